/**
 * @fileoverview Shared helpers and dependency contracts for API route modules.
 *
 * Centralizes request validation and error responses so each route module
 * only deals with its own backend calls. Backend failures map to HTTP
 * status codes by ErrorCode.
 */

import type { Response } from 'express';
import type { z } from 'zod';
import type { BackendService } from '../../../printer-backends/BackendService';
import type { AnalyticsPoller } from '../../../services/AnalyticsPoller';
import type { StatusProvider } from '../../../services/StatusProvider';
import type { ThumbnailService } from '../../../services/ThumbnailService';
import { ErrorCode, toAppError } from '../../../utils/error.utils';
import { logError } from '../../../utils/logging';
import type { FileLocation } from '../../../types/backend-client';
import { firstIssueMessage } from '../../schemas/web-api.schemas';
import type { StandardAPIResponse } from '../../types/web-api.types';

/**
 * Services shared across route modules
 */
export interface RouteDependencies {
  readonly backend: BackendService;
  readonly statusProvider: StatusProvider;
  readonly thumbnails: ThumbnailService;
  /** Absent when the backend has no analytics */
  readonly analytics: AnalyticsPoller | null;
}

const STATUS_BY_ERROR_CODE: Partial<Record<ErrorCode, number>> = {
  [ErrorCode.VALIDATION]: 400,
  [ErrorCode.FILE_NOT_FOUND]: 404,
  [ErrorCode.BACKEND_UNSUPPORTED]: 501,
  [ErrorCode.BACKEND_HTTP_STATUS]: 502,
  [ErrorCode.BACKEND_OPERATION_FAILED]: 502,
  [ErrorCode.NETWORK]: 502,
  [ErrorCode.TIMEOUT]: 504,
  [ErrorCode.BACKEND_NOT_INITIALIZED]: 503,
};

export function httpStatusForError(code: ErrorCode): number {
  return STATUS_BY_ERROR_CODE[code] ?? 500;
}

/**
 * Convenience helper for returning standardized error payloads
 */
export function sendErrorResponse(res: Response, statusCode: number, message: string): void {
  const payload: StandardAPIResponse = {
    success: false,
    error: message,
  };
  res.status(statusCode).json(payload);
}

/**
 * Log and answer a failed backend call
 */
export function handleRouteError(res: Response, error: unknown, operation: string): void {
  const appError = toAppError(error);
  const statusCode = httpStatusForError(appError.code);
  if (statusCode >= 500) {
    logError('WebUI', `${operation} failed:`, appError.message);
  }
  sendErrorResponse(res, statusCode, appError.message);
}

/**
 * Parse a request part, answering 400 on failure. Returns null when a
 * response has already been sent.
 */
export function parseRequest<T extends z.ZodTypeAny>(
  schema: T,
  value: unknown,
  res: Response
): z.infer<T> | null {
  const result = schema.safeParse(value);
  if (!result.success) {
    sendErrorResponse(res, 400, firstIssueMessage(result.error));
    return null;
  }
  return result.data;
}

/**
 * Explicit location, else the backend default
 */
export async function resolveLocation(deps: RouteDependencies, location: FileLocation | undefined): Promise<FileLocation> {
  return location ?? (await deps.backend.defaultLocation());
}
