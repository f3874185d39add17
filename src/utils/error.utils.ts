/**
 * @fileoverview Structured error handling for the backend core.
 *
 * AppError carries a typed ErrorCode, optional context and the wrapped
 * original error. Factories cover the failure categories the reconciliation
 * layer distinguishes:
 * - Transport: NETWORK, TIMEOUT, BACKEND_HTTP_STATUS
 * - Backend actions: BACKEND_OPERATION_FAILED, BACKEND_UNSUPPORTED
 * - Validation: VALIDATION (zod), CONFIG_SAVE_FAILED
 *
 * Payload ambiguity is never an error; parsers fall back to heuristics.
 */

import { ZodError } from 'zod';

// ============================================================================
// ERROR TYPES
// ============================================================================

export enum ErrorCode {
  // General errors
  UNKNOWN = 'UNKNOWN',
  VALIDATION = 'VALIDATION',
  NETWORK = 'NETWORK',
  TIMEOUT = 'TIMEOUT',

  // Backend errors
  BACKEND_NOT_INITIALIZED = 'BACKEND_NOT_INITIALIZED',
  BACKEND_HTTP_STATUS = 'BACKEND_HTTP_STATUS',
  BACKEND_OPERATION_FAILED = 'BACKEND_OPERATION_FAILED',
  BACKEND_UNSUPPORTED = 'BACKEND_UNSUPPORTED',

  // File errors
  FILE_NOT_FOUND = 'FILE_NOT_FOUND',

  // Configuration errors
  CONFIG_SAVE_FAILED = 'CONFIG_SAVE_FAILED',
}

const TRANSPORT_CODES: ReadonlySet<ErrorCode> = new Set([
  ErrorCode.NETWORK,
  ErrorCode.TIMEOUT,
  ErrorCode.BACKEND_HTTP_STATUS,
]);

// ============================================================================
// CUSTOM ERROR CLASS
// ============================================================================

export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly context?: Record<string, unknown>;
  public readonly timestamp: Date;
  public readonly originalError?: Error;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    context?: Record<string, unknown>,
    originalError?: Error
  ) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.context = context;
    this.timestamp = new Date();
    this.originalError = originalError;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AppError);
    }
  }

  /**
   * True for failures recovered by backoff and retry.
   */
  public get isTransport(): boolean {
    return TRANSPORT_CODES.has(this.code);
  }

  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      timestamp: this.timestamp,
      originalError: this.originalError
        ? { name: this.originalError.name, message: this.originalError.message }
        : undefined,
    };
  }
}

// ============================================================================
// ERROR FACTORIES
// ============================================================================

export function fromZodError(error: ZodError, code: ErrorCode = ErrorCode.VALIDATION): AppError {
  const issues = error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
    code: issue.code,
  }));

  return new AppError('Validation failed', code, { issues }, error);
}

export function networkError(message: string, context?: Record<string, unknown>, cause?: Error): AppError {
  return new AppError(message, ErrorCode.NETWORK, context, cause);
}

export function timeoutError(operation: string, timeoutMs: number): AppError {
  return new AppError(`Operation timed out after ${timeoutMs}ms`, ErrorCode.TIMEOUT, { operation, timeoutMs });
}

/**
 * Non-2xx response from a backend endpoint
 */
export function httpStatusError(operation: string, status: number, body?: string): AppError {
  return new AppError(`${operation} failed: HTTP ${status}`, ErrorCode.BACKEND_HTTP_STATUS, {
    operation,
    status,
    body,
  });
}

export function backendError(message: string, operation: string, context?: Record<string, unknown>): AppError {
  return new AppError(message, ErrorCode.BACKEND_OPERATION_FAILED, { operation, ...context });
}

export function unsupportedError(operation: string, backend: string): AppError {
  return new AppError(`${operation} is not supported by the ${backend} backend`, ErrorCode.BACKEND_UNSUPPORTED, {
    operation,
    backend,
  });
}

// ============================================================================
// ERROR HANDLING UTILITIES
// ============================================================================

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function toAppError(error: unknown, defaultCode: ErrorCode = ErrorCode.UNKNOWN): AppError {
  if (isAppError(error)) {
    return error;
  }

  if (error instanceof ZodError) {
    return fromZodError(error);
  }

  if (error instanceof Error) {
    return new AppError(error.message, defaultCode, undefined, error);
  }

  if (typeof error === 'string') {
    return new AppError(error, defaultCode);
  }

  return new AppError('An unknown error occurred', defaultCode, { error });
}
