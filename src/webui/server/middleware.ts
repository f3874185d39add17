/**
 * @fileoverview Express middleware for request logging and error responses.
 *
 * Key exports:
 * - createRequestLogger(): logs method, path, status code and duration
 * - createNotFoundHandler(): JSON 404 for unknown API paths
 * - createErrorMiddleware(): standardized responses for errors escaping a route
 */

import type { NextFunction, Request, Response } from 'express';
import { logError, logVerbose } from '../../utils/logging';
import type { StandardAPIResponse } from '../types/web-api.types';

/**
 * Body parser failures carry the HTTP status they map to
 */
function clientErrorStatus(err: unknown): number | null {
  if (typeof err !== 'object' || err === null || !('status' in err)) {
    return null;
  }
  const status = err.status;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
}

export function createRequestLogger() {
  return (req: Request, res: Response, next: NextFunction): void => {
    const start = Date.now();

    res.on('finish', () => {
      const duration = Date.now() - start;
      logVerbose('WebUI', `${req.method} ${req.path} - ${res.statusCode} (${duration}ms)`);
    });

    next();
  };
}

export function createNotFoundHandler() {
  return (req: Request, res: Response): void => {
    const response: StandardAPIResponse = {
      success: false,
      error: `API endpoint not found: ${req.method} ${req.baseUrl}${req.path}`,
    };
    res.status(404).json(response);
  };
}

/**
 * Error handling middleware
 */
export function createErrorMiddleware() {
  return (err: unknown, _req: Request, res: Response, _next: NextFunction): void => {
    const clientStatus = clientErrorStatus(err);
    if (clientStatus !== null) {
      const response: StandardAPIResponse = {
        success: false,
        error: err instanceof Error ? err.message : 'Bad request',
      };
      res.status(clientStatus).json(response);
      return;
    }

    logError('WebUI', 'Express error:', err);
    const response: StandardAPIResponse = {
      success: false,
      error: 'Internal server error',
    };
    res.status(500).json(response);
  };
}
