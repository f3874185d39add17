/**
 * @fileoverview Tests for error utilities
 */

import { describe, it, expect } from '@jest/globals';
import { z, ZodError } from 'zod';
import {
  AppError,
  ErrorCode,
  fromZodError,
  networkError,
  timeoutError,
  httpStatusError,
  backendError,
  unsupportedError,
  isAppError,
  toAppError,
} from './error.utils';

function makeZodError(): ZodError {
  const result = z.object({ name: z.string() }).safeParse({ name: 42 });
  if (result.success) {
    throw new Error('expected validation failure');
  }
  return result.error;
}

describe('AppError', () => {
  it('should create error with message, code and context', () => {
    const error = new AppError('Test error', ErrorCode.NETWORK, { host: 'localhost' });

    expect(error.message).toBe('Test error');
    expect(error.code).toBe(ErrorCode.NETWORK);
    expect(error.name).toBe('AppError');
    expect(error.context).toEqual({ host: 'localhost' });
    expect(error.timestamp).toBeInstanceOf(Date);
  });

  it('should default to UNKNOWN', () => {
    expect(new AppError('x').code).toBe(ErrorCode.UNKNOWN);
  });

  it('should flag transport failures', () => {
    expect(new AppError('a', ErrorCode.NETWORK).isTransport).toBe(true);
    expect(new AppError('a', ErrorCode.TIMEOUT).isTransport).toBe(true);
    expect(new AppError('a', ErrorCode.BACKEND_HTTP_STATUS).isTransport).toBe(true);
    expect(new AppError('a', ErrorCode.BACKEND_UNSUPPORTED).isTransport).toBe(false);
  });

  describe('toJSON', () => {
    it('should serialize to plain object', () => {
      const error = new AppError('Test error', ErrorCode.NETWORK, { test: 'value' });

      expect(error.toJSON()).toEqual({
        name: 'AppError',
        message: 'Test error',
        code: ErrorCode.NETWORK,
        context: { test: 'value' },
        timestamp: error.timestamp,
        originalError: undefined,
      });
    });

    it('should serialize original error', () => {
      const error = new AppError('Test', ErrorCode.UNKNOWN, undefined, new Error('Original'));

      expect(error.toJSON().originalError).toEqual({ name: 'Error', message: 'Original' });
    });
  });
});

describe('Error Factory Functions', () => {
  it('fromZodError should list issues', () => {
    const appError = fromZodError(makeZodError());

    expect(appError.code).toBe(ErrorCode.VALIDATION);
    expect(appError.message).toBe('Validation failed');
    expect(appError.context?.issues).toEqual([
      { path: 'name', message: 'Expected string, received number', code: 'invalid_type' },
    ]);
  });

  it('fromZodError should allow custom error code', () => {
    expect(fromZodError(new ZodError([]), ErrorCode.BACKEND_OPERATION_FAILED).code).toBe(ErrorCode.BACKEND_OPERATION_FAILED);
  });

  it('networkError should keep context and cause', () => {
    const cause = new Error('socket hang up');
    const error = networkError('Connection failed', { url: 'http://printer.local/status' }, cause);

    expect(error.code).toBe(ErrorCode.NETWORK);
    expect(error.context).toEqual({ url: 'http://printer.local/status' });
    expect(error.originalError).toBe(cause);
  });

  it('timeoutError should describe the operation', () => {
    const error = timeoutError('GET /status', 5000);

    expect(error.code).toBe(ErrorCode.TIMEOUT);
    expect(error.message).toBe('Operation timed out after 5000ms');
    expect(error.context).toEqual({ operation: 'GET /status', timeoutMs: 5000 });
  });

  it('httpStatusError should carry the status', () => {
    const error = httpStatusError('GET /files', 503, 'busy');

    expect(error.code).toBe(ErrorCode.BACKEND_HTTP_STATUS);
    expect(error.message).toBe('GET /files failed: HTTP 503');
    expect(error.context).toEqual({ operation: 'GET /files', status: 503, body: 'busy' });
  });

  it('backendError should merge additional context', () => {
    const error = backendError('Failed', 'cancelPrint', { attempt: 3 });

    expect(error.code).toBe(ErrorCode.BACKEND_OPERATION_FAILED);
    expect(error.context).toEqual({ operation: 'cancelPrint', attempt: 3 });
  });

  it('unsupportedError should name the operation and backend', () => {
    const error = unsupportedError('manualCure', 'NanoDLP');
    expect(error.message).toBe('manualCure is not supported by the NanoDLP backend');
    expect(error.code).toBe(ErrorCode.BACKEND_UNSUPPORTED);
    expect(error.context).toEqual({ operation: 'manualCure', backend: 'NanoDLP' });
  });
});

describe('Error Handling Utilities', () => {
  it('isAppError should only accept AppError instances', () => {
    expect(isAppError(new AppError('Test'))).toBe(true);
    expect(isAppError(new Error('Test'))).toBe(false);
    expect(isAppError('string')).toBe(false);
    expect(isAppError(null)).toBe(false);
  });

  describe('toAppError', () => {
    it('should return AppError as-is', () => {
      const original = new AppError('Test', ErrorCode.NETWORK);
      expect(toAppError(original)).toBe(original);
    });

    it('should convert ZodError', () => {
      expect(toAppError(makeZodError()).code).toBe(ErrorCode.VALIDATION);
    });

    it('should wrap Error with the default code', () => {
      const original = new Error('Test error');
      const converted = toAppError(original, ErrorCode.TIMEOUT);

      expect(converted.message).toBe('Test error');
      expect(converted.code).toBe(ErrorCode.TIMEOUT);
      expect(converted.originalError).toBe(original);
    });

    it('should convert strings and unknown values', () => {
      expect(toAppError('String error').message).toBe('String error');

      const converted = toAppError({ custom: 'object' });
      expect(converted.message).toBe('An unknown error occurred');
      expect(converted.context).toEqual({ error: { custom: 'object' } });
    });
  });
});
