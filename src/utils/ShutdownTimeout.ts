/**
 * @fileoverview Deadlines for graceful shutdown.
 *
 * An unreachable printer or a stuck HTTP connection must not keep the
 * process alive after SIGINT/SIGTERM.
 *
 * Key exports:
 * - withTimeout(): rejects with a TIMEOUT AppError once the deadline passes
 * - createHardDeadline(): exits the process if shutdown overruns
 */

import { AppError, ErrorCode } from './error.utils';
import { logError, logWarning } from './logging';

/**
 * Race a promise against a timeout
 *
 * @example
 * ```typescript
 * await withTimeout(webUIManager.dispose(), { timeoutMs: 5000, operation: 'stop WebUI' });
 * ```
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  options: { timeoutMs: number; operation: string; silent?: boolean }
): Promise<T> {
  const { timeoutMs, operation, silent = false } = options;
  let timeoutHandle: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutHandle = setTimeout(() => {
      if (!silent) {
        logWarning('Shutdown', `Timeout: ${operation} (${timeoutMs}ms)`);
      }
      reject(new AppError(`Timeout: ${operation} exceeded ${timeoutMs}ms`, ErrorCode.TIMEOUT, { operation, timeoutMs }));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timeoutHandle);
  }
}

/**
 * Force `process.exit(1)` after `timeoutMs`. Clear the handle once shutdown
 * has finished.
 */
export function createHardDeadline(timeoutMs: number): NodeJS.Timeout {
  const handle = setTimeout(() => {
    logError('Shutdown', `Hard deadline (${timeoutMs}ms) exceeded - forcing exit`);
    process.exit(1);
  }, timeoutMs);
  handle.unref();
  return handle;
}
