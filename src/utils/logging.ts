/**
 * @fileoverview Namespaced console logging.
 *
 * Every service logs through a namespace prefix (`[StatusProvider] ...`).
 * Verbose output is only printed when DEBUG is set or NODE_ENV is
 * `development`; polling loops log each cycle at that level.
 */

export function isVerboseLoggingEnabled(): boolean {
  return Boolean(process.env.DEBUG) || process.env.NODE_ENV === 'development';
}

/**
 * Log verbose debug message with namespace
 */
export function logVerbose(namespace: string, message: string, ...args: unknown[]): void {
  if (isVerboseLoggingEnabled()) {
    console.debug(`[${namespace}]`, message, ...args);
  }
}

export function logInfo(namespace: string, message: string, ...args: unknown[]): void {
  console.info(`[${namespace}]`, message, ...args);
}

export function logWarning(namespace: string, message: string, ...args: unknown[]): void {
  console.warn(`[${namespace}]`, message, ...args);
}

export function logError(namespace: string, message: string, ...args: unknown[]): void {
  console.error(`[${namespace}]`, message, ...args);
}

export interface NamespacedLogger {
  readonly namespace: string;
  verbose(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * Bind the logging helpers to one namespace.
 */
export function createLogger(namespace: string): NamespacedLogger {
  return {
    namespace,
    verbose: (message, ...args) => logVerbose(namespace, message, ...args),
    info: (message, ...args) => logInfo(namespace, message, ...args),
    warn: (message, ...args) => logWarning(namespace, message, ...args),
    error: (message, ...args) => logError(namespace, message, ...args),
  };
}
