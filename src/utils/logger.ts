/**
 * Logger utility for memcql
 *
 * Provides a consistent logging interface that can be configured
 * at runtime. Defaults to noop logger, can be switched to a console
 * logger for development/debugging.
 *
 * @module utils/logger
 */

/**
 * Logger interface for consistent logging across the codebase
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, error?: unknown, ...args: unknown[]): void
}

/**
 * Log levels in increasing severity. `silent` disables output.
 */
export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

/**
 * Console logger implementation
 * Outputs to console with appropriate log levels
 */
export const consoleLogger: Logger = {
  debug(message: string, ...args: unknown[]): void {
    console.debug(`[DEBUG] ${message}`, ...args)
  },
  info(message: string, ...args: unknown[]): void {
    console.info(`[INFO] ${message}`, ...args)
  },
  warn(message: string, ...args: unknown[]): void {
    console.warn(`[WARN] ${message}`, ...args)
  },
  error(message: string, error?: unknown, ...args: unknown[]): void {
    if (error !== undefined) {
      console.error(`[ERROR] ${message}`, error, ...args)
    } else {
      console.error(`[ERROR] ${message}`, ...args)
    }
  },
}

/**
 * Noop logger implementation
 * Silently discards all log messages (the default)
 */
export const noopLogger: Logger = {
  debug(): void {},
  info(): void {},
  warn(): void {},
  error(): void {},
}

/**
 * Wrap a logger so that messages below `level` are dropped.
 */
export function createLevelLogger(level: LogLevel, target: Logger = consoleLogger): Logger {
  if (level === 'silent') return noopLogger
  const threshold = LOG_LEVELS.indexOf(level)
  const enabled = (l: LogLevel): boolean => LOG_LEVELS.indexOf(l) >= threshold

  return {
    debug(message, ...args) {
      if (enabled('debug')) target.debug(message, ...args)
    },
    info(message, ...args) {
      if (enabled('info')) target.info(message, ...args)
    },
    warn(message, ...args) {
      if (enabled('warn')) target.warn(message, ...args)
    },
    error(message, error, ...args) {
      if (enabled('error')) target.error(message, error, ...args)
    },
  }
}

/**
 * Global logger instance
 * Defaults to noopLogger
 */
export let logger: Logger = noopLogger

/**
 * Set the global logger instance
 *
 * @example
 * ```typescript
 * import { setLogger, consoleLogger } from './utils/logger'
 *
 * // Enable console logging for development
 * setLogger(consoleLogger)
 *
 * // Or use a custom logger
 * setLogger({
 *   debug: (msg) => myDebugFn(msg),
 *   info: (msg) => myInfoFn(msg),
 *   warn: (msg) => myWarnFn(msg),
 *   error: (msg, err) => myErrorFn(msg, err),
 * })
 * ```
 */
export function setLogger(l: Logger): void {
  logger = l
}
