/**
 * Logger utility for the blog
 *
 * Provides a consistent logging interface that can be configured
 * at runtime. Defaults to noop logger so the store and renderer stay
 * silent when used as a library; the server entry point installs a
 * console logger at the configured level.
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
 * Log levels in increasing order of severity
 */
export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const

export type LogLevel = typeof LOG_LEVELS[number]

/**
 * Noop logger implementation
 * Silently discards all log messages (default)
 */
export const noopLogger: Logger = {
  debug(): void {},
  info(): void {},
  warn(): void {},
  error(): void {},
}

/**
 * Create a console logger that drops messages below `minLevel`
 *
 * @example
 * ```typescript
 * setLogger(createConsoleLogger('warn'))
 * logger.info('dropped')
 * logger.warn('printed')
 * ```
 */
export function createConsoleLogger(minLevel: LogLevel = 'debug'): Logger {
  const threshold = LOG_LEVELS.indexOf(minLevel)
  const enabled = (level: LogLevel): boolean => LOG_LEVELS.indexOf(level) >= threshold

  return {
    debug(message: string, ...args: unknown[]): void {
      if (enabled('debug')) console.debug(`[DEBUG] ${message}`, ...args)
    },
    info(message: string, ...args: unknown[]): void {
      if (enabled('info')) console.info(`[INFO] ${message}`, ...args)
    },
    warn(message: string, ...args: unknown[]): void {
      if (enabled('warn')) console.warn(`[WARN] ${message}`, ...args)
    },
    error(message: string, error?: unknown, ...args: unknown[]): void {
      if (!enabled('error')) return
      if (error !== undefined) {
        console.error(`[ERROR] ${message}`, error, ...args)
      } else {
        console.error(`[ERROR] ${message}`, ...args)
      }
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
 * import { setLogger, createConsoleLogger } from './utils/logger'
 *
 * setLogger(createConsoleLogger('info'))
 * ```
 */
export function setLogger(l: Logger): void {
  logger = l
}
