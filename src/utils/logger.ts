/**
 * Logging for the engine and its collaborators
 * @module utils/logger
 */

/**
 * Logger used throughout the engine
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void
  info(message: string, context?: Record<string, unknown>): void
  warn(message: string, context?: Record<string, unknown>): void
  error(message: string, context?: Record<string, unknown>): void
}

/**
 * Console levels, lowest first. `'silent'` drops everything.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

export const LOG_LEVELS: readonly LogLevel[] = [
  'debug',
  'info',
  'warn',
  'error',
  'silent',
]

/**
 * Default console logger implementation
 */
export const defaultLogger: Logger = {
  debug: (message: string, context?: Record<string, unknown>) => {
    console.log(`[DEBUG] ${message}`, context ?? '')
  },
  info: (message: string, context?: Record<string, unknown>) => {
    console.log(`[INFO] ${message}`, context ?? '')
  },
  warn: (message: string, context?: Record<string, unknown>) => {
    console.warn(`[WARN] ${message}`, context ?? '')
  },
  error: (message: string, context?: Record<string, unknown>) => {
    console.error(`[ERROR] ${message}`, context ?? '')
  },
}

/**
 * Creates a no-op logger for silent operation
 */
export function createSilentLogger(): Logger {
  const noop = () => {}
  return {
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
  }
}

/**
 * Creates a logger that prefixes messages with a component name
 */
export function createPrefixedLogger(name: string, baseLogger: Logger): Logger {
  const prefix = `[${name}]`
  return {
    debug: (message, context) => baseLogger.debug(`${prefix} ${message}`, context),
    info: (message, context) => baseLogger.info(`${prefix} ${message}`, context),
    warn: (message, context) => baseLogger.warn(`${prefix} ${message}`, context),
    error: (message, context) => baseLogger.error(`${prefix} ${message}`, context),
  }
}

/**
 * Creates a logger that drops messages below `level`
 *
 * @example
 * ```typescript
 * const logger = createLevelLogger('info')
 * logger.debug('dropped')
 * logger.info('written')
 * ```
 */
export function createLevelLogger(
  level: LogLevel,
  baseLogger: Logger = defaultLogger
): Logger {
  const threshold = LOG_LEVELS.indexOf(level)
  const enabled = (messageLevel: LogLevel) =>
    LOG_LEVELS.indexOf(messageLevel) >= threshold && level !== 'silent'
  return {
    debug: (message, context) => {
      if (enabled('debug')) baseLogger.debug(message, context)
    },
    info: (message, context) => {
      if (enabled('info')) baseLogger.info(message, context)
    },
    warn: (message, context) => {
      if (enabled('warn')) baseLogger.warn(message, context)
    },
    error: (message, context) => {
      if (enabled('error')) baseLogger.error(message, context)
    },
  }
}
