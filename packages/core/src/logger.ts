import { getEnv } from './helpers.js'

/**
 * Logging interface shared by the Accordo packages.
 *
 * Levels, from least to most severe: `trace`, `debug`, `info`, `warn`,
 * `error`, `fatal`. Any logging library can be plugged in by mapping its
 * methods onto this shape.
 *
 * @example
 * ```typescript
 * import pino from 'pino'
 * import type { AccordoLogger } from '@accordo/core'
 *
 * const base = pino()
 * const logger: AccordoLogger = {
 *   trace: (msg, ...args) => base.trace({ args }, msg),
 *   debug: (msg, ...args) => base.debug({ args }, msg),
 *   info: (msg, ...args) => base.info({ args }, msg),
 *   warn: (msg, ...args) => base.warn({ args }, msg),
 *   error: (msg, ...args) => base.error({ args }, msg),
 *   fatal: (msg, ...args) => base.fatal({ args }, msg)
 * }
 *
 * const CreateOrder = defineTransaction({ name: 'CreateOrder', logger, ... })
 * ```
 */
export interface AccordoLogger {
  trace(message: string, ...args: unknown[]): void
  debug(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, ...args: unknown[]): void
  fatal(message: string, ...args: unknown[]): void
}

export type LogLevel = keyof AccordoLogger

export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal']

/**
 * Whether `value` implements every method of `AccordoLogger`
 */
export function isLogger(value: unknown): value is AccordoLogger {
  if (typeof value !== 'object' || value === null) {
    return false
  }
  return LOG_LEVELS.every(level => typeof Reflect.get(value, level) === 'function')
}

/**
 * Console-backed logger. Every message is prefixed with `[accordo:level]`.
 *
 * @example
 * ```typescript
 * consoleLogger.info('committed', { transaction: 'CreateOrder' })
 * // Output: [accordo:info] committed { transaction: 'CreateOrder' }
 * ```
 */
export const consoleLogger: AccordoLogger = {
  trace: (msg, ...args) => console.debug(`[accordo:trace] ${msg}`, ...args),
  debug: (msg, ...args) => console.debug(`[accordo:debug] ${msg}`, ...args),
  info: (msg, ...args) => console.info(`[accordo:info] ${msg}`, ...args),
  warn: (msg, ...args) => console.warn(`[accordo:warn] ${msg}`, ...args),
  error: (msg, ...args) => console.error(`[accordo:error] ${msg}`, ...args),
  fatal: (msg, ...args) => console.error(`[accordo:fatal] FATAL: ${msg}`, ...args)
}

/**
 * No-op logger. Used by every package when no logger is supplied.
 */
export const silentLogger: AccordoLogger = {
  trace: () => {
    /* intentionally empty */
  },
  debug: () => {
    /* intentionally empty */
  },
  info: () => {
    /* intentionally empty */
  },
  warn: () => {
    /* intentionally empty */
  },
  error: () => {
    /* intentionally empty */
  },
  fatal: () => {
    /* intentionally empty */
  }
}

/**
 * Create a logger that adds `[prefix]` in front of every message.
 *
 * @example
 * ```typescript
 * const txLogger = createPrefixedLogger('CreateOrder', consoleLogger)
 * txLogger.debug('state -> verified')
 * // Output: [accordo:debug] [CreateOrder] state -> verified
 * ```
 */
export function createPrefixedLogger(
  prefix: string,
  baseLogger: AccordoLogger = consoleLogger
): AccordoLogger {
  return {
    trace: (msg, ...args) => baseLogger.trace(`[${prefix}] ${msg}`, ...args),
    debug: (msg, ...args) => baseLogger.debug(`[${prefix}] ${msg}`, ...args),
    info: (msg, ...args) => baseLogger.info(`[${prefix}] ${msg}`, ...args),
    warn: (msg, ...args) => baseLogger.warn(`[${prefix}] ${msg}`, ...args),
    error: (msg, ...args) => baseLogger.error(`[${prefix}] ${msg}`, ...args),
    fatal: (msg, ...args) => baseLogger.fatal(`[${prefix}] ${msg}`, ...args)
  }
}

/**
 * Create a logger that drops every message below `level`.
 */
export function createLevelLogger(
  level: LogLevel,
  baseLogger: AccordoLogger = consoleLogger
): AccordoLogger {
  const threshold = LOG_LEVELS.indexOf(level)
  const forward =
    (target: LogLevel) =>
    (msg: string, ...args: unknown[]): void => {
      if (LOG_LEVELS.indexOf(target) >= threshold) {
        baseLogger[target](msg, ...args)
      }
    }

  return {
    trace: forward('trace'),
    debug: forward('debug'),
    info: forward('info'),
    warn: forward('warn'),
    error: forward('error'),
    fatal: forward('fatal')
  }
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value)
}

/**
 * Read the `ACCORDO_LOG_LEVEL` environment variable.
 *
 * Returns `undefined` when the variable is unset or holds an unknown level.
 */
export function getLogLevel(): LogLevel | undefined {
  const raw = getEnv('ACCORDO_LOG_LEVEL')?.trim().toLowerCase()
  return raw && isLogLevel(raw) ? raw : undefined
}

/**
 * Logger used when the caller passes none: silent, unless
 * `ACCORDO_LOG_LEVEL` asks for console output at some level.
 */
export function getDefaultLogger(): AccordoLogger {
  const level = getLogLevel()
  return level ? createLevelLogger(level, consoleLogger) : silentLogger
}
