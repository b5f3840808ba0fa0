/**
 * Zod schemas for cursor options.
 *
 * @module @accordo/executor
 */

import { z } from 'zod'
import { isLogger, type AccordoLogger } from '@accordo/core'

const loggerSchema = z.custom<AccordoLogger>(isLogger, {
  message: 'logger must implement every log level'
})

/**
 * Options of `createKyselyCursor`
 *
 * @example
 * ```typescript
 * const options = KyselyCursorOptionsSchema.parse({ dialect: 'postgres' })
 * ```
 */
export const KyselyCursorOptionsSchema = z.object({
  /** Driver family, used to parse constraint violations (default: sqlite) */
  dialect: z.enum(['postgres', 'mysql', 'sqlite']).default('sqlite'),
  logger: loggerSchema.optional()
})

export type KyselyCursorOptions = z.input<typeof KyselyCursorOptionsSchema>

/**
 * Options of `createLoggingCursor`
 */
export const LoggingCursorOptionsSchema = z.object({
  logger: loggerSchema,
  /** Include bound parameters in statement logs (default: false) */
  logParameters: z.boolean().default(false),
  /** Level statements are logged at (default: debug) */
  level: z.enum(['trace', 'debug', 'info']).default('debug')
})

export type LoggingCursorOptions = z.input<typeof LoggingCursorOptionsSchema>
