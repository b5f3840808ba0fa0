/**
 * @accordo/executor
 *
 * Cursor implementations: a Kysely-backed cursor with controlled
 * transactions and a logging decorator.
 *
 * @example
 * import { createKyselyCursor, createLoggingCursor } from '@accordo/executor'
 * import { consoleLogger } from '@accordo/core'
 *
 * const cursor = createLoggingCursor(createKyselyCursor(db, { dialect: 'postgres' }), {
 *   logger: consoleLogger
 * })
 */

export { KyselyCursor, createKyselyCursor } from './kysely-cursor.js'
export { createLoggingCursor } from './logging-cursor.js'
export {
  KyselyCursorOptionsSchema,
  LoggingCursorOptionsSchema,
  type KyselyCursorOptions,
  type LoggingCursorOptions
} from './options.js'
