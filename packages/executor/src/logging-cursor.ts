import type { Cursor, DriverValue, IsolationLevel, Row } from '@accordo/core'
import { LoggingCursorOptionsSchema, type LoggingCursorOptions } from './options.js'

/**
 * Wrap a cursor so every statement and transaction boundary is logged.
 * Failures are logged at `error` and rethrown unchanged.
 *
 * @example
 * ```typescript
 * const cursor = createLoggingCursor(createKyselyCursor(db), {
 *   logger: consoleLogger,
 *   logParameters: true
 * })
 * ```
 */
export function createLoggingCursor(inner: Cursor, options: LoggingCursorOptions): Cursor {
  const { logger, logParameters, level } = LoggingCursorOptionsSchema.parse(options)
  const log = (message: string, ...args: unknown[]): void => logger[level](message, ...args)

  return {
    async execute(sql: string, parameters: readonly DriverValue[] = []): Promise<Row[]> {
      if (logParameters) {
        log(`SQL: ${sql}`, parameters)
      } else {
        log(`SQL: ${sql}`)
      }
      try {
        const rows = await inner.execute(sql, parameters)
        logger.trace(`${rows.length} row(s) returned`)
        return rows
      } catch (error) {
        logger.error(`Statement failed: ${sql}`, error)
        throw error
      }
    },

    async begin(isolation?: IsolationLevel): Promise<void> {
      log(isolation ? `BEGIN (${isolation})` : 'BEGIN')
      await inner.begin(isolation)
    },

    async commit(): Promise<void> {
      log('COMMIT')
      await inner.commit()
    },

    async rollback(): Promise<void> {
      log('ROLLBACK')
      await inner.rollback()
    }
  }
}
