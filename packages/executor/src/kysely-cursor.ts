/**
 * Cursor over a Kysely instance.
 *
 * @module @accordo/executor
 */

import { CompiledQuery, type ControlledTransaction, type Kysely } from 'kysely'
import {
  DatabaseError,
  parseDatabaseError,
  silentLogger,
  type AccordoLogger,
  type Cursor,
  type DriverDialect,
  type DriverValue,
  type IsolationLevel,
  type Row
} from '@accordo/core'
import { KyselyCursorOptionsSchema, type KyselyCursorOptions } from './options.js'

function isRow(value: unknown): value is Row {
  return typeof value === 'object' && value !== null
}

/**
 * Runs raw statements through Kysely. `begin` opens a controlled
 * transaction that holds one connection until `commit` or `rollback`;
 * outside it each statement runs on its own.
 *
 * Driver failures are rethrown as `DatabaseError` subclasses.
 */
export class KyselyCursor<DB> implements Cursor {
  readonly dialect: DriverDialect
  private readonly logger: AccordoLogger
  private transaction: ControlledTransaction<DB> | undefined

  constructor(
    private readonly db: Kysely<DB>,
    options: KyselyCursorOptions = {}
  ) {
    const parsed = KyselyCursorOptionsSchema.parse(options)
    this.dialect = parsed.dialect
    this.logger = parsed.logger ?? silentLogger
  }

  get inTransaction(): boolean {
    return this.transaction !== undefined
  }

  async execute(sql: string, parameters: readonly DriverValue[] = []): Promise<Row[]> {
    const executor = this.transaction ?? this.db
    try {
      const result = await executor.executeQuery(CompiledQuery.raw(sql, [...parameters]))
      return result.rows.filter(isRow)
    } catch (error) {
      throw parseDatabaseError(error, this.dialect)
    }
  }

  async begin(isolation?: IsolationLevel): Promise<void> {
    if (this.transaction) {
      throw new DatabaseError('A transaction is already open on this cursor')
    }
    const builder = isolation
      ? this.db.startTransaction().setIsolationLevel(isolation)
      : this.db.startTransaction()
    try {
      this.transaction = await builder.execute()
    } catch (error) {
      throw parseDatabaseError(error, this.dialect)
    }
    this.logger.debug('Transaction opened', { isolation })
  }

  async commit(): Promise<void> {
    const transaction = this.take('commit')
    try {
      await transaction.commit().execute()
    } catch (error) {
      throw parseDatabaseError(error, this.dialect)
    }
    this.logger.debug('Transaction committed')
  }

  async rollback(): Promise<void> {
    const transaction = this.take('rollback')
    try {
      await transaction.rollback().execute()
    } catch (error) {
      throw parseDatabaseError(error, this.dialect)
    }
    this.logger.debug('Transaction rolled back')
  }

  private take(operation: string): ControlledTransaction<DB> {
    const transaction = this.transaction
    if (!transaction) {
      throw new DatabaseError(`Cannot ${operation}: no transaction is open on this cursor`)
    }
    this.transaction = undefined
    return transaction
  }
}

/**
 * Create a cursor over any Kysely instance.
 *
 * @example
 * ```typescript
 * import { Kysely, SqliteDialect } from 'kysely'
 * import Database from 'better-sqlite3'
 * import { createKyselyCursor } from '@accordo/executor'
 *
 * const db = new Kysely<Database>({ dialect: new SqliteDialect({ database: new Database(':memory:') }) })
 * const cursor = createKyselyCursor(db)
 *
 * await CreateOrder.create().insertNew(cursor)
 * ```
 */
export function createKyselyCursor<DB>(db: Kysely<DB>, options: KyselyCursorOptions = {}): KyselyCursor<DB> {
  return new KyselyCursor(db, options)
}
