/**
 * In-memory SQLite database for tests.
 *
 * @module @accordo/testing
 */

import { Kysely, SqliteDialect } from 'kysely'
import BetterSqlite3 from 'better-sqlite3'
import type { AccordoLogger } from '@accordo/core'
import { createKyselyCursor, type KyselyCursor } from '@accordo/executor'

export interface TestDatabase<DB> {
  /** The raw better-sqlite3 handle */
  sqlite: BetterSqlite3.Database
  db: Kysely<DB>
  cursor: KyselyCursor<DB>
  destroy(): Promise<void>
}

export interface TestDatabaseOptions {
  /** Enforce foreign keys (default: true) */
  foreignKeys?: boolean | undefined
  logger?: AccordoLogger | undefined
}

/**
 * Open a fresh in-memory database with a Kysely instance and a cursor over
 * it.
 *
 * @example
 * ```typescript
 * let database: TestDatabase<Record<string, never>>
 *
 * beforeEach(() => {
 *   database = createTestDatabase()
 * })
 *
 * afterEach(async () => {
 *   await database.destroy()
 * })
 *
 * it('creates the schema', async () => {
 *   await sales.create(database.cursor)
 * })
 * ```
 */
export function createTestDatabase<DB = Record<string, never>>(
  options: TestDatabaseOptions = {}
): TestDatabase<DB> {
  const sqlite = new BetterSqlite3(':memory:')
  sqlite.pragma(`foreign_keys = ${(options.foreignKeys ?? true) ? 'ON' : 'OFF'}`)
  const db = new Kysely<DB>({ dialect: new SqliteDialect({ database: sqlite }) })
  const cursor = createKyselyCursor(db, { dialect: 'sqlite', logger: options.logger })

  return {
    sqlite,
    db,
    cursor,
    destroy: async () => {
      await db.destroy()
    }
  }
}
