import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { Kysely, SqliteDialect } from 'kysely'
import BetterSqlite3 from 'better-sqlite3'
import {
  DatabaseError,
  NotNullError,
  UniqueConstraintError,
  type AccordoLogger
} from '@accordo/core'
import { KyselyCursor, createKyselyCursor, KyselyCursorOptionsSchema } from '../src/index.js'

interface TestDatabase {
  customers: {
    id: number
    email: string
    name: string
  }
}

function createMockLogger(): AccordoLogger {
  return {
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn()
  }
}

describe('KyselyCursor', () => {
  let db: Kysely<TestDatabase>
  let cursor: KyselyCursor<TestDatabase>

  beforeEach(async () => {
    const sqlite = new BetterSqlite3(':memory:')
    db = new Kysely<TestDatabase>({ dialect: new SqliteDialect({ database: sqlite }) })
    cursor = createKyselyCursor(db)
    await cursor.execute(
      'CREATE TABLE customers (id INTEGER PRIMARY KEY, email TEXT NOT NULL UNIQUE, name TEXT NOT NULL)'
    )
  })

  afterEach(async () => {
    await db.destroy()
  })

  it('executes parametrised statements and returns rows', async () => {
    await cursor.execute('INSERT INTO customers (id, email, name) VALUES (?, ?, ?)', [
      1,
      'ada@example.com',
      'Ada'
    ])

    const rows = await cursor.execute('SELECT id, email, name FROM customers WHERE id = ?', [1])

    expect(rows).toEqual([{ id: 1, email: 'ada@example.com', name: 'Ada' }])
  })

  it('returns no rows for statements without results', async () => {
    const rows = await cursor.execute('DELETE FROM customers')
    expect(rows).toEqual([])
  })

  it('keeps committed work', async () => {
    await cursor.begin()
    expect(cursor.inTransaction).toBe(true)
    await cursor.execute("INSERT INTO customers (id, email, name) VALUES (1, 'a@example.com', 'A')")
    await cursor.commit()

    expect(cursor.inTransaction).toBe(false)
    const rows = await db.selectFrom('customers').selectAll().execute()
    expect(rows).toHaveLength(1)
  })

  it('discards rolled back work', async () => {
    await cursor.begin()
    await cursor.execute("INSERT INTO customers (id, email, name) VALUES (1, 'a@example.com', 'A')")
    await cursor.rollback()

    const rows = await db.selectFrom('customers').selectAll().execute()
    expect(rows).toEqual([])
  })

  it('refuses to open a second transaction', async () => {
    await cursor.begin()
    await expect(cursor.begin()).rejects.toThrow('A transaction is already open on this cursor')
    await cursor.rollback()
  })

  it('refuses to commit or roll back without a transaction', async () => {
    await expect(cursor.commit()).rejects.toThrow(
      'Cannot commit: no transaction is open on this cursor'
    )
    await expect(cursor.rollback()).rejects.toBeInstanceOf(DatabaseError)
  })

  it('parses unique violations', async () => {
    await cursor.execute("INSERT INTO customers (id, email, name) VALUES (1, 'a@example.com', 'A')")

    const failure = cursor.execute(
      "INSERT INTO customers (id, email, name) VALUES (2, 'a@example.com', 'B')"
    )

    await expect(failure).rejects.toBeInstanceOf(UniqueConstraintError)
    await expect(failure).rejects.toMatchObject({
      code: 'DB_UNIQUE_VIOLATION',
      table: 'customers',
      columns: ['email']
    })
  })

  it('parses not-null violations', async () => {
    const failure = cursor.execute('INSERT INTO customers (id, email, name) VALUES (?, ?, ?)', [
      1,
      'a@example.com',
      null
    ])

    await expect(failure).rejects.toBeInstanceOf(NotNullError)
    await expect(failure).rejects.toMatchObject({ column: 'name', table: 'customers' })
  })

  it('logs transaction boundaries', async () => {
    const logger = createMockLogger()
    const logged = createKyselyCursor(db, { logger })

    await logged.begin()
    await logged.commit()

    expect(logger.debug).toHaveBeenCalledWith('Transaction opened', { isolation: undefined })
    expect(logger.debug).toHaveBeenCalledWith('Transaction committed')
  })
})

describe('KyselyCursorOptionsSchema', () => {
  it('defaults the dialect to sqlite', () => {
    expect(KyselyCursorOptionsSchema.parse({})).toEqual({ dialect: 'sqlite' })
  })

  it('rejects unknown dialects and malformed loggers', () => {
    expect(KyselyCursorOptionsSchema.safeParse({ dialect: 'oracle' }).success).toBe(false)
    expect(KyselyCursorOptionsSchema.safeParse({ logger: { info: () => undefined } }).success).toBe(
      false
    )
  })
})
