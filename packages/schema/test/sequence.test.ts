import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { QueryResultError } from '@accordo/core'
import { mysqlAdapter, postgresAdapter } from '@accordo/dialects'
import { RecordingCursor, createTestDatabase, type TestDatabase } from '@accordo/testing'
import {
  IntField,
  NumericField,
  defineNamespace,
  defineSequence,
  defineTable,
  defineView,
  primaryKey
} from '../src/index.js'

describe('Sequence', () => {
  it('validates its definition', () => {
    expect(() => defineSequence('bad_seq', { increment: 0 })).toThrow(RangeError)
    expect(() => defineSequence('bad_seq', { start: 1.5 })).toThrow(RangeError)
    expect(() => defineSequence('bad-seq')).toThrow('Invalid sequence name: bad-seq')
  })

  it('reads the value of the last nextval statement', async () => {
    const seq = defineSequence('trans_id_seq')
    const cursor = new RecordingCursor().respond('nextval', [{ nextval: '7' }])

    expect(await seq.nextval(cursor, postgresAdapter)).toBe(7)
    expect(cursor.sql).toEqual([`SELECT nextval('"trans_id_seq"') AS nextval`])
  })

  it('fails when the database returns no integer', async () => {
    const seq = defineSequence('trans_id_seq')

    await expect(seq.nextval(new RecordingCursor(), postgresAdapter)).rejects.toBeInstanceOf(
      QueryResultError
    )
    await expect(
      seq.nextval(new RecordingCursor().respond('nextval', [{ nextval: 'x' }]), postgresAdapter)
    ).rejects.toThrow('Sequence trans_id_seq returned no integer value')
  })

  it('emulates sequences where the dialect has none', () => {
    const seq = defineSequence('trans_id_seq', { start: 101, increment: 2 })

    expect(seq.createStatements(mysqlAdapter)[0]).toContain('trans_id_seq')
    expect(seq.createStatements(postgresAdapter)).toEqual([
      'CREATE SEQUENCE IF NOT EXISTS "trans_id_seq" AS BIGINT START 101 INCREMENT 2'
    ])
  })

  describe('against SQLite', () => {
    let database: TestDatabase<Record<string, never>>

    beforeEach(() => {
      database = createTestDatabase()
    })

    afterEach(async () => {
      await database.destroy()
    })

    it('counts from its start by its increment', async () => {
      const seq = defineSequence('trans_id_seq', { start: 101, increment: 5 })
      await seq.create(database.cursor)
      await seq.create(database.cursor)

      expect(await seq.nextval(database.cursor)).toBe(101)
      expect(await seq.nextval(database.cursor)).toBe(106)

      await seq.reset(database.cursor)
      expect(await seq.nextval(database.cursor)).toBe(101)
    })
  })
})

describe('Namespace', () => {
  let database: TestDatabase<Record<string, never>>

  beforeEach(() => {
    database = createTestDatabase()
  })

  afterEach(async () => {
    await database.destroy()
  })

  it('creates every registered object', async () => {
    const sales = defineNamespace('sales')
    const seq = defineSequence('trans_id_seq', { namespace: sales, start: 101 })
    const orders = defineTable(
      'orders',
      {
        trans_id: new IntField({ contextKey: 'trans_id' }),
        total: new NumericField({ precision: 8, scale: 2 })
      },
      { namespace: sales, constraints: { orders_pk: primaryKey(['trans_id']) } }
    )
    const bigOrders = defineView(
      'big_orders',
      { trans_id: new IntField({ contextKey: 'trans_id' }) },
      { namespace: sales, query: 'SELECT trans_id FROM {sales.orders} WHERE total > 10' }
    )

    expect(sales.objects.map(object => object.kind)).toEqual(['sequence', 'table', 'view'])

    await sales.create(database.cursor)
    const transId = await seq.nextval(database.cursor)
    await orders.insert(database.cursor, orders.create({ trans_id: transId, total: '25.00' }))

    const rows = await bigOrders.select(database.cursor)
    expect(rows.map(row => row.get('trans_id'))).toEqual([101])
  })
})
