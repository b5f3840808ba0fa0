import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { UniqueConstraintError } from '@accordo/core'
import { IntField, defineTable, primaryKey } from '@accordo/schema'
import { createTestDatabase, type TestDatabase } from '@accordo/testing'
import { defineTransaction } from '../src/index.js'
import { CreateOrder, ManageOrder, orderLines, orders, transIdSeq } from './fixtures.js'

describe('transactions against SQLite', () => {
  let database: TestDatabase<Record<string, never>>

  beforeEach(async () => {
    database = createTestDatabase()
    await transIdSeq.create(database.cursor)
    for (const sql of [...orders.createStatements(), ...orderLines.createStatements()]) {
      await database.cursor.execute(sql)
    }
  })

  afterEach(async () => {
    await database.destroy()
  })

  async function createOrder() {
    const tx = CreateOrder.create()
    tx.attr('order').assign({ customer: 'ACME', total: '9.99' })
    tx.attr('lines').append({ sku: 'A-1' })
    tx.attr('lines').append({ sku: 'B-2' })
    await tx.insertNew(database.cursor)
    return tx
  }

  it('inserts an order under a freshly drawn key', async () => {
    const tx = await createOrder()

    expect(tx.value('trans_id')).toBe(101)
    expect(database.sqlite.prepare('SELECT trans_id, customer FROM orders').all()).toEqual([
      { trans_id: 101, customer: 'ACME' }
    ])
    expect(
      database.sqlite.prepare('SELECT trans_id, line_no, sku FROM order_lines ORDER BY line_no').all()
    ).toEqual([
      { trans_id: 101, line_no: 1, sku: 'A-1' },
      { trans_id: 101, line_no: 2, sku: 'B-2' }
    ])

    const next = await createOrder()
    expect(next.value('trans_id')).toBe(102)
  })

  it('reads back what it wrote', async () => {
    const written = await createOrder()

    const read = ManageOrder.create({ trans_id: 101 })
    await read.contextSelect(database.cursor)

    expect(read.attr('order').toObject()).toEqual(written.attr('order').toObject())
    expect(read.attr('lines').toArray().map(record => record.toObject())).toEqual(
      written.attr('lines').toArray().map(record => record.toObject())
    )
    expect(read.value('customer')).toBe('ACME')
  })

  it('updates and deletes the rows it loaded', async () => {
    await createOrder()
    const tx = ManageOrder.create({ trans_id: 101 })
    await tx.contextSelect(database.cursor)

    tx.attr('order').set('total', '12.50')
    await tx.update(database.cursor)
    expect(database.sqlite.prepare('SELECT total FROM orders').get()).toEqual({ total: '12.50' })

    await tx.delete(database.cursor)
    expect(database.sqlite.prepare('SELECT COUNT(*) AS n FROM orders').get()).toEqual({ n: 0 })
    expect(database.sqlite.prepare('SELECT COUNT(*) AS n FROM order_lines').get()).toEqual({ n: 0 })
  })

  it('leaves no rows behind when a later statement fails', async () => {
    const archive = defineTable(
      'archive',
      { trans_id: new IntField({ contextKey: 'trans_id' }) },
      { constraints: { archive_pk: primaryKey(['trans_id']) } }
    )
    for (const sql of archive.createStatements()) {
      await database.cursor.execute(sql)
    }
    database.sqlite.exec('INSERT INTO archive (trans_id) VALUES (7)')

    const ArchiveOrder = defineTransaction({
      name: 'ArchiveOrder',
      fields: { trans_id: new IntField() },
      attributes: { order: orders, archived: archive }
    })
    const tx = ArchiveOrder.create({ trans_id: 7 })

    await expect(tx.insertExisting(database.cursor)).rejects.toBeInstanceOf(UniqueConstraintError)
    expect(tx.state).toBe('aborted')
    expect(database.sqlite.prepare('SELECT COUNT(*) AS n FROM orders').get()).toEqual({ n: 0 })
  })
})
