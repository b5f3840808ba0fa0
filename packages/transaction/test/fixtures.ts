import { vi } from 'vitest'
import type { AccordoLogger } from '@accordo/core'
import {
  ContextIntField,
  IntField,
  NumericField,
  RowEnumIntField,
  SequenceIntField,
  TextField,
  defineRecordList,
  defineSequence,
  defineTable,
  foreignKey,
  primaryKey
} from '@accordo/schema'
import { defineTransaction } from '../src/index.js'

export const transIdSeq = defineSequence('trans_id_seq', { start: 101 })

export const orders = defineTable(
  'orders',
  {
    trans_id: new IntField({ contextKey: 'trans_id' }),
    customer: new TextField({ contextKey: 'customer' }),
    total: new NumericField({ precision: 8, scale: 2 })
  },
  { constraints: { orders_pk: primaryKey(['trans_id']) } }
)

export const orderLines = defineTable(
  'order_lines',
  {
    trans_id: new ContextIntField({ contextKey: 'trans_id' }),
    line_no: new RowEnumIntField({ contextKey: 'line_no' }),
    sku: new TextField({ nullable: false })
  },
  {
    constraints: {
      lines_pk: primaryKey(['trans_id', 'line_no']),
      lines_orders_fk: foreignKey(['trans_id'], { table: orders, onDelete: 'CASCADE' })
    }
  }
)

export const CreateOrder = defineTransaction({
  name: 'CreateOrder',
  fields: { trans_id: new SequenceIntField({ sequence: transIdSeq }) },
  attributes: { order: orders, lines: defineRecordList(orderLines) }
})

/** Loads, changes and removes an existing order */
export const ManageOrder = defineTransaction({
  name: 'ManageOrder',
  fields: {
    trans_id: new IntField(),
    customer: new TextField()
  },
  attributes: { order: orders, lines: defineRecordList(orderLines) }
})

export function createMockLogger(): AccordoLogger {
  return {
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn()
  }
}
