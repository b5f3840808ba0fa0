import { describe, it, expect, vi } from 'vitest'
import {
  ContextRequiredError,
  GenerationError,
  ValidationError,
  type Context,
  type Cursor
} from '@accordo/core'
import { mysqlAdapter, postgresAdapter, sqliteAdapter } from '@accordo/dialects'
import { RecordingCursor } from '@accordo/testing'
import {
  BigIntField,
  BooleanField,
  CharField,
  ContextIntField,
  EnumField,
  IntField,
  NumericField,
  QueryIntField,
  RealField,
  RowEnumIntField,
  SequenceIntField,
  SmallIntField,
  TextField,
  TimestampField,
  UTCNowTimestampField,
  VarCharField,
  defineQuery,
  defineSequence
} from '../src/index.js'

function unusedCursor(): Cursor {
  return {
    execute: vi.fn(async () => []),
    begin: vi.fn(async () => undefined),
    commit: vi.fn(async () => undefined),
    rollback: vi.fn(async () => undefined)
  }
}

describe('integer fields', () => {
  it('accept integers and integer strings', () => {
    const qty = new IntField()
    expect(qty.validate(4)).toBe(4)
    expect(qty.validate('4')).toBe(4)
    expect(qty.validate(' -12 ')).toBe(-12)
  })

  it('reject fractions', () => {
    const qty = new IntField()
    expect(() => qty.validate('1.2', 'qty')).toThrow(ValidationError)
    expect(() => qty.validate(1.5, 'qty')).toThrow(
      "Invalid value for field 'qty': expected an integer"
    )
  })

  it('enforce their range', () => {
    expect(() => new SmallIntField().validate(40000)).toThrow('must be at most 32767')
    expect(new BigIntField().validate(2 ** 40)).toBe(2 ** 40)
    expect(() => new BigIntField().validate(2 ** 60)).toThrow(ValidationError)
  })

  it('reject null when not nullable', () => {
    const id = new IntField({ nullable: false })
    expect(() => id.validate(null, 'id')).toThrow("Invalid value for field 'id': null is not allowed")
    expect(new IntField().validate(null)).toBeNull()
    expect(new IntField().validate(undefined)).toBeNull()
  })

  it('render their column type', () => {
    expect(new IntField({ nullable: false }).sqlType(sqliteAdapter)).toBe('INTEGER NOT NULL')
    expect(new IntField({ autoIncrement: true }).sqlType(sqliteAdapter)).toBe(
      'INTEGER PRIMARY KEY AUTOINCREMENT'
    )
    expect(new IntField({ autoIncrement: true }).sqlType(postgresAdapter)).toBe('SERIAL PRIMARY KEY')
    expect(new SmallIntField().sqlType(sqliteAdapter)).toBe('SMALLINT')
  })
})

describe('RealField', () => {
  it('accepts finite numbers only', () => {
    const weight = new RealField()
    expect(weight.validate(2.5)).toBe(2.5)
    expect(() => weight.validate(Number.POSITIVE_INFINITY)).toThrow(ValidationError)
    expect(() => weight.validate('2.5')).toThrow(ValidationError)
  })
})

describe('NumericField', () => {
  const price = new NumericField({ precision: 6, scale: 2 })

  it('quantises decimal text to its scale', () => {
    expect(price.validate('10.5')).toBe('10.50')
    expect(price.validate('7')).toBe('7.00')
    expect(price.validate('.5')).toBe('0.50')
    expect(price.validate('-0.00')).toBe('0.00')
    expect(price.validate('-3.1')).toBe('-3.10')
  })

  it('rejects excess fractional digits unless quantising inexactly', () => {
    expect(() => price.validate('10.555', 'price')).toThrow(
      "Invalid value for field 'price': more than 2 decimal places"
    )

    const rounded = new NumericField({ precision: 6, scale: 2, inexactQuantize: true })
    expect(rounded.validate('10.555')).toBe('10.56')
    expect(rounded.validate('10.545')).toBe('10.54')
    expect(rounded.validate('0.005')).toBe('0.00')
  })

  it('always rejects excess integer digits', () => {
    expect(() => price.validate('12345.1')).toThrow('more than 4 digits before the decimal point')
  })

  it('accepts numbers only when floats are allowed', () => {
    expect(() => price.validate(2.5)).toThrow('floats are not accepted')
    expect(new NumericField({ precision: 6, scale: 2, allowFloats: true }).validate(2.5)).toBe('2.50')
  })

  it('rejects malformed text', () => {
    expect(() => price.validate('ten')).toThrow('expected a decimal number')
  })

  it('checks precision and scale at definition', () => {
    expect(() => new NumericField({ precision: 0, scale: 0 })).toThrow(RangeError)
    expect(() => new NumericField({ precision: 4, scale: 5 })).toThrow(RangeError)
  })

  it('renders its column type per dialect', () => {
    expect(price.sqlType(postgresAdapter)).toBe('NUMERIC(6,2)')
    expect(price.sqlType(sqliteAdapter)).toBe('TEXT')
  })
})

describe('BooleanField', () => {
  it('accepts booleans and 0/1', () => {
    const paid = new BooleanField()
    expect(paid.validate(true)).toBe(true)
    expect(paid.validate(0)).toBe(false)
    expect(paid.validate(1)).toBe(true)
    expect(() => paid.validate('yes', 'paid')).toThrow(
      "Invalid value for field 'paid': expected a boolean"
    )
  })
})

describe('text fields', () => {
  it('TextField accepts strings only', () => {
    expect(new TextField().validate('note')).toBe('note')
    expect(() => new TextField().validate(3)).toThrow('expected a string')
  })

  it('VarCharField enforces or truncates its length', () => {
    expect(() => new VarCharField({ maxLength: 3 }).validate('abcd')).toThrow(
      'longer than 3 characters'
    )
    expect(new VarCharField({ maxLength: 3, silentTruncate: true }).validate('abcd')).toBe('abc')
    expect(new VarCharField({ maxLength: 40 }).sqlType(mysqlAdapter)).toBe('VARCHAR(40)')
  })

  it('CharField enforces its length', () => {
    expect(new CharField({ maxLength: 2 }).validate('GB')).toBe('GB')
    expect(() => new CharField({ maxLength: 2 }).validate('GBR')).toThrow(ValidationError)
  })

  it('EnumField accepts its labels only', () => {
    const status = new EnumField({ values: ['open', 'paid', 'void'] as const })
    expect(status.validate('paid')).toBe('paid')
    expect(() => status.validate('lost', 'status')).toThrow(
      "Invalid value for field 'status': expected one of: open, paid, void"
    )
    expect(() => new EnumField({ values: [] })).toThrow(RangeError)
  })
})

describe('TimestampField', () => {
  it('accepts dates and ISO-8601 strings', () => {
    const at = new TimestampField()
    const date = new Date(Date.UTC(2024, 0, 2, 3, 4, 5))
    expect(at.validate(date)).toEqual(date)
    expect(at.validate('2024-01-02T03:04:05Z')).toEqual(date)
    expect(() => at.validate('not a date')).toThrow(ValidationError)
  })

  it('renders time zone columns', () => {
    expect(new TimestampField({ tz: true }).sqlType(postgresAdapter)).toBe('TIMESTAMP WITH TIME ZONE')
    expect(new TimestampField().sqlType(postgresAdapter)).toBe('TIMESTAMP')
  })
})

describe('context resolution', () => {
  it('refresh adopts a non-null context value', () => {
    const transId = new IntField({ contextKey: 'trans_id' })
    const context: Context = new Map([['trans_id', 7]])

    expect(transId.refresh(5, context)).toBe(7)
    expect(transId.refresh(5, new Map([['trans_id', null]]))).toBe(5)
    expect(transId.refresh(5)).toBe(5)
    expect(new IntField().refresh(5, context)).toBe(5)
  })

  it('refresh is idempotent', () => {
    const transId = new IntField({ contextKey: 'trans_id' })
    const context: Context = new Map([['trans_id', 7]])

    const once = transId.refresh(5, context)
    expect(transId.refresh(once, context)).toBe(once)
    expect(context.get('trans_id')).toBe(7)
  })

  it('refresh validates the adopted value', () => {
    const transId = new IntField({ contextKey: 'trans_id' })
    expect(transId.refresh(null, new Map([['trans_id', '12']]))).toBe(12)
    expect(() => transId.refresh(null, new Map([['trans_id', 'x']]), 'trans_id')).toThrow(
      ValidationError
    )
  })

  it('plain fields update and propagate by refreshing', async () => {
    const transId = new IntField({ contextKey: 'trans_id' })
    const context: Context = new Map([['trans_id', 9]])
    const env = { cursor: unusedCursor(), dialect: sqliteAdapter }

    await expect(transId.update(1, context, env)).resolves.toBe(9)
    expect(transId.propagate(1, context)).toBe(9)
  })

  it('ContextIntField requires its key when a context is given', () => {
    const transId = new ContextIntField({ contextKey: 'trans_id' })

    expect(() => transId.refresh(null, new Map())).toThrow(ContextRequiredError)
    expect(() => transId.refresh(null, new Map())).toThrow("Context value 'trans_id' is required")
    expect(transId.refresh(3, new Map([['trans_id', null]]))).toBe(3)
    expect(transId.refresh(3)).toBe(3)
  })

  it('RowEnumIntField numbers rows through a counter in the context', () => {
    const line = new RowEnumIntField({ contextKey: 'line_no' })
    const context: Context = new Map()

    expect(line.propagate(null, context)).toBe(1)
    expect(line.propagate(null, context)).toBe(2)
    expect(context.get('line_no')).toBe(2)
    expect(line.refresh(2, new Map([['line_no', 10]]))).toBe(2)
    expect(line.nullable).toBe(false)
  })

  it('RowEnumIntField honours a starting number', () => {
    const line = new RowEnumIntField({ contextKey: 'line_no', startingNumber: 10 })
    const context: Context = new Map([['line_no', null]])

    expect(line.propagate(null, context)).toBe(10)
    expect(line.propagate(null, context)).toBe(11)
  })
})

describe('generating fields', () => {
  it('UTCNowTimestampField stores and publishes the current time', async () => {
    const createdAt = new UTCNowTimestampField({ contextKey: 'created_at' })
    const context: Context = new Map()
    const before = Date.now()

    const value = await createdAt.update(null, context, { cursor: unusedCursor(), dialect: sqliteAdapter })

    expect(value).toBeInstanceOf(Date)
    expect(value?.getTime()).toBeGreaterThanOrEqual(before)
    expect(context.get('created_at')).toBe(value)
  })

  it('SequenceIntField draws nextval and publishes it', async () => {
    const sequence = defineSequence('trans_id_seq', { start: 101 })
    const transId = new SequenceIntField({ sequence, contextKey: 'trans_id' })
    const cursor = new RecordingCursor().respond('SELECT last_value', [{ nextval: 101 }])
    const context: Context = new Map([['trans_id', null]])

    const value = await transId.update(null, context, { cursor, dialect: sqliteAdapter }, 'trans_id')

    expect(value).toBe(101)
    expect(context.get('trans_id')).toBe(101)
    expect(cursor.sql).toEqual([
      'UPDATE "trans_id_seq" SET last_value = last_value + 1',
      'SELECT last_value AS nextval FROM "trans_id_seq"'
    ])
  })

  it('SequenceIntField wraps generator failures', async () => {
    const sequence = defineSequence('trans_id_seq')
    const transId = new SequenceIntField({ sequence })
    const cursor = new RecordingCursor().failOn('UPDATE', new Error('no such table: trans_id_seq'))

    const failure = transId.update(null, new Map(), { cursor, dialect: sqliteAdapter }, 'trans_id')

    await expect(failure).rejects.toBeInstanceOf(GenerationError)
    await expect(failure).rejects.toThrow(
      "Could not generate a value for field 'trans_id': no such table: trans_id_seq"
    )
  })

  it('QueryIntField fills its query from the context', async () => {
    const nextLine = defineQuery({
      name: 'next_line',
      text: 'SELECT COALESCE(MAX(line_no), 0) + 1 FROM order_lines WHERE trans_id = {trans_id}',
      parameters: { trans_id: new IntField() }
    })
    const lineNo = new QueryIntField({ query: nextLine, contextKey: 'line_no' })
    const cursor = new RecordingCursor().respond('order_lines', [{ next: 4 }])
    const context: Context = new Map([
      ['trans_id', 9],
      ['line_no', null]
    ])

    const value = await lineNo.update(null, context, { cursor, dialect: sqliteAdapter })

    expect(value).toBe(4)
    expect(context.get('line_no')).toBe(4)
    expect(cursor.statements).toEqual([
      {
        sql: 'SELECT COALESCE(MAX(line_no), 0) + 1 FROM order_lines WHERE trans_id = ?',
        parameters: [9]
      }
    ])
  })

  it('QueryIntField wraps empty results', async () => {
    const nextLine = defineQuery({
      name: 'next_line',
      text: 'SELECT 1 WHERE 0',
      parameters: {}
    })
    const lineNo = new QueryIntField({ query: nextLine })

    await expect(
      lineNo.update(null, new Map(), { cursor: new RecordingCursor(), dialect: sqliteAdapter }, 'line_no')
    ).rejects.toThrow("Could not generate a value for field 'line_no': Query next_line returned no rows")
  })
})
