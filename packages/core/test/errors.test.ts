import { describe, it, expect } from 'vitest'
import {
  AccordoError,
  CheckConstraintError,
  ContextRequiredError,
  DatabaseError,
  ForeignKeyError,
  GenerationError,
  NotNullError,
  QueryParameterError,
  SchemaError,
  SchemaViolationError,
  UnboundQueryError,
  UnconstrainedWhereError,
  UniqueConstraintError,
  ValidationError,
  VerificationError,
  isAccordoError,
  parseDatabaseError
} from '../src/errors.js'
import { ErrorCodes } from '../src/error-codes.js'

describe('error hierarchy', () => {
  it('every error extends AccordoError with a code', () => {
    const errors: AccordoError[] = [
      new ValidationError('amount', 'expected an integer', 'x'),
      new SchemaViolationError('Order', 'colour'),
      new SchemaError('no primary key'),
      new UnconstrainedWhereError('null key'),
      new VerificationError(),
      new UnboundQueryError('orders'),
      new QueryParameterError('Totals', 'missing'),
      new GenerationError('trans_id', new Error('boom')),
      new ContextRequiredError('trans_id'),
      new DatabaseError('driver failed')
    ]
    for (const error of errors) {
      expect(error).toBeInstanceOf(AccordoError)
      expect(error).toBeInstanceOf(Error)
      expect(isAccordoError(error)).toBe(true)
    }
  })

  it('UnconstrainedWhereError is a SchemaError with its own code', () => {
    const error = new UnconstrainedWhereError('null key')
    expect(error).toBeInstanceOf(SchemaError)
    expect(error.code).toBe(ErrorCodes.SCHEMA_UNCONSTRAINED_WHERE)
    expect(error.name).toBe('UnconstrainedWhereError')
  })

  it('ValidationError names the field', () => {
    const error = new ValidationError('amount', 'expected an integer', 'x')
    expect(error.message).toBe("Invalid value for field 'amount': expected an integer")
    expect(error.toJSON()).toEqual({
      name: 'ValidationError',
      message: "Invalid value for field 'amount': expected an integer",
      code: 'FIELD_VALIDATION_FAILED',
      detail: undefined,
      field: 'amount'
    })
  })

  it('VerificationError carries a custom message', () => {
    expect(new VerificationError('total mismatch').message).toBe('total mismatch')
    expect(new VerificationError().message).toBe('Transaction failed verification')
  })

  it('GenerationError keeps the cause', () => {
    const cause = new Error('sequence missing')
    const error = new GenerationError('trans_id', cause)
    expect(error.cause).toBe(cause)
    expect(error.message).toBe("Could not generate a value for field 'trans_id': sequence missing")
  })

  it('isAccordoError rejects plain errors', () => {
    expect(isAccordoError(new Error('x'))).toBe(false)
    expect(isAccordoError('x')).toBe(false)
  })
})

describe('parseDatabaseError', () => {
  describe('sqlite', () => {
    it('parses UNIQUE failures', () => {
      const error = parseDatabaseError(
        new Error('UNIQUE constraint failed: orders.trans_id'),
        'sqlite'
      )
      expect(error).toBeInstanceOf(UniqueConstraintError)
      expect(error).toMatchObject({ table: 'orders', columns: ['trans_id'], code: 'DB_UNIQUE_VIOLATION' })
    })

    it('parses NOT NULL failures', () => {
      const error = parseDatabaseError(new Error('NOT NULL constraint failed: orders.amount'), 'sqlite')
      expect(error).toBeInstanceOf(NotNullError)
      expect(error).toMatchObject({ column: 'amount', table: 'orders' })
    })

    it('parses FOREIGN KEY failures', () => {
      const error = parseDatabaseError(new Error('FOREIGN KEY constraint failed'), 'sqlite')
      expect(error).toBeInstanceOf(ForeignKeyError)
    })

    it('parses CHECK failures', () => {
      const error = parseDatabaseError(new Error('CHECK constraint failed: positive_amount'), 'sqlite')
      expect(error).toBeInstanceOf(CheckConstraintError)
      expect(error).toMatchObject({ constraint: 'positive_amount' })
    })

    it('wraps anything else as DatabaseError', () => {
      const error = parseDatabaseError(new Error('no such table: orders'), 'sqlite')
      expect(error).toBeInstanceOf(DatabaseError)
      expect(error.code).toBe('DB_UNKNOWN')
      expect(error.message).toBe('no such table: orders')
    })
  })

  describe('postgres', () => {
    it('reads columns from the detail of a unique violation', () => {
      const error = parseDatabaseError(
        {
          code: '23505',
          constraint: 'orders_pkey',
          table: 'orders',
          detail: 'Key (trans_id, line)=(1, 2) already exists.'
        },
        'postgres'
      )
      expect(error).toBeInstanceOf(UniqueConstraintError)
      expect(error).toMatchObject({ constraint: 'orders_pkey', columns: ['trans_id', 'line'] })
    })

    it('reads the referenced table of a foreign key violation', () => {
      const error = parseDatabaseError(
        {
          code: '23503',
          constraint: 'lines_order_fk',
          table: 'lines',
          detail: 'Key (order_id)=(9) is not present in table "orders".'
        },
        'postgres'
      )
      expect(error).toMatchObject({ referencedTable: 'orders', table: 'lines' })
    })

    it('keeps the driver code as detail for unknown errors', () => {
      const error = parseDatabaseError({ code: '42P01', message: 'relation missing' }, 'postgres')
      expect(error).toMatchObject({ code: 'DB_UNKNOWN', detail: '42P01', message: 'relation missing' })
    })
  })

  describe('mysql', () => {
    it('parses duplicate entries', () => {
      const error = parseDatabaseError(
        { code: 'ER_DUP_ENTRY', sqlMessage: "Duplicate entry '7' for key 'orders.trans_id'" },
        'mysql'
      )
      expect(error).toBeInstanceOf(UniqueConstraintError)
      expect(error).toMatchObject({ constraint: 'orders.trans_id', columns: ['trans_id'] })
    })

    it('parses null violations', () => {
      const error = parseDatabaseError(
        { code: 'ER_BAD_NULL_ERROR', sqlMessage: "Column 'amount' cannot be null" },
        'mysql'
      )
      expect(error).toMatchObject({ column: 'amount' })
    })
  })

  it('passes Accordo errors through', () => {
    const original = new VerificationError('nope')
    expect(parseDatabaseError(original, 'postgres')).toBe(original)
  })

  it('handles non-object errors', () => {
    expect(parseDatabaseError('boom').message).toBe('Unknown database error')
    expect(parseDatabaseError(null).message).toBe('Unknown database error')
  })
})
