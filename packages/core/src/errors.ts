/**
 * Error hierarchy shared by every Accordo package.
 *
 * Errors raised while assigning values (`ValidationError`,
 * `SchemaViolationError`) surface immediately. Errors raised while an
 * orchestrated operation runs abort the enclosing database scope and are
 * rethrown unchanged.
 */

import { ErrorCodes, type ErrorCode } from './error-codes.js'

// Pre-compiled patterns for driver error parsing (module-level constants)
const PG_KEY_REGEX = /Key \(([^)]+)\)=/
const PG_TABLE_REGEX = /table "(.+?)"/
const MYSQL_DUP_REGEX = /Duplicate entry '(.+?)' for key '(.+?)'/
const MYSQL_COLUMN_REGEX = /Column '(.+?)' cannot be null/
const MYSQL_COL_DOT_REGEX = /\.([^.]+)$/
const SQLITE_UNIQUE_REGEX = /UNIQUE constraint failed: (\w+)\.(\w+)/
const SQLITE_NOT_NULL_REGEX = /NOT NULL constraint failed: (\w+)\.(\w+)/
const SQLITE_CHECK_REGEX = /CHECK constraint failed: (\w+)/

export class AccordoError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly detail?: string
  ) {
    super(message)
    this.name = 'AccordoError'
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      detail: this.detail
    }
  }
}

/**
 * A value failed its field's type or format check.
 */
export class ValidationError extends AccordoError {
  constructor(
    public readonly field: string,
    message: string,
    public readonly value?: unknown
  ) {
    super(`Invalid value for field '${field}': ${message}`, ErrorCodes.FIELD_VALIDATION_FAILED)
    this.name = 'ValidationError'
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), field: this.field }
  }
}

/**
 * A name that is not declared on the record schema was used.
 */
export class SchemaViolationError extends AccordoError {
  constructor(
    public readonly schema: string,
    public readonly attribute: string,
    message = `'${attribute}' is not a declared field of ${schema}`
  ) {
    super(message, ErrorCodes.SCHEMA_VIOLATION)
    this.name = 'SchemaViolationError'
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), schema: this.schema, attribute: this.attribute }
  }
}

/**
 * A schema is structurally unfit for the requested use, e.g. a table
 * without exactly one primary key used in an update.
 */
export class SchemaError extends AccordoError {
  constructor(message: string, code: ErrorCode = ErrorCodes.SCHEMA_INVALID) {
    super(message, code)
    this.name = 'SchemaError'
  }
}

/**
 * A WHERE clause would not constrain anything, e.g. a primary key column
 * holding null.
 */
export class UnconstrainedWhereError extends SchemaError {
  constructor(message: string) {
    super(message, ErrorCodes.SCHEMA_UNCONSTRAINED_WHERE)
    this.name = 'UnconstrainedWhereError'
  }
}

/**
 * A verify or pre-operation hook rejected the transaction.
 */
export class VerificationError extends AccordoError {
  constructor(message = 'Transaction failed verification') {
    super(message, ErrorCodes.TRANSACTION_VERIFICATION_FAILED)
    this.name = 'VerificationError'
  }
}

/**
 * A context select found no bound predicate for an attribute and
 * unrestricted selects were not allowed.
 */
export class UnboundQueryError extends AccordoError {
  constructor(public readonly target: string) {
    super(
      `No context value constrains the SELECT on ${target}; pass allowUnlimited to read every row`,
      ErrorCodes.QUERY_UNBOUND
    )
    this.name = 'UnboundQueryError'
  }
}

/**
 * A query placeholder has no matching parameter field.
 */
export class QueryParameterError extends AccordoError {
  constructor(
    public readonly query: string,
    public readonly placeholder: string
  ) {
    super(
      `Placeholder {${placeholder}} in query ${query} does not match any parameter field`,
      ErrorCodes.QUERY_PARAMETER_MISSING
    )
    this.name = 'QueryParameterError'
  }
}

/**
 * A query did not return the shape the caller asked for.
 */
export class QueryResultError extends AccordoError {
  constructor(message: string) {
    super(message, ErrorCodes.QUERY_RESULT_INVALID)
    this.name = 'QueryResultError'
  }
}

/**
 * An external value generator (sequence, clock, query) failed.
 */
export class GenerationError extends AccordoError {
  constructor(
    public readonly field: string,
    public override readonly cause: unknown
  ) {
    super(
      `Could not generate a value for field '${field}': ${cause instanceof Error ? cause.message : String(cause)}`,
      ErrorCodes.FIELD_GENERATION_FAILED
    )
    this.name = 'GenerationError'
  }
}

/**
 * A context-bound field was resolved against a context lacking its key.
 */
export class ContextRequiredError extends AccordoError {
  constructor(public readonly contextKey: string) {
    super(`Context value '${contextKey}' is required`, ErrorCodes.FIELD_CONTEXT_REQUIRED)
    this.name = 'ContextRequiredError'
  }
}

/**
 * Opaque passthrough of an underlying driver failure.
 */
export class DatabaseError extends AccordoError {
  constructor(message: string, code: ErrorCode = ErrorCodes.DB_UNKNOWN, detail?: string) {
    super(message, code, detail)
    this.name = 'DatabaseError'
  }
}

export class UniqueConstraintError extends DatabaseError {
  constructor(
    public readonly constraint: string,
    public readonly table: string,
    public readonly columns: string[]
  ) {
    super(`UNIQUE constraint violation on ${table}`, ErrorCodes.DB_UNIQUE_VIOLATION)
    this.name = 'UniqueConstraintError'
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      constraint: this.constraint,
      table: this.table,
      columns: this.columns
    }
  }
}

export class ForeignKeyError extends DatabaseError {
  constructor(
    public readonly constraint: string,
    public readonly table: string,
    public readonly referencedTable: string
  ) {
    super(`FOREIGN KEY constraint violation`, ErrorCodes.DB_FOREIGN_KEY_VIOLATION)
    this.name = 'ForeignKeyError'
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      constraint: this.constraint,
      table: this.table,
      referencedTable: this.referencedTable
    }
  }
}

/**
 * Not Null constraint violation error
 */
export class NotNullError extends DatabaseError {
  constructor(
    public readonly column: string,
    public readonly table?: string
  ) {
    const tableInfo = table ? ` on table ${table}` : ''
    super(
      `NOT NULL constraint violation on column ${column}${tableInfo}`,
      ErrorCodes.DB_NOT_NULL_VIOLATION,
      column
    )
    this.name = 'NotNullError'
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), column: this.column, table: this.table }
  }
}

/**
 * Check constraint violation error
 */
export class CheckConstraintError extends DatabaseError {
  constructor(public readonly constraint: string) {
    super(`CHECK constraint violation: ${constraint}`, ErrorCodes.DB_CHECK_VIOLATION)
    this.name = 'CheckConstraintError'
  }
}

export type DriverDialect = 'postgres' | 'mysql' | 'sqlite'

/**
 * Driver error shape used while parsing.
 * @internal
 */
interface RawDatabaseError {
  code?: string
  message?: string
  detail?: string
  constraint?: string
  table?: string
  column?: string
  sqlMessage?: string
}

function toRawError(error: object): RawDatabaseError {
  const read = (key: keyof RawDatabaseError): string | undefined => {
    const value: unknown = Reflect.get(error, key)
    return typeof value === 'string' ? value : undefined
  }
  return {
    code: read('code'),
    message: read('message'),
    detail: read('detail'),
    constraint: read('constraint'),
    table: read('table'),
    column: read('column'),
    sqlMessage: read('sqlMessage')
  }
}

function parsePostgresError(dbError: RawDatabaseError): DatabaseError {
  switch (dbError.code) {
    case '23505': {
      const detailMatch = dbError.detail ? PG_KEY_REGEX.exec(dbError.detail) : null
      const matchedColumn = detailMatch?.[1]
      const columns = matchedColumn ? matchedColumn.split(',').map(col => col.trim()) : []
      return new UniqueConstraintError(
        dbError.constraint ?? 'unique',
        dbError.table ?? 'unknown',
        columns
      )
    }
    case '23503': {
      const tableMatch = dbError.detail ? PG_TABLE_REGEX.exec(dbError.detail) : null
      return new ForeignKeyError(
        dbError.constraint ?? 'foreign_key',
        dbError.table ?? 'unknown',
        tableMatch?.[1] ?? 'unknown'
      )
    }
    case '23502':
      return new NotNullError(dbError.column ?? 'unknown', dbError.table)
    case '23514':
      return new CheckConstraintError(dbError.constraint ?? 'unknown')
    default:
      return new DatabaseError(dbError.message ?? 'Database error', ErrorCodes.DB_UNKNOWN, dbError.code)
  }
}

function parseMySQLError(dbError: RawDatabaseError): DatabaseError {
  switch (dbError.code) {
    case 'ER_DUP_ENTRY':
    case 'ER_DUP_KEY': {
      const dupMatch = dbError.sqlMessage ? MYSQL_DUP_REGEX.exec(dbError.sqlMessage) : null
      const constraintName = dupMatch?.[2] ?? 'unique'
      const column = MYSQL_COL_DOT_REGEX.exec(constraintName)?.[1] ?? constraintName
      return new UniqueConstraintError(constraintName, 'unknown', dupMatch ? [column] : [])
    }
    case 'ER_NO_REFERENCED_ROW':
    case 'ER_NO_REFERENCED_ROW_2':
    case 'ER_ROW_IS_REFERENCED':
    case 'ER_ROW_IS_REFERENCED_2':
      return new ForeignKeyError('foreign_key', 'unknown', 'unknown')
    case 'ER_BAD_NULL_ERROR': {
      const nullMatch = dbError.sqlMessage ? MYSQL_COLUMN_REGEX.exec(dbError.sqlMessage) : null
      return new NotNullError(nullMatch?.[1] ?? 'unknown')
    }
    default:
      return new DatabaseError(
        dbError.sqlMessage ?? dbError.message ?? 'Database error',
        ErrorCodes.DB_UNKNOWN,
        dbError.code
      )
  }
}

function parseSQLiteError(message: string): DatabaseError {
  if (message.includes('UNIQUE constraint failed')) {
    const match = SQLITE_UNIQUE_REGEX.exec(message)
    return new UniqueConstraintError('unique', match?.[1] ?? 'unknown', match?.[2] ? [match[2]] : [])
  }
  if (message.includes('FOREIGN KEY constraint failed')) {
    return new ForeignKeyError('foreign_key', 'unknown', 'unknown')
  }
  if (message.includes('NOT NULL constraint failed')) {
    const match = SQLITE_NOT_NULL_REGEX.exec(message)
    return new NotNullError(match?.[2] ?? 'unknown', match?.[1])
  }
  if (message.includes('CHECK constraint failed')) {
    const match = SQLITE_CHECK_REGEX.exec(message)
    return new CheckConstraintError(match?.[1] ?? 'unknown')
  }
  return new DatabaseError(message, ErrorCodes.DB_UNKNOWN)
}

/**
 * Classify a driver error for the given dialect.
 *
 * Errors that are already `AccordoError` instances pass through untouched.
 */
export function parseDatabaseError(error: unknown, dialect: DriverDialect = 'sqlite'): AccordoError {
  if (error instanceof AccordoError) {
    return error
  }

  if (!error || typeof error !== 'object' || Array.isArray(error)) {
    return new DatabaseError('Unknown database error', ErrorCodes.DB_UNKNOWN)
  }

  const dbError = toRawError(error)

  switch (dialect) {
    case 'postgres':
      return parsePostgresError(dbError)
    case 'mysql':
      return parseMySQLError(dbError)
    case 'sqlite':
      return parseSQLiteError(dbError.message ?? '')
  }
}

/**
 * Type guard for any error raised by Accordo.
 */
export function isAccordoError(error: unknown): error is AccordoError {
  return error instanceof AccordoError
}
