/**
 * Unified error codes for the Accordo packages.
 *
 * Codes are grouped by a category prefix (`FIELD_`, `SCHEMA_`, `QUERY_`, ...)
 * so that callers can branch on `getErrorCategory(error.code)` without
 * matching on class names.
 *
 * @module @accordo/core/error-codes
 */

export const ErrorCodes = {
  // Field level
  FIELD_VALIDATION_FAILED: 'FIELD_VALIDATION_FAILED',
  FIELD_CONTEXT_REQUIRED: 'FIELD_CONTEXT_REQUIRED',
  FIELD_GENERATION_FAILED: 'FIELD_GENERATION_FAILED',

  // Schema level
  SCHEMA_VIOLATION: 'SCHEMA_VIOLATION',
  SCHEMA_INVALID: 'SCHEMA_INVALID',
  SCHEMA_UNCONSTRAINED_WHERE: 'SCHEMA_UNCONSTRAINED_WHERE',

  // Queries
  QUERY_UNBOUND: 'QUERY_UNBOUND',
  QUERY_PARAMETER_MISSING: 'QUERY_PARAMETER_MISSING',
  QUERY_RESULT_INVALID: 'QUERY_RESULT_INVALID',

  // Transactions
  TRANSACTION_VERIFICATION_FAILED: 'TRANSACTION_VERIFICATION_FAILED',

  // Database passthrough
  DB_UNKNOWN: 'DB_UNKNOWN',
  DB_UNIQUE_VIOLATION: 'DB_UNIQUE_VIOLATION',
  DB_FOREIGN_KEY_VIOLATION: 'DB_FOREIGN_KEY_VIOLATION',
  DB_NOT_NULL_VIOLATION: 'DB_NOT_NULL_VIOLATION',
  DB_CHECK_VIOLATION: 'DB_CHECK_VIOLATION'
} as const

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes]

export type ErrorCategory = 'FIELD' | 'SCHEMA' | 'QUERY' | 'TRANSACTION' | 'DB'

const ERROR_CODE_SET: ReadonlySet<string> = new Set(Object.values(ErrorCodes))

/**
 * Check whether a string is one of the known error codes.
 *
 * @example
 * isValidErrorCode('QUERY_UNBOUND') // true
 * isValidErrorCode('23505')         // false (driver code, not ours)
 */
export function isValidErrorCode(code: string): code is ErrorCode {
  return ERROR_CODE_SET.has(code)
}

/**
 * Extract the category prefix of an error code.
 *
 * @example
 * getErrorCategory('SCHEMA_VIOLATION') // 'SCHEMA'
 */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  const prefix = code.slice(0, code.indexOf('_'))
  switch (prefix) {
    case 'FIELD':
    case 'SCHEMA':
    case 'QUERY':
    case 'TRANSACTION':
    case 'DB':
      return prefix
    default:
      throw new Error(`Error code without a known category: ${code}`)
  }
}
