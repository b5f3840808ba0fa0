/**
 * Dialect Helper Functions
 *
 * Identifier validation and value coercion shared by the bundled adapters.
 */

import { SchemaError, type FieldValue } from '@accordo/core'
import type { SemanticType } from './types.js'

/**
 * Maximum allowed length for SQL identifiers
 */
const MAX_IDENTIFIER_LENGTH = 128

/**
 * Pattern for valid SQL identifiers. Qualification goes through
 * `qualifiedName`, so dots are not allowed here.
 */
const IDENTIFIER_PATTERN = /^[a-zA-Z_][a-zA-Z0-9_]*$/

/**
 * Validate a SQL identifier (table name, column name, etc.)
 *
 * @example
 * validateIdentifier('orders')          // true
 * validateIdentifier('_private_table')  // true
 * validateIdentifier('123invalid')      // false (starts with number)
 * validateIdentifier('table-name')      // false (contains hyphen)
 * validateIdentifier('')                // false (empty)
 */
export function validateIdentifier(name: string): boolean {
  if (!name || name.length > MAX_IDENTIFIER_LENGTH) {
    return false
  }
  return IDENTIFIER_PATTERN.test(name)
}

/**
 * Assert that an identifier is valid, throwing `SchemaError` if not
 *
 * @example
 * assertValidIdentifier('orders', 'table name')  // passes
 * assertValidIdentifier('123bad', 'table name')  // throws: Invalid table name: 123bad
 */
export function assertValidIdentifier(name: string, context = 'identifier'): void {
  if (!validateIdentifier(name)) {
    throw new SchemaError(`Invalid ${context}: ${name}`)
  }
}

function toNumber(value: unknown): FieldValue {
  if (typeof value === 'number') return value
  if (typeof value === 'bigint') return Number(value)
  if (typeof value === 'string' && value.trim() !== '' && !Number.isNaN(Number(value))) {
    return Number(value)
  }
  return passthrough(value)
}

function passthrough(value: unknown): FieldValue {
  if (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    value instanceof Date
  ) {
    return value
  }
  return String(value)
}

/**
 * Lossless conversion of a driver value into a field value.
 *
 * Values that do not fit the semantic type are passed through unchanged so
 * that field validation can report them against the owning field.
 */
export function fromDriverValue(value: unknown, type: SemanticType): FieldValue {
  if (value === null || value === undefined) {
    return null
  }

  switch (type) {
    case 'integer':
    case 'smallint':
    case 'bigint':
    case 'real':
      return toNumber(value)
    case 'numeric':
      if (typeof value === 'number' || typeof value === 'bigint') return String(value)
      return passthrough(value)
    case 'boolean':
      if (value === 0 || value === 1) return value === 1
      if (value === 0n || value === 1n) return value === 1n
      return passthrough(value)
    case 'timestamp':
      if (typeof value === 'string' || typeof value === 'number') {
        const date = new Date(value)
        return Number.isNaN(date.getTime()) ? passthrough(value) : date
      }
      return passthrough(value)
    case 'text':
    case 'varchar':
    case 'char':
    case 'enum':
      return typeof value === 'string' ? value : passthrough(value)
  }
}

/**
 * Render a string as a SQL literal
 */
export function quoteLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`
}
