/**
 * SQLite Dialect Adapter
 *
 * The default dialect. better-sqlite3 cannot bind booleans or dates, so
 * booleans travel as 0/1 and timestamps as ISO-8601 text. Decimals are kept
 * as text to avoid float rounding. Sequences are emulated with a one-row
 * table.
 */

import type { DriverValue, FieldValue } from '@accordo/core'
import type { ColumnSpec, DialectAdapter, SemanticType, SequenceSpec } from '../types.js'
import { fromDriverValue } from '../helpers.js'

export class SQLiteAdapter implements DialectAdapter {
  readonly dialect = 'sqlite' as const
  readonly parameterStyle = 'positional' as const
  readonly supportsSchemas = false
  readonly supportsDeferrableConstraints = true
  readonly autoIncrementColumn = 'INTEGER PRIMARY KEY AUTOINCREMENT'

  parameterMarker(_index: number): string {
    return '?'
  }

  escapeIdentifier(identifier: string): string {
    return '"' + identifier.replace(/"/g, '""') + '"'
  }

  qualifiedName(namespace: string | undefined, name: string): string {
    return this.escapeIdentifier(namespace ? `${namespace}_${name}` : name)
  }

  columnType(spec: ColumnSpec): string {
    switch (spec.type) {
      case 'integer':
        return 'INTEGER'
      case 'smallint':
        return 'SMALLINT'
      case 'bigint':
        return 'BIGINT'
      case 'real':
        return 'REAL'
      case 'boolean':
        return 'BOOLEAN'
      case 'varchar':
        return spec.maxLength ? `VARCHAR(${spec.maxLength})` : 'VARCHAR'
      case 'char':
        return spec.maxLength ? `CHARACTER(${spec.maxLength})` : 'CHARACTER'
      case 'numeric':
      case 'text':
      case 'timestamp':
      case 'enum':
        return 'TEXT'
    }
  }

  toDriver(value: FieldValue, _type: SemanticType): DriverValue {
    if (typeof value === 'boolean') {
      return value ? 1 : 0
    }
    if (value instanceof Date) {
      return value.toISOString()
    }
    return value
  }

  fromDriver(value: unknown, type: SemanticType): FieldValue {
    return fromDriverValue(value, type)
  }

  createSequenceStatements(sequence: SequenceSpec): string[] {
    const name = this.qualifiedName(sequence.namespace, sequence.name)
    return [
      `CREATE TABLE IF NOT EXISTS ${name} (last_value ${this.columnType({ type: sequence.indexType })} NOT NULL)`,
      `INSERT INTO ${name} (last_value) SELECT ${sequence.start - sequence.increment} WHERE NOT EXISTS (SELECT 1 FROM ${name})`
    ]
  }

  nextvalStatements(sequence: SequenceSpec): string[] {
    const name = this.qualifiedName(sequence.namespace, sequence.name)
    return [
      `UPDATE ${name} SET last_value = last_value + ${sequence.increment}`,
      `SELECT last_value AS nextval FROM ${name}`
    ]
  }

  resetSequenceStatements(sequence: SequenceSpec): string[] {
    const name = this.qualifiedName(sequence.namespace, sequence.name)
    return [`UPDATE ${name} SET last_value = ${sequence.start - sequence.increment}`]
  }

  truncateTableStatement(qualifiedName: string): string {
    // SQLite doesn't support TRUNCATE, use DELETE instead
    return `DELETE FROM ${qualifiedName}`
  }

  createViewStatement(qualifiedName: string, columns: readonly string[], query: string): string {
    const list = columns.map(column => this.escapeIdentifier(column)).join(', ')
    return `CREATE VIEW IF NOT EXISTS ${qualifiedName} (${list}) AS ${query}`
  }
}

export const sqliteAdapter = new SQLiteAdapter()
