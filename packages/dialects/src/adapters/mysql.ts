/**
 * MySQL Dialect Adapter
 *
 * Sequences are one-row tables advanced through `LAST_INSERT_ID(expr)`, which
 * keeps the drawn value private to the connection.
 */

import type { DriverValue, FieldValue } from '@accordo/core'
import type { ColumnSpec, DialectAdapter, SemanticType, SequenceSpec } from '../types.js'
import { fromDriverValue, quoteLiteral } from '../helpers.js'

export class MySQLAdapter implements DialectAdapter {
  readonly dialect = 'mysql' as const
  readonly parameterStyle = 'positional' as const
  readonly supportsSchemas = true
  readonly supportsDeferrableConstraints = false
  readonly autoIncrementColumn = 'INT AUTO_INCREMENT PRIMARY KEY'

  parameterMarker(_index: number): string {
    return '?'
  }

  escapeIdentifier(identifier: string): string {
    return `\`${identifier.replace(/`/g, '``')}\``
  }

  qualifiedName(namespace: string | undefined, name: string): string {
    const quoted = this.escapeIdentifier(name)
    return namespace ? `${this.escapeIdentifier(namespace)}.${quoted}` : quoted
  }

  columnType(spec: ColumnSpec): string {
    switch (spec.type) {
      case 'integer':
        return 'INT'
      case 'smallint':
        return 'SMALLINT'
      case 'bigint':
        return 'BIGINT'
      case 'real':
        return 'DOUBLE'
      case 'numeric':
        return spec.precision !== undefined
          ? `DECIMAL(${spec.precision},${spec.scale ?? 0})`
          : 'DECIMAL'
      case 'boolean':
        return 'BOOLEAN'
      case 'text':
        return 'TEXT'
      case 'varchar':
        return `VARCHAR(${spec.maxLength ?? 255})`
      case 'char':
        return spec.maxLength ? `CHAR(${spec.maxLength})` : 'CHAR'
      case 'timestamp':
        // DATETIME has no zone; TIMESTAMP converts through the session zone
        return spec.tz ? 'TIMESTAMP(3)' : 'DATETIME(3)'
      case 'enum':
        return spec.values && spec.values.length > 0
          ? `ENUM(${spec.values.map(quoteLiteral).join(', ')})`
          : 'TEXT'
    }
  }

  toDriver(value: FieldValue, _type: SemanticType): DriverValue {
    if (typeof value === 'boolean') {
      return value ? 1 : 0
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
      `INSERT INTO ${name} (last_value) SELECT ${sequence.start - sequence.increment} FROM DUAL WHERE NOT EXISTS (SELECT 1 FROM ${name})`
    ]
  }

  nextvalStatements(sequence: SequenceSpec): string[] {
    const name = this.qualifiedName(sequence.namespace, sequence.name)
    return [
      `UPDATE ${name} SET last_value = LAST_INSERT_ID(last_value + ${sequence.increment})`,
      'SELECT LAST_INSERT_ID() AS nextval'
    ]
  }

  resetSequenceStatements(sequence: SequenceSpec): string[] {
    const name = this.qualifiedName(sequence.namespace, sequence.name)
    return [`UPDATE ${name} SET last_value = ${sequence.start - sequence.increment}`]
  }

  truncateTableStatement(qualifiedName: string): string {
    return `TRUNCATE TABLE ${qualifiedName}`
  }

  createViewStatement(qualifiedName: string, columns: readonly string[], query: string): string {
    const list = columns.map(column => this.escapeIdentifier(column)).join(', ')
    return `CREATE OR REPLACE VIEW ${qualifiedName} (${list}) AS ${query}`
  }
}

export const mysqlAdapter = new MySQLAdapter()
