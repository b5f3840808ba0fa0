/**
 * PostgreSQL Dialect Adapter
 */

import type { DriverValue, FieldValue } from '@accordo/core'
import type { ColumnSpec, DialectAdapter, SemanticType, SequenceSpec } from '../types.js'
import { fromDriverValue, quoteLiteral } from '../helpers.js'

export class PostgresAdapter implements DialectAdapter {
  readonly dialect = 'postgres' as const
  readonly parameterStyle = 'numbered' as const
  readonly supportsSchemas = true
  readonly supportsDeferrableConstraints = true
  readonly autoIncrementColumn = 'SERIAL PRIMARY KEY'

  parameterMarker(index: number): string {
    return `$${index}`
  }

  escapeIdentifier(identifier: string): string {
    return `"${identifier.replace(/"/g, '""')}"`
  }

  qualifiedName(namespace: string | undefined, name: string): string {
    const quoted = this.escapeIdentifier(name)
    return namespace ? `${this.escapeIdentifier(namespace)}.${quoted}` : quoted
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
        return 'DOUBLE PRECISION'
      case 'numeric':
        return spec.precision !== undefined
          ? `NUMERIC(${spec.precision},${spec.scale ?? 0})`
          : 'NUMERIC'
      case 'boolean':
        return 'BOOLEAN'
      case 'text':
      case 'enum':
        return 'TEXT'
      case 'varchar':
        return spec.maxLength ? `VARCHAR(${spec.maxLength})` : 'VARCHAR'
      case 'char':
        return spec.maxLength ? `CHARACTER(${spec.maxLength})` : 'CHARACTER'
      case 'timestamp':
        return spec.tz ? 'TIMESTAMP WITH TIME ZONE' : 'TIMESTAMP'
    }
  }

  toDriver(value: FieldValue, _type: SemanticType): DriverValue {
    // pg binds every field value natively
    return value
  }

  fromDriver(value: unknown, type: SemanticType): FieldValue {
    return fromDriverValue(value, type)
  }

  createSequenceStatements(sequence: SequenceSpec): string[] {
    const name = this.qualifiedName(sequence.namespace, sequence.name)
    return [
      `CREATE SEQUENCE IF NOT EXISTS ${name} AS ${this.columnType({ type: sequence.indexType })} ` +
        `START ${sequence.start} INCREMENT ${sequence.increment}`
    ]
  }

  nextvalStatements(sequence: SequenceSpec): string[] {
    const name = this.qualifiedName(sequence.namespace, sequence.name)
    return [`SELECT nextval(${quoteLiteral(name)}) AS nextval`]
  }

  resetSequenceStatements(sequence: SequenceSpec): string[] {
    return [`ALTER SEQUENCE ${this.qualifiedName(sequence.namespace, sequence.name)} RESTART`]
  }

  truncateTableStatement(qualifiedName: string): string {
    return `TRUNCATE TABLE ${qualifiedName}`
  }

  createViewStatement(qualifiedName: string, columns: readonly string[], query: string): string {
    const list = columns.map(column => this.escapeIdentifier(column)).join(', ')
    return `CREATE OR REPLACE VIEW ${qualifiedName} (${list}) AS ${query}`
  }
}

export const postgresAdapter = new PostgresAdapter()
