/**
 * Table constraints. Builders return unbound specs; a table binds them to
 * its columns and renders their DDL.
 *
 * @module @accordo/schema/constraints
 */

import { SchemaError } from '@accordo/core'
import type { DialectAdapter } from '@accordo/dialects'
import type { FieldEntry } from './record.js'

export type ReferentialAction = 'NO ACTION' | 'RESTRICT' | 'CASCADE' | 'SET NULL' | 'SET DEFAULT'

export type MatchType = 'SIMPLE' | 'PARTIAL' | 'FULL'

/**
 * Anything a foreign key can point at: a table name, or an object that
 * knows its qualified name (a table schema)
 */
export type ReferenceTarget = string | { qualifiedName(dialect: DialectAdapter): string }

export interface ForeignKeyOptions {
  table: ReferenceTarget
  /** Referenced columns; default to the constrained columns */
  references?: readonly string[] | undefined
  onUpdate?: ReferentialAction | undefined
  onDelete?: ReferentialAction | undefined
  match?: MatchType | undefined
  deferrable?: boolean | undefined
}

export type ConstraintSpec =
  | { readonly kind: 'primaryKey'; readonly columns: readonly string[] }
  | { readonly kind: 'unique'; readonly columns: readonly string[] }
  | { readonly kind: 'foreignKey'; readonly columns: readonly string[]; readonly options: ForeignKeyOptions }
  | { readonly kind: 'check'; readonly sql: string }
  | { readonly kind: 'custom'; readonly sql: string }

export type ConstraintKind = ConstraintSpec['kind']

/**
 * What a constraint needs from the table it is bound to
 */
export interface ColumnLookup {
  has(name: string): boolean
  entry(name: string): FieldEntry
}

/**
 * @example
 * defineTable('orders', fields, { constraints: { orders_pk: primaryKey(['trans_id']) } })
 */
export function primaryKey(columns: readonly string[]): ConstraintSpec {
  return { kind: 'primaryKey', columns }
}

export function unique(columns: readonly string[]): ConstraintSpec {
  return { kind: 'unique', columns }
}

export function foreignKey(columns: readonly string[], options: ForeignKeyOptions): ConstraintSpec {
  return { kind: 'foreignKey', columns, options }
}

export function check(sql: string): ConstraintSpec {
  return { kind: 'check', sql }
}

/** Raw constraint body, emitted after `CONSTRAINT name` */
export function customConstraint(sql: string): ConstraintSpec {
  return { kind: 'custom', sql }
}

/**
 * A constraint bound to a table. Column lists hold field names; DDL uses
 * their SQL names.
 */
export class Constraint {
  constructor(
    readonly name: string,
    readonly spec: ConstraintSpec,
    private readonly schema: ColumnLookup
  ) {
    if ('columns' in spec) {
      if (spec.columns.length === 0) {
        throw new SchemaError(`Constraint ${name} lists no columns`)
      }
      for (const column of spec.columns) {
        if (!schema.has(column)) {
          throw new SchemaError(`Constraint ${name} references non-existent column ${column}`)
        }
      }
    }
    if (spec.kind === 'foreignKey') {
      const references = spec.options.references ?? spec.columns
      if (references.length !== spec.columns.length) {
        throw new SchemaError(
          `Foreign key ${name} maps ${spec.columns.length} columns onto ${references.length}`
        )
      }
    }
  }

  get kind(): ConstraintKind {
    return this.spec.kind
  }

  /** Field names covered by the constraint */
  get columns(): readonly string[] {
    return 'columns' in this.spec ? this.spec.columns : []
  }

  /** The `CONSTRAINT ...` clause of a `CREATE TABLE` */
  ddl(dialect: DialectAdapter): string {
    const spec = this.spec
    const name = dialect.escapeIdentifier(this.name)
    switch (spec.kind) {
      case 'primaryKey':
        return `CONSTRAINT ${name} PRIMARY KEY (${this.sqlColumns(dialect)})`
      case 'unique':
        return `CONSTRAINT ${name} UNIQUE (${this.sqlColumns(dialect)})`
      case 'check':
        return `CONSTRAINT ${name} CHECK (${spec.sql})`
      case 'custom':
        return `CONSTRAINT ${name} ${spec.sql}`
      case 'foreignKey': {
        const { options } = spec
        const target =
          typeof options.table === 'string'
            ? dialect.qualifiedName(undefined, options.table)
            : options.table.qualifiedName(dialect)
        const references = (options.references ?? spec.columns)
          .map(column => dialect.escapeIdentifier(column))
          .join(', ')
        let ddl = `CONSTRAINT ${name} FOREIGN KEY (${this.sqlColumns(dialect)}) REFERENCES ${target} (${references})`
        if (options.match) ddl += ` MATCH ${options.match}`
        if (options.onUpdate) ddl += ` ON UPDATE ${options.onUpdate}`
        if (options.onDelete) ddl += ` ON DELETE ${options.onDelete}`
        if (options.deferrable && dialect.supportsDeferrableConstraints) {
          ddl += ' DEFERRABLE INITIALLY DEFERRED'
        }
        return ddl
      }
    }
  }

  private sqlColumns(dialect: DialectAdapter): string {
    return this.columns
      .map(column => dialect.escapeIdentifier(this.schema.entry(column).sqlName))
      .join(', ')
  }
}
