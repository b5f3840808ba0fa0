/**
 * Shared behaviour of tables and views: a record schema that names a
 * database object and can be selected from.
 *
 * @module @accordo/schema/relation
 */

import {
  SchemaViolationError,
  UnboundQueryError,
  type Context,
  type Cursor,
  type FieldValue,
  type Statement
} from '@accordo/core'
import { defaultDialect, type DialectAdapter } from '@accordo/dialects'
import {
  RecordSchema,
  type FieldEntry,
  type FieldMap,
  type FieldName,
  type RecordInstance
} from './record.js'
import { StatementBuilder, assertValidObjectName } from './statement.js'
import type { Namespace } from './namespace.js'

/**
 * Equality predicates keyed by field name. `null` matches `IS NULL`;
 * `undefined` entries are skipped.
 */
export type Predicates<S extends FieldMap = FieldMap> = {
  readonly [K in FieldName<S>]?: FieldValue | undefined
}

export interface ContextSelectOptions {
  /** Select every row when no context value constrains the relation */
  allowUnlimited?: boolean | undefined
  dialect?: DialectAdapter | undefined
}

export type RelationKind = 'table' | 'view'

export abstract class RelationSchema<S extends FieldMap = FieldMap> extends RecordSchema<S> {
  abstract readonly kind: RelationKind

  constructor(
    name: string,
    fields: S,
    readonly namespace: Namespace | undefined
  ) {
    super(name, fields)
    assertValidObjectName(name, namespace?.name, 'relation')
  }

  /** Object name as the dialect writes it, quoted and namespace included */
  qualifiedName(dialect: DialectAdapter = defaultDialect): string {
    return dialect.qualifiedName(this.namespace?.name, this.name)
  }

  /**
   * `SELECT` every column, filtered by equality predicates joined with AND.
   *
   * @throws SchemaViolationError when a predicate names an undeclared field
   */
  selectStatement(predicates: Predicates<S> = {}, dialect: DialectAdapter = defaultDialect): Statement {
    const builder = new StatementBuilder(dialect)
    const clauses: string[] = []

    for (const [name, value] of Object.entries(predicates)) {
      if (value === undefined) continue
      if (!this.has(name)) {
        throw new SchemaViolationError(this.name, name)
      }
      const entry = this.entry(name)
      if (value === null) {
        clauses.push(`${this.column(entry, dialect)} IS NULL`)
      } else {
        const normalised = entry.field.validate(value, name)
        clauses.push(`${this.column(entry, dialect)} = ${builder.bind(normalised, entry.field.semanticType)}`)
      }
    }

    return builder.build(this.selectSql(dialect, clauses))
  }

  /**
   * `SELECT` constrained by every field whose context key has a non-null
   * value in `context`.
   *
   * @throws UnboundQueryError when nothing constrains the select and
   * `allowUnlimited` is not set
   */
  contextSelectStatement(context: Context, options: ContextSelectOptions = {}): Statement {
    const dialect = options.dialect ?? defaultDialect
    const builder = new StatementBuilder(dialect)
    const clauses: string[] = []

    for (const entry of this.entries) {
      const key = entry.field.contextKey
      if (key === undefined) continue
      const value = context.get(key)
      if (value === null || value === undefined) continue
      const normalised = entry.field.validate(value, entry.name)
      clauses.push(`${this.column(entry, dialect)} = ${builder.bind(normalised, entry.field.semanticType)}`)
    }

    if (clauses.length === 0 && !options.allowUnlimited) {
      throw new UnboundQueryError(this.namespace ? `${this.namespace.name}.${this.name}` : this.name)
    }

    return builder.build(this.selectSql(dialect, clauses))
  }

  /**
   * Run a predicate select and materialise the rows.
   */
  async select(
    cursor: Cursor,
    predicates: Predicates<S> = {},
    dialect: DialectAdapter = defaultDialect
  ): Promise<RecordInstance<S>[]> {
    const { sql, parameters } = this.selectStatement(predicates, dialect)
    const rows = await cursor.execute(sql, parameters)
    return rows.map(row => this.fromRow(row, dialect))
  }

  /** DDL that creates the relation */
  abstract createStatements(dialect?: DialectAdapter): string[]

  protected column(entry: FieldEntry, dialect: DialectAdapter): string {
    return dialect.escapeIdentifier(entry.sqlName)
  }

  protected columnList(dialect: DialectAdapter): string {
    return this.entries.map(entry => this.column(entry, dialect)).join(', ')
  }

  private selectSql(dialect: DialectAdapter, clauses: readonly string[]): string {
    const sql = `SELECT ${this.columnList(dialect)} FROM ${this.qualifiedName(dialect)}`
    return clauses.length > 0 ? `${sql} WHERE ${clauses.join(' AND ')}` : sql
  }
}
