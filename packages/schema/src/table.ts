/**
 * Table schemas: records with a name, constraints and the statements that
 * write them.
 *
 * @module @accordo/schema/table
 */

import { SchemaError, UnconstrainedWhereError, type Cursor, type Statement } from '@accordo/core'
import { assertValidIdentifier, defaultDialect, type DialectAdapter } from '@accordo/dialects'
import { Constraint, type ConstraintSpec } from './constraints.js'
import type { FieldEntry, FieldMap, RecordInstance } from './record.js'
import { RelationSchema } from './relation.js'
import { StatementBuilder } from './statement.js'
import type { Namespace } from './namespace.js'

export interface TableOptions {
  namespace?: Namespace | undefined
  /** Constraints keyed by constraint name */
  constraints?: Readonly<Record<string, ConstraintSpec>> | undefined
}

/**
 * @example
 * ```typescript
 * const orders = defineTable(
 *   'orders',
 *   {
 *     trans_id: new ContextIntField({ contextKey: 'trans_id' }),
 *     total: new NumericField({ precision: 10, scale: 2 })
 *   },
 *   { constraints: { orders_pk: primaryKey(['trans_id']) } }
 * )
 *
 * orders.insertStatement(orders.create({ trans_id: 101, total: '9.99' }))
 * // { sql: 'INSERT INTO "orders" ("trans_id", "total") VALUES (?, ?)', parameters: [101, '9.99'] }
 * ```
 */
export class TableSchema<S extends FieldMap = FieldMap> extends RelationSchema<S> {
  readonly kind = 'table' as const
  readonly constraints: readonly Constraint[]

  constructor(name: string, fields: S, options: TableOptions = {}) {
    super(name, fields, options.namespace)

    const constraints: Constraint[] = []
    for (const [constraintName, spec] of Object.entries(options.constraints ?? {})) {
      assertValidIdentifier(constraintName, 'constraint name')
      if (spec.kind === 'primaryKey' && constraints.some(c => c.kind === 'primaryKey')) {
        throw new SchemaError(`Table ${name} declares more than one primary key`)
      }
      constraints.push(new Constraint(constraintName, spec, this))
    }
    this.constraints = constraints

    options.namespace?.register(this)
  }

  get primaryKey(): Constraint | undefined {
    return this.constraints.find(constraint => constraint.kind === 'primaryKey')
  }

  /** Entries of the primary-key columns, in constraint order */
  get primaryKeyEntries(): FieldEntry[] {
    return (this.primaryKey?.columns ?? []).map(column => this.entry(column))
  }

  /**
   * Fail unless the table has exactly one primary key.
   *
   * @throws SchemaError
   */
  assertPrimaryKey(): Constraint {
    const key = this.primaryKey
    if (!key) {
      throw new SchemaError(`Table ${this.name} has no primary key`)
    }
    return key
  }

  /**
   * `INSERT` of every declared column. Auto-incrementing columns holding
   * null are left to the database.
   */
  insertStatement(record: RecordInstance<S>, dialect: DialectAdapter = defaultDialect): Statement {
    const builder = new StatementBuilder(dialect)
    const columns: string[] = []
    const markers: string[] = []

    for (const entry of this.entries) {
      const value = record.getValue(entry.name)
      if (value === null && entry.field.columnSpec().autoIncrement) continue
      columns.push(this.column(entry, dialect))
      markers.push(builder.bind(value, entry.field.semanticType))
    }

    return builder.build(
      `INSERT INTO ${this.qualifiedName(dialect)} (${columns.join(', ')}) VALUES (${markers.join(', ')})`
    )
  }

  /**
   * `UPDATE` of the non-key columns, keyed on the primary key.
   *
   * @throws SchemaError without a primary key
   * @throws UnconstrainedWhereError when a key column holds null
   */
  updateStatement(record: RecordInstance<S>, dialect: DialectAdapter = defaultDialect): Statement {
    this.assertPrimaryKey()
    const keyEntries = this.primaryKeyEntries
    const keyNames = new Set(keyEntries.map(entry => entry.name))
    const nonKey = this.entries.filter(entry => !keyNames.has(entry.name))
    const setEntries = nonKey.length > 0 ? nonKey : keyEntries

    const builder = new StatementBuilder(dialect)
    const assignments = setEntries.map(
      entry =>
        `${this.column(entry, dialect)} = ${builder.bind(record.getValue(entry.name), entry.field.semanticType)}`
    )
    const where = this.keyClauses(record, builder, dialect)

    return builder.build(
      `UPDATE ${this.qualifiedName(dialect)} SET ${assignments.join(', ')} WHERE ${where}`
    )
  }

  /**
   * `DELETE` keyed on the primary key.
   */
  deleteStatement(record: RecordInstance<S>, dialect: DialectAdapter = defaultDialect): Statement {
    this.assertPrimaryKey()
    const builder = new StatementBuilder(dialect)
    const where = this.keyClauses(record, builder, dialect)
    return builder.build(`DELETE FROM ${this.qualifiedName(dialect)} WHERE ${where}`)
  }

  /**
   * `SELECT` of the row sharing the record's primary key.
   */
  primaryKeySelectStatement(
    record: RecordInstance<S>,
    dialect: DialectAdapter = defaultDialect
  ): Statement {
    this.assertPrimaryKey()
    const builder = new StatementBuilder(dialect)
    const where = this.keyClauses(record, builder, dialect)
    return builder.build(
      `SELECT ${this.columnList(dialect)} FROM ${this.qualifiedName(dialect)} WHERE ${where}`
    )
  }

  /**
   * Insert a record on its own, outside any orchestrated transaction.
   */
  async insert(
    cursor: Cursor,
    record: RecordInstance<S>,
    dialect: DialectAdapter = defaultDialect
  ): Promise<void> {
    const { sql, parameters } = this.insertStatement(record, dialect)
    await cursor.execute(sql, parameters)
  }

  createTableStatement(dialect: DialectAdapter = defaultDialect): string {
    const lines = [
      ...this.entries.map(entry => `${this.column(entry, dialect)} ${entry.field.sqlType(dialect)}`),
      ...this.constraints
        .filter(constraint => !this.keyIsInlined(constraint))
        .map(constraint => constraint.ddl(dialect))
    ]
    return `CREATE TABLE IF NOT EXISTS ${this.qualifiedName(dialect)} (\n    ${lines.join(',\n    ')}\n)`
  }

  truncateTableStatement(dialect: DialectAdapter = defaultDialect): string {
    return dialect.truncateTableStatement(this.qualifiedName(dialect))
  }

  createStatements(dialect: DialectAdapter = defaultDialect): string[] {
    return [this.createTableStatement(dialect)]
  }

  private keyClauses(
    record: RecordInstance<S>,
    builder: StatementBuilder,
    dialect: DialectAdapter
  ): string {
    return this.primaryKeyEntries
      .map(entry => {
        const value = record.getValue(entry.name)
        if (value === null) {
          throw new UnconstrainedWhereError(
            `Primary key column ${entry.sqlName} of ${this.name} is null`
          )
        }
        return `${this.column(entry, dialect)} = ${builder.bind(value, entry.field.semanticType)}`
      })
      .join(' AND ')
  }

  // An auto-increment column already declares itself the primary key
  private keyIsInlined(constraint: Constraint): boolean {
    return (
      constraint.kind === 'primaryKey' &&
      constraint.columns.some(column => this.entry(column).field.columnSpec().autoIncrement === true)
    )
  }
}

/**
 * Declare a table schema.
 */
export function defineTable<S extends FieldMap>(
  name: string,
  fields: S,
  options: TableOptions = {}
): TableSchema<S> {
  return new TableSchema(name, fields, options)
}
