/**
 * Record schemas and the fixed-shape records built from them.
 *
 * @module @accordo/schema/record
 */

import {
  SchemaError,
  SchemaViolationError,
  type Context,
  type FieldValue,
  type Row
} from '@accordo/core'
import { assertValidIdentifier, defaultDialect, type DialectAdapter } from '@accordo/dialects'
import type { AnyField, Field } from './fields/base.js'

/**
 * Ordered field declarations, keyed by attribute name
 */
export type FieldMap = Readonly<Record<string, AnyField>>

/**
 * Value type of a field, including null
 */
export type FieldType<F> = F extends Field<infer T> ? T | null : never

export type FieldName<S extends FieldMap> = keyof S & string

export type RecordValues<S extends FieldMap> = { [K in FieldName<S>]: FieldType<S[K]> }

export type RecordInput<S extends FieldMap> = { [K in FieldName<S>]?: FieldType<S[K]> }

export interface FieldEntry {
  readonly name: string
  readonly sqlName: string
  readonly field: AnyField
}

function cloneValue(value: FieldValue): FieldValue {
  return value instanceof Date ? new Date(value.getTime()) : value
}

function sameValue(a: FieldValue, b: FieldValue): boolean {
  if (a instanceof Date && b instanceof Date) {
    return a.getTime() === b.getTime()
  }
  return a === b
}

/**
 * The static description of a record: an ordered set of named fields.
 *
 * @example
 * ```typescript
 * const Point = defineRecord('Point', {
 *   x: new IntField({ nullable: false }),
 *   y: new IntField({ nullable: false })
 * })
 *
 * const p = Point.create({ x: 1, y: 2 })
 * p.get('x') // 1
 * p.setValue('z', 3) // throws SchemaViolationError
 * ```
 */
export class RecordSchema<S extends FieldMap = FieldMap> {
  readonly entries: readonly FieldEntry[]
  private readonly positions: ReadonlyMap<string, number>
  private readonly columnPositions: ReadonlyMap<string, number>

  constructor(
    readonly name: string,
    readonly fields: S
  ) {
    const entries: FieldEntry[] = []
    const positions = new Map<string, number>()
    const columnPositions = new Map<string, number>()

    for (const [fieldName, field] of Object.entries(fields)) {
      assertValidIdentifier(fieldName, 'field name')
      const sqlName = field.sqlName ?? fieldName
      assertValidIdentifier(sqlName, 'column name')
      if (columnPositions.has(sqlName)) {
        throw new SchemaError(`${name} declares column ${sqlName} twice`)
      }
      positions.set(fieldName, entries.length)
      columnPositions.set(sqlName, entries.length)
      entries.push({ name: fieldName, sqlName, field })
    }

    this.entries = entries
    this.positions = positions
    this.columnPositions = columnPositions
  }

  get fieldNames(): string[] {
    return this.entries.map(entry => entry.name)
  }

  get columnNames(): string[] {
    return this.entries.map(entry => entry.sqlName)
  }

  has(name: string): boolean {
    return this.positions.has(name)
  }

  /**
   * Slot index of a field.
   *
   * @throws SchemaViolationError for undeclared names
   */
  position(name: string): number {
    const index = this.positions.get(name)
    if (index === undefined) {
      throw new SchemaViolationError(this.name, name)
    }
    return index
  }

  entry(name: string): FieldEntry {
    const entry = this.entries[this.position(name)]
    if (!entry) {
      throw new SchemaViolationError(this.name, name)
    }
    return entry
  }

  create(values?: RecordInput<S>): RecordInstance<S> {
    return new RecordInstance(this, values)
  }

  /**
   * Build a record from untyped values, validating each one.
   */
  fromObject(values: Readonly<Record<string, unknown>>): RecordInstance<S> {
    const record = new RecordInstance(this)
    record.assign(values)
    return record
  }

  /**
   * Materialise a driver row. Keys are column names; every key must belong
   * to a declared field.
   */
  fromRow(row: Row, dialect: DialectAdapter = defaultDialect): RecordInstance<S> {
    const record = new RecordInstance(this)
    for (const [column, raw] of Object.entries(row)) {
      const index = this.columnPositions.get(column)
      const entry = index === undefined ? undefined : this.entries[index]
      if (!entry) {
        throw new SchemaViolationError(this.name, column)
      }
      record.setValue(entry.name, dialect.fromDriver(raw, entry.field.semanticType))
    }
    return record
  }

  /**
   * Materialise driver values given in declaration order.
   */
  fromValues(values: readonly unknown[], dialect: DialectAdapter = defaultDialect): RecordInstance<S> {
    if (values.length !== this.entries.length) {
      throw new SchemaError(
        `${this.name} has ${this.entries.length} fields but ${values.length} values were supplied`
      )
    }
    const record = new RecordInstance(this)
    this.entries.forEach((entry, index) => {
      record.setValue(entry.name, dialect.fromDriver(values[index], entry.field.semanticType))
    })
    return record
  }

  /** Whether every key of `row` is a declared column */
  matchesColumns(row: Row): boolean {
    return Object.keys(row).every(column => this.columnPositions.has(column))
  }

  isRecord(value: unknown): value is RecordInstance<S> {
    return value instanceof RecordInstance && value.schema === this
  }
}

/**
 * A record: one value slot per declared field, in declaration order.
 */
export class RecordInstance<S extends FieldMap = FieldMap> {
  private slots: FieldValue[]

  constructor(
    readonly schema: RecordSchema<S>,
    values?: RecordInput<S>
  ) {
    this.slots = schema.entries.map(() => null)
    if (values) {
      this.assign(values)
    }
  }

  get<K extends FieldName<S>>(name: K): FieldType<S[K]> {
    // Slots are only written through the field's own validate()
    return (this.slots[this.schema.position(name)] ?? null) as FieldType<S[K]>
  }

  set<K extends FieldName<S>>(name: K, value: FieldType<S[K]>): void {
    this.setValue(name, value)
  }

  getValue(name: string): FieldValue {
    return this.slots[this.schema.position(name)] ?? null
  }

  /**
   * Assign by name, validating the value.
   *
   * @throws SchemaViolationError for undeclared names
   * @throws ValidationError when the value does not fit the field
   */
  setValue(name: string, value: unknown): void {
    const index = this.schema.position(name)
    const entry = this.schema.entry(name)
    this.slots[index] = entry.field.validate(value, name)
  }

  assign(values: Readonly<Record<string, unknown>>): void {
    for (const [name, value] of Object.entries(values)) {
      if (value !== undefined) {
        this.setValue(name, value)
      }
    }
  }

  /** Values in declaration order */
  values(): FieldValue[] {
    return this.slots.map(cloneValue)
  }

  toObject(): RecordValues<S> {
    const result: Record<string, FieldValue> = {}
    this.schema.entries.forEach((entry, index) => {
      result[entry.name] = cloneValue(this.slots[index] ?? null)
    })
    // Keys are exactly the schema's field names
    return result as RecordValues<S>
  }

  copy(): RecordInstance<S> {
    const duplicate = new RecordInstance(this.schema)
    duplicate.slots = this.slots.map(cloneValue)
    return duplicate
  }

  clear(): void {
    this.slots = this.schema.entries.map(() => null)
  }

  equals(other: RecordInstance<S>): boolean {
    return (
      other.schema === this.schema &&
      this.slots.every((value, index) => sameValue(value, other.slots[index] ?? null))
    )
  }

  /**
   * Push a context into the record, field by field in declaration order.
   * Row-enumerating fields advance their counter in `context`.
   */
  applyContext(context: Context): void {
    this.schema.entries.forEach((entry, index) => {
      this.slots[index] = entry.field.propagate(this.slots[index] ?? null, context, entry.name)
    })
  }

  /**
   * Adopt non-null context values without side effects on the context.
   */
  refreshContext(context: Context): void {
    this.schema.entries.forEach((entry, index) => {
      this.slots[index] = entry.field.refresh(this.slots[index] ?? null, context, entry.name)
    })
  }

  /**
   * Stored non-null values of context-bound fields, keyed by context key.
   * The first field bound to a key wins.
   */
  contextValues(): Map<string, FieldValue> {
    const result = new Map<string, FieldValue>()
    this.schema.entries.forEach((entry, index) => {
      const key = entry.field.contextKey
      const value = this.slots[index] ?? null
      if (key !== undefined && value !== null && !result.has(key)) {
        result.set(key, cloneValue(value))
      }
    })
    return result
  }
}

/**
 * Declare a record schema.
 */
export function defineRecord<S extends FieldMap>(name: string, fields: S): RecordSchema<S> {
  return new RecordSchema(name, fields)
}
