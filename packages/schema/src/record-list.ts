/**
 * Ordered containers of records sharing one schema.
 *
 * @module @accordo/schema/record-list
 */

import { SchemaViolationError, type Context, type FieldValue } from '@accordo/core'
import {
  RecordInstance,
  type FieldMap,
  type FieldName,
  type FieldType,
  type RecordInput,
  type RecordSchema
} from './record.js'

/**
 * A list of records of one schema.
 *
 * @example
 * ```typescript
 * const Lines = defineRecordList(orderLines)
 * const lines = Lines.create([orderLines.create({ sku: 'A-1', qty: 2 })])
 * lines.append({ sku: 'B-7', qty: 1 })
 * [...lines.column('sku')] // ['A-1', 'B-7']
 * ```
 */
export class RecordList<S extends FieldMap = FieldMap> implements Iterable<RecordInstance<S>> {
  protected items: RecordInstance<S>[] = []

  constructor(
    readonly schema: RecordSchema<S>,
    records: Iterable<RecordInstance<S> | RecordInput<S>> = []
  ) {
    this.extend(records)
  }

  get length(): number {
    return this.items.length
  }

  /**
   * Add a record at the end. Plain objects are turned into records.
   *
   * @throws SchemaViolationError for a record of another schema
   */
  append(record: RecordInstance<S> | RecordInput<S>): void {
    this.items.push(this.accept(record))
  }

  insert(index: number, record: RecordInstance<S> | RecordInput<S>): void {
    this.items.splice(index, 0, this.accept(record))
  }

  extend(records: Iterable<RecordInstance<S> | RecordInput<S>>): void {
    for (const record of records) {
      this.append(record)
    }
  }

  /** Record at `index`; negative indexes count from the end */
  at(index: number): RecordInstance<S> | undefined {
    return this.items.at(index)
  }

  set(index: number, record: RecordInstance<S> | RecordInput<S>): void {
    const position = index < 0 ? this.items.length + index : index
    if (position < 0 || position >= this.items.length) {
      throw new RangeError(`Index ${index} is out of range for a list of ${this.items.length}`)
    }
    this.items[position] = this.accept(record)
  }

  /** Remove and return the record at `index`, or undefined when out of range */
  remove(index: number): RecordInstance<S> | undefined {
    const position = index < 0 ? this.items.length + index : index
    if (position < 0 || position >= this.items.length) {
      return undefined
    }
    return this.items.splice(position, 1)[0]
  }

  clear(): void {
    this.items = []
  }

  /** Deep copy: the records are copied too */
  copy(): RecordList<S> {
    return new RecordList(
      this.schema,
      this.items.map(record => record.copy())
    )
  }

  /**
   * Values of one field across the list, in list order. Each iteration
   * reads the list afresh.
   */
  column<K extends FieldName<S>>(name: K): Iterable<FieldType<S[K]>> {
    this.schema.position(name)
    const items = (): RecordInstance<S>[] => this.items
    return {
      *[Symbol.iterator]() {
        for (const record of items()) {
          yield record.get(name)
        }
      }
    }
  }

  /** Push a context into every record in order */
  applyContext(context: Context): void {
    for (const record of this.items) {
      record.applyContext(context)
    }
  }

  /** First non-null stored value per context key across the list */
  contextValues(): Map<string, FieldValue> {
    const result = new Map<string, FieldValue>()
    for (const record of this.items) {
      for (const [key, value] of record.contextValues()) {
        if (!result.has(key)) {
          result.set(key, value)
        }
      }
    }
    return result
  }

  toArray(): RecordInstance<S>[] {
    return [...this.items]
  }

  [Symbol.iterator](): Iterator<RecordInstance<S>> {
    return this.items[Symbol.iterator]()
  }

  private accept(record: RecordInstance<S> | RecordInput<S>): RecordInstance<S> {
    if (this.schema.isRecord(record)) {
      return record
    }
    if (isForeignRecord(record)) {
      throw new SchemaViolationError(
        this.schema.name,
        record.schema.name,
        `A ${record.schema.name} record cannot be added to a list of ${this.schema.name}`
      )
    }
    return this.schema.create(record)
  }
}

function isForeignRecord(value: unknown): value is RecordInstance<FieldMap> {
  return value instanceof RecordInstance
}

/**
 * Factory for record lists of one schema.
 */
export class RecordListDefinition<S extends FieldMap = FieldMap> {
  constructor(readonly schema: RecordSchema<S>) {}

  create(records?: Iterable<RecordInstance<S> | RecordInput<S>>): RecordList<S> {
    return new RecordList(this.schema, records)
  }

  isList(value: unknown): value is RecordList<S> {
    return value instanceof RecordList && value.schema === this.schema
  }
}

export function defineRecordList<S extends FieldMap>(schema: RecordSchema<S>): RecordListDefinition<S> {
  return new RecordListDefinition(schema)
}
