import { QueryResultError, type Cursor, type Row } from '@accordo/core'
import { defaultDialect, type DialectAdapter, type SequenceSpec } from '@accordo/dialects'
import { assertValidObjectName } from './statement.js'
import type { Namespace } from './namespace.js'

export interface SequenceOptions {
  start?: number | undefined
  increment?: number | undefined
  indexType?: 'integer' | 'bigint' | undefined
  namespace?: Namespace | undefined
}

/**
 * A database sequence. Dialects without native sequences emulate them, so
 * the statements always come from the adapter.
 *
 * @example
 * ```typescript
 * const transIdSeq = defineSequence('trans_id_seq', { start: 101 })
 * await transIdSeq.create(cursor)
 * await transIdSeq.nextval(cursor) // 101
 * await transIdSeq.nextval(cursor) // 102
 * ```
 */
export class Sequence {
  readonly kind = 'sequence' as const
  readonly start: number
  readonly increment: number
  readonly indexType: 'integer' | 'bigint'
  readonly namespace: Namespace | undefined

  constructor(
    readonly name: string,
    options: SequenceOptions = {}
  ) {
    assertValidObjectName(name, options.namespace?.name, 'sequence')
    this.start = options.start ?? 1
    this.increment = options.increment ?? 1
    this.indexType = options.indexType ?? 'bigint'
    this.namespace = options.namespace
    if (!Number.isSafeInteger(this.start) || !Number.isSafeInteger(this.increment) || this.increment === 0) {
      throw new RangeError(`Sequence ${name} needs an integer start and a non-zero integer increment`)
    }
    options.namespace?.register(this)
  }

  get spec(): SequenceSpec {
    return {
      name: this.name,
      namespace: this.namespace?.name,
      start: this.start,
      increment: this.increment,
      indexType: this.indexType
    }
  }

  qualifiedName(dialect: DialectAdapter = defaultDialect): string {
    return dialect.qualifiedName(this.namespace?.name, this.name)
  }

  createStatements(dialect: DialectAdapter = defaultDialect): string[] {
    return dialect.createSequenceStatements(this.spec)
  }

  async create(cursor: Cursor, dialect: DialectAdapter = defaultDialect): Promise<void> {
    for (const sql of this.createStatements(dialect)) {
      await cursor.execute(sql)
    }
  }

  /**
   * Advance the sequence and return the new value.
   *
   * @throws QueryResultError when the database returns no usable value
   */
  async nextval(cursor: Cursor, dialect: DialectAdapter = defaultDialect): Promise<number> {
    let rows: Row[] = []
    for (const sql of dialect.nextvalStatements(this.spec)) {
      rows = await cursor.execute(sql)
    }

    const row = rows.at(-1)
    const raw = row === undefined ? undefined : Object.values(row)[0]
    const value = typeof raw === 'bigint' || typeof raw === 'string' ? Number(raw) : raw
    if (typeof value !== 'number' || !Number.isSafeInteger(value)) {
      throw new QueryResultError(`Sequence ${this.name} returned no integer value`)
    }
    return value
  }

  async reset(cursor: Cursor, dialect: DialectAdapter = defaultDialect): Promise<void> {
    for (const sql of dialect.resetSequenceStatements(this.spec)) {
      await cursor.execute(sql)
    }
  }
}

export function defineSequence(name: string, options: SequenceOptions = {}): Sequence {
  return new Sequence(name, options)
}
