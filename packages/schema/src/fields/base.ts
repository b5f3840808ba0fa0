/**
 * Field descriptors: the typed, validated columns records are made of.
 *
 * @module @accordo/schema/fields
 */

import type { z } from 'zod'
import { ValidationError, type Context, type Cursor, type FieldValue } from '@accordo/core'
import type { ColumnSpec, DialectAdapter, SemanticType } from '@accordo/dialects'

/**
 * Non-null value a field can hold
 */
export type StoredValue = NonNullable<FieldValue>

export interface FieldOptions {
  /** Column name in SQL when it differs from the attribute name */
  sqlName?: string | undefined
  /** Whether null is accepted (default: true) */
  nullable?: boolean | undefined
  /** Context entry that overrides the stored value when present and non-null */
  contextKey?: string | undefined
}

/**
 * What generating fields need to reach the database
 */
export interface FieldEnv {
  cursor: Cursor
  dialect: DialectAdapter
}

/**
 * Base class for every field kind.
 *
 * `name` parameters on the methods below only label errors; records and
 * transactions pass the attribute name the field is declared under.
 */
export abstract class Field<T extends StoredValue = StoredValue> {
  abstract readonly semanticType: SemanticType

  readonly sqlName: string | undefined
  readonly nullable: boolean
  readonly contextKey: string | undefined
  /** `update` draws a new value and publishes it under `contextKey` */
  readonly generates: boolean = false

  /** Parses and normalises non-null input */
  protected abstract readonly parser: z.ZodType<T, z.ZodTypeDef, unknown>

  constructor(options: FieldOptions = {}) {
    this.sqlName = options.sqlName
    this.nullable = options.nullable ?? true
    this.contextKey = options.contextKey
  }

  /**
   * Validate and normalise a value for this field.
   *
   * @throws ValidationError when the value does not fit
   */
  validate(value: unknown, name = 'value'): T | null {
    if (value === null || value === undefined) {
      if (!this.nullable) {
        throw new ValidationError(name, 'null is not allowed', value)
      }
      return null
    }

    const result = this.parser.safeParse(value)
    if (!result.success) {
      throw new ValidationError(name, result.error.issues[0]?.message ?? 'invalid value', value)
    }
    return result.data
  }

  /**
   * Resolve the value against a context without side effects: a non-null
   * context entry under `contextKey` wins over `current`.
   */
  refresh(current: T | null, context?: Context, name?: string): T | null {
    if (context && this.contextKey !== undefined) {
      const fromContext = context.get(this.contextKey)
      if (fromContext !== null && fromContext !== undefined) {
        return this.validate(fromContext, name)
      }
    }
    return current
  }

  /**
   * Resolve the value, possibly generating a new one. Plain fields refresh.
   */
  async update(
    current: T | null,
    context: Context,
    _env: FieldEnv,
    name?: string
  ): Promise<T | null> {
    return this.refresh(current, context, name)
  }

  /**
   * Resolve the value while the orchestrator pushes a context into an
   * attached record. Plain fields refresh.
   */
  propagate(current: T | null, context: Context, name?: string): T | null {
    return this.refresh(current, context, name)
  }

  /** Column description handed to the dialect */
  columnSpec(): ColumnSpec {
    return { type: this.semanticType }
  }

  /**
   * Column type rendered through the dialect, with `NOT NULL` when the field
   * rejects null.
   */
  sqlType(dialect: DialectAdapter): string {
    const spec = this.columnSpec()
    if (spec.autoIncrement) {
      return dialect.autoIncrementColumn
    }
    const type = dialect.columnType(spec)
    return this.nullable ? type : `${type} NOT NULL`
  }

  /**
   * Store a generated value under `contextKey`, when the field has one
   */
  protected publish(value: T | null, context: Context): T | null {
    if (this.contextKey !== undefined) {
      context.set(this.contextKey, value)
    }
    return value
  }
}

/**
 * Any field, whatever the type of its values
 */
export type AnyField = Field<StoredValue>
