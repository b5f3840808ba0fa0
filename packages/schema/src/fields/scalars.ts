import { z } from 'zod'
import type { Context } from '@accordo/core'
import type { ColumnSpec, SemanticType } from '@accordo/dialects'
import { Field, type FieldEnv, type FieldOptions } from './base.js'

/**
 * Booleans; `0` and `1` are accepted as false and true.
 */
export class BooleanField extends Field<boolean> {
  readonly semanticType: SemanticType = 'boolean'
  protected readonly parser = z.union(
    [z.boolean(), z.literal(0).transform(() => false), z.literal(1).transform(() => true)],
    { errorMap: () => ({ message: 'expected a boolean' }) }
  )
}

export interface TimestampFieldOptions extends FieldOptions {
  /** Column stores a time zone */
  tz?: boolean | undefined
}

const timestampParser = z.union(
  [
    z.date(),
    z
      .string()
      .transform(value => new Date(value))
      .refine(date => !Number.isNaN(date.getTime()), 'expected a Date or an ISO-8601 string')
  ],
  { errorMap: () => ({ message: 'expected a Date or an ISO-8601 string' }) }
)

export class TimestampField extends Field<Date> {
  readonly semanticType: SemanticType = 'timestamp'
  readonly tz: boolean
  protected readonly parser = timestampParser

  constructor(options: TimestampFieldOptions = {}) {
    super(options)
    this.tz = options.tz ?? false
  }

  override columnSpec(): ColumnSpec {
    return { type: this.semanticType, tz: this.tz }
  }
}

/**
 * Timestamp that takes the current time whenever it is updated.
 */
export class UTCNowTimestampField extends TimestampField {
  override readonly generates = true

  override async update(
    _current: Date | null,
    context: Context,
    _env: FieldEnv,
    _name?: string
  ): Promise<Date | null> {
    return this.publish(new Date(), context)
  }
}
