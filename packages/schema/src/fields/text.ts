import { z } from 'zod'
import type { ColumnSpec, SemanticType } from '@accordo/dialects'
import { Field, type FieldOptions } from './base.js'

export class TextField extends Field<string> {
  readonly semanticType: SemanticType = 'text'
  protected readonly parser = z.string({ invalid_type_error: 'expected a string' })
}

export interface VarCharFieldOptions extends FieldOptions {
  maxLength: number
  /** Cut longer strings down to `maxLength` instead of rejecting them */
  silentTruncate?: boolean | undefined
}

export class VarCharField extends Field<string> {
  readonly semanticType: SemanticType = 'varchar'
  readonly maxLength: number
  readonly silentTruncate: boolean
  protected readonly parser: z.ZodType<string, z.ZodTypeDef, unknown>

  constructor(options: VarCharFieldOptions) {
    super(options)
    this.maxLength = options.maxLength
    this.silentTruncate = options.silentTruncate ?? false

    const text = z.string({ invalid_type_error: 'expected a string' })
    this.parser = this.silentTruncate
      ? text.transform(value => value.slice(0, this.maxLength))
      : text.max(this.maxLength, `longer than ${this.maxLength} characters`)
  }

  override columnSpec(): ColumnSpec {
    return { type: this.semanticType, maxLength: this.maxLength }
  }
}

export interface CharFieldOptions extends FieldOptions {
  maxLength: number
}

export class CharField extends Field<string> {
  readonly semanticType: SemanticType = 'char'
  readonly maxLength: number
  protected readonly parser: z.ZodType<string, z.ZodTypeDef, unknown>

  constructor(options: CharFieldOptions) {
    super(options)
    this.maxLength = options.maxLength
    this.parser = z
      .string({ invalid_type_error: 'expected a string' })
      .max(this.maxLength, `longer than ${this.maxLength} characters`)
  }

  override columnSpec(): ColumnSpec {
    return { type: this.semanticType, maxLength: this.maxLength }
  }
}

export interface EnumFieldOptions<L extends string> extends FieldOptions {
  values: readonly L[]
}

/**
 * One of a fixed list of string labels
 *
 * @example
 * const status = new EnumField({ values: ['open', 'paid', 'void'] as const })
 */
export class EnumField<L extends string = string> extends Field<L> {
  readonly semanticType: SemanticType = 'enum'
  readonly values: readonly L[]
  protected readonly parser: z.ZodType<L, z.ZodTypeDef, unknown>

  constructor(options: EnumFieldOptions<L>) {
    super(options)
    if (options.values.length === 0) {
      throw new RangeError('EnumField needs at least one value')
    }
    this.values = options.values
    const labels = this.values
    this.parser = z.custom<L>(
      value => typeof value === 'string' && labels.some(label => label === value),
      { message: `expected one of: ${labels.join(', ')}` }
    )
  }

  override columnSpec(): ColumnSpec {
    return { type: this.semanticType, values: this.values }
  }
}
