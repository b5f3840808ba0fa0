import { z } from 'zod'
import type { ColumnSpec, SemanticType } from '@accordo/dialects'
import { Field, type FieldOptions } from './base.js'

const INTEGER_PATTERN = /^[+-]?\d+$/
const DECIMAL_PATTERN = /^([+-]?)(\d*)(?:\.(\d*))?$/

/**
 * Integers given as numbers or as integer strings (`'4'` becomes 4)
 */
function integerParser(min: number, max: number): z.ZodType<number, z.ZodTypeDef, unknown> {
  return z
    .union([
      z.number(),
      z
        .string()
        .trim()
        .regex(INTEGER_PATTERN, 'expected an integer')
        .transform(Number)
    ])
    .pipe(
      z
        .number()
        .int('expected an integer')
        .min(min, `must be at least ${min}`)
        .max(max, `must be at most ${max}`)
    )
}

export interface IntFieldOptions extends FieldOptions {
  /** Let the database assign the value (`dialect.autoIncrementColumn`) */
  autoIncrement?: boolean | undefined
}

export class IntField extends Field<number> {
  readonly semanticType: SemanticType = 'integer'
  protected readonly parser = integerParser(-2147483648, 2147483647)
  readonly autoIncrement: boolean

  constructor(options: IntFieldOptions = {}) {
    super(options)
    this.autoIncrement = options.autoIncrement ?? false
  }

  override columnSpec(): ColumnSpec {
    return { type: this.semanticType, autoIncrement: this.autoIncrement }
  }
}

export class SmallIntField extends Field<number> {
  readonly semanticType: SemanticType = 'smallint'
  protected readonly parser = integerParser(-32768, 32767)
}

/**
 * 64-bit column; values stay JavaScript numbers, so only the safe integer
 * range is accepted.
 */
export class BigIntField extends Field<number> {
  readonly semanticType: SemanticType = 'bigint'
  protected readonly parser = integerParser(Number.MIN_SAFE_INTEGER, Number.MAX_SAFE_INTEGER)
}

export class RealField extends Field<number> {
  readonly semanticType: SemanticType = 'real'
  protected readonly parser = z.number().finite('expected a finite number')
}

export interface NumericFieldOptions extends FieldOptions {
  /** Total number of significant digits */
  precision: number
  /** Digits after the decimal point */
  scale: number
  /** Accept JavaScript numbers as input */
  allowFloats?: boolean | undefined
  /** Round excess fractional digits instead of rejecting them */
  inexactQuantize?: boolean | undefined
}

/**
 * Round a non-negative digit string, dropping `drop` trailing digits,
 * half to even.
 */
function roundDigits(digits: string, drop: number): string {
  const divisor = 10n ** BigInt(drop)
  const whole = BigInt(digits)
  let quotient = whole / divisor
  const twiceRemainder = (whole % divisor) * 2n
  if (twiceRemainder > divisor || (twiceRemainder === divisor && quotient % 2n === 1n)) {
    quotient += 1n
  }
  return quotient.toString()
}

/**
 * Exact decimal stored as text (`'10.50'`), quantised to `scale` digits.
 *
 * @example
 * const price = new NumericField({ precision: 8, scale: 2 })
 * price.validate('10.5')   // '10.50'
 * price.validate('10.555') // throws ValidationError
 */
export class NumericField extends Field<string> {
  readonly semanticType: SemanticType = 'numeric'
  readonly precision: number
  readonly scale: number
  readonly allowFloats: boolean
  readonly inexactQuantize: boolean
  protected readonly parser: z.ZodType<string, z.ZodTypeDef, unknown>

  constructor(options: NumericFieldOptions) {
    super(options)
    if (!Number.isInteger(options.precision) || options.precision < 1) {
      throw new RangeError('precision must be a positive integer')
    }
    if (!Number.isInteger(options.scale) || options.scale < 0 || options.scale > options.precision) {
      throw new RangeError('scale must be an integer between 0 and precision')
    }
    this.precision = options.precision
    this.scale = options.scale
    this.allowFloats = options.allowFloats ?? false
    this.inexactQuantize = options.inexactQuantize ?? false

    this.parser = z.union([z.string(), z.number()]).transform((input, ctx) => {
      const text = this.toText(input)
      if (text === undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message:
            typeof input === 'number' ? 'floats are not accepted' : 'expected a decimal number'
        })
        return z.NEVER
      }
      const quantized = this.quantize(text)
      if (typeof quantized !== 'string') {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: quantized.message })
        return z.NEVER
      }
      return quantized
    })
  }

  override columnSpec(): ColumnSpec {
    return { type: this.semanticType, precision: this.precision, scale: this.scale }
  }

  private toText(input: string | number): string | undefined {
    if (typeof input === 'string') {
      return input.trim()
    }
    if (!this.allowFloats || !Number.isFinite(input)) {
      return undefined
    }
    const text = String(input)
    if (!text.includes('e')) {
      return text
    }
    return this.inexactQuantize ? input.toFixed(this.scale) : undefined
  }

  private quantize(text: string): string | { message: string } {
    const match = DECIMAL_PATTERN.exec(text)
    const sign = match?.[1] ?? ''
    let integral = match?.[2] ?? ''
    let fraction = match?.[3] ?? ''
    if (!match || (integral === '' && fraction === '')) {
      return { message: 'expected a decimal number' }
    }

    if (fraction.length > this.scale) {
      if (!this.inexactQuantize) {
        return { message: `more than ${this.scale} decimal places` }
      }
      const rounded = roundDigits(integral + fraction, fraction.length - this.scale).padStart(
        this.scale + 1,
        '0'
      )
      integral = rounded.slice(0, rounded.length - this.scale)
      fraction = rounded.slice(rounded.length - this.scale)
    }

    integral = integral.replace(/^0+/, '') || '0'
    fraction = fraction.padEnd(this.scale, '0')

    const maxIntegral = this.precision - this.scale
    if (integral !== '0' && integral.length > maxIntegral) {
      return { message: `more than ${maxIntegral} digits before the decimal point` }
    }

    const isZero = /^0*$/.test(integral + fraction)
    const prefix = sign === '-' && !isZero ? '-' : ''
    return this.scale > 0 ? `${prefix}${integral}.${fraction}` : `${prefix}${integral}`
  }
}
