import { GenerationError, type Context } from '@accordo/core'
import type { Sequence } from '../sequence.js'
import type { QueryDefinition } from '../query.js'
import type { FieldEnv } from './base.js'
import { IntField, type IntFieldOptions } from './numbers.js'

export interface SequenceIntFieldOptions extends IntFieldOptions {
  sequence: Sequence
}

/**
 * Integer drawn from a database sequence each time it is updated.
 *
 * @example
 * const transIdSeq = defineSequence('trans_id_seq', { start: 101 })
 *
 * const CreateOrder = defineTransaction({
 *   name: 'CreateOrder',
 *   fields: { trans_id: new SequenceIntField({ sequence: transIdSeq }) },
 *   ...
 * })
 */
export class SequenceIntField extends IntField {
  override readonly generates = true
  readonly sequence: Sequence

  constructor(options: SequenceIntFieldOptions) {
    super(options)
    this.sequence = options.sequence
  }

  override async update(
    _current: number | null,
    context: Context,
    env: FieldEnv,
    name = 'value'
  ): Promise<number | null> {
    let drawn: number
    try {
      drawn = await this.sequence.nextval(env.cursor, env.dialect)
    } catch (error) {
      throw new GenerationError(name, error)
    }
    return this.publish(this.validate(drawn, name), context)
  }
}

export interface QueryIntFieldOptions extends IntFieldOptions {
  /** A query returning exactly one column; its parameters are filled from the context */
  query: QueryDefinition
}

/**
 * Integer computed by a single-value query each time it is updated.
 */
export class QueryIntField extends IntField {
  override readonly generates = true
  readonly query: QueryDefinition

  constructor(options: QueryIntFieldOptions) {
    super(options)
    this.query = options.query
  }

  override async update(
    _current: number | null,
    context: Context,
    env: FieldEnv,
    name = 'value'
  ): Promise<number | null> {
    const instance = this.query.create()
    instance.setContext(context)
    let computed: unknown
    try {
      computed = await instance.resultSingleValue(env.cursor, env.dialect)
    } catch (error) {
      throw new GenerationError(name, error)
    }
    return this.publish(this.validate(computed, name), context)
  }
}
