import { ContextRequiredError, type Context } from '@accordo/core'
import { IntField, type IntFieldOptions } from './numbers.js'

export interface ContextIntFieldOptions extends IntFieldOptions {
  contextKey: string
}

/**
 * Integer that must come from the context: resolving it against a context
 * that lacks `contextKey` fails with `ContextRequiredError`.
 *
 * @example
 * const lines = defineTable('order_lines', {
 *   trans_id: new ContextIntField({ contextKey: 'trans_id' }),
 *   ...
 * })
 */
export class ContextIntField extends IntField {
  declare readonly contextKey: string

  constructor(options: ContextIntFieldOptions) {
    super(options)
  }

  override refresh(current: number | null, context?: Context, name?: string): number | null {
    if (context === undefined) {
      return current
    }
    if (!context.has(this.contextKey)) {
      throw new ContextRequiredError(this.contextKey)
    }
    return super.refresh(current, context, name)
  }
}

export interface RowEnumIntFieldOptions extends IntFieldOptions {
  contextKey: string
  /** First number handed out (default: 1) */
  startingNumber?: number | undefined
}

/**
 * Numbers the rows of an attached record list as the context is pushed into
 * it. The running counter lives in the context under `contextKey`, so the
 * orchestrator hands each attribute its own copy of the context.
 */
export class RowEnumIntField extends IntField {
  declare readonly contextKey: string
  readonly startingNumber: number

  constructor(options: RowEnumIntFieldOptions) {
    super({ ...options, nullable: false })
    this.startingNumber = options.startingNumber ?? 1
  }

  /** The counter is not a value to adopt; refreshing keeps the stored number. */
  override refresh(current: number | null, _context?: Context, _name?: string): number | null {
    return current
  }

  override propagate(_current: number | null, context: Context, name?: string): number | null {
    const previous = context.get(this.contextKey)
    const next = typeof previous === 'number' ? previous + 1 : this.startingNumber
    context.set(this.contextKey, next)
    return this.validate(next, name)
  }
}
