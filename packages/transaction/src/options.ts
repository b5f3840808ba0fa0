/**
 * Zod schemas for transaction definitions and operation calls.
 *
 * @module @accordo/transaction
 */

import { z } from 'zod'
import { ISOLATION_LEVELS, isLogger, type AccordoLogger } from '@accordo/core'
import { getAdapter, type DialectAdapter } from '@accordo/dialects'
import type { RollbackErrorCallback } from './types.js'

function isDialectAdapter(value: unknown): value is DialectAdapter {
  return (
    typeof value === 'object' &&
    value !== null &&
    typeof Reflect.get(value, 'dialect') === 'string' &&
    typeof Reflect.get(value, 'parameterMarker') === 'function' &&
    typeof Reflect.get(value, 'toDriver') === 'function'
  )
}

/**
 * A bundled dialect by name, or any adapter instance
 */
const dialectSchema = z.union([
  z.enum(['sqlite', 'postgres', 'mysql']).transform(name => getAdapter(name)),
  z.custom<DialectAdapter>(isDialectAdapter, { message: 'expected a dialect name or adapter' })
])

const loggerSchema = z.custom<AccordoLogger>(isLogger, {
  message: 'logger must implement every log level'
})

const rollbackCallbackSchema = z.custom<RollbackErrorCallback>(
  value => typeof value === 'function',
  { message: 'onRollbackError must be a function' }
)

/**
 * Scalar options of `defineTransaction`
 *
 * @example
 * ```typescript
 * TransactionOptionsSchema.parse({ name: 'CreateOrder', isolationLevel: 'serializable' })
 * ```
 */
export const TransactionOptionsSchema = z
  .object({
    name: z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'name must be an identifier'),
    /** Passed to `cursor.begin`; `manual` leaves the scope to the caller */
    isolationLevel: z.enum([...ISOLATION_LEVELS, 'manual']).optional(),
    /** Default dialect of every operation (default: sqlite) */
    dialect: dialectSchema.default('sqlite'),
    logger: loggerSchema.optional(),
    rollbackErrorMode: z.enum(['log-only', 'throw', 'callback']).default('log-only'),
    onRollbackError: rollbackCallbackSchema.optional()
  })
  .refine(
    options => options.rollbackErrorMode !== 'callback' || options.onRollbackError !== undefined,
    { message: "rollbackErrorMode 'callback' needs onRollbackError", path: ['onRollbackError'] }
  )

export type TransactionOptions = z.input<typeof TransactionOptionsSchema>
export type ResolvedTransactionOptions = z.output<typeof TransactionOptionsSchema>

/**
 * Per-call options of the orchestrated operations
 */
export const OperationOptionsSchema = z.object({
  /** Overrides the definition's dialect for this call */
  dialect: dialectSchema.optional(),
  /** `contextSelect` only: read every row when the context constrains nothing */
  allowUnlimited: z.boolean().default(false)
})

export type OperationOptions = z.input<typeof OperationOptionsSchema>
