/**
 * @accordo/transaction
 *
 * Declarative transactions: own fields form a context that is propagated
 * into attached records, hooks verify the operation, and every statement
 * runs in one database scope.
 *
 * @example
 * import { defineTransaction } from '@accordo/transaction'
 *
 * const PayOrder = defineTransaction({
 *   name: 'PayOrder',
 *   fields: { trans_id: new IntField() },
 *   attributes: { order: orders }
 * })
 *
 * const tx = PayOrder.create({ trans_id: 101 })
 * await tx.contextSelect(cursor)
 * tx.attr('order').set('paid', true)
 * await tx.update(cursor)
 */

export {
  TransactionDefinition,
  defineTransaction,
  extendTransaction,
  HOOK_NAMES,
  type BoundHook,
  type HookChain,
  type TransactionConfig
} from './define.js'

export { Transaction } from './transaction.js'

export {
  TransactionOptionsSchema,
  OperationOptionsSchema,
  type TransactionOptions,
  type ResolvedTransactionOptions,
  type OperationOptions
} from './options.js'

export type { AttributeSpec } from './attributes.js'

export type {
  AttributeDefinition,
  AttributeMap,
  AttributeInstance,
  AttributeName,
  AttributeValue,
  TransactionState,
  OperationName,
  HookResult,
  TransactionHandle,
  HookArgs,
  TransactionHook,
  HookName,
  TransactionHooks,
  RollbackErrorMode,
  RollbackErrorCallback
} from './types.js'
