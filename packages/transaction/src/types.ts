/**
 * Core types for the transaction orchestrator.
 *
 * @module @accordo/transaction
 */

import type { Context, Cursor, FieldValue } from '@accordo/core'
import type { DialectAdapter } from '@accordo/dialects'
import type { QueryResult, RecordInstance, RecordList } from '@accordo/schema'

/**
 * Anything that can be attached to a transaction: a record, table or view
 * schema, a record list definition or a query result definition. Each one
 * creates the instance the transaction holds.
 */
export interface AttributeDefinition {
  create(): unknown
}

/**
 * Attached attributes, keyed by attribute name, in declaration order
 */
export type AttributeMap = Readonly<Record<string, AttributeDefinition>>

/**
 * What an attribute definition creates: `RecordInstance`, `RecordList` or
 * `QueryResult`
 */
export type AttributeInstance<D extends AttributeDefinition> = ReturnType<D['create']>

export type AttributeName<A extends AttributeMap> = keyof A & string

/**
 * An attribute instance without its static type
 */
export type AttributeValue = RecordInstance | RecordList | QueryResult

/**
 * Lifecycle of one orchestrated operation.
 *
 * Writes run `idle → contextBuilt → hookRun → verified → executing →
 * committed`; `contextSelect` executes its selects before the post-select
 * hook. Any failure ends in `aborted`.
 */
export type TransactionState =
  | 'idle'
  | 'contextBuilt'
  | 'hookRun'
  | 'verified'
  | 'executing'
  | 'committed'
  | 'aborted'

export type OperationName = 'insertNew' | 'insertExisting' | 'update' | 'delete' | 'contextSelect'

/**
 * Hook outcome. `false` or a message string rejects the operation with a
 * `VerificationError`; anything else lets it continue.
 */
export type HookResult = boolean | string | undefined | void

/**
 * The view of a transaction that hooks work with
 */
export interface TransactionHandle {
  readonly name: string
  readonly state: TransactionState
  getValue(name: string): FieldValue
  setFieldValue(name: string, value: unknown): void
  attribute(name: string): AttributeValue
  /** First non-null stored value per context key across the attributes */
  contextFromRecords(): Context
  /** Adopt the non-null context entries named after the transaction's own fields */
  applyContext(context: Context): void
}

/**
 * Arguments every hook receives
 */
export interface HookArgs {
  /** The operation's context; hooks may add or change entries */
  context: Context
  transaction: TransactionHandle
  cursor: Cursor
  dialect: DialectAdapter
  operation: OperationName
  /** Run the hook this one replaced: the base definition's, or the default */
  next: () => Promise<HookResult>
}

export type TransactionHook = (args: HookArgs) => HookResult | Promise<HookResult>

export type HookName = 'preInsert' | 'preUpdate' | 'preDelete' | 'postSelect' | 'verify'

export type TransactionHooks = { [H in HookName]?: TransactionHook }

/**
 * How a failed rollback is handled once an operation has already failed.
 *
 * - `'log-only'` (default): log the rollback error, rethrow the original
 * - `'throw'`: throw the rollback error instead
 * - `'callback'`: hand both errors to `onRollbackError`, rethrow the original
 */
export type RollbackErrorMode = 'log-only' | 'throw' | 'callback'

export type RollbackErrorCallback = (
  originalError: unknown,
  rollbackError: unknown
) => void | Promise<void>
