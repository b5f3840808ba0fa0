/**
 * Transaction definitions.
 *
 * @module @accordo/transaction
 */

import { SchemaError, getDefaultLogger, type AccordoLogger, type IsolationMode } from '@accordo/core'
import { assertValidIdentifier, type DialectAdapter } from '@accordo/dialects'
import { RecordSchema, type FieldMap, type RecordInput } from '@accordo/schema'
import { classifyAttributes, type AttributeSpec } from './attributes.js'
import {
  TransactionOptionsSchema,
  type ResolvedTransactionOptions,
  type TransactionOptions
} from './options.js'
import { Transaction } from './transaction.js'
import type {
  AttributeMap,
  HookArgs,
  HookName,
  HookResult,
  RollbackErrorCallback,
  RollbackErrorMode,
  TransactionHooks
} from './types.js'

/**
 * A hook with its `next` already bound
 */
export type BoundHook = (args: Omit<HookArgs, 'next'>) => Promise<HookResult>

export type HookChain = Readonly<Record<HookName, BoundHook>>

export const HOOK_NAMES: readonly HookName[] = [
  'preInsert',
  'preUpdate',
  'preDelete',
  'postSelect',
  'verify'
]

const pass: BoundHook = async () => true

/**
 * Fill context entries that are still null from the records fetched by the
 * select, then copy the context into the transaction's own fields.
 */
const backPropagate: BoundHook = async ({ context, transaction }) => {
  const found = transaction.contextFromRecords()
  for (const [key, value] of context) {
    const discovered = found.get(key)
    if (value === null && discovered !== undefined) {
      context.set(key, discovered)
    }
  }
  transaction.applyContext(context)
  return true
}

const DEFAULT_HOOKS: HookChain = {
  preInsert: pass,
  preUpdate: pass,
  preDelete: pass,
  postSelect: backPropagate,
  verify: pass
}

function chainHooks(inherited: HookChain, overrides: TransactionHooks | undefined): HookChain {
  const chain: Record<HookName, BoundHook> = { ...inherited }
  for (const name of HOOK_NAMES) {
    const hook = overrides?.[name]
    if (!hook) continue
    const previous = inherited[name]
    chain[name] = async args => hook({ ...args, next: () => previous(args) })
  }
  return chain
}

export type TransactionConfig<F extends FieldMap, A extends AttributeMap> = TransactionOptions & {
  /** Own fields; they build the context, keyed by field name, in declaration order */
  fields?: F | undefined
  /** Tables, views, records, record lists and query results, in execution order */
  attributes?: A | undefined
  hooks?: TransactionHooks | undefined
}

/**
 * The static description of a transaction. `create()` returns instances
 * that run the orchestrated operations.
 */
export class TransactionDefinition<
  F extends FieldMap = FieldMap,
  A extends AttributeMap = AttributeMap
> {
  readonly name: string
  readonly fields: RecordSchema<F>
  readonly attributes: A
  readonly attributeSpecs: readonly AttributeSpec[]
  readonly hooks: HookChain
  readonly isolationLevel: IsolationMode | undefined
  readonly dialect: DialectAdapter
  readonly logger: AccordoLogger
  readonly rollbackErrorMode: RollbackErrorMode
  readonly onRollbackError: RollbackErrorCallback | undefined
  private readonly options: ResolvedTransactionOptions

  constructor(fields: F, attributes: A, hooks: HookChain, options: TransactionOptions) {
    this.options = TransactionOptionsSchema.parse(options)
    this.name = this.options.name
    this.fields = new RecordSchema(this.name, fields)
    this.attributes = attributes
    this.attributeSpecs = classifyAttributes(this.name, attributes)
    this.hooks = hooks
    this.isolationLevel = this.options.isolationLevel
    this.dialect = this.options.dialect
    this.logger = this.options.logger ?? getDefaultLogger()
    this.rollbackErrorMode = this.options.rollbackErrorMode
    this.onRollbackError = this.options.onRollbackError

    for (const spec of this.attributeSpecs) {
      assertValidIdentifier(spec.name, 'attribute name')
      if (this.fields.has(spec.name)) {
        throw new SchemaError(`${this.name} declares ${spec.name} as both a field and an attribute`)
      }
    }
  }

  /** Options in the form `extendTransaction` can pass on */
  get settings(): TransactionOptions {
    return { ...this.options }
  }

  create(values?: RecordInput<F>): Transaction<F, A> {
    return new Transaction(this, values)
  }

  isTransaction(value: unknown): value is Transaction<F, A> {
    return value instanceof Transaction && value.definition === this
  }
}

/**
 * Declare a transaction.
 *
 * @example
 * ```typescript
 * const CreateOrder = defineTransaction({
 *   name: 'CreateOrder',
 *   fields: { trans_id: new SequenceIntField({ sequence: transIdSeq }) },
 *   attributes: { order: orders, lines: defineRecordList(orderLines) },
 *   hooks: {
 *     verify: ({ transaction }) =>
 *       transaction.getValue('customer') !== null || 'An order needs a customer'
 *   },
 *   isolationLevel: 'serializable'
 * })
 *
 * const tx = CreateOrder.create()
 * tx.attr('order').set('customer', 'c-1')
 * tx.attr('lines').append({ sku: 'A-1', qty: 2 })
 * await tx.insertNew(cursor)
 * tx.value('trans_id') // 101
 * ```
 */
export function defineTransaction<
  F extends FieldMap = Record<never, never>,
  A extends AttributeMap = Record<never, never>
>(config: TransactionConfig<F, A>): TransactionDefinition<F, A> {
  const { fields, attributes, hooks, ...options } = config
  return new TransactionDefinition<F, A>(
    fields ?? emptyMap<F>(),
    attributes ?? emptyMap<A>(),
    chainHooks(DEFAULT_HOOKS, hooks),
    options
  )
}

/**
 * Derive a narrower transaction from `base`. Fields and attributes are
 * added after the inherited ones; a hook given here receives the inherited
 * hook as `next`.
 *
 * @example
 * ```typescript
 * const CreateLargeOrder = extendTransaction(CreateOrder, {
 *   name: 'CreateLargeOrder',
 *   hooks: {
 *     preInsert: async ({ transaction, next }) => {
 *       if (transaction.getValue('approved') !== true) return 'Large orders need approval'
 *       return next()
 *     }
 *   }
 * })
 * ```
 */
export function extendTransaction<
  F extends FieldMap,
  A extends AttributeMap,
  FE extends FieldMap = Record<never, never>,
  AE extends AttributeMap = Record<never, never>
>(
  base: TransactionDefinition<F, A>,
  config: Partial<TransactionConfig<FE, AE>> = {}
): TransactionDefinition<F & FE, A & AE> {
  const { fields, attributes, hooks, ...options } = config
  return new TransactionDefinition<F & FE, A & AE>(
    { ...base.fields.fields, ...(fields ?? emptyMap<FE>()) },
    { ...base.attributes, ...(attributes ?? emptyMap<AE>()) },
    chainHooks(base.hooks, hooks),
    { ...base.settings, ...options }
  )
}

function emptyMap<M>(): M {
  // An empty object is a valid map of no fields or attributes
  return Object.create(null) as M
}

