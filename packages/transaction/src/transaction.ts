/**
 * Transaction instances and the orchestrated operations.
 *
 * @module @accordo/transaction
 */

import {
  SchemaViolationError,
  VerificationError,
  type Context,
  type Cursor,
  type FieldValue,
  type Statement
} from '@accordo/core'
import type { DialectAdapter } from '@accordo/dialects'
import type { FieldName, FieldType, FieldMap, RecordInput, RecordInstance } from '@accordo/schema'
import {
  copySlot,
  createSlot,
  replaceValue,
  slotRecords,
  slotRelation,
  slotTable,
  type AttributeSlot
} from './attributes.js'
import type { TransactionDefinition } from './define.js'
import { OperationOptionsSchema, type OperationOptions } from './options.js'
import type {
  AttributeInstance,
  AttributeMap,
  AttributeName,
  AttributeValue,
  HookName,
  HookResult,
  OperationName,
  TransactionHandle,
  TransactionState
} from './types.js'

type ContextMode = 'refresh' | 'update'

interface OperationScope {
  cursor: Cursor
  dialect: DialectAdapter
  operation: OperationName
  context: Context
}

const WRITE_HOOKS = {
  insertNew: 'preInsert',
  insertExisting: 'preInsert',
  update: 'preUpdate',
  delete: 'preDelete'
} as const satisfies Record<Exclude<OperationName, 'contextSelect'>, HookName>

type WriteOperation = keyof typeof WRITE_HOOKS

/**
 * One transaction: its own fields, the attributes it carries, and the
 * operations that move them to and from the database in a single scope.
 *
 * @example
 * ```typescript
 * const tx = CreateOrder.create({ customer: 'c-1' })
 * await tx.insertNew(cursor)
 * tx.state // 'committed'
 * ```
 */
export class Transaction<F extends FieldMap = FieldMap, A extends AttributeMap = AttributeMap>
  implements TransactionHandle
{
  private own: RecordInstance<F>
  private slots: Map<string, AttributeSlot>
  private _state: TransactionState = 'idle'

  constructor(
    readonly definition: TransactionDefinition<F, A>,
    values?: RecordInput<F>,
    slots?: Map<string, AttributeSlot>
  ) {
    this.own = definition.fields.create(values)
    this.slots =
      slots ?? new Map(definition.attributeSpecs.map(spec => [spec.name, createSlot(spec)]))
  }

  get name(): string {
    return this.definition.name
  }

  get state(): TransactionState {
    return this._state
  }

  value<K extends FieldName<F>>(name: K): FieldType<F[K]> {
    return this.own.get(name)
  }

  setValue<K extends FieldName<F>>(name: K, value: FieldType<F[K]>): void {
    this.own.set(name, value)
  }

  getValue(name: string): FieldValue {
    return this.own.getValue(name)
  }

  setFieldValue(name: string, value: unknown): void {
    this.own.setValue(name, value)
  }

  attr<K extends AttributeName<A>>(name: K): AttributeInstance<A[K]> {
    // Slots are created by the definition declared under this name
    return this.attribute(name) as AttributeInstance<A[K]>
  }

  /**
   * Replace an attribute's instance.
   *
   * @throws SchemaViolationError when `value` was not created by the
   * attribute's definition
   */
  setAttr<K extends AttributeName<A>>(name: K, value: AttributeInstance<A[K]>): void {
    this.setAttribute(name, value)
  }

  attribute(name: string): AttributeValue {
    return this.slot(name).value
  }

  setAttribute(name: string, value: unknown): void {
    if (!replaceValue(this.slot(name), value)) {
      throw new SchemaViolationError(
        this.name,
        name,
        `Attribute ${name} of ${this.name} cannot hold that value`
      )
    }
  }

  /** Deep copy: own values and every attribute */
  copy(): Transaction<F, A> {
    const slots = new Map([...this.slots].map(([name, slot]) => [name, copySlot(slot)]))
    const duplicate = new Transaction(this.definition, undefined, slots)
    duplicate.own = this.own.copy()
    return duplicate
  }

  /**
   * Stored own values keyed by field name, in declaration order
   */
  getContext(): Context {
    const context: Context = new Map()
    for (const entry of this.definition.fields.entries) {
      context.set(entry.name, this.own.getValue(entry.name))
    }
    return context
  }

  /**
   * Refresh every own field in declaration order, storing the results, and
   * return the context they form. Generating fields also appear under their
   * context key, as they do after `getUpdatedContext`.
   */
  getRefreshedContext(): Context {
    const context = this.getContext()
    for (const entry of this.definition.fields.entries) {
      const value = entry.field.refresh(this.own.getValue(entry.name), context, entry.name)
      this.own.setValue(entry.name, value)
      context.set(entry.name, value)
      const key = entry.field.contextKey
      if (entry.field.generates && key !== undefined) {
        context.set(key, value)
      }
    }
    return context
  }

  /**
   * Like `getRefreshedContext`, but generating fields draw new values from
   * the database.
   */
  async getUpdatedContext(
    cursor: Cursor,
    dialect: DialectAdapter = this.definition.dialect
  ): Promise<Context> {
    const context = this.getContext()
    for (const entry of this.definition.fields.entries) {
      const value = await entry.field.update(
        this.own.getValue(entry.name),
        context,
        { cursor, dialect },
        entry.name
      )
      this.own.setValue(entry.name, value)
      context.set(entry.name, value)
    }
    return context
  }

  contextFromRecords(): Context {
    const found: Context = new Map()
    for (const slot of this.slots.values()) {
      for (const [key, value] of slot.value.contextValues()) {
        if (!found.has(key)) found.set(key, value)
      }
    }
    return found
  }

  applyContext(context: Context): void {
    for (const entry of this.definition.fields.entries) {
      const value = context.get(entry.name)
      if (value !== null && value !== undefined) {
        this.own.setValue(entry.name, value)
      }
    }
  }

  /**
   * Generate fresh own values, then insert every table record.
   */
  insertNew(cursor: Cursor, options?: OperationOptions): Promise<void> {
    return this.write('insertNew', cursor, options)
  }

  /**
   * Insert every table record using the values the transaction already has.
   */
  insertExisting(cursor: Cursor, options?: OperationOptions): Promise<void> {
    return this.write('insertExisting', cursor, options)
  }

  /**
   * Update every table record by primary key, in declaration order.
   *
   * @throws SchemaError before any statement when a table lacks exactly one
   * primary key
   */
  update(cursor: Cursor, options?: OperationOptions): Promise<void> {
    return this.write('update', cursor, options)
  }

  /**
   * Delete every table record by primary key, in reverse declaration order.
   */
  delete(cursor: Cursor, options?: OperationOptions): Promise<void> {
    return this.write('delete', cursor, options)
  }

  /**
   * Load every table, view and query result attribute from the rows the
   * context selects.
   *
   * @throws UnboundQueryError when nothing in the context constrains a
   * select and `allowUnlimited` is not set
   */
  async contextSelect(cursor: Cursor, options?: OperationOptions): Promise<void> {
    const { dialect, allowUnlimited } = this.resolve(options)
    const scope = await this.prepare('contextSelect', cursor, dialect)

    await this.inScope(scope, async () => {
      this.transition(scope, 'executing')
      for (const [name, slot] of this.slots) {
        await this.load(name, slot, scope, allowUnlimited)
      }
      await this.runHook('postSelect', scope, 'hookRun')
      await this.runHook('verify', scope, 'verified')
    })
  }

  private async write(
    operation: WriteOperation,
    cursor: Cursor,
    options: OperationOptions | undefined
  ): Promise<void> {
    const { dialect } = this.resolve(options)
    const scope = await this.prepare(operation, cursor, dialect)

    await this.inScope(scope, async () => {
      await this.runHook(WRITE_HOOKS[operation], scope, 'hookRun')
      await this.runHook('verify', scope, 'verified')
      this.transition(scope, 'executing')

      const slots = [...this.slots.values()]
      if (operation === 'delete') slots.reverse()

      for (const slot of slots) {
        const table = slotTable(slot)
        if (!table) continue
        slot.value.applyContext(new Map(scope.context))
        for (const record of slotRecords(slot)) {
          const statement =
            operation === 'update'
              ? table.updateStatement(record, dialect)
              : operation === 'delete'
                ? table.deleteStatement(record, dialect)
                : table.insertStatement(record, dialect)
          await this.execute(scope, statement)
        }
      }
    })
  }

  private resolve(options: OperationOptions | undefined): {
    dialect: DialectAdapter
    allowUnlimited: boolean
  } {
    const parsed = OperationOptionsSchema.parse(options ?? {})
    return {
      dialect: parsed.dialect ?? this.definition.dialect,
      allowUnlimited: parsed.allowUnlimited
    }
  }

  /**
   * Everything that happens before the scope opens: primary-key checks and
   * the context.
   */
  private async prepare(
    operation: OperationName,
    cursor: Cursor,
    dialect: DialectAdapter
  ): Promise<OperationScope> {
    this._state = 'idle'
    const mode: ContextMode = operation === 'insertNew' ? 'update' : 'refresh'

    try {
      if (operation === 'update' || operation === 'delete') {
        for (const slot of this.slots.values()) {
          slotTable(slot)?.assertPrimaryKey()
        }
      }
      const context =
        mode === 'update' ? await this.getUpdatedContext(cursor, dialect) : this.getRefreshedContext()
      const scope: OperationScope = { cursor, dialect, operation, context }
      this.transition(scope, 'contextBuilt')
      return scope
    } catch (error) {
      this._state = 'aborted'
      this.definition.logger.debug(`${this.name}.${operation}: aborted before begin`)
      throw error
    }
  }

  private async inScope(scope: OperationScope, body: () => Promise<void>): Promise<void> {
    const level = this.definition.isolationLevel
    const manual = level === 'manual'
    const isolation = level === 'manual' ? undefined : level

    try {
      if (!manual) await scope.cursor.begin(isolation)
      await body()
      if (!manual) await scope.cursor.commit()
      this.transition(scope, 'committed')
    } catch (error) {
      this._state = 'aborted'
      if (!manual) await this.rollback(scope, error)
      throw error
    }
  }

  private async rollback(scope: OperationScope, originalError: unknown): Promise<void> {
    const { logger, rollbackErrorMode, onRollbackError } = this.definition
    logger.warn(`${this.name}.${scope.operation}: rolling back`, originalError)

    try {
      await scope.cursor.rollback()
    } catch (rollbackError) {
      switch (rollbackErrorMode) {
        case 'throw':
          throw rollbackError
        case 'callback':
          if (onRollbackError) {
            await onRollbackError(originalError, rollbackError)
          }
          break
        case 'log-only':
          logger.error(`${this.name}.${scope.operation}: rollback failed`, rollbackError)
          break
      }
    }
  }

  private async load(
    name: string,
    slot: AttributeSlot,
    scope: OperationScope,
    allowUnlimited: boolean
  ): Promise<void> {
    if (slot.kind === 'result') {
      slot.value.setContext(scope.context)
      this.definition.logger.trace(`${this.name}.${scope.operation}: refreshing ${name}`)
      await slot.value.refresh(scope.cursor, scope.dialect)
      return
    }

    const relation = slotRelation(slot)
    if (!relation) {
      slot.value.clear()
      return
    }

    const statement = relation.contextSelectStatement(scope.context, {
      allowUnlimited,
      dialect: scope.dialect
    })
    const rows = await this.execute(scope, statement)

    if (slot.kind === 'record') {
      slot.value.clear()
      const [first] = rows
      if (first !== undefined) {
        slot.value.assign(relation.fromRow(first, scope.dialect).toObject())
      }
      return
    }

    slot.value.clear()
    slot.value.extend(rows.map(row => relation.fromRow(row, scope.dialect)))
  }

  private async runHook(
    hook: HookName,
    scope: OperationScope,
    after: TransactionState
  ): Promise<void> {
    const result: HookResult = await this.definition.hooks[hook]({
      context: scope.context,
      transaction: this,
      cursor: scope.cursor,
      dialect: scope.dialect,
      operation: scope.operation
    })
    if (result === false) {
      throw new VerificationError()
    }
    if (typeof result === 'string') {
      throw new VerificationError(result)
    }
    this.transition(scope, after)
  }

  private async execute(scope: OperationScope, statement: Statement) {
    this.definition.logger.trace(`${this.name}.${scope.operation}: ${statement.sql}`, statement.parameters)
    return scope.cursor.execute(statement.sql, statement.parameters)
  }

  private transition(scope: OperationScope, state: TransactionState): void {
    this._state = state
    this.definition.logger.debug(`${this.name}.${scope.operation}: ${state}`)
  }

  private slot(name: string): AttributeSlot {
    const slot = this.slots.get(name)
    if (!slot) {
      throw new SchemaViolationError(
        this.name,
        name,
        `'${name}' is not a declared attribute of ${this.name}`
      )
    }
    return slot
  }
}
