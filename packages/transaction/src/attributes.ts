/**
 * Classification of the attributes attached to a transaction.
 *
 * @module @accordo/transaction
 */

import { SchemaError } from '@accordo/core'
import {
  QueryResultDefinition,
  RecordListDefinition,
  RecordSchema,
  RelationSchema,
  TableSchema,
  type QueryResult,
  type RecordInstance,
  type RecordList
} from '@accordo/schema'
import type { AttributeMap } from './types.js'

export type AttributeSpec =
  | { readonly kind: 'record'; readonly name: string; readonly schema: RecordSchema }
  | { readonly kind: 'list'; readonly name: string; readonly definition: RecordListDefinition }
  | { readonly kind: 'result'; readonly name: string; readonly definition: QueryResultDefinition }

export type AttributeSlot =
  | { readonly kind: 'record'; readonly spec: Extract<AttributeSpec, { kind: 'record' }>; value: RecordInstance }
  | { readonly kind: 'list'; readonly spec: Extract<AttributeSpec, { kind: 'list' }>; value: RecordList }
  | { readonly kind: 'result'; readonly spec: Extract<AttributeSpec, { kind: 'result' }>; value: QueryResult }

/**
 * Turn attribute definitions into specs, in declaration order.
 *
 * @throws SchemaError for a value that is not an attribute definition
 */
export function classifyAttributes(transaction: string, attributes: AttributeMap): AttributeSpec[] {
  return Object.entries(attributes).map(([name, definition]): AttributeSpec => {
    if (definition instanceof RecordListDefinition) {
      return { kind: 'list', name, definition }
    }
    if (definition instanceof QueryResultDefinition) {
      return { kind: 'result', name, definition }
    }
    if (definition instanceof RecordSchema) {
      return { kind: 'record', name, schema: definition }
    }
    throw new SchemaError(
      `Attribute ${name} of ${transaction} is not a record, table, view, record list or query result`
    )
  })
}

export function createSlot(spec: AttributeSpec): AttributeSlot {
  switch (spec.kind) {
    case 'record':
      return { kind: 'record', spec, value: spec.schema.create() }
    case 'list':
      return { kind: 'list', spec, value: spec.definition.create() }
    case 'result':
      return { kind: 'result', spec, value: spec.definition.create() }
  }
}

export function copySlot(slot: AttributeSlot): AttributeSlot {
  switch (slot.kind) {
    case 'record':
      return { kind: 'record', spec: slot.spec, value: slot.value.copy() }
    case 'list':
      return { kind: 'list', spec: slot.spec, value: slot.value.copy() }
    case 'result':
      return { kind: 'result', spec: slot.spec, value: slot.value.copy() }
  }
}

/**
 * Put `value` in the slot when it is an instance of the slot's definition.
 * Returns whether it was accepted.
 */
export function replaceValue(slot: AttributeSlot, value: unknown): boolean {
  switch (slot.kind) {
    case 'record':
      if (!slot.spec.schema.isRecord(value)) return false
      slot.value = value
      return true
    case 'list':
      if (!slot.spec.definition.isList(value)) return false
      slot.value = value
      return true
    case 'result':
      if (!slot.spec.definition.isResult(value)) return false
      slot.value = value
      return true
  }
}

/** The schema of the records an attribute holds */
export function slotSchema(slot: AttributeSlot): RecordSchema {
  return slot.kind === 'record' ? slot.spec.schema : slot.value.schema
}

/** The table behind a record or record-list attribute, when it is one */
export function slotTable(slot: AttributeSlot): TableSchema | undefined {
  if (slot.kind === 'result') return undefined
  const schema = slotSchema(slot)
  return schema instanceof TableSchema ? schema : undefined
}

/** The table or view a record or record-list attribute can be selected from */
export function slotRelation(slot: AttributeSlot): RelationSchema | undefined {
  if (slot.kind === 'result') return undefined
  const schema = slotSchema(slot)
  return schema instanceof RelationSchema ? schema : undefined
}

/** Records held by an attribute, in order */
export function slotRecords(slot: AttributeSlot): RecordInstance[] {
  return slot.kind === 'record' ? [slot.value] : slot.value.toArray()
}
