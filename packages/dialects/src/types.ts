/**
 * @accordo/dialects - Type Definitions
 *
 * The contract every SQL dialect adapter fulfils. Everything above this
 * package produces SQL only through these methods.
 */

import type { DriverDialect, DriverValue, FieldValue } from '@accordo/core'

/**
 * Supported database dialects
 */
export type DatabaseDialect = DriverDialect

/**
 * Semantic column types understood by every adapter
 */
export type SemanticType =
  | 'integer'
  | 'smallint'
  | 'bigint'
  | 'real'
  | 'numeric'
  | 'boolean'
  | 'text'
  | 'varchar'
  | 'char'
  | 'timestamp'
  | 'enum'

/**
 * Everything an adapter needs to render a column type
 */
export interface ColumnSpec {
  type: SemanticType
  precision?: number | undefined
  scale?: number | undefined
  maxLength?: number | undefined
  /** Timestamp carries a time zone */
  tz?: boolean | undefined
  /** Labels of an enum column */
  values?: readonly string[] | undefined
  autoIncrement?: boolean | undefined
}

/**
 * A database sequence as the dialect needs to see it
 */
export interface SequenceSpec {
  name: string
  namespace?: string | undefined
  start: number
  increment: number
  indexType: 'integer' | 'bigint'
}

/**
 * How bind markers are written: `?` for every parameter, or `$1`, `$2`...
 */
export type ParameterStyle = 'positional' | 'numbered'

/**
 * Interface for dialect-specific operations
 */
export interface DialectAdapter {
  /** The dialect this adapter handles */
  readonly dialect: DatabaseDialect

  /** Bind marker style */
  readonly parameterStyle: ParameterStyle

  /** Whether objects can live in a named schema (`ns.table`) */
  readonly supportsSchemas: boolean

  /** Whether constraints accept `DEFERRABLE INITIALLY DEFERRED` */
  readonly supportsDeferrableConstraints: boolean

  /** Bind marker for the parameter at 1-based `index` */
  parameterMarker(index: number): string

  /** Escape identifier for this dialect */
  escapeIdentifier(identifier: string): string

  /**
   * Quoted name of `name` inside `namespace`. Dialects without schema
   * support fold the namespace into the name (`"ns_name"`).
   */
  qualifiedName(namespace: string | undefined, name: string): string

  /** Column type for a semantic type, without nullability */
  columnType(spec: ColumnSpec): string

  /** Convert a field value into what the driver binds */
  toDriver(value: FieldValue, type: SemanticType): DriverValue

  /** Convert a driver value back into a field value */
  fromDriver(value: unknown, type: SemanticType): FieldValue

  /** Column definition for an auto-incrementing integer key */
  readonly autoIncrementColumn: string

  /** Statements that create a sequence if it does not exist */
  createSequenceStatements(sequence: SequenceSpec): string[]

  /** Statements that advance a sequence; the last one yields the new value */
  nextvalStatements(sequence: SequenceSpec): string[]

  /** Statements that restart a sequence at its starting value */
  resetSequenceStatements(sequence: SequenceSpec): string[]

  /** Statement that removes every row of a table */
  truncateTableStatement(qualifiedName: string): string

  /** Statement that creates a view; column names are quoted here */
  createViewStatement(qualifiedName: string, columns: readonly string[], query: string): string
}
