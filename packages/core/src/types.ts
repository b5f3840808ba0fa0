/**
 * A value held by a field: what application code reads and writes.
 */
export type FieldValue = string | number | boolean | Date | null

/**
 * A value as it crosses the driver boundary, after dialect adaptation.
 */
export type DriverValue = string | number | bigint | boolean | Date | Uint8Array | null

/**
 * A result row keyed by column name, as returned by the driver.
 */
export type Row = Readonly<Record<string, unknown>>

/**
 * Shared values propagated from a transaction's own fields into every
 * attached entity. Keys are field names, iteration order is declaration
 * order and every declared field has an entry (null when empty).
 */
export type Context = Map<string, FieldValue>

/**
 * A statement ready for execution. `parameters` are listed in placeholder
 * order and already adapted for the driver.
 */
export interface Statement {
  sql: string
  parameters: readonly DriverValue[]
}

export const ISOLATION_LEVELS = [
  'read uncommitted',
  'read committed',
  'repeatable read',
  'serializable'
] as const

export type IsolationLevel = (typeof ISOLATION_LEVELS)[number]

/**
 * `manual` leaves begin, commit and rollback to the caller.
 */
export type IsolationMode = IsolationLevel | 'manual'

/**
 * The database collaborator every orchestrated operation runs on.
 *
 * One cursor serves one operation; statements are executed sequentially.
 *
 * @example
 * ```typescript
 * const cursor: Cursor = createKyselyCursor(db)
 * await CreateOrder.create().insertNew(cursor)
 * ```
 */
export interface Cursor {
  execute(sql: string, parameters?: readonly DriverValue[]): Promise<Row[]>
  begin(isolation?: IsolationLevel): Promise<void>
  commit(): Promise<void>
  rollback(): Promise<void>
}
