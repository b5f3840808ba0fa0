/**
 * @accordo/dialects
 *
 * SQL dialect adapters: bind markers, identifier quoting, column types,
 * value adaptation and sequence statements for SQLite, PostgreSQL and MySQL.
 *
 * @example
 * import { getAdapter } from '@accordo/dialects'
 *
 * const adapter = getAdapter('postgres')
 * adapter.columnType({ type: 'numeric', precision: 10, scale: 2 }) // 'NUMERIC(10,2)'
 * adapter.nextvalStatements({ name: 'trans_id_seq', start: 1, increment: 1, indexType: 'bigint' })
 * // [`SELECT nextval('"trans_id_seq"') AS nextval`]
 */

// Types
export type {
  DatabaseDialect,
  SemanticType,
  ColumnSpec,
  SequenceSpec,
  ParameterStyle,
  DialectAdapter
} from './types.js'

// Factory and adapters
export { getAdapter, createDialectAdapter, defaultDialect } from './factory.js'
export { PostgresAdapter, postgresAdapter } from './adapters/postgres.js'
export { MySQLAdapter, mysqlAdapter } from './adapters/mysql.js'
export { SQLiteAdapter, sqliteAdapter } from './adapters/sqlite.js'

// Helper functions
export {
  validateIdentifier,
  assertValidIdentifier,
  fromDriverValue,
  quoteLiteral
} from './helpers.js'
