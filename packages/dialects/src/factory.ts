/**
 * Dialect Adapter Factory
 */

import type { DatabaseDialect, DialectAdapter } from './types.js'
import { PostgresAdapter, postgresAdapter } from './adapters/postgres.js'
import { MySQLAdapter, mysqlAdapter } from './adapters/mysql.js'
import { SQLiteAdapter, sqliteAdapter } from './adapters/sqlite.js'

const adapters: Readonly<Record<DatabaseDialect, DialectAdapter>> = {
  postgres: postgresAdapter,
  mysql: mysqlAdapter,
  sqlite: sqliteAdapter
}

/**
 * The adapter used when nothing else is specified
 */
export const defaultDialect: DialectAdapter = sqliteAdapter

function isDatabaseDialect(name: string): name is DatabaseDialect {
  return Object.prototype.hasOwnProperty.call(adapters, name)
}

/**
 * Get the bundled adapter singleton for a dialect
 *
 * @example
 * const adapter = getAdapter('postgres')
 * adapter.parameterMarker(2) // '$2'
 */
export function getAdapter(dialect: string): DialectAdapter {
  if (!isDatabaseDialect(dialect)) {
    throw new Error(`Unknown dialect: ${dialect}. Supported: postgres, mysql, sqlite`)
  }
  return adapters[dialect]
}

/**
 * Create a new dialect adapter instance
 *
 * @example
 * const adapter = createDialectAdapter('mysql')
 */
export function createDialectAdapter(dialect: DatabaseDialect): DialectAdapter {
  switch (dialect) {
    case 'postgres':
      return new PostgresAdapter()
    case 'mysql':
      return new MySQLAdapter()
    case 'sqlite':
      return new SQLiteAdapter()
  }
}
