import type { Cursor } from '@accordo/core'
import { assertValidIdentifier, defaultDialect, type DialectAdapter } from '@accordo/dialects'

/**
 * A schema object that a namespace can create
 */
export interface NamespaceMember {
  readonly kind: 'table' | 'view' | 'sequence'
  readonly name: string
  createStatements(dialect?: DialectAdapter): string[]
}

const CREATION_ORDER: readonly NamespaceMember['kind'][] = ['sequence', 'table', 'view']

/**
 * A named group of tables, views and sequences. On dialects with schemas it
 * maps to `CREATE SCHEMA`; elsewhere its name prefixes every object.
 *
 * @example
 * ```typescript
 * const sales = defineNamespace('sales')
 * const orders = defineTable('orders', fields, { namespace: sales })
 * orders.qualifiedName(postgresAdapter) // '"sales"."orders"'
 * orders.qualifiedName(sqliteAdapter)   // '"sales_orders"'
 * ```
 */
export class Namespace {
  private readonly members: NamespaceMember[] = []

  constructor(readonly name: string) {
    assertValidIdentifier(name, 'namespace name')
  }

  qualifiedName(object: string, dialect: DialectAdapter = defaultDialect): string {
    return dialect.qualifiedName(this.name, object)
  }

  register(member: NamespaceMember): void {
    if (!this.members.includes(member)) {
      this.members.push(member)
    }
  }

  get objects(): readonly NamespaceMember[] {
    return this.members
  }

  /**
   * DDL for the namespace and everything registered in it: sequences, then
   * tables, then views, each group in registration order.
   */
  createStatements(dialect: DialectAdapter = defaultDialect): string[] {
    const statements: string[] = []
    if (dialect.supportsSchemas) {
      statements.push(`CREATE SCHEMA IF NOT EXISTS ${dialect.escapeIdentifier(this.name)}`)
    }
    for (const kind of CREATION_ORDER) {
      for (const member of this.members) {
        if (member.kind === kind) {
          statements.push(...member.createStatements(dialect))
        }
      }
    }
    return statements
  }

  async create(cursor: Cursor, dialect: DialectAdapter = defaultDialect): Promise<void> {
    for (const sql of this.createStatements(dialect)) {
      await cursor.execute(sql)
    }
  }
}

export function defineNamespace(name: string): Namespace {
  return new Namespace(name)
}
