import type { DriverValue, FieldValue, Statement } from '@accordo/core'
import { assertValidIdentifier, type DialectAdapter, type SemanticType } from '@accordo/dialects'

/**
 * Collects bound parameters in placeholder order and hands out the matching
 * dialect markers.
 *
 * @example
 * ```typescript
 * const builder = new StatementBuilder(postgresAdapter)
 * const marker = builder.bind(42, 'integer') // '$1'
 * builder.build(`SELECT * FROM orders WHERE trans_id = ${marker}`)
 * // { sql: 'SELECT * FROM orders WHERE trans_id = $1', parameters: [42] }
 * ```
 */
export class StatementBuilder {
  private readonly parameters: DriverValue[] = []

  constructor(readonly dialect: DialectAdapter) {}

  bind(value: FieldValue, type: SemanticType): string {
    this.parameters.push(this.dialect.toDriver(value, type))
    return this.dialect.parameterMarker(this.parameters.length)
  }

  build(sql: string): Statement {
    return { sql, parameters: [...this.parameters] }
  }
}

const QUALIFIED_TOKEN = /\{([A-Za-z_][A-Za-z0-9_]*)\.([A-Za-z_][A-Za-z0-9_]*)\}/g

/**
 * Replace `{namespace.object}` tokens with the dialect's qualified name.
 */
export function rewriteQualifiedNames(text: string, dialect: DialectAdapter): string {
  return text.replace(QUALIFIED_TOKEN, (_token, namespace: string, name: string) =>
    dialect.qualifiedName(namespace, name)
  )
}

/**
 * Check a namespace-and-name pair at definition time.
 */
export function assertValidObjectName(name: string, namespace: string | undefined, kind: string): void {
  assertValidIdentifier(name, `${kind} name`)
  if (namespace !== undefined) {
    assertValidIdentifier(namespace, 'namespace name')
  }
}
