import { defaultDialect, type DialectAdapter } from '@accordo/dialects'
import type { FieldMap } from './record.js'
import { RelationSchema } from './relation.js'
import { rewriteQualifiedNames } from './statement.js'
import type { Namespace } from './namespace.js'

export interface ViewOptions {
  /** Defining SELECT; `{namespace.object}` tokens are qualified per dialect */
  query: string
  namespace?: Namespace | undefined
}

/**
 * A read-only relation defined by a query. Views are selected from, by
 * predicates or by context, and never written.
 *
 * @example
 * ```typescript
 * const orderTotals = defineView(
 *   'order_totals',
 *   { trans_id: new IntField({ contextKey: 'trans_id' }), total: new NumericField({ precision: 12, scale: 2 }) },
 *   { query: 'SELECT trans_id, SUM(amount) FROM order_lines GROUP BY trans_id' }
 * )
 * ```
 */
export class ViewSchema<S extends FieldMap = FieldMap> extends RelationSchema<S> {
  readonly kind = 'view' as const
  readonly query: string

  constructor(name: string, fields: S, options: ViewOptions) {
    super(name, fields, options.namespace)
    this.query = options.query
    options.namespace?.register(this)
  }

  createViewStatement(dialect: DialectAdapter = defaultDialect): string {
    return dialect.createViewStatement(
      this.qualifiedName(dialect),
      this.columnNames,
      rewriteQualifiedNames(this.query, dialect)
    )
  }

  createStatements(dialect: DialectAdapter = defaultDialect): string[] {
    return [this.createViewStatement(dialect)]
  }
}

export function defineView<S extends FieldMap>(
  name: string,
  fields: S,
  options: ViewOptions
): ViewSchema<S> {
  return new ViewSchema(name, fields, options)
}
