import { QueryResultError, type Context, type Cursor } from '@accordo/core'
import { defaultDialect, type DialectAdapter } from '@accordo/dialects'
import type { FieldMap, RecordInput, RecordInstance, RecordSchema } from './record.js'
import { RecordList } from './record-list.js'
import type { QueryDefinition, QueryInstance } from './query.js'

/**
 * Records fetched by a query that the list owns. Setting the context
 * fills the query's parameters; `refresh` replaces the contents.
 *
 * @example
 * ```typescript
 * const Orders = defineQueryResult(ordersByCustomer)
 * const orders = Orders.create()
 * orders.setContext(new Map([['customer', 'c-1']]))
 * await orders.refresh(cursor)
 * orders.length // rows returned for c-1
 * ```
 */
export class QueryResult<R extends FieldMap = FieldMap, P extends FieldMap = FieldMap> extends RecordList<R> {
  constructor(
    readonly query: QueryInstance<R, P>,
    schema: RecordSchema<R>,
    records: Iterable<RecordInstance<R> | RecordInput<R>> = []
  ) {
    super(schema, records)
  }

  setContext(context: Context): void {
    this.query.setContext(context)
  }

  getContext(): Context {
    return this.query.getContext()
  }

  /** Clear and repopulate from the query */
  async refresh(cursor: Cursor, dialect: DialectAdapter = defaultDialect): Promise<void> {
    const records = await this.query.resultRecords(cursor, dialect)
    this.clear()
    this.extend(records)
  }

  override copy(): QueryResult<R, P> {
    return new QueryResult(
      this.query.copy(),
      this.schema,
      this.toArray().map(record => record.copy())
    )
  }
}

export class QueryResultDefinition<R extends FieldMap = FieldMap, P extends FieldMap = FieldMap> {
  readonly schema: RecordSchema<R>

  constructor(readonly query: QueryDefinition<R, P>) {
    if (!query.result) {
      throw new QueryResultError(`Query ${query.name} declares no result schema`)
    }
    this.schema = query.result
  }

  create(records?: Iterable<RecordInstance<R> | RecordInput<R>>): QueryResult<R, P> {
    return new QueryResult(this.query.create(), this.schema, records)
  }

  isResult(value: unknown): value is QueryResult<R, P> {
    return value instanceof QueryResult && value.query.definition === this.query
  }
}

export function defineQueryResult<R extends FieldMap, P extends FieldMap>(
  query: QueryDefinition<R, P>
): QueryResultDefinition<R, P> {
  return new QueryResultDefinition(query)
}
