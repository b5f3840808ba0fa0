/**
 * Parametrised queries. Placeholders are written `{name}` in the query
 * text and bound through the dialect's markers, never spliced in as text.
 *
 * @module @accordo/schema/query
 */

import {
  QueryParameterError,
  QueryResultError,
  type Context,
  type Cursor,
  type FieldValue,
  type Row,
  type Statement
} from '@accordo/core'
import { assertValidIdentifier, defaultDialect, type DialectAdapter } from '@accordo/dialects'
import {
  RecordSchema,
  type FieldMap,
  type FieldName,
  type FieldType,
  type RecordInput,
  type RecordInstance
} from './record.js'
import { StatementBuilder } from './statement.js'

type Segment =
  | { kind: 'text'; text: string }
  | { kind: 'parameter'; name: string }
  | { kind: 'qualified'; namespace: string; name: string }

const PLACEHOLDER = /\{([A-Za-z_][A-Za-z0-9_]*)(?:\.([A-Za-z_][A-Za-z0-9_]*))?\}/g

function parseTemplate(text: string): Segment[] {
  const segments: Segment[] = []
  let position = 0
  for (const match of text.matchAll(PLACEHOLDER)) {
    const start = match.index ?? 0
    if (start > position) {
      segments.push({ kind: 'text', text: text.slice(position, start) })
    }
    const [token, first = '', second] = match
    segments.push(
      second === undefined
        ? { kind: 'parameter', name: first }
        : { kind: 'qualified', namespace: first, name: second }
    )
    position = start + token.length
  }
  if (position < text.length) {
    segments.push({ kind: 'text', text: text.slice(position) })
  }
  return segments
}

export interface QueryOptions<R extends FieldMap, P extends FieldMap> {
  name: string
  /** Query text with `{parameter}` and `{namespace.object}` tokens */
  text: string
  /** Schema of the rows the query returns */
  result?: RecordSchema<R> | undefined
  /** Parameter fields, keyed by placeholder name; `{}` when the query binds nothing */
  parameters: P
}

/**
 * @example
 * ```typescript
 * const ordersByCustomer = defineQuery({
 *   name: 'orders_by_customer',
 *   text: 'SELECT trans_id, total FROM {sales.orders} WHERE customer = {customer}',
 *   result: OrderSummary,
 *   parameters: { customer: new TextField({ contextKey: 'customer' }) }
 * })
 *
 * ordersByCustomer.create({ customer: 'c-1' }).compile(postgresAdapter)
 * // { sql: 'SELECT trans_id, total FROM "sales"."orders" WHERE customer = $1', parameters: ['c-1'] }
 * ```
 */
export class QueryDefinition<R extends FieldMap = FieldMap, P extends FieldMap = FieldMap> {
  readonly name: string
  readonly text: string
  readonly result: RecordSchema<R> | undefined
  readonly parameters: RecordSchema<P>
  private readonly segments: readonly Segment[]

  constructor(options: QueryOptions<R, P>) {
    assertValidIdentifier(options.name, 'query name')
    this.name = options.name
    this.text = options.text
    this.result = options.result
    this.parameters = new RecordSchema(options.name, options.parameters)
    this.segments = parseTemplate(options.text)

    for (const segment of this.segments) {
      if (segment.kind === 'parameter' && !this.parameters.has(segment.name)) {
        throw new QueryParameterError(this.name, segment.name)
      }
    }
  }

  /** Placeholder names in order of appearance, repeats included */
  get placeholders(): string[] {
    return this.segments.flatMap(segment => (segment.kind === 'parameter' ? [segment.name] : []))
  }

  create(values?: RecordInput<P>): QueryInstance<R, P> {
    return new QueryInstance(this, values)
  }

  /**
   * Render the text for `dialect`, binding `values` in marker order.
   * Numbered markers reuse their number for a repeated placeholder.
   */
  compile(values: RecordInstance<P>, dialect: DialectAdapter = defaultDialect): Statement {
    const builder = new StatementBuilder(dialect)
    const numbered = new Map<string, string>()
    let sql = ''

    for (const segment of this.segments) {
      switch (segment.kind) {
        case 'text':
          sql += segment.text
          break
        case 'qualified':
          sql += dialect.qualifiedName(segment.namespace, segment.name)
          break
        case 'parameter': {
          if (!this.parameters.has(segment.name)) {
            throw new QueryParameterError(this.name, segment.name)
          }
          const reused = dialect.parameterStyle === 'numbered' ? numbered.get(segment.name) : undefined
          if (reused !== undefined) {
            sql += reused
            break
          }
          const field = this.parameters.entry(segment.name).field
          const marker = builder.bind(values.getValue(segment.name), field.semanticType)
          numbered.set(segment.name, marker)
          sql += marker
          break
        }
      }
    }

    return builder.build(sql)
  }
}

/**
 * A query with its parameter values.
 */
export class QueryInstance<R extends FieldMap = FieldMap, P extends FieldMap = FieldMap> {
  private readonly values: RecordInstance<P>

  constructor(
    readonly definition: QueryDefinition<R, P>,
    values?: RecordInput<P>
  ) {
    this.values = definition.parameters.create(values)
  }

  get<K extends FieldName<P>>(name: K): FieldType<P[K]> {
    return this.values.get(name)
  }

  set<K extends FieldName<P>>(name: K, value: FieldType<P[K]>): void {
    this.values.set(name, value)
  }

  getValue(name: string): FieldValue {
    return this.values.getValue(name)
  }

  setValue(name: string, value: unknown): void {
    this.values.setValue(name, value)
  }

  /**
   * Adopt the non-null context values for the parameters. A parameter
   * reads the context under its context key, or else under its own name.
   */
  setContext(context: Context): void {
    for (const entry of this.definition.parameters.entries) {
      const value = context.get(entry.field.contextKey ?? entry.name)
      if (value !== null && value !== undefined) {
        this.values.setValue(entry.name, value)
      }
    }
  }

  /** Parameter values keyed the way `setContext` reads them */
  getContext(): Context {
    const context: Context = new Map()
    for (const entry of this.definition.parameters.entries) {
      context.set(entry.field.contextKey ?? entry.name, this.values.getValue(entry.name))
    }
    return context
  }

  compile(dialect: DialectAdapter = defaultDialect): Statement {
    return this.definition.compile(this.values, dialect)
  }

  async execute(cursor: Cursor, dialect: DialectAdapter = defaultDialect): Promise<Row[]> {
    const { sql, parameters } = this.compile(dialect)
    return cursor.execute(sql, parameters)
  }

  /**
   * Execute and materialise every row with the result schema.
   *
   * @throws QueryResultError when the query declares no result schema
   */
  async resultRecords(cursor: Cursor, dialect: DialectAdapter = defaultDialect): Promise<RecordInstance<R>[]> {
    const schema = this.resultSchema()
    const rows = await this.execute(cursor, dialect)
    return rows.map(row => materialise(schema, row, dialect))
  }

  /** First result record, or null when the query returns nothing */
  async resultRecord(cursor: Cursor, dialect: DialectAdapter = defaultDialect): Promise<RecordInstance<R> | null> {
    const schema = this.resultSchema()
    const [first] = await this.execute(cursor, dialect)
    return first === undefined ? null : materialise(schema, first, dialect)
  }

  /**
   * Execute a query returning one value.
   *
   * @throws QueryResultError for zero rows, or a row without exactly one column
   */
  async resultSingleValue(cursor: Cursor, dialect: DialectAdapter = defaultDialect): Promise<FieldValue> {
    const [first] = await this.execute(cursor, dialect)
    if (first === undefined) {
      throw new QueryResultError(`Query ${this.definition.name} returned no rows`)
    }
    const columns = Object.values(first)
    if (columns.length !== 1) {
      throw new QueryResultError(
        `Query ${this.definition.name} returned ${columns.length} columns where one value was expected`
      )
    }

    const [raw] = columns
    const [only, ...others] = this.definition.result?.entries ?? []
    if (only !== undefined && others.length === 0) {
      return dialect.fromDriver(raw, only.field.semanticType)
    }
    return singleValue(this.definition.name, raw)
  }

  copy(): QueryInstance<R, P> {
    const duplicate = new QueryInstance(this.definition)
    duplicate.values.assign(this.values.toObject())
    return duplicate
  }

  private resultSchema(): RecordSchema<R> {
    const schema = this.definition.result
    if (!schema) {
      throw new QueryResultError(`Query ${this.definition.name} declares no result schema`)
    }
    return schema
  }
}

function materialise<R extends FieldMap>(
  schema: RecordSchema<R>,
  row: Row,
  dialect: DialectAdapter
): RecordInstance<R> {
  const values = Object.values(row)
  // Unnamed expressions (`SELECT SUM(x) ...`) are matched by position
  if (!schema.matchesColumns(row) && values.length === schema.entries.length) {
    return schema.fromValues(values, dialect)
  }
  return schema.fromRow(row, dialect)
}

function singleValue(query: string, raw: unknown): FieldValue {
  if (typeof raw === 'bigint') return Number(raw)
  if (
    raw === null ||
    typeof raw === 'string' ||
    typeof raw === 'number' ||
    typeof raw === 'boolean' ||
    raw instanceof Date
  ) {
    return raw
  }
  throw new QueryResultError(`Query ${query} returned a value of unsupported type ${typeof raw}`)
}

export function defineQuery<R extends FieldMap = FieldMap, P extends FieldMap = FieldMap>(
  options: QueryOptions<R, P>
): QueryDefinition<R, P> {
  return new QueryDefinition(options)
}
