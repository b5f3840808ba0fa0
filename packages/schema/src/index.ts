/**
 * @accordo/schema
 *
 * Typed fields, records, tables, views, record lists, sequences and
 * parametrised queries, with dialect-correct statement generation.
 *
 * @example
 * import { defineTable, ContextIntField, TextField, primaryKey } from '@accordo/schema'
 *
 * const customers = defineTable(
 *   'customers',
 *   {
 *     customer_id: new ContextIntField({ contextKey: 'customer_id' }),
 *     name: new TextField({ nullable: false })
 *   },
 *   { constraints: { customers_pk: primaryKey(['customer_id']) } }
 * )
 *
 * customers.selectStatement({ customer_id: 7 })
 * // {
 * //   sql: 'SELECT "customer_id", "name" FROM "customers" WHERE "customer_id" = ?',
 * //   parameters: [7]
 * // }
 */

export * from './fields/index.js'

export {
  RecordSchema,
  RecordInstance,
  defineRecord,
  type FieldMap,
  type FieldType,
  type FieldName,
  type FieldEntry,
  type RecordValues,
  type RecordInput
} from './record.js'

export { StatementBuilder, rewriteQualifiedNames } from './statement.js'

export {
  RelationSchema,
  type RelationKind,
  type Predicates,
  type ContextSelectOptions
} from './relation.js'

export {
  Constraint,
  primaryKey,
  unique,
  foreignKey,
  check,
  customConstraint,
  type ConstraintSpec,
  type ConstraintKind,
  type ForeignKeyOptions,
  type ReferenceTarget,
  type ReferentialAction,
  type MatchType
} from './constraints.js'

export { TableSchema, defineTable, type TableOptions } from './table.js'
export { ViewSchema, defineView, type ViewOptions } from './view.js'
export { RecordList, RecordListDefinition, defineRecordList } from './record-list.js'
export { Namespace, defineNamespace, type NamespaceMember } from './namespace.js'
export { Sequence, defineSequence, type SequenceOptions } from './sequence.js'
export { QueryDefinition, QueryInstance, defineQuery, type QueryOptions } from './query.js'
export { QueryResult, QueryResultDefinition, defineQueryResult } from './query-result.js'
