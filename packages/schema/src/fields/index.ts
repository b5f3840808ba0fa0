export { Field, type AnyField, type FieldEnv, type FieldOptions, type StoredValue } from './base.js'
export {
  IntField,
  SmallIntField,
  BigIntField,
  RealField,
  NumericField,
  type IntFieldOptions,
  type NumericFieldOptions
} from './numbers.js'
export {
  TextField,
  VarCharField,
  CharField,
  EnumField,
  type VarCharFieldOptions,
  type CharFieldOptions,
  type EnumFieldOptions
} from './text.js'
export {
  BooleanField,
  TimestampField,
  UTCNowTimestampField,
  type TimestampFieldOptions
} from './scalars.js'
export {
  ContextIntField,
  RowEnumIntField,
  type ContextIntFieldOptions,
  type RowEnumIntFieldOptions
} from './context.js'
export {
  SequenceIntField,
  QueryIntField,
  type SequenceIntFieldOptions,
  type QueryIntFieldOptions
} from './generated.js'
