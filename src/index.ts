/** Define the type system and schema. */
export type {
  Type,
  NamedType,
  WrappingType,
  NullableType,
  Thunk,
  FieldResolver,
  FieldArgs,
  FieldLookup,
  ScalarTypeConfig,
  ObjectTypeConfig,
  FieldConfig,
  FieldConfigMap,
  ArgumentConfig,
  ArgumentConfigMap,
  Field,
  FieldMap,
  Argument,
  SchemaConfig,
  OperationType,
} from './type/index';

export {
  TypeKind,
  ScalarName,
  ScalarType,
  ObjectType,
  ListType,
  NonNullType,
  listOf,
  nonNull,
  field,
  arg,
  isType,
  isScalarType,
  isObjectType,
  isListType,
  isNonNullType,
  isWrappingType,
  isNullableType,
  getNullableType,
  getNamedType,
  getFields,
  getField,
  getOfType,
  StringScalar,
  IntScalar,
  BooleanScalar,
  FloatScalar,
  IDScalar,
  specifiedScalarTypes,
  getScalarType,
  Schema,
  isSchema,
  assertSchema,
} from './type/index';

/** Parse query text. */
export type { SelectionSet, ParsedOperation } from './language/index';
export { parse } from './language/index';

/** Execute selections. */
export type {
  ExecutorArgs,
  ExecutionArgs,
  ExecutionResult,
} from './execution/index';
export { Executor, defaultFieldLookup, execute } from './execution/index';

/** Coerce resolved values. */
export { coerceValue } from './utilities/coerceValue';

/** Operate on errors. */
export type {
  FormatErrorOptions,
  FormattedError,
  DebugInfo,
} from './error/index';
export { ErrorCode, isGraphQLError, formatError } from './error/index';
