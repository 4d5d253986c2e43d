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
} from './definition';

export {
  TypeKind,
  ScalarName,
  /** Definitions */
  ScalarType,
  ObjectType,
  ListType,
  NonNullType,
  /** Builders */
  listOf,
  nonNull,
  field,
  arg,
  /** Predicates */
  isType,
  isScalarType,
  isObjectType,
  isListType,
  isNonNullType,
  isWrappingType,
  isNullableType,
  /** Un-modifiers */
  getNullableType,
  getNamedType,
  /** Accessors */
  getFields,
  getField,
  getOfType,
} from './definition';

export {
  StringScalar,
  IntScalar,
  BooleanScalar,
  FloatScalar,
  IDScalar,
  specifiedScalarTypes,
  getScalarType,
} from './scalars';

export type { SchemaConfig, OperationType } from './schema';
export { Schema, isSchema, assertSchema } from './schema';
