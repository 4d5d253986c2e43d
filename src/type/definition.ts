import { devAssert } from 'graphql/jsutils/devAssert';
import { inspect } from 'graphql/jsutils/inspect';
import { isObjectLike } from 'graphql/jsutils/isObjectLike';
import type { Maybe } from 'graphql/jsutils/Maybe';

import { executionError } from '../error/createError';

/**
 * The closed set of shapes a type descriptor can take.
 */
export enum TypeKind {
  SCALAR = 'SCALAR',
  OBJECT = 'OBJECT',
  LIST = 'LIST',
  NON_NULL = 'NON_NULL',
}

/**
 * The built-in leaf types. Scalars are identified by name only.
 */
export enum ScalarName {
  STRING = 'String',
  INT = 'Int',
  BOOLEAN = 'Boolean',
  FLOAT = 'Float',
  ID = 'ID',
}

export type Type = NamedType | WrappingType;

export type NamedType = ScalarType | ObjectType;

export type WrappingType = ListType<Type> | NonNullType<NullableType>;

export type NullableType = NamedType | ListType<Type>;

export type Thunk<T> = (() => T) | T;

/**
 * Produces the raw value of a field from its parent value.
 */
export type FieldResolver = (source: unknown, args: FieldArgs) => unknown;

export interface FieldArgs {
  readonly [argName: string]: unknown;
}

/**
 * Reads a named value off a host value when a field has no resolver.
 * Returning `undefined` or `null` means the value is absent.
 */
export type FieldLookup = (source: unknown, fieldName: string) => unknown;

/*
 * Predicates
 *
 * Descriptors are recognized by their string tag rather than `instanceof` so
 * that types built by another copy of this package are still accepted.
 */

export function isType(type: unknown): type is Type {
  return (
    isScalarType(type) ||
    isObjectType(type) ||
    isListType(type) ||
    isNonNullType(type)
  );
}

export function isScalarType(type: unknown): type is ScalarType {
  return Object.prototype.toString.call(type) === '[object ScalarType]';
}

export function isObjectType(type: unknown): type is ObjectType {
  return Object.prototype.toString.call(type) === '[object ObjectType]';
}

export function isListType(type: unknown): type is ListType<Type> {
  return Object.prototype.toString.call(type) === '[object ListType]';
}

export function isNonNullType(
  type: unknown,
): type is NonNullType<NullableType> {
  return Object.prototype.toString.call(type) === '[object NonNullType]';
}

export function isWrappingType(type: unknown): type is WrappingType {
  return isListType(type) || isNonNullType(type);
}

export function isNullableType(type: unknown): type is NullableType {
  return isType(type) && !isNonNullType(type);
}

export function getNullableType(type: Type): NullableType {
  return type.kind === TypeKind.NON_NULL ? type.ofType : type;
}

export function getNamedType(type: Type): NamedType {
  let unwrappedType = type;
  while (
    unwrappedType.kind === TypeKind.LIST ||
    unwrappedType.kind === TypeKind.NON_NULL
  ) {
    unwrappedType = unwrappedType.ofType;
  }
  return unwrappedType;
}

/*
 * Accessors that accept any kind and fail on the wrong one.
 */

export function getFields(type: Type): FieldMap {
  if (type.kind !== TypeKind.OBJECT) {
    throw executionError(
      `Cannot get fields from a non-object type (${type.toString()}).`,
    );
  }
  return type.getFields();
}

export function getField(type: Type, fieldName: string): Field | undefined {
  if (type.kind !== TypeKind.OBJECT) {
    throw executionError(
      `Cannot get field "${fieldName}" from a non-object type (${type.toString()}).`,
    );
  }
  return type.getField(fieldName);
}

export function getOfType(type: Type): Type {
  if (type.kind !== TypeKind.LIST && type.kind !== TypeKind.NON_NULL) {
    throw executionError(
      `Cannot get "ofType" from a non-LIST or non-NON_NULL type (${type.toString()}).`,
    );
  }
  return type.ofType;
}

/**
 * Scalar Type Definition
 *
 * Leaf values of a response. Coercion of each built-in scalar lives in
 * `coerceValue`; the descriptor only carries identity.
 */
export class ScalarType {
  readonly kind: TypeKind.SCALAR = TypeKind.SCALAR;
  readonly name: ScalarName;
  readonly description: Maybe<string>;

  constructor(config: Readonly<ScalarTypeConfig>) {
    this.name = config.name;
    this.description = config.description;
  }

  get [Symbol.toStringTag]() {
    return 'ScalarType';
  }

  toString(): string {
    return this.name;
  }

  toJSON(): string {
    return this.toString();
  }
}

export interface ScalarTypeConfig {
  name: ScalarName;
  description?: Maybe<string>;
}

/**
 * Object Type Definition
 *
 * Almost all of the types you define will be object types. Object types have
 * a name and a set of named fields. When two types reference each other, or
 * a type references itself, provide `fields` as a function so that it can be
 * evaluated after both types exist:
 *
 * ```ts
 * const PersonType: ObjectType = new ObjectType({
 *   name: 'Person',
 *   fields: () => ({
 *     name: { type: StringScalar },
 *     bestFriend: { type: PersonType },
 *   }),
 * });
 * ```
 */
export class ObjectType {
  readonly kind: TypeKind.OBJECT = TypeKind.OBJECT;
  readonly name: string;
  readonly description: Maybe<string>;
  readonly lookup: Maybe<FieldLookup>;

  private _fields: Thunk<FieldMap>;

  constructor(config: Readonly<ObjectTypeConfig>) {
    devAssert(typeof config.name === 'string', 'Must provide name.');
    this.name = config.name;
    this.description = config.description;
    this.lookup = config.lookup;
    this._fields = () => defineFieldMap(config);
  }

  get [Symbol.toStringTag]() {
    return 'ObjectType';
  }

  getFields(): FieldMap {
    if (typeof this._fields === 'function') {
      this._fields = this._fields();
    }
    return this._fields;
  }

  getField(fieldName: string): Field | undefined {
    return this.getFields()[fieldName];
  }

  toString(): string {
    return this.name;
  }

  toJSON(): string {
    return this.toString();
  }
}

function defineFieldMap(config: Readonly<ObjectTypeConfig>): FieldMap {
  const fieldMap =
    typeof config.fields === 'function' ? config.fields() : config.fields;
  devAssert(
    isObjectLike(fieldMap),
    `${config.name} fields must be an object with field names as keys or a function which returns such an object.`,
  );

  const fields: { [fieldName: string]: Field } = Object.create(null);
  for (const [fieldName, fieldConfig] of Object.entries(fieldMap)) {
    devAssert(
      isType(fieldConfig.type),
      `${config.name}.${fieldName} field type must be a type but got: ${inspect(
        fieldConfig.type,
      )}.`,
    );
    devAssert(
      fieldConfig.resolve == null || typeof fieldConfig.resolve === 'function',
      `${config.name}.${fieldName} field resolver must be a function if ` +
        `provided, but got: ${inspect(fieldConfig.resolve)}.`,
    );
    fields[fieldName] = Object.freeze({
      name: fieldName,
      description: fieldConfig.description,
      type: fieldConfig.type,
      args: defineArguments(fieldConfig.args ?? {}),
      resolve: fieldConfig.resolve,
    });
  }
  return fields;
}

function defineArguments(
  config: ArgumentConfigMap,
): ReadonlyArray<Argument> {
  return Object.entries(config).map(([argName, argConfig]) =>
    Object.freeze({
      name: argName,
      description: argConfig.description,
      type: argConfig.type,
      defaultValue: argConfig.defaultValue,
    }),
  );
}

export interface ObjectTypeConfig {
  name: string;
  description?: Maybe<string>;
  fields: Thunk<FieldConfigMap>;
  /** Default resolution for fields of this type that have no resolver. */
  lookup?: Maybe<FieldLookup>;
}

export interface FieldConfig {
  type: Type;
  description?: Maybe<string>;
  args?: Maybe<ArgumentConfigMap>;
  resolve?: Maybe<FieldResolver>;
}

export interface FieldConfigMap {
  [fieldName: string]: FieldConfig;
}

export interface ArgumentConfig {
  type: Type;
  description?: Maybe<string>;
  defaultValue?: unknown;
}

export interface ArgumentConfigMap {
  [argName: string]: ArgumentConfig;
}

export interface Field {
  readonly name: string;
  readonly description: Maybe<string>;
  readonly type: Type;
  readonly args: ReadonlyArray<Argument>;
  readonly resolve: Maybe<FieldResolver>;
}

export interface Argument {
  readonly name: string;
  readonly description: Maybe<string>;
  readonly type: Type;
  readonly defaultValue: unknown;
}

export interface FieldMap {
  readonly [fieldName: string]: Field;
}

/**
 * List Type Wrapper
 *
 * A list is a wrapping type which points to another type.
 */
export class ListType<T extends Type> {
  readonly kind: TypeKind.LIST = TypeKind.LIST;
  readonly ofType: T;

  constructor(ofType: T) {
    devAssert(isType(ofType), `Expected ${inspect(ofType)} to be a type.`);
    this.ofType = ofType;
  }

  get [Symbol.toStringTag]() {
    return 'ListType';
  }

  toString(): string {
    return '[' + String(this.ofType) + ']';
  }

  toJSON(): string {
    return this.toString();
  }
}

/**
 * Non-Null Type Wrapper
 *
 * Declares that a field never resolves to null. Use `nonNull` to wrap a type
 * that may already be non-null.
 */
export class NonNullType<T extends NullableType> {
  readonly kind: TypeKind.NON_NULL = TypeKind.NON_NULL;
  readonly ofType: T;

  constructor(ofType: T) {
    devAssert(
      isNullableType(ofType),
      `Expected ${inspect(ofType)} to be a nullable type.`,
    );
    this.ofType = ofType;
  }

  get [Symbol.toStringTag]() {
    return 'NonNullType';
  }

  toString(): string {
    return String(this.ofType) + '!';
  }

  toJSON(): string {
    return this.toString();
  }
}

/*
 * Builders
 */

export function listOf<T extends Type>(ofType: T): ListType<T> {
  return new ListType(ofType);
}

/**
 * Wraps a type as non-null. A type that is already non-null is returned as
 * given.
 */
export function nonNull(ofType: Type): NonNullType<NullableType> {
  if (ofType.kind === TypeKind.NON_NULL) {
    return ofType;
  }
  return new NonNullType(ofType);
}

export function field(
  type: Type,
  description?: Maybe<string>,
  args?: Maybe<ArgumentConfigMap>,
  resolve?: Maybe<FieldResolver>,
): FieldConfig {
  return { type, description, args, resolve };
}

export function arg(
  type: Type,
  description?: Maybe<string>,
  defaultValue?: unknown,
): ArgumentConfig {
  return { type, description, defaultValue };
}
