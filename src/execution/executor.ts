import type { GraphQLError } from 'graphql';
import { inspect } from 'graphql/jsutils/inspect';
import { isIterableObject } from 'graphql/jsutils/isIterableObject';
import { isObjectLike } from 'graphql/jsutils/isObjectLike';
import type { Maybe } from 'graphql/jsutils/Maybe';
import type { ObjMap } from 'graphql/jsutils/ObjMap';

import { toError } from '../jsutils/toError';

import {
  coercionError,
  createError,
  executionError,
} from '../error/createError';
import { ErrorCode } from '../error/errorCodes';
import { isGraphQLError } from '../error/isGraphQLError';

import type { ParsedOperation, SelectionSet } from '../language/ast';

import type {
  Field,
  FieldLookup,
  ListType,
  ObjectType,
  Type,
} from '../type/definition';
import {
  getNamedType,
  getNullableType,
  isListType,
  isNonNullType,
  isObjectType,
} from '../type/definition';
import type { Schema } from '../type/schema';
import { assertSchema } from '../type/schema';

import { coerceValue, nonNullViolationError } from '../utilities/coerceValue';

export interface ExecutorArgs {
  schema: Schema;
  /**
   * Reads field values off host values for fields without a resolver, unless
   * the parent object type brings its own `lookup`. Defaults to
   * `defaultFieldLookup`.
   */
  fieldLookup?: Maybe<FieldLookup>;
}

/**
 * Executes selection sets against a schema.
 *
 * An executor holds only its schema and lookup, so one instance may serve any
 * number of requests. Execution is a synchronous depth-first walk: fields are
 * resolved in selection order and the first error aborts the whole request.
 */
export class Executor {
  private _schema: Schema;
  private _fieldLookup: FieldLookup;

  constructor(executorArgs: ExecutorArgs) {
    const { schema, fieldLookup } = executorArgs;

    // Schema must be provided.
    this._schema = assertSchema(schema);
    this._fieldLookup = fieldLookup ?? defaultFieldLookup;
  }

  executeOperation(
    parsed: ParsedOperation,
    rootValue?: unknown,
  ): ObjMap<unknown> {
    return this.execute(parsed.operation, parsed.selections, rootValue);
  }

  execute(
    operation: string,
    selections: SelectionSet,
    rootValue?: unknown,
  ): ObjMap<unknown> {
    const rootType = this.getRootType(operation);
    return this.resolveSelections(selections, rootType, rootValue);
  }

  getRootType(operation: string): ObjectType {
    if (operation !== 'query' && operation !== 'mutation') {
      throw executionError(`Unsupported operation type: ${operation}`);
    }

    const rootType = this._schema.getRootType(operation);
    if (rootType === undefined) {
      throw executionError('Schema does not define a Mutation type.');
    }
    return rootType;
  }

  /**
   * Resolves every requested field of `parentType` against `source`, in
   * selection order.
   */
  resolveSelections(
    selections: SelectionSet,
    parentType: Type,
    source: unknown,
  ): ObjMap<unknown> {
    if (!isObjectType(parentType)) {
      throw executionError(
        `Cannot resolve selections on a non-object type (${parentType.toString()}).`,
      );
    }

    const results = Object.create(null);
    for (const [fieldName, fieldSelections] of Object.entries(selections)) {
      const fieldDef = parentType.getField(fieldName);
      if (fieldDef === undefined) {
        throw executionError(
          `Cannot query field "${fieldName}" on type "${parentType.name}".`,
        );
      }

      results[fieldName] = this.executeField(
        parentType,
        fieldDef,
        fieldSelections,
        source,
      );
    }
    return results;
  }

  executeField(
    parentType: ObjectType,
    fieldDef: Field,
    selections: SelectionSet,
    source: unknown,
  ): unknown {
    const result = this.resolveFieldValue(parentType, fieldDef, source);

    // Lazy values such as generators are consumed during completion.
    try {
      return this.completeValue(fieldDef.type, selections, result);
    } catch (rawError) {
      throw toFieldError(rawError, fieldDef.name);
    }
  }

  /**
   * Calls the field's resolver, or looks the value up on the source when the
   * field has none. Absent values come back as null.
   */
  resolveFieldValue(
    parentType: ObjectType,
    fieldDef: Field,
    source: unknown,
  ): unknown {
    const { name: fieldName, resolve } = fieldDef;
    const lookup = parentType.lookup ?? this._fieldLookup;

    try {
      const result =
        resolve != null ? resolve(source, {}) : lookup(source, fieldName);
      return result ?? null;
    } catch (rawError) {
      throw toFieldError(rawError, fieldName);
    }
  }

  /**
   * Objects with a sub-selection, and lists of them at any depth, are
   * executed against that selection. Everything else is handed to
   * `coerceValue`.
   *
   * Non-null wrappers do not change which path is taken: the wrapped type
   * decides, and the null check is applied to the completed value.
   */
  completeValue(
    returnType: Type,
    selections: SelectionSet,
    result: unknown,
  ): unknown {
    if (!hasSelections(selections)) {
      return coerceValue(result, returnType);
    }

    const nullableType = getNullableType(returnType);

    if (isObjectType(nullableType)) {
      const completed =
        result == null
          ? null
          : this.resolveSelections(selections, nullableType, result);
      return ensureNonNull(returnType, completed);
    }

    if (isListType(nullableType) && isObjectType(getNamedType(nullableType))) {
      const completed = this.completeObjectListValue(
        nullableType,
        selections,
        result,
      );
      return ensureNonNull(returnType, completed);
    }

    return coerceValue(result, returnType);
  }

  completeObjectListValue(
    returnType: ListType<Type>,
    selections: SelectionSet,
    result: unknown,
  ): Array<unknown> | null {
    if (result == null) {
      return null;
    }

    if (!isIterableObject(result)) {
      throw coercionError(
        `Value is not iterable for List type ${returnType.toString()}: ${inspect(
          result,
        )}`,
      );
    }

    const itemType = returnType.ofType;
    return Array.from(result, (item) =>
      this.completeValue(itemType, selections, item),
    );
  }
}

function hasSelections(selections: SelectionSet): boolean {
  return Object.keys(selections).length > 0;
}

function ensureNonNull<T>(returnType: Type, completed: T | null): T | null {
  if (completed === null && isNonNullType(returnType)) {
    throw nonNullViolationError(returnType);
  }
  return completed;
}

/**
 * Errors of this library's own kind pass through unchanged; anything else
 * is attributed to the field whose resolver raised it.
 */
function toFieldError(rawError: unknown, fieldName: string): GraphQLError {
  if (isGraphQLError(rawError)) {
    return rawError;
  }

  const error = toError(rawError);
  return createError(
    `Resolver for field "${fieldName}" threw an exception: ${error.message}`,
    ErrorCode.RESOLVER_ERROR,
    error,
  );
}

/**
 * If a field has no resolver and its object type no `lookup`, this lookup
 * is used. It tries, in order:
 *
 * 1. a key of a `Map` source,
 * 2. a property of the source that is not a function,
 * 3. a method of the source, called without arguments.
 *
 * Members inherited from `Object.prototype` are ignored. When nothing
 * applies the value is null.
 */
export const defaultFieldLookup: FieldLookup = function (source, fieldName) {
  if (source instanceof Map && source.has(fieldName)) {
    return source.get(fieldName);
  }

  if (!isObjectLike(source) || !hasProperty(source, fieldName)) {
    return null;
  }

  const property = source[fieldName];
  if (typeof property === 'function') {
    return property.call(source);
  }
  return property;
};

function hasProperty(source: object, name: string): boolean {
  return (
    Object.prototype.hasOwnProperty.call(source, name) ||
    (name in source && !(name in Object.prototype))
  );
}
