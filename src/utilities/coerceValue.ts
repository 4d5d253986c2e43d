import type { GraphQLError } from 'graphql';
import { inspect } from 'graphql/jsutils/inspect';
import { isIterableObject } from 'graphql/jsutils/isIterableObject';
import { isObjectLike } from 'graphql/jsutils/isObjectLike';
import type { ObjMap } from 'graphql/jsutils/ObjMap';

import { coercionError, internalError } from '../error/createError';

import type { ObjectType, ScalarType, Type } from '../type/definition';
import { ScalarName, TypeKind } from '../type/definition';

/**
 * Shapes a resolved value into the form its declared type mandates.
 *
 * Null is accepted for every nullable type. A non-null type coerces its inner
 * type first and then rejects a null result, so a null deep inside a list of
 * non-null items fails the whole value. A list accepts a single non-list
 * value as a list of one.
 */
export function coerceValue(value: unknown, type: Type): unknown {
  switch (type.kind) {
    case TypeKind.NON_NULL: {
      const coercedValue = coerceValue(value, type.ofType);
      if (coercedValue === null) {
        throw nonNullViolationError(type);
      }
      return coercedValue;
    }
    case TypeKind.LIST: {
      if (value == null) {
        return null;
      }
      const itemType = type.ofType;
      if (isIterableObject(value)) {
        return Array.from(value, (itemValue) =>
          coerceValue(itemValue, itemType),
        );
      }
      return [coerceValue(value, itemType)];
    }
    case TypeKind.SCALAR:
      return coerceScalarValue(value, type);
    case TypeKind.OBJECT:
      return coerceObjectValue(value, type);
  }
  /* c8 ignore next 4 */
  // Not reachable. All possible type kinds have been considered.
  throw internalError(`Unsupported type kind for coercion: ${inspect(type)}`);
}

export function nonNullViolationError(type: Type): GraphQLError {
  return coercionError(
    `Cannot return null for non-nullable type ${type.toString()}.`,
  );
}

function coerceScalarValue(value: unknown, type: ScalarType): unknown {
  if (value == null) {
    return null;
  }

  switch (type.name) {
    case ScalarName.STRING:
    case ScalarName.ID:
      return String(value);
    case ScalarName.INT:
      return coerceInt(value);
    case ScalarName.FLOAT:
      return coerceFloat(value);
    case ScalarName.BOOLEAN:
      return coerceBoolean(value);
  }
  /* c8 ignore next 2 */
  // Only reachable through a scalar built outside of the named set.
  throw coercionError(`Unknown scalar type: ${String(type.name)}`);
}

const INTEGER_TEXT = /^-?\d+$/;

function coerceInt(value: unknown): number {
  if (typeof value === 'number' && Number.isSafeInteger(value)) {
    return value;
  }

  // Text must survive a round trip unchanged, which rules out "1.0", "01"
  // and "1abc".
  if (typeof value === 'string' && INTEGER_TEXT.test(value)) {
    const num = Number(value);
    if (Number.isSafeInteger(num) && String(num) === value) {
      return num;
    }
  }

  throw coercionError(`Value is not a valid Int: ${inspect(value)}`);
}

const FLOAT_TEXT = /^\s*[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?\s*$/;

function coerceFloat(value: unknown): number {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }

  if (typeof value === 'string' && FLOAT_TEXT.test(value)) {
    const num = Number(value);
    if (Number.isFinite(num)) {
      return num;
    }
  }

  throw coercionError(`Value is not a valid Float: ${inspect(value)}`);
}

const TRUE_TEXT = new Set(['1', 'true', 'on', 'yes']);
const FALSE_TEXT = new Set(['0', 'false', 'off', 'no', '']);

/**
 * Never fails: recognized textual forms map to their boolean, everything
 * else falls back to truthiness.
 */
function coerceBoolean(value: unknown): boolean {
  if (typeof value === 'string') {
    const text = value.trim().toLowerCase();
    if (TRUE_TEXT.has(text)) {
      return true;
    }
    if (FALSE_TEXT.has(text)) {
      return false;
    }
  }
  return Boolean(value);
}

/**
 * Values reaching here had no sub-selection applied, so the whole value is
 * copied into a plain result map.
 *
 * The copy is shallow and takes own enumerable members only: every instance
 * field (underscore-prefixed ones included) is kept, while getters and
 * methods on a prototype are not. A sub-selection reads the requested
 * fields instead.
 */
function coerceObjectValue(
  value: unknown,
  type: ObjectType,
): ObjMap<unknown> | null {
  if (value == null) {
    return null;
  }

  if (value instanceof Map) {
    const result = Object.create(null);
    for (const [key, entry] of value) {
      result[String(key)] = entry;
    }
    return result;
  }

  if (isObjectLike(value) && !Array.isArray(value)) {
    return Object.assign(Object.create(null), value);
  }

  throw coercionError(
    `Value cannot be coerced to object type ${type.name}: ${inspect(value)}`,
  );
}
