import { coercionError } from '../error/createError';

import { ScalarName, ScalarType } from './definition';

export const StringScalar = new ScalarType({
  name: ScalarName.STRING,
  description:
    'The `String` scalar type represents textual data, represented as UTF-8 character sequences.',
});

export const IntScalar = new ScalarType({
  name: ScalarName.INT,
  description:
    'The `Int` scalar type represents a signed whole number. It is often used for unique identifiers or counts.',
});

export const BooleanScalar = new ScalarType({
  name: ScalarName.BOOLEAN,
  description: 'The `Boolean` scalar type represents `true` or `false`.',
});

export const FloatScalar = new ScalarType({
  name: ScalarName.FLOAT,
  description:
    'The `Float` scalar type represents a signed double-precision fractional value.',
});

export const IDScalar = new ScalarType({
  name: ScalarName.ID,
  description:
    'The `ID` scalar type represents a unique identifier. It is serialized as a String.',
});

export const specifiedScalarTypes: ReadonlyArray<ScalarType> = Object.freeze([
  StringScalar,
  IntScalar,
  BooleanScalar,
  FloatScalar,
  IDScalar,
]);

/**
 * Returns the built-in scalar with the given name.
 */
export function getScalarType(name: string): ScalarType {
  const scalarType = specifiedScalarTypes.find((type) => type.name === name);
  if (scalarType === undefined) {
    throw coercionError(`Unknown scalar type: ${name}`);
  }
  return scalarType;
}
