import { inspect } from 'graphql/jsutils/inspect';
import type { Maybe } from 'graphql/jsutils/Maybe';

import { schemaError } from '../error/createError';

import type { ObjectType, Type } from './definition';
import { isObjectType, TypeKind } from './definition';
import { specifiedScalarTypes } from './scalars';

export type OperationType = 'query' | 'mutation';

export interface SchemaConfig {
  query: Type;
  mutation?: Maybe<Type>;
}

/**
 * Test if the given value is a schema.
 */
export function isSchema(schema: unknown): schema is Schema {
  return Object.prototype.toString.call(schema) === '[object Schema]';
}

export function assertSchema(schema: unknown): Schema {
  if (!isSchema(schema)) {
    throw new Error(`Expected ${inspect(schema)} to be a schema.`);
  }
  return schema;
}

/**
 * Schema Definition
 *
 * A schema is created by supplying the root types of each type of operation,
 * query and mutation (optional). Every type reachable from the roots is
 * collected into a name-keyed type map once, at construction:
 *
 * ```ts
 * const MyAppSchema = new Schema({
 *   query: MyAppQueryRootType,
 *   mutation: MyAppMutationRootType,
 * });
 * ```
 *
 * Types are identified by name. When two descriptors share a name, the one
 * reached first is kept.
 */
export class Schema {
  private _queryType: ObjectType;
  private _mutationType: ObjectType | undefined;
  private _typeMap: Map<string, Type>;

  constructor(config: Readonly<SchemaConfig>) {
    const { query, mutation } = config;
    if (!isObjectType(query)) {
      throw schemaError('Query type must be an ObjectType.');
    }
    if (mutation != null && !isObjectType(mutation)) {
      throw schemaError('Mutation type must be an ObjectType.');
    }

    this._queryType = query;
    this._mutationType = mutation ?? undefined;
    this._typeMap = new Map();

    for (const scalarType of specifiedScalarTypes) {
      this._collectReferencedTypes(scalarType);
    }
    this._collectReferencedTypes(query);
    if (mutation != null) {
      this._collectReferencedTypes(mutation);
    }
  }

  get [Symbol.toStringTag]() {
    return 'Schema';
  }

  getQueryType(): ObjectType {
    return this._queryType;
  }

  getMutationType(): ObjectType | undefined {
    return this._mutationType;
  }

  getRootType(operation: string): ObjectType | undefined {
    switch (operation) {
      case 'query':
        return this.getQueryType();
      case 'mutation':
        return this.getMutationType();
    }
  }

  getType(name: string): Type | undefined {
    return this._typeMap.get(name);
  }

  getTypeMap(): ReadonlyMap<string, Type> {
    return this._typeMap;
  }

  private _collectReferencedTypes(type: Type): void {
    const typeName = type.toString();
    if (this._typeMap.has(typeName)) {
      return;
    }

    this._typeMap.set(typeName, type);

    switch (type.kind) {
      case TypeKind.OBJECT:
        for (const field of Object.values(type.getFields())) {
          this._collectReferencedTypes(field.type);
        }
        break;
      case TypeKind.LIST:
      case TypeKind.NON_NULL:
        this._collectReferencedTypes(type.ofType);
        break;
      case TypeKind.SCALAR:
        break;
    }
  }
}
