import type { GraphQLError } from 'graphql';
import type { Maybe } from 'graphql/jsutils/Maybe';
import type { ObjMap } from 'graphql/jsutils/ObjMap';

import { isGraphQLError } from '../error/isGraphQLError';

import { parse } from '../language/parser';

import type { FieldLookup } from '../type/definition';
import type { Schema } from '../type/schema';

import { Executor } from './executor';

export interface ExecutionArgs {
  schema: Schema;
  source: string;
  rootValue?: unknown;
  fieldLookup?: Maybe<FieldLookup>;
}

/**
 * The result of execution.
 *
 *   - `data` is the result tree of a successful execution.
 *   - `errors` holds the single error that aborted the request.
 *
 * A result never carries both.
 */
export interface ExecutionResult<TData = ObjMap<unknown>> {
  errors?: ReadonlyArray<GraphQLError>;
  data?: TData;
}

/**
 * Parses and executes `source` in one step.
 *
 * Query failures of any kind (syntax, lookup, resolver or coercion) are
 * returned in `errors`. Anything that is not a GraphQLError signals misuse
 * of the API, such as a missing schema, and is thrown.
 */
export function execute(args: ExecutionArgs): ExecutionResult {
  const { schema, source, rootValue, fieldLookup } = args;

  try {
    const executor = new Executor({ schema, fieldLookup });
    return { data: executor.executeOperation(parse(source), rootValue) };
  } catch (error) {
    if (isGraphQLError(error)) {
      return { errors: [error] };
    }
    throw error;
  }
}
