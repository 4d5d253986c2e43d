import { GraphQLError } from 'graphql';
import type { Maybe } from 'graphql/jsutils/Maybe';

import { ErrorCode } from './errorCodes';

export function createError(
  message: string,
  code: ErrorCode,
  originalError?: Maybe<Error>,
): GraphQLError {
  return new GraphQLError(message, {
    originalError,
    extensions: { code },
  });
}

export function schemaError(message: string): GraphQLError {
  return createError(message, ErrorCode.SCHEMA_VALIDATION);
}

export function syntaxError(message: string): GraphQLError {
  return createError(message, ErrorCode.SYNTAX_ERROR);
}

export function executionError(message: string): GraphQLError {
  return createError(message, ErrorCode.EXECUTION_ERROR);
}

export function coercionError(message: string): GraphQLError {
  return createError(message, ErrorCode.COERCION_ERROR);
}

export function internalError(message: string): GraphQLError {
  return createError(message, ErrorCode.INTERNAL_ERROR);
}
