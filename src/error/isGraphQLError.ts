import type { GraphQLError } from 'graphql';

/**
 * Recognizes errors of this library's own kind. Errors that pass this check
 * are never re-wrapped when they cross a field boundary.
 */
export function isGraphQLError(error: unknown): error is GraphQLError {
  return Object.prototype.toString.call(error) === '[object GraphQLError]';
}
