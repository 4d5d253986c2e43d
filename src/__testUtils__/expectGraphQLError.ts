import { expect } from 'chai';
import type { GraphQLError } from 'graphql';

import type { ErrorCode } from '../error/errorCodes';
import { isGraphQLError } from '../error/isGraphQLError';

export function expectGraphQLError(fn: () => unknown) {
  return {
    toThrow(message: string, code?: ErrorCode): GraphQLError {
      let caughtError: unknown;

      try {
        fn();
      } catch (error) {
        caughtError = error;
      }

      if (!isGraphQLError(caughtError)) {
        throw new Error(
          `Expected a GraphQLError to be thrown, got: ${String(caughtError)}`,
        );
      }

      expect(caughtError.message).to.equal(message);
      if (code !== undefined) {
        expect(caughtError.extensions.code).to.equal(code);
      }
      return caughtError;
    },
  };
}
