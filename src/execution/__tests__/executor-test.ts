import { expect } from 'chai';
import { describe, it } from 'mocha';

import { expectGraphQLError } from '../../__testUtils__/expectGraphQLError';
import {
  alice,
  bob,
  QueryType,
  testSchema,
} from '../../__testUtils__/testSchema';

import { ErrorCode } from '../../error/errorCodes';

import { parse } from '../../language/parser';

import { Schema } from '../../type/schema';

import { Executor } from '../executor';

const executor = new Executor({ schema: testSchema });

function executeQuery(source: string, rootValue?: unknown) {
  return executor.executeOperation(parse(source), rootValue);
}

describe('Executor', () => {
  describe('queries', () => {
    it('resolves a scalar field', () => {
      expect(executeQuery('{ hello }')).to.deep.equal({ hello: 'World' });
    });

    it('resolves only the requested fields of an object', () => {
      expect(executeQuery('{ user { name } }')).to.deep.equal({
        user: { name: 'Alice' },
      });
    });

    it('resolves every requested field of an object', () => {
      expect(
        executeQuery('{ user { id name email age isActive } }'),
      ).to.deep.equal({
        user: {
          id: '1',
          name: 'Alice',
          email: 'alice@example.test',
          age: 30,
          isActive: true,
        },
      });
    });

    it('resolves several root fields in selection order', () => {
      const result = executeQuery('{ product { price name } hello }');

      expect(JSON.stringify(result)).to.equal(
        '{"product":{"price":24.5,"name":"Desk lamp"},"hello":"World"}',
      );
    });

    it('resolves a list of objects against the sub-selection', () => {
      expect(executeQuery('{ users { id name } }')).to.deep.equal({
        users: [
          { id: '1', name: 'Alice' },
          { id: '2', name: 'Bob' },
        ],
      });
    });

    it('resolves lists of scalars', () => {
      expect(
        executeQuery('{ listOfString listOfNonNullString }'),
      ).to.deep.equal({
        listOfString: ['apple', 'banana', 'cherry'],
        listOfNonNullString: ['one', 'two', 'three'],
      });
    });

    it('passes the root value to root resolvers', () => {
      const rootValue = { user: { ...bob, name: 'Charlie' } };

      expect(executeQuery('{ user { name } }', rootValue)).to.deep.equal({
        user: { name: 'Charlie' },
      });
    });

    it('runs custom resolvers of nested fields', () => {
      expect(executeQuery('{ user { age } }', { user: bob })).to.deep.equal({
        user: { age: 25 },
      });
    });

    it('returns null for a nullable field resolving to null', () => {
      expect(executeQuery('{ nullableString }')).to.deep.equal({
        nullableString: null,
      });
    });

    it('returns null for an object that resolves to null without descending', () => {
      expect(executeQuery('{ user { name } }', { user: null })).to.deep.equal({
        user: null,
      });
    });

    it('returns a non-null value', () => {
      expect(executeQuery('{ nonNullableString }')).to.deep.equal({
        nonNullableString: 'present',
      });
    });

    it('returns the same result on every execution', () => {
      const source = '{ hello user { name } users { id } }';

      expect(executeQuery(source)).to.deep.equal(executeQuery(source));
    });

    it('mirrors the selection shape exactly', () => {
      const result = executeQuery('{ user { email name } users { name } }');

      expect(Object.keys(result)).to.deep.equal(['user', 'users']);
      expect(result).to.deep.equal({
        user: { email: 'alice@example.test', name: 'Alice' },
        users: [{ name: 'Alice' }, { name: 'Bob' }],
      });
    });

    it('copies an object without a sub-selection as a whole', () => {
      expect(executeQuery('{ product }')).to.deep.equal({
        product: { id: 'P1', name: 'Desk lamp', price: 24.5 },
      });
    });
  });

  describe('mutations', () => {
    it('resolves a scalar mutation field', () => {
      expect(executeQuery('mutation { updateUserStatus }')).to.deep.equal({
        updateUserStatus: true,
      });
    });

    it('resolves an object mutation field', () => {
      expect(
        executeQuery('mutation { createUser { id name } }'),
      ).to.deep.equal({
        createUser: { id: 'new-123', name: 'New User' },
      });
    });

    it('fails when the schema has no mutation type', () => {
      const queryOnly = new Executor({
        schema: new Schema({ query: QueryType }),
      });

      expectGraphQLError(() =>
        queryOnly.executeOperation(parse('mutation { updateUserStatus }')),
      ).toThrow(
        'Schema does not define a Mutation type.',
        ErrorCode.EXECUTION_ERROR,
      );
    });
  });

  describe('errors', () => {
    it('fails when a non-null field resolves to null', () => {
      expectGraphQLError(() =>
        executeQuery('{ nonNullableStringNullResolver }'),
      ).toThrow(
        'Cannot return null for non-nullable type String!.',
        ErrorCode.COERCION_ERROR,
      );
    });

    it('fails on a null item in a list of non-null items', () => {
      expectGraphQLError(() =>
        executeQuery('{ listOfNonNullStringWithNull }'),
      ).toThrow('Cannot return null for non-nullable type String!.');
    });

    it('fails on a root field that does not exist', () => {
      expectGraphQLError(() => executeQuery('{ nonExistentField }')).toThrow(
        'Cannot query field "nonExistentField" on type "Query".',
        ErrorCode.EXECUTION_ERROR,
      );
    });

    it('fails on a nested field that does not exist', () => {
      expectGraphQLError(() =>
        executeQuery('{ user { name invalidField } }'),
      ).toThrow('Cannot query field "invalidField" on type "User".');
    });

    it('aborts on the first failing field', () => {
      expectGraphQLError(() =>
        executeQuery('{ hello nonExistentField nonNullableStringNullResolver }'),
      ).toThrow('Cannot query field "nonExistentField" on type "Query".');
    });

    it('wraps errors thrown by a resolver', () => {
      const error = expectGraphQLError(() =>
        executeQuery('{ errorField }'),
      ).toThrow(
        'Resolver for field "errorField" threw an exception: Something went wrong in the resolver!',
        ErrorCode.RESOLVER_ERROR,
      );

      expect(error.originalError?.message).to.equal(
        'Something went wrong in the resolver!',
      );
    });

    it('fails on a non-null nested field resolving to null', () => {
      expectGraphQLError(() =>
        executeQuery('{ user { id } }', { user: { name: 'Nobody' } }),
      ).toThrow('Cannot return null for non-nullable type ID!.');
    });

    it('rejects an unsupported operation type', () => {
      expectGraphQLError(() =>
        executor.execute('subscription', { hello: {} }),
      ).toThrow(
        'Unsupported operation type: subscription',
        ErrorCode.EXECUTION_ERROR,
      );
    });

    it('refuses to resolve selections on a non-object type', () => {
      expectGraphQLError(() =>
        executor.resolveSelections(
          { length: {} },
          testSchema.getType('String') ?? testSchema.getQueryType(),
          'text',
        ),
      ).toThrow(
        'Cannot resolve selections on a non-object type (String).',
        ErrorCode.EXECUTION_ERROR,
      );
    });
  });

  it('requires a schema', () => {
    expect(
      () => new Executor(JSON.parse('{ "schema": { "query": null } }')),
    ).to.throw('Expected { query: null } to be a schema.');
  });

  it('holds no state between executions', () => {
    expectGraphQLError(() => executeQuery('{ errorField }')).toThrow(
      'Resolver for field "errorField" threw an exception: Something went wrong in the resolver!',
    );
    expect(executeQuery('{ user { name } }')).to.deep.equal({
      user: { name: alice.name },
    });
  });
});
