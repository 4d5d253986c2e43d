import { isObjectLike } from 'graphql/jsutils/isObjectLike';

import { field, listOf, nonNull, ObjectType } from '../type/definition';
import {
  BooleanScalar,
  FloatScalar,
  IDScalar,
  IntScalar,
  StringScalar,
} from '../type/scalars';
import { Schema } from '../type/schema';

export const alice = {
  id: '1',
  name: 'Alice',
  email: 'alice@example.test',
  age: 30,
  isActive: true,
};

export const bob = {
  id: '2',
  name: 'Bob',
  email: 'bob@example.test',
  age: 25,
  isActive: false,
};

export const UserType = new ObjectType({
  name: 'User',
  description: 'A person with an account.',
  fields: {
    id: field(nonNull(IDScalar), 'The user ID.'),
    name: field(StringScalar, 'The user name.'),
    email: field(nonNull(StringScalar), 'The user email.'),
    age: field(IntScalar, 'The user age.', null, (user) =>
      isObjectLike(user) ? user.age : null,
    ),
    isActive: field(BooleanScalar),
  },
});

export const ProductType = new ObjectType({
  name: 'Product',
  fields: {
    id: field(nonNull(IDScalar)),
    name: field(StringScalar),
    price: field(FloatScalar),
  },
});

export const QueryType = new ObjectType({
  name: 'Query',
  fields: {
    hello: { type: StringScalar, resolve: () => 'World' },
    user: {
      type: UserType,
      resolve: (rootValue) =>
        isObjectLike(rootValue) && rootValue.user !== undefined
          ? rootValue.user
          : alice,
    },
    users: { type: listOf(UserType), resolve: () => [alice, bob] },
    product: {
      type: ProductType,
      resolve: () => ({ id: 'P1', name: 'Desk lamp', price: 24.5 }),
    },
    nullableString: { type: StringScalar, resolve: () => null },
    nonNullableString: {
      type: nonNull(StringScalar),
      resolve: () => 'present',
    },
    nonNullableStringNullResolver: {
      type: nonNull(StringScalar),
      resolve: () => null,
    },
    listOfString: {
      type: listOf(StringScalar),
      resolve: () => ['apple', 'banana', 'cherry'],
    },
    listOfNonNullString: {
      type: listOf(nonNull(StringScalar)),
      resolve: () => ['one', 'two', 'three'],
    },
    listOfNonNullStringWithNull: {
      type: listOf(nonNull(StringScalar)),
      resolve: () => ['valid', null, 'another_valid'],
    },
    errorField: {
      type: StringScalar,
      resolve: () => {
        throw new Error('Something went wrong in the resolver!');
      },
    },
  },
});

export const MutationType = new ObjectType({
  name: 'Mutation',
  fields: {
    createUser: {
      type: UserType,
      resolve: () => ({
        id: 'new-123',
        name: 'New User',
        email: 'new@example.test',
        age: 22,
        isActive: true,
      }),
    },
    updateUserStatus: {
      type: nonNull(BooleanScalar),
      resolve: () => true,
    },
  },
});

export const testSchema = new Schema({
  query: QueryType,
  mutation: MutationType,
});
