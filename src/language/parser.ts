import { devAssert } from 'graphql/jsutils/devAssert';
import { inspect } from 'graphql/jsutils/inspect';

import { syntaxError } from '../error/createError';

import type { ParsedOperation, SelectionSet } from './ast';

const COMMENT = /\s*#.*$/gm;
const OPERATION_PREFIX = /^(query|mutation)\s*\{/i;
const NAME = /[A-Za-z0-9_]+/y;
// Commas are insignificant, as in the full query language.
const IGNORED = /[\s,]*/y;

/**
 * Given a query string, returns the operation type and the tree of requested
 * fields.
 *
 * Accepted forms are `query { ... }`, `mutation { ... }` and the bare
 * `{ ... }` shorthand for a query. Only field names and nested selection sets
 * are understood: arguments, aliases, fragments and directives are not, and
 * a field named twice at one level keeps its last selection.
 *
 * Throws a GraphQLError if a syntax error is encountered.
 */
export function parse(source: string): ParsedOperation {
  devAssert(
    typeof source === 'string',
    `Must provide Source. Received: ${inspect(source)}.`,
  );

  const body = source.replace(COMMENT, '').trim();
  if (body === '') {
    throw syntaxError('Empty query string.');
  }

  let operation: ParsedOperation['operation'] = 'query';
  let selectionBody = body;

  const prefix = OPERATION_PREFIX.exec(body);
  if (prefix) {
    operation = prefix[1].toLowerCase() === 'mutation' ? 'mutation' : 'query';
    // Keep the opening brace.
    selectionBody = body.slice(prefix[0].length - 1).trim();
  } else if (!body.startsWith('{')) {
    throw syntaxError(
      "Unsupported query format. Expected 'query {' or 'mutation {' or '{'.",
    );
  }

  if (countOf(selectionBody, '{') !== countOf(selectionBody, '}')) {
    throw syntaxError('Mismatched curly braces in query.');
  }

  return { operation, selections: parseSelectionSet(selectionBody) };
}

/**
 * Parses the fields of a single selection set, with or without its
 * surrounding braces, descending into nested selection sets.
 *
 * @internal
 */
export function parseSelectionSet(text: string): SelectionSet {
  let body = text.trim();
  if (body.startsWith('{') && body.endsWith('}')) {
    body = body.slice(1, -1).trim();
  }

  const selections: { [fieldName: string]: SelectionSet } =
    Object.create(null);
  let cursor = skipIgnored(body, 0);

  while (cursor < body.length) {
    NAME.lastIndex = cursor;
    const name = NAME.exec(body);
    if (!name) {
      throw syntaxError(
        `Unexpected token near: ${body.slice(cursor, cursor + 20)}...`,
      );
    }

    const fieldName = name[0];
    cursor = skipIgnored(body, cursor + fieldName.length);

    if (body[cursor] === '{') {
      const end = findClosingBrace(body, cursor);
      if (end === -1) {
        throw syntaxError(`Unbalanced braces in field '${fieldName}'.`);
      }
      selections[fieldName] = parseSelectionSet(body.slice(cursor, end + 1));
      cursor = skipIgnored(body, end + 1);
    } else {
      selections[fieldName] = Object.create(null);
    }
  }

  return selections;
}

function skipIgnored(body: string, start: number): number {
  IGNORED.lastIndex = start;
  IGNORED.exec(body);
  return IGNORED.lastIndex;
}

/**
 * Returns the index of the brace closing the one at `start`, or -1.
 */
function findClosingBrace(body: string, start: number): number {
  let depth = 0;
  for (let position = start; position < body.length; ++position) {
    const char = body[position];
    if (char === '{') {
      ++depth;
    } else if (char === '}') {
      --depth;
      if (depth === 0) {
        return position;
      }
    }
  }
  return -1;
}

function countOf(text: string, char: string): number {
  let count = 0;
  for (const c of text) {
    if (c === char) {
      ++count;
    }
  }
  return count;
}
