import type { OperationType } from '../type/schema';

/**
 * The requested fields of one level, keyed by field name. An empty nested
 * selection set marks a leaf.
 */
export interface SelectionSet {
  readonly [fieldName: string]: SelectionSet;
}

export interface ParsedOperation {
  readonly operation: OperationType;
  readonly selections: SelectionSet;
}
