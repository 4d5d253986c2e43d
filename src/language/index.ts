export type { SelectionSet, ParsedOperation } from './ast';

export { parse, parseSelectionSet } from './parser';
