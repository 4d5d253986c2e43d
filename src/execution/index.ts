export type { ExecutorArgs } from './executor';
export { Executor, defaultFieldLookup } from './executor';

export type { ExecutionArgs, ExecutionResult } from './execute';
export { execute } from './execute';
