export { ErrorCode } from './errorCodes';

export {
  createError,
  schemaError,
  syntaxError,
  executionError,
  coercionError,
  internalError,
} from './createError';

export { isGraphQLError } from './isGraphQLError';

export type {
  FormatErrorOptions,
  FormattedError,
  DebugInfo,
} from './formatError';
export { formatError } from './formatError';
