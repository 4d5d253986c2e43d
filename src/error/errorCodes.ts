/**
 * Stored under `extensions.code` of every error raised by this library.
 */
export enum ErrorCode {
  /** A schema root has the wrong kind. */
  SCHEMA_VALIDATION = 'SCHEMA_VALIDATION',
  /** The query text could not be parsed. */
  SYNTAX_ERROR = 'SYNTAX_ERROR',
  /** Operation or field lookup failed during execution. */
  EXECUTION_ERROR = 'EXECUTION_ERROR',
  /** A resolver or accessor threw a foreign error. */
  RESOLVER_ERROR = 'RESOLVER_ERROR',
  /** A resolved value does not fit its declared type. */
  COERCION_ERROR = 'COERCION_ERROR',
  /** The type system reached a state it cannot represent. */
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}
