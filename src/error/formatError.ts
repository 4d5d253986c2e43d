import type { GraphQLError, GraphQLFormattedError } from 'graphql';

export interface FormatErrorOptions {
  /**
   * Adds the location of the throw site and the stack trace. Meant for
   * development builds; hosts decide when to turn it on.
   */
  debug?: boolean;
}

export interface DebugInfo {
  file?: string;
  line?: number;
  trace: Array<string>;
}

export interface FormattedError extends GraphQLFormattedError {
  debug?: DebugInfo;
}

const FRAME_LOCATION = /\(?([^\s()]+):(\d+):\d+\)?$/;

/**
 * Converts an error into the `{ message, extensions? }` wire shape.
 */
export function formatError(
  error: GraphQLError,
  options: FormatErrorOptions = {},
): FormattedError {
  const formatted: FormattedError = error.toJSON();

  if (options.debug === true) {
    formatted.debug = getDebugInfo(error.stack);
  }

  return formatted;
}

function getDebugInfo(stack: string | undefined): DebugInfo {
  // The first line repeats the message.
  const trace = (stack ?? '')
    .split('\n')
    .slice(1)
    .map((line) => line.trim())
    .filter((line) => line !== '');

  const debug: DebugInfo = { trace };
  for (const frame of trace) {
    const match = FRAME_LOCATION.exec(frame);
    if (match) {
      debug.file = match[1];
      debug.line = Number(match[2]);
      break;
    }
  }
  return debug;
}
