import { ErrorSentinel } from '../constants.ts';
import type { MarshaledError } from '../types.ts';
import { isCodedError } from '../utils/isCodedError.ts';

/**
 * Marshals an error into a JSON-serializable {@link MarshaledError}.
 * Non-error causes are stringified.
 *
 * @param error - The error to marshal.
 * @returns The marshaled error.
 */
export function marshalError(error: Error): MarshaledError {
  const output: MarshaledError = {
    [ErrorSentinel]: true,
    message: error.message,
  };
  if (error.cause !== undefined) {
    output.cause =
      error.cause instanceof Error
        ? marshalError(error.cause)
        : JSON.stringify(error.cause);
  }
  if (error.stack) {
    output.stack = error.stack;
  }
  if (isCodedError(error)) {
    output.code = error.code;
    if (error.data !== undefined) {
      output.data = error.data;
    }
  }
  return harden(output);
}
