import { errorClasses } from '../errors/index.ts';
import type {
  ErrorOptionsWithStack,
  MarshaledCodedError,
  MarshaledError,
} from '../types.ts';
import { isMarshaledCodedError } from './isMarshaledError.ts';

/**
 * Unmarshals a {@link MarshaledError} into an `Error`. Coded errors are
 * restored to their own classes.
 *
 * @param marshaledError - The marshaled error to unmarshal.
 * @returns The unmarshaled error.
 */
export function unmarshalError(marshaledError: MarshaledError): Error {
  if (isMarshaledCodedError(marshaledError)) {
    return errorClasses[marshaledError.code].unmarshal(
      marshaledError,
      unmarshalErrorOptions,
    );
  }

  const { stack, ...options } = unmarshalErrorOptions(marshaledError);
  const error = new Error(marshaledError.message, options);
  if (stack !== undefined) {
    error.stack = stack;
  }
  return error;
}

/**
 * Gets the error options from a marshaled error.
 *
 * @param marshaledError - The marshaled error to get the options from.
 * @returns The error options.
 */
export function unmarshalErrorOptions(
  marshaledError: MarshaledError | MarshaledCodedError,
): ErrorOptionsWithStack {
  const output: ErrorOptionsWithStack = {};

  if (marshaledError.stack) {
    output.stack = marshaledError.stack;
  }

  if (marshaledError.cause) {
    output.cause =
      typeof marshaledError.cause === 'string'
        ? marshaledError.cause
        : unmarshalError(marshaledError.cause);
  }

  return output;
}
