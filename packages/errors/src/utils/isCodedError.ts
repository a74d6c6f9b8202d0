import { ErrorCode } from '../constants.ts';
import type { CodedError } from '../types.ts';

const errorCodes: readonly string[] = Object.values(ErrorCode);

/**
 * Checks if a value is one of the known error codes.
 *
 * @param value - The value to check.
 * @returns Whether the value is an {@link ErrorCode}.
 */
export const isErrorCode = (value: unknown): value is ErrorCode =>
  typeof value === 'string' && errorCodes.includes(value);

/**
 * Checks if an error carries one of the known error codes. Uses the code
 * rather than `instanceof` so that errors from another copy of this package
 * are recognized.
 *
 * @param error - The error to check.
 * @returns Whether the error is a {@link CodedError}.
 */
export function isCodedError(error: unknown): error is CodedError {
  return error instanceof Error && 'code' in error && isErrorCode(error.code);
}
