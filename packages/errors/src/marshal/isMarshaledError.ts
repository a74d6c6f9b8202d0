import { is } from '@metamask/superstruct';

import { MarshaledErrorStruct } from '../constants.ts';
import type { MarshaledCodedError, MarshaledError } from '../types.ts';
import { isErrorCode } from '../utils/isCodedError.ts';

/**
 * Checks if a value is a {@link MarshaledError}.
 *
 * @param value - The value to check.
 * @returns Whether the value is a {@link MarshaledError}.
 */
export function isMarshaledError(value: unknown): value is MarshaledError {
  return is(value, MarshaledErrorStruct);
}

/**
 * Checks if a value is a {@link MarshaledCodedError}.
 *
 * @param value - The value to check.
 * @returns Whether the value is a {@link MarshaledCodedError}.
 */
export function isMarshaledCodedError(
  value: unknown,
): value is MarshaledCodedError {
  return (
    isMarshaledError(value) &&
    isErrorCode(value.code) &&
    value.data !== undefined
  );
}
