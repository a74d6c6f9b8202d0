import type { BindingMissingError } from '../errors/BindingMissingError.ts';
import type { BindingTypeMismatchError } from '../errors/BindingTypeMismatchError.ts';
import type { IncompatibleResponseError } from '../errors/IncompatibleResponseError.ts';
import type { InvalidRequestError } from '../errors/InvalidRequestError.ts';
import type { TransportError } from '../errors/TransportError.ts';
import { ErrorCode } from '../constants.ts';
import { isCodedError } from './isCodedError.ts';

export type BindingError = BindingMissingError | BindingTypeMismatchError;

export type FetchError =
  | InvalidRequestError
  | TransportError
  | IncompatibleResponseError;

const bindingErrorCodes: readonly string[] = [
  ErrorCode.BindingMissing,
  ErrorCode.BindingTypeMismatch,
];

const fetchErrorCodes: readonly string[] = [
  ErrorCode.InvalidRequest,
  ErrorCode.Transport,
  ErrorCode.IncompatibleResponse,
];

/**
 * Type guard for failures raised while resolving a binding.
 *
 * @param error - The error to check.
 * @returns True if the error has a binding error code.
 */
export const isBindingError = (error: unknown): error is BindingError =>
  isCodedError(error) && bindingErrorCodes.includes(error.code);

/**
 * Type guard for failures raised by a fetch through a binding, including
 * response adaptation.
 *
 * @param error - The error to check.
 * @returns True if the error has a fetch error code.
 */
export const isFetchError = (error: unknown): error is FetchError =>
  isCodedError(error) && fetchErrorCodes.includes(error.code);
