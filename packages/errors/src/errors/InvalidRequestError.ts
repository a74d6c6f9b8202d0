import { assert, literal, object, string } from '@metamask/superstruct';

import { BaseError } from '../BaseError.ts';
import { marshaledErrorSchema, ErrorCode } from '../constants.ts';
import type { ErrorOptionsWithStack, MarshaledCodedError } from '../types.ts';

export class InvalidRequestError extends BaseError {
  constructor(reason: string, options?: ErrorOptionsWithStack) {
    super(ErrorCode.InvalidRequest, `Invalid request: ${reason}`, {
      ...options,
      data: { reason },
    });
    harden(this);
  }

  /**
   * A superstruct struct for validating marshaled {@link InvalidRequestError} instances.
   */
  public static struct = object({
    ...marshaledErrorSchema,
    code: literal(ErrorCode.InvalidRequest),
    data: object({
      reason: string(),
    }),
  });

  /**
   * Unmarshals a {@link MarshaledCodedError} into an {@link InvalidRequestError}.
   *
   * @param marshaledError - The marshaled error to unmarshal.
   * @param unmarshalErrorOptions - The function to unmarshal the error options.
   * @returns The unmarshaled error.
   */
  public static unmarshal(
    marshaledError: MarshaledCodedError,
    unmarshalErrorOptions: (
      marshaledError: MarshaledCodedError,
    ) => ErrorOptionsWithStack,
  ): InvalidRequestError {
    assert(marshaledError, this.struct);
    return new InvalidRequestError(
      marshaledError.data.reason,
      unmarshalErrorOptions(marshaledError),
    );
  }
}
harden(InvalidRequestError);
