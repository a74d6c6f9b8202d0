import { assert, literal, object, string } from '@metamask/superstruct';

import { BaseError } from '../BaseError.ts';
import { marshaledErrorSchema, ErrorCode } from '../constants.ts';
import type { ErrorOptionsWithStack, MarshaledCodedError } from '../types.ts';

export class IncompatibleResponseError extends BaseError {
  constructor(reason: string, options?: ErrorOptionsWithStack) {
    super(
      ErrorCode.IncompatibleResponse,
      `Response cannot be represented: ${reason}`,
      {
        ...options,
        data: { reason },
      },
    );
    harden(this);
  }

  /**
   * A superstruct struct for validating marshaled {@link IncompatibleResponseError} instances.
   */
  public static struct = object({
    ...marshaledErrorSchema,
    code: literal(ErrorCode.IncompatibleResponse),
    data: object({
      reason: string(),
    }),
  });

  /**
   * Unmarshals a {@link MarshaledCodedError} into an {@link IncompatibleResponseError}.
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
  ): IncompatibleResponseError {
    assert(marshaledError, this.struct);
    return new IncompatibleResponseError(
      marshaledError.data.reason,
      unmarshalErrorOptions(marshaledError),
    );
  }
}
harden(IncompatibleResponseError);
