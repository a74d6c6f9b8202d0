import { assert, literal, object, string } from '@metamask/superstruct';

import { BaseError } from '../BaseError.ts';
import { marshaledErrorSchema, ErrorCode } from '../constants.ts';
import type { ErrorOptionsWithStack, MarshaledCodedError } from '../types.ts';

/**
 * Thrown when the host's network or handshake layer fails. An HTTP error
 * status is not a transport failure.
 */
export class TransportError extends BaseError {
  constructor(
    destination: string,
    detail: string,
    options?: ErrorOptionsWithStack,
  ) {
    super(ErrorCode.Transport, `Fetch to ${destination} failed: ${detail}`, {
      ...options,
      data: { destination, detail },
    });
    harden(this);
  }

  /**
   * A superstruct struct for validating marshaled {@link TransportError} instances.
   */
  public static struct = object({
    ...marshaledErrorSchema,
    code: literal(ErrorCode.Transport),
    data: object({
      destination: string(),
      detail: string(),
    }),
  });

  /**
   * Unmarshals a {@link MarshaledCodedError} into a {@link TransportError}.
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
  ): TransportError {
    assert(marshaledError, this.struct);
    return new TransportError(
      marshaledError.data.destination,
      marshaledError.data.detail,
      unmarshalErrorOptions(marshaledError),
    );
  }
}
harden(TransportError);
