import { assert, literal, object, string } from '@metamask/superstruct';

import { BaseError } from '../BaseError.ts';
import { marshaledErrorSchema, ErrorCode } from '../constants.ts';
import type { ErrorOptionsWithStack, MarshaledCodedError } from '../types.ts';

/**
 * Thrown when a binding exists but the host object behind it does not carry
 * the expected type identity. Usually a configuration/code mismatch.
 */
export class BindingTypeMismatchError extends BaseError {
  constructor(
    name: string,
    expectedType: string,
    options?: ErrorOptionsWithStack,
  ) {
    super(
      ErrorCode.BindingTypeMismatch,
      `Binding "${name}" is not of type "${expectedType}".`,
      {
        ...options,
        data: { name, expectedType },
      },
    );
    harden(this);
  }

  /**
   * A superstruct struct for validating marshaled {@link BindingTypeMismatchError} instances.
   */
  public static struct = object({
    ...marshaledErrorSchema,
    code: literal(ErrorCode.BindingTypeMismatch),
    data: object({
      name: string(),
      expectedType: string(),
    }),
  });

  /**
   * Unmarshals a {@link MarshaledCodedError} into a {@link BindingTypeMismatchError}.
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
  ): BindingTypeMismatchError {
    assert(marshaledError, this.struct);
    return new BindingTypeMismatchError(
      marshaledError.data.name,
      marshaledError.data.expectedType,
      unmarshalErrorOptions(marshaledError),
    );
  }
}
harden(BindingTypeMismatchError);
