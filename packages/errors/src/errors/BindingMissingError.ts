import { assert, literal, object, string } from '@metamask/superstruct';

import { BaseError } from '../BaseError.ts';
import { marshaledErrorSchema, ErrorCode } from '../constants.ts';
import type { ErrorOptionsWithStack, MarshaledCodedError } from '../types.ts';

export class BindingMissingError extends BaseError {
  constructor(name: string, options?: ErrorOptionsWithStack) {
    super(
      ErrorCode.BindingMissing,
      `Binding "${name}" is not defined in the environment.`,
      {
        ...options,
        data: { name },
      },
    );
    harden(this);
  }

  /**
   * A superstruct struct for validating marshaled {@link BindingMissingError} instances.
   */
  public static struct = object({
    ...marshaledErrorSchema,
    code: literal(ErrorCode.BindingMissing),
    data: object({
      name: string(),
    }),
  });

  /**
   * Unmarshals a {@link MarshaledCodedError} into a {@link BindingMissingError}.
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
  ): BindingMissingError {
    assert(marshaledError, this.struct);
    return new BindingMissingError(
      marshaledError.data.name,
      unmarshalErrorOptions(marshaledError),
    );
  }
}
harden(BindingMissingError);
