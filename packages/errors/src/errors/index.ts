import { BindingMissingError } from './BindingMissingError.ts';
import { BindingTypeMismatchError } from './BindingTypeMismatchError.ts';
import { IncompatibleResponseError } from './IncompatibleResponseError.ts';
import { InvalidRequestError } from './InvalidRequestError.ts';
import { TransportError } from './TransportError.ts';
import { ErrorCode } from '../constants.ts';

export const errorClasses = {
  [ErrorCode.BindingMissing]: BindingMissingError,
  [ErrorCode.BindingTypeMismatch]: BindingTypeMismatchError,
  [ErrorCode.InvalidRequest]: InvalidRequestError,
  [ErrorCode.Transport]: TransportError,
  [ErrorCode.IncompatibleResponse]: IncompatibleResponseError,
} as const;
