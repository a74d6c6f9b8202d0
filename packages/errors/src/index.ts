export type {
  CodedError,
  ErrorOptionsWithStack,
  MarshaledError,
  MarshaledCodedError,
} from './types.ts';
export type { BindingError, FetchError } from './utils/guards.ts';
export { ErrorCode, ErrorSentinel } from './constants.ts';
export { BaseError } from './BaseError.ts';
export { BindingMissingError } from './errors/BindingMissingError.ts';
export { BindingTypeMismatchError } from './errors/BindingTypeMismatchError.ts';
export { InvalidRequestError } from './errors/InvalidRequestError.ts';
export { TransportError } from './errors/TransportError.ts';
export { IncompatibleResponseError } from './errors/IncompatibleResponseError.ts';
export { toError } from './utils/toError.ts';
export { isCodedError, isErrorCode } from './utils/isCodedError.ts';
export { isBindingError, isFetchError } from './utils/guards.ts';
export { marshalError } from './marshal/marshalError.ts';
export { unmarshalError } from './marshal/unmarshalError.ts';
export {
  isMarshaledError,
  isMarshaledCodedError,
} from './marshal/isMarshaledError.ts';
