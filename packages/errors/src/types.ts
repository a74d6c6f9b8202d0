import type { Json } from '@metamask/utils';

import type { ErrorCode, ErrorSentinel } from './constants.ts';

/**
 * An error carrying one of the {@link ErrorCode} values and optional
 * JSON-serializable data.
 */
export type CodedError = Error & {
  code: ErrorCode;
  data?: Json | undefined;
};

export type ErrorOptionsWithStack = {
  cause?: unknown;
  stack?: string;
};

export type MarshaledError = {
  [ErrorSentinel]: true;
  message: string;
  code?: string;
  data?: Json;
  stack?: string;
  cause?: MarshaledError | string;
};

export type MarshaledCodedError = Omit<MarshaledError, 'code' | 'data'> & {
  code: ErrorCode;
  data: Json;
};
