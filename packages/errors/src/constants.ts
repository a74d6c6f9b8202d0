import {
  lazy,
  literal,
  object,
  optional,
  string,
  union,
} from '@metamask/superstruct';
import type { Struct } from '@metamask/superstruct';
import { JsonStruct } from '@metamask/utils';

import type { MarshaledError } from './types.ts';

/**
 * Codes for every failure the binding core can report.
 */
export const ErrorCode = {
  BindingMissing: 'BINDING_MISSING',
  BindingTypeMismatch: 'BINDING_TYPE_MISMATCH',
  InvalidRequest: 'INVALID_REQUEST',
  Transport: 'TRANSPORT_ERROR',
  IncompatibleResponse: 'INCOMPATIBLE_RESPONSE',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * A sentinel value used to identify marshaled errors.
 */
export const ErrorSentinel = '@@MARSHALED_ERROR';

/**
 * Fields shared by every marshaled error. Individual error classes narrow
 * `code` and `data`.
 */
export const marshaledErrorSchema = {
  [ErrorSentinel]: literal(true),
  message: string(),
  code: optional(string()),
  data: optional(JsonStruct),
  stack: optional(string()),
  cause: optional(
    union([string(), lazy((): Struct<MarshaledError> => MarshaledErrorStruct)]),
  ),
};

/**
 * Struct to validate marshaled errors.
 */
export const MarshaledErrorStruct = object(
  marshaledErrorSchema,
) as Struct<MarshaledError>;
