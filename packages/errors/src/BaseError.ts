import type { Json } from '@metamask/utils';

import type { ErrorCode } from './constants.ts';
import type { CodedError, ErrorOptionsWithStack } from './types.ts';

export type BaseErrorOptions = ErrorOptionsWithStack & {
  data?: Json;
};

export class BaseError extends Error implements CodedError {
  public readonly code: ErrorCode;

  public data: Json | undefined;

  constructor(code: ErrorCode, message: string, options: BaseErrorOptions = {}) {
    const { data, cause, stack } = options;
    super(message, { cause });
    this.name = this.constructor.name;
    this.code = code;
    this.data = data;
    if (stack !== undefined) {
      this.stack = stack;
    }
  }
}
harden(BaseError);
