import { describe, it, expect } from 'vitest';

import { IncompatibleResponseError } from './IncompatibleResponseError.ts';
import { ErrorCode } from '../constants.ts';

describe('IncompatibleResponseError', () => {
  it('creates an IncompatibleResponseError with the correct properties', () => {
    const error = new IncompatibleResponseError('status 1000 out of range');
    expect(error).toBeInstanceOf(IncompatibleResponseError);
    expect(error.code).toBe(ErrorCode.IncompatibleResponse);
    expect(error.message).toBe(
      'Response cannot be represented: status 1000 out of range',
    );
    expect(error.data).toStrictEqual({ reason: 'status 1000 out of range' });
  });
});
