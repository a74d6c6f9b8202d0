import { Fetcher, KVNamespace, respondWith } from '@edgebind/test-utils';
import { describe, expect, it, vi } from 'vitest';

import { isInstanceOfType, makeTypeVerifier } from './verifier.ts';

describe('isInstanceOfType', () => {
  it('matches the class of a host object', () => {
    expect(isInstanceOfType(new Fetcher(respondWith()), 'Fetcher')).toBe(true);
    expect(isInstanceOfType(new KVNamespace(), 'KVNamespace')).toBe(true);
  });

  it('matches a class further up the prototype chain', () => {
    class CertificateFetcher extends Fetcher {}
    expect(
      isInstanceOfType(new CertificateFetcher(respondWith()), 'Fetcher'),
    ).toBe(true);
  });

  it('rejects objects of another class', () => {
    expect(isInstanceOfType(new KVNamespace(), 'Fetcher')).toBe(false);
  });

  it('compares type names case-sensitively', () => {
    expect(isInstanceOfType(new Fetcher(respondWith()), 'fetcher')).toBe(
      false,
    );
  });

  it('rejects a look-alike plain object', () => {
    const lookAlike = { fetch: vi.fn() };
    expect(isInstanceOfType(lookAlike, 'Fetcher')).toBe(false);
  });

  it.each([
    ['null', null],
    ['undefined', undefined],
    ['a string', 'Fetcher'],
    ['a number', 42],
    ['a null-prototype object', Object.create(null)],
  ])('rejects %s', (_, value) => {
    expect(isInstanceOfType(value, 'Fetcher')).toBe(false);
  });

  it('rejects a proxy whose prototype lookup throws', () => {
    const hostile = new Proxy(
      {},
      {
        getPrototypeOf: () => {
          throw new Error('no introspection');
        },
      },
    );
    expect(isInstanceOfType(hostile, 'Fetcher')).toBe(false);
  });

  it('does not run getters on the value', () => {
    const getter = vi.fn(() => 'Fetcher');
    const value = Object.create(
      Object.create(Object.prototype, { constructor: { get: getter } }),
    );
    expect(isInstanceOfType(value, 'Fetcher')).toBe(false);
    expect(getter).not.toHaveBeenCalled();
  });
});

describe('makeTypeVerifier', () => {
  it('returns the result of the check', () => {
    const check = vi.fn(() => true);
    const verify = makeTypeVerifier(check);

    expect(verify('value', 'Type')).toBe(true);
    expect(check).toHaveBeenCalledWith('value', 'Type');
  });

  it('turns a throwing check into false', () => {
    const verify = makeTypeVerifier(() => {
      throw new Error('host introspection failed');
    });
    expect(verify({}, 'Fetcher')).toBe(false);
  });
});
