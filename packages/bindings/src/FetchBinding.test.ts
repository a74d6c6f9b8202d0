import {
  IncompatibleResponseError,
  InvalidRequestError,
  TransportError,
} from '@edgebind/errors';
import {
  Fetcher,
  KVNamespace,
  failWith,
  respondWith,
} from '@edgebind/test-utils';
import { describe, expect, it, vi } from 'vitest';

import {
  FETCHER_TYPE_NAME,
  FetchBinding,
  isHostFetcher,
} from './FetchBinding.ts';
import type { ResponseShape } from './types.ts';

const passThrough: ResponseShape<Request, Response> = {
  name: 'pass-through',
  toRequest: (request) => request,
  adapt: (response) => response,
};

const destination = 'https://api.example.test/v1/accounts';

describe('isHostFetcher', () => {
  it('accepts objects with a fetch method', () => {
    expect(isHostFetcher(new Fetcher(respondWith()))).toBe(true);
    expect(isHostFetcher({ fetch: vi.fn() })).toBe(true);
  });

  it.each([
    ['a KV namespace', new KVNamespace()],
    ['a non-callable fetch', { fetch: 'https://api.example.test' }],
    ['null', null],
    ['a function', () => undefined],
  ])('rejects %s', (_, value) => {
    expect(isHostFetcher(value)).toBe(false);
  });

  it('rejects an object whose fetch getter throws', () => {
    const value = {
      get fetch(): never {
        throw new Error('revoked');
      },
    };
    expect(isHostFetcher(value)).toBe(false);
  });
});

describe('FetchBinding', () => {
  describe('fromHost', () => {
    it('wraps a Fetcher', () => {
      const host = new Fetcher(respondWith());
      const binding = FetchBinding.fromHost(host, passThrough);
      expect(binding).toBeInstanceOf(FetchBinding);
      expect(binding?.toHost()).toBe(host);
    });

    it('returns undefined for another host type', () => {
      expect(
        FetchBinding.fromHost(new KVNamespace(), passThrough),
      ).toBeUndefined();
    });

    it('uses the given verifier', () => {
      const verify = vi.fn(() => true);
      const host = { fetch: vi.fn() };
      const binding = FetchBinding.fromHost(host, passThrough, verify);
      expect(verify).toHaveBeenCalledWith(host, FETCHER_TYPE_NAME);
      expect(binding?.toHost()).toBe(host);
    });
  });

  describe('fetch', () => {
    it('calls the host with the bare destination without options', async () => {
      const transport = vi.fn(respondWith('ok'));
      const binding = new FetchBinding(new Fetcher(transport), passThrough);

      const response = await binding.fetch(destination);

      expect(transport).toHaveBeenCalledTimes(1);
      expect(transport).toHaveBeenCalledWith(destination);
      expect(await response.text()).toBe('ok');
    });

    it('passes options to the host as a request init', async () => {
      const transport = vi.fn(respondWith(null, { status: 201 }));
      const binding = new FetchBinding(new Fetcher(transport), passThrough);

      const response = await binding.fetch(destination, {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: '{"owner":"test-owner"}',
      });

      expect(transport).toHaveBeenCalledWith(destination, {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: '{"owner":"test-owner"}',
      });
      expect(response.status).toBe(201);
    });

    it('sends a byte body to the host', async () => {
      const transport = vi.fn(respondWith());
      const binding = new FetchBinding(new Fetcher(transport), passThrough);
      const body = new TextEncoder().encode('{"owner":"test-owner"}');

      await binding.fetch(destination, { method: 'POST', body });

      expect(transport).toHaveBeenCalledWith(destination, {
        method: 'POST',
        body,
      });
    });

    it('passes empty options as an empty init', async () => {
      const transport = vi.fn(respondWith());
      const binding = new FetchBinding(new Fetcher(transport), passThrough);

      await binding.fetch(destination, {});

      expect(transport).toHaveBeenCalledWith(destination, {});
    });

    it('returns HTTP error statuses as responses', async () => {
      const binding = new FetchBinding(
        new Fetcher(respondWith('origin unreachable', { status: 520 })),
        passThrough,
      );
      const response = await binding.fetch(destination);
      expect(response.status).toBe(520);
    });

    it('rejects an invalid destination without calling the host', async () => {
      const transport = vi.fn(respondWith());
      const binding = new FetchBinding(new Fetcher(transport), passThrough);

      await expect(binding.fetch('api.example.test')).rejects.toThrow(
        InvalidRequestError,
      );
      expect(transport).not.toHaveBeenCalled();
    });

    it('rejects invalid options without calling the host', async () => {
      const transport = vi.fn(respondWith());
      const binding = new FetchBinding(new Fetcher(transport), passThrough);

      await expect(
        binding.fetch(destination, { method: 'NOT A METHOD' }),
      ).rejects.toThrow(InvalidRequestError);
      expect(transport).not.toHaveBeenCalled();
    });

    it('wraps transport failures', async () => {
      const binding = new FetchBinding(
        new Fetcher(failWith('certificate rejected')),
        passThrough,
      );
      await expect(binding.fetch(destination)).rejects.toThrow(
        new TransportError(destination, 'certificate rejected'),
      );
    });

    it('propagates adaptation failures', async () => {
      const failure = new IncompatibleResponseError('test failure');
      const binding = new FetchBinding(new Fetcher(respondWith()), {
        ...passThrough,
        adapt: () => {
          throw failure;
        },
      });
      await expect(binding.fetch(destination)).rejects.toBe(failure);
    });
  });

  describe('fetchRequest', () => {
    it('hands the converted request to the host', async () => {
      const transport = vi.fn(respondWith('created', { status: 201 }));
      const binding = new FetchBinding(new Fetcher(transport), passThrough);
      const request = new Request(destination, { method: 'PUT', body: 'x' });

      const response = await binding.fetchRequest(request);

      expect(transport).toHaveBeenCalledWith(request);
      expect(await response.text()).toBe('created');
    });

    it('rejects when the request cannot be converted', async () => {
      const transport = vi.fn(respondWith());
      const failure = new InvalidRequestError('test failure');
      const binding = new FetchBinding(new Fetcher(transport), {
        ...passThrough,
        toRequest: () => {
          throw failure;
        },
      });

      await expect(
        binding.fetchRequest(new Request(destination)),
      ).rejects.toBe(failure);
      expect(transport).not.toHaveBeenCalled();
    });

    it('wraps transport failures with the request URL', async () => {
      const binding = new FetchBinding(
        new Fetcher(failWith('connection reset')),
        passThrough,
      );
      await expect(
        binding.fetchRequest(new Request(destination)),
      ).rejects.toThrow(new TransportError(destination, 'connection reset'));
    });
  });

  describe('clone and equals', () => {
    it('clones share the host object and are equal', () => {
      const host = new Fetcher(respondWith());
      const binding = new FetchBinding(host, passThrough);
      const clone = binding.clone();

      expect(clone).not.toBe(binding);
      expect(clone.toHost()).toBe(host);
      expect(clone.equals(binding)).toBe(true);
      expect(binding.equals(clone)).toBe(true);
    });

    it('handles over different host objects are not equal', () => {
      const transport = respondWith();
      const first = new FetchBinding(new Fetcher(transport), passThrough);
      const second = new FetchBinding(new Fetcher(transport), passThrough);
      expect(first.equals(second)).toBe(false);
    });

    it('clones behave like the original', async () => {
      const transport = vi.fn(respondWith('same'));
      const binding = new FetchBinding(new Fetcher(transport), passThrough);

      const [original, cloned] = await Promise.all([
        binding.fetch(destination),
        binding.clone().fetch(destination),
      ]);

      expect(await original.text()).toBe('same');
      expect(await cloned.text()).toBe('same');
      expect(transport).toHaveBeenNthCalledWith(1, destination);
      expect(transport).toHaveBeenNthCalledWith(2, destination);
    });
  });
});
