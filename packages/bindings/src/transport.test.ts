import { TransportError } from '@edgebind/errors';
import { describe, expect, it } from 'vitest';

import { callHost } from './transport.ts';

const destination = 'https://api.example.test/v1';

describe('callHost', () => {
  it('returns the host response', async () => {
    const response = new Response('ok');
    expect(await callHost(destination, async () => response)).toBe(response);
  });

  it('returns error statuses as responses', async () => {
    const response = await callHost(
      destination,
      async () => new Response(null, { status: 520 }),
    );
    expect(response.status).toBe(520);
  });

  it('wraps a host rejection', async () => {
    const failure = new TypeError('handshake failed');
    const error = await callHost(destination, async () => {
      throw failure;
    }).catch((problem: unknown) => problem);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({
      message: `Fetch to ${destination} failed: handshake failed`,
      data: { destination, detail: 'handshake failed' },
      cause: failure,
    });
  });

  it('wraps a synchronous host throw', async () => {
    const call = (): Promise<unknown> => {
      throw new Error('binding revoked');
    };
    await expect(callHost(destination, call)).rejects.toThrow(
      new TransportError(destination, 'binding revoked'),
    );
  });

  it('wraps a thrown non-error', async () => {
    await expect(
      callHost(destination, async () => Promise.reject('reset')),
    ).rejects.toThrow(`Fetch to ${destination} failed: reset`);
  });

  it('rejects a result that is not a response', async () => {
    await expect(
      callHost(destination, async () => ({ status: 200 })),
    ).rejects.toThrow(
      new TransportError(destination, 'host did not return a response'),
    );
  });
});
