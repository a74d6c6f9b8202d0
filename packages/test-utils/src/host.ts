/**
 * In-process stand-ins for the objects an edge host places in a worker's
 * environment. The host identifies binding objects by class, so the class
 * names here are significant.
 */

export type FetchInput = string | Request | URL;

export type FakeTransport = (
  ...args: [input: FetchInput, init?: RequestInit]
) => Promise<Response>;

/**
 * A service or certificate binding. Both are `Fetcher`s on the host; requests
 * are handed to the supplied transport with their arguments untouched.
 */
export class Fetcher {
  readonly #transport: FakeTransport;

  constructor(transport: FakeTransport) {
    this.#transport = transport;
  }

  async fetch(
    ...args: [input: FetchInput, init?: RequestInit]
  ): Promise<Response> {
    return this.#transport(...args);
  }
}

/**
 * A key-value namespace binding, present so tests can offer the resolver an
 * object of the wrong type.
 */
export class KVNamespace {
  readonly #entries = new Map<string, string>();

  async get(key: string): Promise<string | null> {
    return this.#entries.get(key) ?? null;
  }

  async put(key: string, value: string): Promise<void> {
    this.#entries.set(key, value);
  }
}

/**
 * Makes a transport that answers every request with a fresh response.
 *
 * @param body - The response body.
 * @param init - The response status and headers.
 * @returns The transport.
 */
export const respondWith =
  (body: string | null = null, init?: ResponseInit): FakeTransport =>
  async () =>
    new Response(body, init);

/**
 * Makes a transport that fails every request the way a host does when the
 * connection or handshake cannot be completed.
 *
 * @param message - The host's diagnostic.
 * @returns The transport.
 */
export const failWith =
  (message: string): FakeTransport =>
  async () => {
    throw new TypeError(message);
  };
