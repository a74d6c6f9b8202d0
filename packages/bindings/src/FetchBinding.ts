import { isObject } from '@metamask/utils';

import { assertDestination, toRequestInit } from './request.ts';
import type { RequestOptions } from './request.ts';
import { callHost } from './transport.ts';
import type { HostFetcher, ResponseShape, TypeVerifier } from './types.ts';
import { isInstanceOfType, makeTypeVerifier } from './verifier.ts';

/**
 * The host type name of fetch-capable bindings. Certificate bindings and
 * service bindings both carry it.
 */
export const FETCHER_TYPE_NAME = 'Fetcher';

/**
 * Checks that a value has the call surface of a host fetcher. Introspection
 * failures count as "no".
 *
 * @param value - The value to check.
 * @returns Whether the value has a callable `fetch`.
 */
export const isHostFetcher = (value: unknown): value is HostFetcher => {
  try {
    return (
      isObject(value) && typeof Reflect.get(value, 'fetch') === 'function'
    );
  } catch {
    return false;
  }
};

/**
 * A handle to a fetch-capable binding, such as an mTLS certificate or a
 * service binding. Requests go through the host object, which presents the
 * binding's credential during the handshake.
 *
 * The handle holds no state of its own. Clones share the host object, and two
 * handles are equal when they share one.
 */
export class FetchBinding<RequestValue, ResponseValue> {
  readonly #host: HostFetcher;

  readonly #shape: ResponseShape<RequestValue, ResponseValue>;

  constructor(
    host: HostFetcher,
    shape: ResponseShape<RequestValue, ResponseValue>,
  ) {
    this.#host = host;
    this.#shape = shape;
    harden(this);
  }

  /**
   * Converts a generic host object into a handle.
   *
   * @param value - The host object.
   * @param shape - The response shape of this build.
   * @param verify - The host adapter's type check.
   * @returns The handle, or `undefined` if the object is not a `Fetcher`.
   */
  static fromHost<RequestValue, ResponseValue>(
    value: unknown,
    shape: ResponseShape<RequestValue, ResponseValue>,
    verify: TypeVerifier = isInstanceOfType,
  ): FetchBinding<RequestValue, ResponseValue> | undefined {
    if (
      !makeTypeVerifier(verify)(value, FETCHER_TYPE_NAME) ||
      !isHostFetcher(value)
    ) {
      return undefined;
    }
    return new FetchBinding(value, shape);
  }

  /**
   * Makes an authenticated request to a destination. Without options the host
   * receives the bare destination string.
   *
   * @param destination - The absolute URL to request.
   * @param options - Method, headers, body and redirect mode.
   * @returns The response, in this build's response shape.
   * @throws {InvalidRequestError} If the destination or options are invalid.
   * @throws {TransportError} If the host cannot complete the exchange.
   * @throws {IncompatibleResponseError} If the response cannot be adapted.
   */
  async fetch(
    destination: string,
    options?: RequestOptions,
  ): Promise<ResponseValue> {
    assertDestination(destination);
    const init = options === undefined ? undefined : toRequestInit(options);
    const response = await callHost(destination, async () =>
      init === undefined
        ? this.#host.fetch(destination)
        : this.#host.fetch(destination, init),
    );
    return this.#shape.adapt(response);
  }

  /**
   * Makes an authenticated request from an already-built request.
   *
   * @param request - Anything this build's response shape can turn into a
   * host request.
   * @returns The response, in this build's response shape.
   * @throws {InvalidRequestError} If the request cannot be converted.
   * @throws {TransportError} If the host cannot complete the exchange.
   * @throws {IncompatibleResponseError} If the response cannot be adapted.
   */
  async fetchRequest(request: RequestValue): Promise<ResponseValue> {
    const hostRequest = this.#shape.toRequest(request);
    const response = await callHost(hostRequest.url, async () =>
      this.#host.fetch(hostRequest),
    );
    return this.#shape.adapt(response);
  }

  /**
   * @returns A handle sharing this handle's host object.
   */
  clone(): FetchBinding<RequestValue, ResponseValue> {
    return new FetchBinding(this.#host, this.#shape);
  }

  /**
   * @param other - Another handle.
   * @returns Whether both handles refer to the same host object.
   */
  equals(other: FetchBinding<never, unknown>): boolean {
    return other.#host === this.#host;
  }

  /**
   * @returns The host object, for code that works with raw bindings.
   */
  toHost(): HostFetcher {
    return this.#host;
  }
}
harden(FetchBinding);
