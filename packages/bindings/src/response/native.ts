import { toHostRequest } from '../request.ts';
import type { ResponseShape } from '../types.ts';

/**
 * Requests accepted by `fetchRequest` in the native build.
 */
export type NativeRequestInput = Request | URL;

/**
 * The native response representation: the host response, unchanged, behind
 * this package's own type.
 */
export class FetchResponse {
  readonly #response: Response;

  constructor(response: Response) {
    this.#response = response;
  }

  get status(): number {
    return this.#response.status;
  }

  get statusText(): string {
    return this.#response.statusText;
  }

  get ok(): boolean {
    return this.#response.ok;
  }

  get url(): string {
    return this.#response.url;
  }

  get redirected(): boolean {
    return this.#response.redirected;
  }

  get headers(): Headers {
    return this.#response.headers;
  }

  get body(): ReadableStream<Uint8Array> | null {
    return this.#response.body;
  }

  get bodyUsed(): boolean {
    return this.#response.bodyUsed;
  }

  async text(): Promise<string> {
    return this.#response.text();
  }

  async json(): Promise<unknown> {
    return this.#response.json();
  }

  async arrayBuffer(): Promise<ArrayBuffer> {
    return this.#response.arrayBuffer();
  }

  /**
   * @returns The host response, for returning from a worker's fetch handler.
   */
  toResponse(): Response {
    return this.#response;
  }
}
harden(FetchResponse);

/**
 * Adapts a host response to the native representation.
 *
 * @param response - The host response.
 * @returns The wrapped response.
 */
export const adaptNativeResponse = (response: Response): FetchResponse =>
  new FetchResponse(response);

export const nativeShape: ResponseShape<NativeRequestInput, FetchResponse> =
  harden({
    name: 'native',
    toRequest: toHostRequest,
    adapt: adaptNativeResponse,
  });
