/**
 * The bindings a host hands to one worker invocation, by name. Read-only to
 * this package.
 */
export type Environment = Readonly<Record<string, unknown>>;

/**
 * The host object behind a fetch-capable binding. The host presents any
 * credential configured for the binding (such as an mTLS client
 * certificate) during the handshake; callers never see it.
 *
 * Handles assume the host object is safe to call from concurrent tasks.
 */
export type HostFetcher = {
  fetch(input: string | Request, init?: RequestInit): Promise<Response>;
};

/**
 * Decides whether a host value carries the host type identity named by
 * `typeName`. Must not throw.
 */
export type TypeVerifier = (value: unknown, typeName: string) => boolean;

/**
 * One of the two response representations an application can build against.
 * `toRequest` turns the requests that representation accepts into host
 * requests; `adapt` turns host responses into the representation.
 */
export type ResponseShape<RequestValue, ResponseValue> = {
  readonly name: string;
  toRequest(request: RequestValue): Request;
  adapt(response: Response): ResponseValue;
};
