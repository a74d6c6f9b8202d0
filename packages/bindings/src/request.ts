import { InvalidRequestError, toError } from '@edgebind/errors';
import {
  array,
  define,
  enums,
  exactOptional,
  instance,
  nullable,
  object,
  pattern,
  record,
  string,
  tuple,
  union,
  validate,
} from '@metamask/superstruct';
import type { Infer } from '@metamask/superstruct';

// RFC 9110 token characters.
const methodPattern = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/u;

export const headersInitStruct = union([
  instance(Headers),
  array(tuple([string(), string()])),
  record(string(), string()),
]);

// An ArrayBuffer, or any view of one such as the Uint8Array from TextEncoder.
export const bufferSourceStruct = define<BufferSource>(
  'BufferSource',
  (value) => value instanceof ArrayBuffer || ArrayBuffer.isView(value),
);

export const bodyInitStruct = nullable(
  union([
    string(),
    bufferSourceStruct,
    instance(Blob),
    instance(FormData),
    instance(URLSearchParams),
    instance(ReadableStream),
  ]),
);

/**
 * The options a caller may merge into a fetch by destination.
 */
export const requestOptionsStruct = object({
  method: exactOptional(pattern(string(), methodPattern)),
  headers: exactOptional(headersInitStruct),
  body: exactOptional(bodyInitStruct),
  redirect: exactOptional(enums(['follow', 'error', 'manual'])),
});

export type RequestOptions = Infer<typeof requestOptionsStruct>;

/**
 * Checks that a fetch destination is an absolute URL.
 *
 * @param destination - The destination.
 * @throws {InvalidRequestError} If the destination cannot be parsed.
 */
export const assertDestination = (destination: string): void => {
  try {
    // eslint-disable-next-line no-new
    new URL(destination);
  } catch (error) {
    throw new InvalidRequestError(`"${destination}" is not a valid URL`, {
      cause: error,
    });
  }
};

/**
 * Validates request options and turns them into the host's `RequestInit`.
 *
 * @param options - The caller's options.
 * @returns The equivalent `RequestInit`.
 * @throws {InvalidRequestError} If the options are malformed.
 */
export const toRequestInit = (options: RequestOptions): RequestInit => {
  const [error, validated] = validate(options, requestOptionsStruct);
  if (error !== undefined) {
    throw new InvalidRequestError(error.message, { cause: error });
  }
  const init: RequestInit = {};
  if (validated.method !== undefined) {
    init.method = validated.method;
  }
  if (validated.headers !== undefined) {
    init.headers = validated.headers;
  }
  if (validated.body !== undefined) {
    init.body = validated.body;
  }
  if (validated.redirect !== undefined) {
    init.redirect = validated.redirect;
  }
  return init;
};

/**
 * Converts a request or URL to a host request.
 *
 * @param request - The request to convert.
 * @returns The host request; a `Request` is returned as is.
 * @throws {InvalidRequestError} If no request can be built from the value.
 */
export const toHostRequest = (request: Request | URL): Request => {
  if (request instanceof Request) {
    return request;
  }
  if (!(request instanceof URL)) {
    throw new InvalidRequestError('expected a Request or URL');
  }
  try {
    return new Request(request);
  } catch (error) {
    throw new InvalidRequestError(toError(error).message, { cause: error });
  }
};
