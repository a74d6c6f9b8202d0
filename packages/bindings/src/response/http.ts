import {
  IncompatibleResponseError,
  InvalidRequestError,
  toError,
} from '@edgebind/errors';
import { array, object, string, tuple, validate } from '@metamask/superstruct';

import { bodyInitStruct, toHostRequest } from '../request.ts';
import type { ResponseShape } from '../types.ts';

/**
 * Header name/value pairs, sorted by lower-case name as the host iterates
 * them. Repeated headers arrive joined by ", ", except `set-cookie`, which
 * appears once per value.
 */
export type HttpHeaders = [name: string, value: string][];

/**
 * A standard response record.
 */
export type HttpResponse = {
  status: number;
  statusText: string;
  headers: HttpHeaders;
  body: ReadableStream<Uint8Array> | null;
};

/**
 * A standard request record.
 */
export type HttpRequest = {
  method: string;
  url: string;
  headers: HttpHeaders;
  body: BodyInit | null;
};

/**
 * Requests accepted by `fetchRequest` in the standard build.
 */
export type HttpRequestInput = HttpRequest | Request | URL;

export const httpRequestStruct = object({
  method: string(),
  url: string(),
  headers: array(tuple([string(), string()])),
  body: bodyInitStruct,
});

// Visible ASCII and horizontal tab.
const headerValuePattern = /^[\t\x20-\x7e]*$/u;

/**
 * Converts a host response into a standard response record. The body stream
 * is passed through unread.
 *
 * @param response - The host response.
 * @returns The response record.
 * @throws {IncompatibleResponseError} If the status is outside 100-999 or a
 * header value is not visible ASCII.
 */
export const adaptHttpResponse = (response: Response): HttpResponse => {
  const { status } = response;
  if (!Number.isInteger(status) || status < 100 || status > 999) {
    throw new IncompatibleResponseError(`status ${status} is outside 100-999`);
  }
  const headers: HttpHeaders = [];
  for (const [name, value] of response.headers) {
    if (!headerValuePattern.test(value)) {
      throw new IncompatibleResponseError(
        `value of header "${name}" is not visible ASCII`,
      );
    }
    headers.push([name, value]);
  }
  return {
    status,
    statusText: response.statusText,
    headers,
    body: response.body,
  };
};

/**
 * Converts a standard response record back into a host response, as a worker
 * must return one.
 *
 * @param response - The response record.
 * @returns The host response.
 * @throws {IncompatibleResponseError} If the host cannot represent the record,
 * such as a 1xx status.
 */
export const toResponse = (response: HttpResponse): Response => {
  try {
    return new Response(response.body, {
      status: response.status,
      statusText: response.statusText,
      headers: response.headers,
    });
  } catch (error) {
    throw new IncompatibleResponseError(toError(error).message, {
      cause: error,
    });
  }
};

/**
 * Converts a standard request record, host request or URL into a host
 * request.
 *
 * @param request - The request to convert.
 * @returns The host request.
 * @throws {InvalidRequestError} If no host request can be built.
 */
export const toRequest = (request: HttpRequestInput): Request => {
  if (request instanceof Request || request instanceof URL) {
    return toHostRequest(request);
  }
  const [error, validated] = validate(request, httpRequestStruct);
  if (error !== undefined) {
    throw new InvalidRequestError(error.message, { cause: error });
  }
  try {
    return new Request(validated.url, {
      method: validated.method,
      headers: validated.headers,
      body: validated.body,
    });
  } catch (problem) {
    throw new InvalidRequestError(toError(problem).message, {
      cause: problem,
    });
  }
};

export const httpShape: ResponseShape<HttpRequestInput, HttpResponse> = harden(
  {
    name: 'http',
    toRequest,
    adapt: adaptHttpResponse,
  },
);
