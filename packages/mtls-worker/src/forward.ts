import type { RequestOptions } from '@edgebind/bindings';

// Not forwarded: they describe the hop to this worker, not the hop upstream.
const hopHeaders = ['connection', 'host', 'keep-alive', 'transfer-encoding'];

export type UpstreamRequest = {
  destination: string;
  options: RequestOptions;
};

/**
 * Maps an incoming request onto the upstream: the path and query are resolved
 * against the upstream URL, and the method, headers and body are carried over.
 *
 * @param request - The incoming request.
 * @param upstreamUrl - The upstream base URL.
 * @returns The destination and options for the upstream fetch.
 */
export const toUpstreamRequest = async (
  request: Request,
  upstreamUrl: string,
): Promise<UpstreamRequest> => {
  const { pathname, search } = new URL(request.url);
  const destination = new URL(`.${pathname}${search}`, upstreamUrl).href;

  const headers = new Headers(request.headers);
  for (const name of hopHeaders) {
    headers.delete(name);
  }

  const options: RequestOptions = {
    method: request.method,
    headers,
    redirect: 'manual',
  };
  if (request.method !== 'GET' && request.method !== 'HEAD') {
    options.body = await request.arrayBuffer();
  }
  return { destination, options };
};
