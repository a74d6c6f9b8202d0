import type { Environment, RequestOptions } from '@edgebind/bindings';
import {
  isBindingError,
  isFetchError,
  marshalError,
  toError,
} from '@edgebind/errors';
import {
  Logger,
  filterTransport,
  makeConsoleTransport,
} from '@edgebind/logger';
import type { Transport } from '@edgebind/logger';

import { readConfig } from './config.ts';
import { toUpstreamRequest } from './forward.ts';

/**
 * The part of a certificate binding the worker uses.
 */
export type Upstream<ResponseValue> = {
  fetch(destination: string, options?: RequestOptions): Promise<ResponseValue>;
};

export type WorkerOptions<ResponseValue> = {
  /**
   * Resolves the certificate binding named in the configuration.
   */
  resolve: (environment: Environment, name: string) => Upstream<ResponseValue>;
  /**
   * Turns an upstream response into the response the worker returns.
   */
  toResponse: (response: ResponseValue) => Response;
  /**
   * Where log entries go. Defaults to the console.
   */
  transports?: Transport[];
};

export type Worker = {
  fetch(request: Request, environment: Environment): Promise<Response>;
};

/**
 * Gets the status the worker answers with when handling a request fails.
 *
 * @param error - The failure.
 * @returns 502 if the upstream exchange failed, 500 otherwise.
 */
export const getErrorStatus = (error: unknown): number =>
  isFetchError(error) ? 502 : 500;

const makeErrorResponse = (error: unknown): Response =>
  new Response(JSON.stringify(marshalError(toError(error))), {
    status: getErrorStatus(error),
    headers: { 'content-type': 'application/json' },
  });

/**
 * Creates a worker that forwards each request to the configured upstream
 * through the configured certificate binding, and returns the upstream's
 * response.
 *
 * @param options - The worker's options.
 * @returns The worker.
 */
export const makeWorker = <ResponseValue>({
  resolve,
  toResponse,
  transports = [makeConsoleTransport()],
}: WorkerOptions<ResponseValue>): Worker =>
  harden({
    async fetch(request: Request, environment: Environment): Promise<Response> {
      let logger = new Logger({ tags: ['mtls-worker'], transports });
      try {
        const config = readConfig(environment);
        logger = new Logger({
          tags: ['mtls-worker'],
          transports: transports.map((transport) =>
            filterTransport(transport, config.logLevel),
          ),
        });
        logger.debug(`${request.method} ${request.url}`);

        const upstream = resolve(environment, config.certificateBinding);
        const { destination, options } = await toUpstreamRequest(
          request,
          config.upstreamUrl,
        );
        const upstreamLogger = logger.subLogger('upstream');
        upstreamLogger.info(`${options.method ?? 'GET'} ${destination}`);

        const response = toResponse(
          await upstream.fetch(destination, options),
        );
        upstreamLogger.info(`${destination} answered ${response.status}`);
        return response;
      } catch (error) {
        if (isBindingError(error)) {
          logger.error('Certificate binding unavailable', error);
        } else if (isFetchError(error)) {
          logger.warn('Upstream request failed', error);
        } else {
          logger.error('Request handling failed', error);
        }
        return makeErrorResponse(error);
      }
    },
  });
