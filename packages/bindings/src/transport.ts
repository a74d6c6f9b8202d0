import { TransportError, toError } from '@edgebind/errors';

/**
 * Runs a call into the host's fetch and checks its outcome. This is the only
 * point at which a fetch suspends.
 *
 * @param destination - The destination, for diagnostics.
 * @param call - Issues the host fetch.
 * @returns The host response.
 * @throws {TransportError} If the host rejects, throws, or resolves to
 * something other than a response.
 */
export const callHost = async (
  destination: string,
  call: () => Promise<unknown>,
): Promise<Response> => {
  let result: unknown;
  try {
    result = await call();
  } catch (error) {
    throw new TransportError(destination, toError(error).message, {
      cause: error,
    });
  }
  if (!(result instanceof Response)) {
    throw new TransportError(destination, 'host did not return a response');
  }
  return result;
};
