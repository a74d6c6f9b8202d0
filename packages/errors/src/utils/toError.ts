/**
 * Coerces a thrown value into an `Error`.
 *
 * @param problem - The thrown value.
 * @returns The value itself if it is an `Error`, otherwise a new `Error`
 * describing it, with the original value as its cause.
 */
export function toError(problem: unknown): Error {
  if (problem instanceof Error) {
    return problem;
  }
  return new Error(String(problem), { cause: problem });
}
