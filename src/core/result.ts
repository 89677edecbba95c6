/**
 * @fileoverview Result values for oracle and store calls
 *
 * The gate runs every outbound call through `safeAsync`, then maps a failed
 * result onto a degraded verdict or a missing expert answer.
 */

export type Result<T, E = Error> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export const Ok = <T>(value: T): Result<T, never> => ({ ok: true, value });
export const Err = <E>(error: E): Result<never, E> => ({ ok: false, error });

function toError(thrown: unknown): Error {
  if (thrown instanceof Error) return thrown;
  return new Error(typeof thrown === 'string' ? thrown : `Non-error value thrown: ${String(thrown)}`);
}

/**
 * Await `fn`, capturing a rejection as an `Err` holding an Error.
 */
export async function safeAsync<T>(fn: () => Promise<T>): Promise<Result<T, Error>> {
  try {
    return Ok(await fn());
  } catch (thrown) {
    return Err(toError(thrown));
  }
}
