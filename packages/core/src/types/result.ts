/**
 * Outcome of an operation that can fail in an expected, typed way.
 *
 * Failures the caller is meant to handle (not connected, invalid topic,
 * broker refusal) travel as values; exceptions are reserved for programmer
 * errors such as invalid options.
 */
export type Result<T, E extends Error> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export function ok(): Result<void, never>;
export function ok<T>(value: T): Result<T, never>;
export function ok<T>(value?: T): Result<T | undefined, never> {
  return { ok: true, value };
}

export function err<E extends Error>(error: E): Result<never, E> {
  return { ok: false, error };
}
