/**
 * Outcome of a call that can fail for a reason the caller must handle.
 * Used for platform calls so "no data" and "call failed" never look alike.
 */
export type Result<T, E> = Ok<T> | Err<E>;

export interface Ok<T> {
  ok: true;
  value: T;
}

export interface Err<E> {
  ok: false;
  error: E;
}

export const ok = <T>(value: T): Ok<T> => ({ ok: true, value });

export const err = <E>(error: E): Err<E> => ({ ok: false, error });
