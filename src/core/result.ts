/**
 * Explicit success/failure and presence/absence carriers.
 * Pipeline stages return these instead of throwing so a single symbol's
 * failure can be recorded without unwinding the whole scan.
 */

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

export type Maybe<T> = { present: true; value: T } | { present: false };

export const absent: { present: false } = { present: false };

export function present<T>(value: T): Maybe<T> {
  return { present: true, value };
}

/**
 * Maps null, undefined and non-finite numbers to an absent value.
 */
export function fromNullable(value: number | null | undefined): Maybe<number> {
  if (value === null || value === undefined || !Number.isFinite(value)) {
    return absent;
  }
  return present(value);
}
