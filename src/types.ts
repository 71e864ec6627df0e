/**
 * Core shared types for phrasekey.
 */

// ── Result<T, E> ────────────────────────────────────────────────────────────

type Ok<T> = { readonly ok: true; readonly value: T }
type Err<E> = { readonly ok: false; readonly error: E }
export type Result<T, E = Error> = Ok<T> | Err<E>

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value }
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error }
}

// ── Passphrase ──────────────────────────────────────────────────────────────

/** Ordered dictionary words; word i stands for bytes 2i (high) and 2i+1 (low). */
export type Passphrase = readonly string[]

/** Fills a buffer of the requested size with random bytes. */
export type RandomSource = (size: number) => Uint8Array
