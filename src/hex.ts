/**
 * Hex helpers for the CLI. Buffer.from(s, 'hex') stops silently at the
 * first bad digit, so input is checked against HEX_PATTERN first.
 */

import { InvalidHexError } from './errors.ts'
import { err, ok } from './types.ts'
import type { Result } from './types.ts'

const HEX_PATTERN = /^(?:[0-9a-f]{2})*$/i

/** Accepts an optional 0x prefix and either case. */
export function parseHex(input: string): Result<Uint8Array, InvalidHexError> {
  const digits = input.startsWith('0x') || input.startsWith('0X') ? input.slice(2) : input
  if (!HEX_PATTERN.test(digits)) return err(new InvalidHexError(input))
  return ok(new Uint8Array(Buffer.from(digits, 'hex')))
}

export function toHex(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('hex')
}
