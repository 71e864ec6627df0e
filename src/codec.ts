/**
 * Byte ↔ passphrase codec.
 *
 * A fixed-radix, big-endian base-65536 encoding: every two bytes become one
 * dictionary word and every word becomes two bytes.
 *
 *   encode([0x0b, 0x98, 0x1e, 0xd2]) → ['bacca', 'cavort']
 *   decode(['bacca', 'cavort'])      → Uint8Array [0x0b, 0x98, 0x1e, 0xd2]
 *
 * Both directions are all-or-nothing: either the complete output or an
 * error, never a partial result.
 */

import { InvalidWordError, OddLengthError } from './errors.ts'
import { getWordlist, indexOf, wordAt } from './wordlist/index.ts'
import type { Wordlist } from './wordlist/index.ts'
import { err, ok } from './types.ts'
import type { Passphrase, Result } from './types.ts'

export const BYTES_PER_WORD = 2

/**
 * Converts an even-length byte buffer into one word per big-endian 16-bit
 * unit. An empty buffer gives an empty passphrase; an odd length is
 * rejected rather than padded.
 */
export function encode(
  bytes: Uint8Array,
  wordlist: Wordlist = getWordlist(),
): Result<Passphrase, OddLengthError> {
  if (bytes.length % BYTES_PER_WORD !== 0) {
    return err(new OddLengthError(bytes.length))
  }

  const words: string[] = new Array<string>(bytes.length / BYTES_PER_WORD)
  for (let i = 0; i < words.length; i++) {
    const hi = bytes[2 * i] ?? 0
    const lo = bytes[2 * i + 1] ?? 0
    words[i] = wordAt((hi << 8) | lo, wordlist)
  }
  return ok(words)
}

/**
 * Converts already-tokenized dictionary words back into bytes.
 * Matching is exact; the first unknown token fails the whole call.
 */
export function decode(
  words: readonly string[],
  wordlist: Wordlist = getWordlist(),
): Result<Uint8Array, InvalidWordError> {
  const bytes = new Uint8Array(words.length * BYTES_PER_WORD)
  for (const [position, word] of words.entries()) {
    const lookup = indexOf(word, wordlist)
    if (!lookup.ok) return err(new InvalidWordError(position, word))
    bytes[2 * position] = lookup.value >> 8
    bytes[2 * position + 1] = lookup.value & 0xff
  }
  return ok(bytes)
}
