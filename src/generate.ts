/**
 * Random passphrase generation.
 *
 * Takes a word count rather than a byte count so callers cannot ask for an
 * odd number of bytes. Eight words give 128 bits.
 */

import { randomBytes } from 'node:crypto'
import { encode, BYTES_PER_WORD } from './codec.ts'
import { InvalidWordCountError, RandomSourceError, TooManyWordsError } from './errors.ts'
import { err } from './types.ts'
import type { Passphrase, RandomSource, Result } from './types.ts'

export const MAX_PASSPHRASE_WORDS = 512

export type GenerateError = TooManyWordsError | InvalidWordCountError | RandomSourceError

const defaultRandomSource: RandomSource = (size) => randomBytes(size)

export function generatePassphrase(
  numWords: number,
  randomSource: RandomSource = defaultRandomSource,
): Result<Passphrase, GenerateError> {
  if (!Number.isInteger(numWords) || numWords < 0) {
    return err(new InvalidWordCountError(numWords))
  }
  if (numWords > MAX_PASSPHRASE_WORDS) {
    return err(new TooManyWordsError(numWords, MAX_PASSPHRASE_WORDS))
  }

  const size = numWords * BYTES_PER_WORD
  let bytes: Uint8Array
  try {
    bytes = randomSource(size)
  } catch (e) {
    return err(new RandomSourceError(e))
  }
  if (bytes.length !== size) {
    return err(new RandomSourceError(new Error(`expected ${size} random bytes, got ${bytes.length}`)))
  }

  const encoded = encode(bytes)
  // unreachable: size is even
  if (!encoded.ok) return err(new RandomSourceError(encoded.error))
  return encoded
}
