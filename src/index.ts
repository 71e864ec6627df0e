/**
 * phrasekey: reversible bytes ↔ passphrase encoding over a 65,536-word
 * dictionary. Each word carries 16 bits; a 128-bit key is an 8-word phrase.
 */

export { encode, decode, BYTES_PER_WORD } from './codec.ts'
export { generatePassphrase, MAX_PASSPHRASE_WORDS } from './generate.ts'
export type { GenerateError } from './generate.ts'
export {
  buildWordlist,
  getWordlist,
  indexOf,
  wordAt,
  Wordlist,
  WORDLIST_ANCHORS,
  WORDLIST_SIZE,
} from './wordlist/index.ts'
export type { BuildOptions } from './wordlist/index.ts'
export {
  PhrasekeyError,
  OddLengthError,
  UnknownWordError,
  InvalidWordError,
  TooManyWordsError,
  InvalidWordCountError,
  RandomSourceError,
  MalformedWordlistError,
  InvalidHexError,
} from './errors.ts'
export type { PhrasekeyErrorCode } from './errors.ts'
export { ok, err } from './types.ts'
export type { Passphrase, RandomSource, Result } from './types.ts'
