/**
 * Error taxonomy.
 *
 * Every per-call failure is returned inside a Result; only
 * MalformedWordlistError is thrown, because it means the bundled
 * dictionary itself is broken.
 */

export type PhrasekeyErrorCode =
  | 'ODD_LENGTH'
  | 'UNKNOWN_WORD'
  | 'INVALID_WORD'
  | 'TOO_MANY_WORDS'
  | 'INVALID_WORD_COUNT'
  | 'RANDOM_SOURCE'
  | 'MALFORMED_WORDLIST'
  | 'INVALID_HEX'

export abstract class PhrasekeyError extends Error {
  abstract readonly code: PhrasekeyErrorCode

  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = new.target.name
  }
}

/** Encode input has an odd number of bytes. */
export class OddLengthError extends PhrasekeyError {
  readonly code = 'ODD_LENGTH'

  constructor(readonly size: number) {
    super(`odd size not supported: ${size}`)
  }
}

/** Wordlist lookup miss. */
export class UnknownWordError extends PhrasekeyError {
  readonly code = 'UNKNOWN_WORD'

  constructor(readonly word: string) {
    super(`unknown word: ${word}`)
  }
}

/** Decode hit a token that is not in the dictionary. `position` is zero-based. */
export class InvalidWordError extends PhrasekeyError {
  readonly code = 'INVALID_WORD'

  constructor(
    readonly position: number,
    readonly word: string,
  ) {
    super(`unknown word at position ${position}: ${word}`)
  }
}

export class TooManyWordsError extends PhrasekeyError {
  readonly code = 'TOO_MANY_WORDS'

  constructor(
    readonly numWords: number,
    readonly maxWords: number,
  ) {
    super(`number of words ${numWords} cannot be greater than ${maxWords}`)
  }
}

export class InvalidWordCountError extends PhrasekeyError {
  readonly code = 'INVALID_WORD_COUNT'

  constructor(readonly numWords: number) {
    super(`number of words must be a non-negative integer, got: ${numWords}`)
  }
}

export class RandomSourceError extends PhrasekeyError {
  readonly code = 'RANDOM_SOURCE'

  constructor(cause: unknown) {
    super(`failed to generate entropy for passphrase: ${String(cause)}`, { cause })
  }
}

export class MalformedWordlistError extends PhrasekeyError {
  readonly code = 'MALFORMED_WORDLIST'

  constructor(readonly reason: string) {
    super(`malformed wordlist: ${reason}`)
  }
}

export class InvalidHexError extends PhrasekeyError {
  readonly code = 'INVALID_HEX'

  constructor(readonly input: string) {
    super(`not a hex byte string: ${input}`)
  }
}
