/**
 * Wordlist manager.
 *
 * Provides indexed access over the niceware 65,536-word dictionary and its
 * inverse. Both directions are built in a single pass from the list shipped
 * in the `niceware` package the first time either is needed, checked once,
 * then frozen and shared.
 */

import { createHash } from 'node:crypto'
import { createRequire } from 'node:module'
import { MalformedWordlistError, UnknownWordError } from '../errors.ts'
import { err, ok } from '../types.ts'
import type { Result } from '../types.ts'

/** 2^16: one word per 16-bit big-endian unit. */
export const WORDLIST_SIZE = 65_536

// The package's CommonJS module exporting the ordered word array.
const NICEWARE_WORDS_MODULE = 'niceware/lib/wordlist.js'

// Positions fixed by previously issued passphrases. A list that moves any of
// them is a different encoding and must fail the load.
export const WORDLIST_ANCHORS: ReadonlyMap<number, string> = new Map([
  [0x0000, 'a'],
  [0x0001, 'aah'],
  [0x0b98, 'bacca'],
  [0x0c8c, 'balloted'],
  [0x11d4, 'bioengineering'],
  [0x1ed2, 'cavort'],
  [0x2e53, 'creneled'],
  [0x36a9, 'depriving'],
  [0x5af6, 'gobbled'],
  [0xf73b, 'volley'],
  [0xfa2a, 'west'],
  [0xfe3c, 'written'],
  [0xffff, 'zyzzyva'],
])

export interface BuildOptions {
  /** Reject the list unless its digest matches. */
  readonly expectedDigest?: string
  /** Reject the list unless each index holds the given word. */
  readonly anchors?: ReadonlyMap<number, string>
}

export function digestWords(words: readonly string[]): string {
  return createHash('sha256').update(words.join('\n')).digest('hex')
}

function isDictionaryWord(word: string): boolean {
  return word !== '' && word === word.toLowerCase() && !/\s/.test(word)
}

/**
 * A validated dictionary. Only buildWordlist() can produce one, so the
 * codec never indexes into an unchecked list.
 */
export class Wordlist {
  /** Hex SHA-256 of the words joined by '\n'. */
  readonly digest: string
  readonly size: number

  private constructor(
    /** Dictionary words in index order (frozen). */
    readonly words: readonly string[],
    /** Inverse of `words`. */
    readonly indexByWord: ReadonlyMap<string, number>,
    /** Length of the longest word; longer tokens can never match. */
    readonly maxWordLength: number,
  ) {
    this.digest = digestWords(words)
    this.size = words.length
    Object.freeze(this)
  }

  /**
   * Validates a candidate dictionary and indexes it. Fails on a wrong entry
   * count, a duplicate, an empty, upper-case or whitespace-bearing entry, a
   * moved anchor, or a digest mismatch when one is expected.
   */
  static build(
    words: readonly string[],
    options: BuildOptions = {},
  ): Result<Wordlist, MalformedWordlistError> {
    if (words.length !== WORDLIST_SIZE) {
      return err(new MalformedWordlistError(`expected ${WORDLIST_SIZE} entries, got ${words.length}`))
    }

    const indexByWord = new Map<string, number>()
    let maxWordLength = 0
    for (const [index, word] of words.entries()) {
      if (!isDictionaryWord(word)) {
        return err(new MalformedWordlistError(`entry ${index} is not a lowercase word: ${JSON.stringify(word)}`))
      }
      const previous = indexByWord.get(word)
      if (previous !== undefined) {
        return err(new MalformedWordlistError(`duplicate entry "${word}" at ${previous} and ${index}`))
      }
      indexByWord.set(word, index)
      maxWordLength = Math.max(maxWordLength, word.length)
    }

    for (const [index, expected] of options.anchors ?? []) {
      if (words[index] !== expected) {
        return err(new MalformedWordlistError(
          `entry ${index} should be "${expected}", got ${JSON.stringify(words[index])}`,
        ))
      }
    }

    const wordlist = new Wordlist(Object.freeze([...words]), indexByWord, maxWordLength)
    if (options.expectedDigest !== undefined && wordlist.digest !== options.expectedDigest) {
      return err(new MalformedWordlistError(
        `digest mismatch: expected ${options.expectedDigest}, got ${wordlist.digest}`,
      ))
    }
    return ok(wordlist)
  }
}

export function buildWordlist(
  words: readonly string[],
  options: BuildOptions = {},
): Result<Wordlist, MalformedWordlistError> {
  return Wordlist.build(words, options)
}

/** Narrows the package export to a string array without trusting its shape. */
export function toWordArray(data: unknown): Result<string[], MalformedWordlistError> {
  // an ES-module build exposes the array as `default`
  if (typeof data === 'object' && data !== null && !Array.isArray(data) && 'default' in data) {
    return toWordArray(data.default)
  }
  if (!Array.isArray(data)) {
    return err(new MalformedWordlistError(`${NICEWARE_WORDS_MODULE} does not export an array`))
  }
  const words: string[] = []
  for (const [index, entry] of data.entries()) {
    if (typeof entry !== 'string') {
      return err(new MalformedWordlistError(`entry ${index} is not a string`))
    }
    words.push(entry)
  }
  return ok(words)
}

let shared: Wordlist | undefined

/**
 * Returns the process-wide dictionary, loading it on first call.
 * Throws MalformedWordlistError if the packaged list fails its checks.
 */
export function getWordlist(): Wordlist {
  if (shared !== undefined) return shared
  const requireFromHere = createRequire(import.meta.url)
  const data: unknown = requireFromHere(NICEWARE_WORDS_MODULE)
  const words = toWordArray(data)
  if (!words.ok) throw words.error
  const built = buildWordlist(words.value, { anchors: WORDLIST_ANCHORS })
  if (!built.ok) throw built.error
  shared = built.value
  return shared
}

/**
 * Returns the word for a 16-bit index.
 * Throws RangeError outside 0..65535; callers derive indices from byte pairs.
 */
export function wordAt(index: number, wordlist: Wordlist = getWordlist()): string {
  const word = Number.isInteger(index) ? wordlist.words[index] : undefined
  if (word === undefined) {
    throw new RangeError(`word index out of range: ${index}`)
  }
  return word
}

/** Exact, case-sensitive lookup of a word's index. */
export function indexOf(word: string, wordlist: Wordlist = getWordlist()): Result<number, UnknownWordError> {
  if (word.length > wordlist.maxWordLength) return err(new UnknownWordError(word))
  const index = wordlist.indexByWord.get(word)
  return index === undefined ? err(new UnknownWordError(word)) : ok(index)
}
