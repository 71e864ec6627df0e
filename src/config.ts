/**
 * Configuration loader for the CLI.
 *
 * Optional env vars:
 *   LOG_LEVEL            – debug | info | warn | error (default info)
 *   PHRASEKEY_WORDS      – default word count for `generate`, 1..512 (default 8)
 *   PHRASEKEY_SEPARATOR  – string placed between printed words (default ' ')
 */

import { MAX_PASSPHRASE_WORDS } from './generate.ts'
import { isLogLevel } from './logger.ts'
import type { LogLevel } from './logger.ts'
import { err, ok } from './types.ts'
import type { Result } from './types.ts'

export interface Config {
  readonly logLevel: LogLevel
  readonly defaultWords: number
  readonly separator: string
}

const DEFAULT_WORDS = 8
const DEFAULT_SEPARATOR = ' '

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Result<Config> {
  const wordsStr = env.PHRASEKEY_WORDS ?? String(DEFAULT_WORDS)
  const words = Number(wordsStr)
  if (wordsStr.trim() === '' || !Number.isInteger(words) || words < 1 || words > MAX_PASSPHRASE_WORDS) {
    return err(new Error(`PHRASEKEY_WORDS must be an integer from 1 to ${MAX_PASSPHRASE_WORDS}, got: ${wordsStr}`))
  }

  const separator = env.PHRASEKEY_SEPARATOR ?? DEFAULT_SEPARATOR
  if (separator === '') {
    return err(new Error('PHRASEKEY_SEPARATOR must not be empty'))
  }

  const rawLevel = env.LOG_LEVEL ?? 'info'
  const logLevel: LogLevel = isLogLevel(rawLevel) ? rawLevel : 'info'

  return ok({
    logLevel,
    defaultWords: words,
    separator,
  })
}
