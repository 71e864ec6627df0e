/**
 * Tests for the command-line front end.
 *
 * runCli() is driven with an in-memory CliIO and an explicit env; the
 * logger's stdout/stderr writes are captured with spies.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { runCli, tokenize } from '../src/cli.ts'
import type { CliIO } from '../src/cli.ts'
import { setLogLevel } from '../src/logger.ts'
import { indexOf } from '../src/wordlist/index.ts'

interface Captured {
  readonly io: CliIO
  readonly out: () => string
  readonly err: () => string
}

function captureIO(): Captured {
  let out = ''
  let errText = ''
  return {
    io: {
      out: (text) => {
        out += text
      },
      err: (text) => {
        errText += text
      },
    },
    out: () => out,
    err: () => errText,
  }
}

function run(args: readonly string[], env: NodeJS.ProcessEnv = {}) {
  const captured = captureIO()
  return runCli(['node', 'phrasekey', ...args], captured.io, env).then((code) => ({
    code,
    out: captured.out(),
    err: captured.err(),
  }))
}

describe('phrasekey CLI', () => {
  let stdoutWrite: ReturnType<typeof spyStdout>
  let stderrWrite: ReturnType<typeof spyStderr>

  function spyStdout() {
    return vi.spyOn(process.stdout, 'write').mockImplementation(() => true)
  }

  function spyStderr() {
    return vi.spyOn(process.stderr, 'write').mockImplementation(() => true)
  }

  function loggedEntries(spy: typeof stderrWrite): unknown[] {
    return spy.mock.calls.map(([chunk]): unknown => JSON.parse(String(chunk)))
  }

  beforeEach(() => {
    stdoutWrite = spyStdout()
    stderrWrite = spyStderr()
  })

  afterEach(() => {
    vi.restoreAllMocks()
    setLogLevel('info')
  })

  // ── encode ──────────────────────────────────────────────────────────

  describe('encode', () => {
    it('prints the passphrase for a hex key', async () => {
      const result = await run(['encode', '0b981ed2fa2af73b'])
      expect(result.code).toBe(0)
      expect(result.out).toBe('bacca cavort west volley\n')
    })

    it('accepts a 0x prefix', async () => {
      const result = await run(['encode', '0x0000ffff'])
      expect(result.out).toBe('a zyzzyva\n')
    })

    it('joins words with --separator', async () => {
      const result = await run(['-s', ':', 'encode', '0000ffff'])
      expect(result.out).toBe('a:zyzzyva\n')
    })

    it('joins words with PHRASEKEY_SEPARATOR', async () => {
      const result = await run(['encode', '0000ffff'], { PHRASEKEY_SEPARATOR: '.' })
      expect(result.out).toBe('a.zyzzyva\n')
    })

    it('fails on an odd number of bytes', async () => {
      const result = await run(['encode', 'ff'])
      expect(result.code).toBe(1)
      expect(result.out).toBe('')
      expect(loggedEntries(stderrWrite)).toEqual([
        expect.objectContaining({
          level: 'error',
          msg: 'odd size not supported: 1',
          component: 'cli',
          code: 'ODD_LENGTH',
        }),
      ])
    })

    it('fails on malformed hex', async () => {
      const result = await run(['encode', 'xyz'])
      expect(result.code).toBe(1)
      expect(loggedEntries(stderrWrite)).toEqual([
        expect.objectContaining({ msg: 'not a hex byte string: xyz', code: 'INVALID_HEX' }),
      ])
    })

    it('logs debug details to stderr with --verbose', async () => {
      const result = await run(['-v', 'encode', '0000'])
      expect(result.out).toBe('a\n')
      expect(stdoutWrite).not.toHaveBeenCalled()
      expect(loggedEntries(stderrWrite)).toEqual([
        expect.objectContaining({ level: 'debug', msg: 'Encoded bytes', bytes: 2, words: 1 }),
      ])
    })
  })

  // ── decode ──────────────────────────────────────────────────────────

  describe('decode', () => {
    it('prints the bytes as hex', async () => {
      const result = await run(['decode', 'bacca', 'cavort', 'west', 'volley'])
      expect(result.code).toBe(0)
      expect(result.out).toBe('0b981ed2fa2af73b\n')
    })

    it('splits a quoted phrase on whitespace', async () => {
      const result = await run(['decode', 'bacca  cavort\twest', 'volley'])
      expect(result.out).toBe('0b981ed2fa2af73b\n')
    })

    it('is case-sensitive by default', async () => {
      const result = await run(['decode', 'BACCA'])
      expect(result.code).toBe(1)
      expect(loggedEntries(stderrWrite)).toEqual([
        expect.objectContaining({ msg: 'unknown word at position 0: BACCA', code: 'INVALID_WORD' }),
      ])
    })

    it('folds case with --ignore-case', async () => {
      const result = await run(['decode', '-i', 'BACCA', 'Cavort'])
      expect(result.code).toBe(0)
      expect(result.out).toBe('0b981ed2\n')
    })

    it('names the first unknown word', async () => {
      const result = await run(['decode', 'bacca', 'cavort', 'not-a-real-word'])
      expect(result.code).toBe(1)
      expect(result.out).toBe('')
      expect(loggedEntries(stderrWrite)).toEqual([
        expect.objectContaining({ msg: 'unknown word at position 2: not-a-real-word' }),
      ])
    })
  })

  // ── generate ────────────────────────────────────────────────────────

  describe('generate', () => {
    it('prints the configured default number of words', async () => {
      const result = await run(['generate'], { PHRASEKEY_WORDS: '4' })
      expect(result.code).toBe(0)
      const words = result.out.trimEnd().split(' ')
      expect(words.length).toBe(4)
      for (const word of words) expect(indexOf(word).ok).toBe(true)
    })

    it('prints 8 words by default', async () => {
      const result = await run(['generate'])
      expect(result.out.trimEnd().split(' ').length).toBe(8)
    })

    it('honours --words', async () => {
      const result = await run(['generate', '--words', '3'])
      expect(result.out.trimEnd().split(' ').length).toBe(3)
    })

    it('rejects more than 512 words', async () => {
      const result = await run(['generate', '-n', '513'])
      expect(result.code).toBe(1)
      expect(loggedEntries(stderrWrite)).toEqual([
        expect.objectContaining({
          msg: 'number of words 513 cannot be greater than 512',
          code: 'TOO_MANY_WORDS',
        }),
      ])
    })

    it('rejects a non-numeric word count', async () => {
      const result = await run(['generate', '-n', 'abc'])
      expect(result.code).toBe(1)
      expect(result.err).toContain('must be a non-negative integer')
    })
  })

  // ── program ─────────────────────────────────────────────────────────

  describe('program', () => {
    it('prints the version', async () => {
      const result = await run(['--version'])
      expect(result.code).toBe(0)
      expect(result.out).toBe('0.1.0\n')
    })

    it('fails on invalid configuration', async () => {
      const result = await run(['generate'], { PHRASEKEY_WORDS: '0' })
      expect(result.code).toBe(1)
      expect(loggedEntries(stderrWrite)).toEqual([
        expect.objectContaining({
          msg: 'Configuration error',
          error: 'PHRASEKEY_WORDS must be an integer from 1 to 512, got: 0',
        }),
      ])
    })

    it('fails on an unknown command', async () => {
      const result = await run(['frobnicate'])
      expect(result.code).toBe(1)
      expect(result.err).toContain("unknown command 'frobnicate'")
    })
  })
})

describe('tokenize', () => {
  it('splits on runs of whitespace and drops empties', () => {
    expect(tokenize(['  a  b', '', 'c\n'])).toEqual(['a', 'b', 'c'])
  })
})
