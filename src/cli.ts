/**
 * Command-line front end.
 *
 *   phrasekey encode 0b981ed2fa2af73b   → bacca cavort west volley
 *   phrasekey decode bacca cavort west volley → 0b981ed2fa2af73b
 *   phrasekey generate --words 8
 *
 * Tokenizing and case folding happen here, never in the codec: decode
 * arguments are split on whitespace and only lower-cased with --ignore-case.
 */

import { Command, CommanderError, InvalidArgumentError } from 'commander'
import { decode, encode } from './codec.ts'
import { loadConfig } from './config.ts'
import type { Config } from './config.ts'
import { PhrasekeyError } from './errors.ts'
import { generatePassphrase } from './generate.ts'
import { parseHex, toHex } from './hex.ts'
import { createLogger, setLogLevel } from './logger.ts'
import type { Result } from './types.ts'

// stdout carries the passphrase or hex result, so logs never go there
const log = createLogger('cli', { stderrOnly: true })

const VERSION = '0.1.0'

export interface CliIO {
  /** Receives command results (passphrases, hex, help text). */
  readonly out: (text: string) => void
  /** Receives commander's own usage errors. */
  readonly err: (text: string) => void
}

const processIO: CliIO = {
  out: (text) => process.stdout.write(text),
  err: (text) => process.stderr.write(text),
}

type GlobalOptions = {
  readonly separator?: string
  readonly verbose?: boolean
}

type DecodeOptions = {
  readonly ignoreCase?: boolean
}

type GenerateOptions = {
  readonly words?: number
}

function unwrap<T>(result: Result<T, PhrasekeyError>): T {
  if (!result.ok) throw result.error
  return result.value
}

function parseWordCount(value: string): number {
  const n = Number(value)
  if (value.trim() === '' || !Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError('must be a non-negative integer')
  }
  return n
}

/** Splits on runs of whitespace and drops empty tokens. */
export function tokenize(args: readonly string[]): string[] {
  return args.join(' ').split(/\s+/).filter((token) => token !== '')
}

export function createProgram(config: Config, io: CliIO = processIO): Command {
  const program = new Command()

  program
    .name('phrasekey')
    .description('Convert bytes to dictionary passphrases (16 bits per word) and back')
    .version(VERSION)
    .option('-s, --separator <sep>', 'string printed between words')
    .option('-v, --verbose', 'log debug output')
    .exitOverride()
    .configureOutput({ writeOut: io.out, writeErr: io.err })

  program.hook('preAction', (thisCommand) => {
    if (thisCommand.opts<GlobalOptions>().verbose === true) setLogLevel('debug')
  })

  const separatorOf = (command: Command): string =>
    command.optsWithGlobals<GlobalOptions>().separator ?? config.separator

  program
    .command('encode')
    .description('encode an even-length hex byte string as a passphrase')
    .argument('<hex>', 'bytes as hex, optional 0x prefix')
    .action((hex: string, _options: unknown, command: Command) => {
      const bytes = unwrap(parseHex(hex))
      const words = unwrap(encode(bytes))
      log.debug('Encoded bytes', { bytes: bytes.length, words: words.length })
      io.out(words.join(separatorOf(command)) + '\n')
    })

  program
    .command('decode')
    .description('decode passphrase words back into hex bytes')
    .argument('<words...>', 'passphrase words, separated by whitespace')
    .option('-i, --ignore-case', 'lower-case words before lookup')
    .action((args: string[], options: DecodeOptions) => {
      const tokens = tokenize(args)
      const words = options.ignoreCase === true ? tokens.map((w) => w.toLowerCase()) : tokens
      const bytes = unwrap(decode(words))
      log.debug('Decoded passphrase', { words: words.length, bytes: bytes.length })
      io.out(toHex(bytes) + '\n')
    })

  program
    .command('generate')
    .description('print a random passphrase')
    .option('-n, --words <count>', 'number of words (16 bits each)', parseWordCount)
    .action((options: GenerateOptions, command: Command) => {
      const count = options.words ?? config.defaultWords
      const words = unwrap(generatePassphrase(count))
      log.debug('Generated passphrase', { words: words.length, bits: words.length * 16 })
      io.out(words.join(separatorOf(command)) + '\n')
    })

  return program
}

/**
 * Runs the CLI against a full argv (node, script, ...args) and resolves to
 * the process exit code.
 */
export async function runCli(
  argv: readonly string[],
  io: CliIO = processIO,
  env: NodeJS.ProcessEnv = process.env,
): Promise<number> {
  const configResult = loadConfig(env)
  if (!configResult.ok) {
    log.error('Configuration error', { error: configResult.error.message })
    return 1
  }
  setLogLevel(configResult.value.logLevel)

  const program = createProgram(configResult.value, io)
  try {
    await program.parseAsync([...argv])
    return 0
  } catch (e) {
    if (e instanceof CommanderError) return e.exitCode
    if (e instanceof PhrasekeyError) {
      log.error(e.message, { code: e.code })
      return 1
    }
    throw e
  }
}
