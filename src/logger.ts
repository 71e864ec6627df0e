/**
 * JSON-lines logger for the command-line front end.
 *
 * The codec itself never logs; failures travel back as Result values and
 * the CLI decides what to report. By default debug/info go to stdout and
 * warn/error to stderr; a logger created with `stderrOnly` keeps stdout free
 * for command output.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error']
const LOG_LEVEL_SET: ReadonlySet<string> = new Set<LogLevel>(LOG_LEVELS)

interface LogEntry {
  readonly level: LogLevel
  readonly msg: string
  readonly time: string
  readonly component?: string
  readonly [key: string]: unknown
}

const LEVEL_PRIORITY: Readonly<Record<LogLevel, number>> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

let currentLevel: LogLevel = 'info'

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVEL_SET.has(value)
}

export function setLogLevel(level: LogLevel): void {
  currentLevel = level
}

export function getLogLevel(): LogLevel {
  return currentLevel
}

export interface LoggerOptions {
  /** Write every level to stderr. */
  readonly stderrOnly?: boolean
}

function writeLog(
  level: LogLevel,
  msg: string,
  component: string | undefined,
  options: LoggerOptions,
  ctx?: Record<string, unknown>,
): void {
  if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[currentLevel]) return

  const entry: LogEntry = {
    level,
    msg,
    time: new Date().toISOString(),
    ...(component !== undefined ? { component } : {}),
    ...ctx,
  }
  const out = JSON.stringify(entry)
  if (options.stderrOnly === true || level === 'error' || level === 'warn') {
    process.stderr.write(out + '\n')
  } else {
    process.stdout.write(out + '\n')
  }
}

export interface Logger {
  debug(msg: string, ctx?: Record<string, unknown>): void
  info(msg: string, ctx?: Record<string, unknown>): void
  warn(msg: string, ctx?: Record<string, unknown>): void
  error(msg: string, ctx?: Record<string, unknown>): void
}

/** Logger whose entries carry `component`. Level is shared process-wide. */
export function createLogger(component?: string, options: LoggerOptions = {}): Logger {
  return {
    debug: (msg, ctx) => writeLog('debug', msg, component, options, ctx),
    info: (msg, ctx) => writeLog('info', msg, component, options, ctx),
    warn: (msg, ctx) => writeLog('warn', msg, component, options, ctx),
    error: (msg, ctx) => writeLog('error', msg, component, options, ctx),
  }
}

export const logger = createLogger()
