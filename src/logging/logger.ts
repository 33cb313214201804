import { appendFileSync } from 'node:fs'
import type { LogLevel, LoggingConfig } from '../types/config.js'

export type LogFields = Record<string, unknown>

/**
 * Leveled structured logger.
 *
 * Every record is one JSON object per line: `{ time, level, msg, ...fields }`.
 */
export interface Logger {
  debug(msg: string, fields?: LogFields): void
  info(msg: string, fields?: LogFields): void
  warn(msg: string, fields?: LogFields): void
  error(msg: string, fields?: LogFields): void
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: Number.POSITIVE_INFINITY,
}

export interface LoggerOptions {
  level: LogLevel
  /** Append records to this file instead of stderr. */
  path?: string
  /** Custom line sink; takes precedence over `path`. */
  write?: (line: string) => void
  /** Clock used for the `time` field. */
  now?: () => Date
}

/** JSON.stringify replacer for values JSON has no encoding for. */
function encodeField(_key: string, value: unknown): unknown {
  if (typeof value === 'bigint') return value.toString()
  if (value instanceof Uint8Array) return `<${value.byteLength} bytes>`
  if (value instanceof Error) return { name: value.name, message: value.message }
  return value
}

/**
 * Create a JSONL logger.
 *
 * Records below `level` are dropped. `silent` drops everything.
 */
export function createLogger(options: LoggerOptions): Logger {
  const threshold = LEVEL_RANK[options.level]
  const now = options.now ?? (() => new Date())
  const path = options.path
  const write =
    options.write ??
    (path !== undefined
      ? (line: string) => appendFileSync(path, line + '\n')
      : (line: string) => {
          process.stderr.write(line + '\n')
        })

  function emit(level: Exclude<LogLevel, 'silent'>, msg: string, fields: LogFields = {}): void {
    if (LEVEL_RANK[level] < threshold) return
    const record = { time: now().toISOString(), level, msg, ...fields }
    write(JSON.stringify(record, encodeField))
  }

  return {
    debug: (msg, fields) => emit('debug', msg, fields),
    info: (msg, fields) => emit('info', msg, fields),
    warn: (msg, fields) => emit('warn', msg, fields),
    error: (msg, fields) => emit('error', msg, fields),
  }
}

/** Logger built from the `logging` section of the configuration. */
export function loggerFromConfig(config: LoggingConfig): Logger {
  return createLogger({ level: config.level, path: config.path })
}

/** Logger that discards everything. Default for library use. */
export const noopLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
}
