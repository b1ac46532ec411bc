/**
 * Structured logging for the benchmark.
 *
 * Emits one JSON line per entry with `ts`, `level`, `msg` and any extra
 * fields. Info and below go to stdout, warn and error to stderr.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export type LogFields = Record<string, unknown>

export interface Logger {
  debug(msg: string, fields?: LogFields): void
  info(msg: string, fields?: LogFields): void
  warn(msg: string, fields?: LogFields): void
  error(msg: string, fields?: LogFields): void
}

/** Where a finished line goes; defaults to the process streams. */
export type LogSink = (level: LogLevel, line: string) => void

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 }

const processSink: LogSink = (level, line) => {
  if (level === 'warn' || level === 'error') process.stderr.write(line)
  else process.stdout.write(line)
}

export function createLogger(minLevel: LogLevel = 'info', sink: LogSink = processSink): Logger {
  const emit = (level: LogLevel, msg: string, fields?: LogFields): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return
    const entry = { ts: new Date().toISOString(), level, msg, ...fields }
    sink(level, JSON.stringify(entry) + '\n')
  }

  return {
    debug: (msg, fields) => emit('debug', msg, fields),
    info: (msg, fields) => emit('info', msg, fields),
    warn: (msg, fields) => emit('warn', msg, fields),
    error: (msg, fields) => emit('error', msg, fields),
  }
}
