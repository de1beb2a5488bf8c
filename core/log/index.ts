/**
 * Leveled console logger
 *
 * `verbose` sits below `debug` and carries per-provider notes; `debug`
 * carries resolution decisions.
 *
 * @module core/log
 */

export type LogLevel = 'verbose' | 'debug' | 'info' | 'warn' | 'error' | 'silent'

export const LOG_LEVELS: Record<LogLevel, number> = {
  verbose: 5,
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

/**
 * Receives formatted lines. Defaults to the console.
 */
export type LogSink = (level: Exclude<LogLevel, 'silent'>, line: string) => void

export interface Logger {
  level: LogLevel
  verbose(msg: string, extra?: unknown): void
  debug(msg: string, extra?: unknown): void
  info(msg: string, extra?: unknown): void
  warn(msg: string, extra?: unknown): void
  error(msg: string, extra?: unknown): void
}

export interface LoggerOptions {
  level?: LogLevel
  sink?: LogSink
  /** Prepend an ISO timestamp to each line */
  timestamps?: boolean
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value)
}

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case 'error':
      console.error(line)
      break
    case 'warn':
      console.warn(line)
      break
    case 'info':
      console.info(line)
      break
    default:
      console.debug(line)
  }
}

function fmt(level: LogLevel, msg: string, extra: unknown, timestamps: boolean): string {
  const time = timestamps ? `${new Date().toISOString()} ` : ''
  const head = `[apkdeps] ${time}${level.toUpperCase()} ${msg}`
  if (extra === undefined) return head
  if (extra instanceof Error) return `${head} ${extra.message}`
  return `${head} ${JSON.stringify(extra)}`
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const sink = options.sink ?? consoleSink
  const timestamps = options.timestamps ?? false

  const emit = (logger: Logger, level: Exclude<LogLevel, 'silent'>, msg: string, extra: unknown): void => {
    if (LOG_LEVELS[logger.level] <= LOG_LEVELS[level]) {
      sink(level, fmt(level, msg, extra, timestamps))
    }
  }

  return {
    level: options.level ?? 'info',
    verbose(msg, extra) { emit(this, 'verbose', msg, extra) },
    debug(msg, extra) { emit(this, 'debug', msg, extra) },
    info(msg, extra) { emit(this, 'info', msg, extra) },
    warn(msg, extra) { emit(this, 'warn', msg, extra) },
    error(msg, extra) { emit(this, 'error', msg, extra) },
  }
}

/**
 * Logger that drops everything, for callers that pass none.
 */
export const silentLogger: Logger = createLogger({ level: 'silent' })
