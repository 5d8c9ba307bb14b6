/**
 * Structured CLI logging.
 *
 * One JSON line per entry (ts, level, event, extra fields). Defaults to
 * stderr so stdout carries nothing but sequence output and can be piped.
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const
export type LogLevel = (typeof LOG_LEVELS)[number]

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
}

type Fields = Record<string, unknown>

export interface Logger {
  debug(event: string, fields?: Fields): void
  info(event: string, fields?: Fields): void
  warn(event: string, fields?: Fields): void
  error(event: string, fields?: Fields): void
}

export interface LoggerOptions {
  level: LogLevel
  write?: (line: string) => void
  now?: () => Date
}

export function createLogger(options: LoggerOptions): Logger {
  const write = options.write ?? ((line: string) => { process.stderr.write(line) })
  const now = options.now ?? (() => new Date())
  const threshold = SEVERITY[options.level]

  const emit = (level: LogLevel) => (event: string, fields: Fields = {}): void => {
    if (SEVERITY[level] < threshold) return
    write(JSON.stringify({ ts: now().toISOString(), level, event, ...fields }) + '\n')
  }

  return {
    debug: emit('debug'),
    info: emit('info'),
    warn: emit('warn'),
    error: emit('error'),
  }
}
