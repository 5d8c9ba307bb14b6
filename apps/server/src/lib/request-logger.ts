/**
 * Structured request logging middleware.
 *
 * Emits one JSON line per request with timestamp, HTTP method, path,
 * response status and duration in ms. Writes to stdout unless a sink is given.
 */

import type { Context, Next } from 'hono'

export type LogSink = (line: string) => void

export const stdoutSink: LogSink = (line) => { process.stdout.write(line) }
export const stderrSink: LogSink = (line) => { process.stderr.write(line) }

/** Serialize one log entry with a leading ISO timestamp. */
export function logLine(fields: Record<string, unknown>, now: Date = new Date()): string {
  return JSON.stringify({ ts: now.toISOString(), ...fields }) + '\n'
}

export function requestLogger(sink: LogSink = stdoutSink) {
  return async (c: Context, next: Next): Promise<void> => {
    const start = performance.now()
    await next()
    const ms = (performance.now() - start).toFixed(1)

    sink(logLine({
      event: 'request',
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      ms: Number(ms),
    }))
  }
}
