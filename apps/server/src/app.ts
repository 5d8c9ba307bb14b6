import { Hono } from 'hono'
import type { ContentfulStatusCode } from 'hono/utils/http-status'
import { HTTPException } from 'hono/http-exception'
import { cors } from 'hono/cors'
import { isIldsError } from '@ilds-gen/core'
import { rateLimit } from './lib/rate-limit'
import { logLine, requestLogger, stderrSink, stdoutSink, type LogSink } from './lib/request-logger'
import { sequenceRoutes } from './routes/sequences'

export const API_NAME = 'ilds-gen'
export const API_VERSION = '0.1.0'

export interface AppOptions {
  maxCount: number
  corsOrigins: string[]
  /** Sequence requests per client per minute. */
  rateLimitMax: number
  /** Include stack traces in error logs. */
  exposeStack: boolean
  accessLog?: LogSink
  /** Errors and warnings; stderr by default. */
  errorLog?: LogSink
}

export function createApp(options: AppOptions): Hono {
  const app = new Hono()
  const errorLog = options.errorLog ?? stderrSink

  // -------------------------------------------------------------------------
  // Global error handling
  // -------------------------------------------------------------------------

  app.onError((err, c) => {
    if (isIldsError(err)) {
      return c.json({ error: err.message, code: err.code }, 400)
    }

    const status: ContentfulStatusCode = err instanceof HTTPException ? err.status : 500
    if (status >= 500) {
      errorLog(logLine({
        level: 'error',
        method: c.req.method,
        path: c.req.path,
        error: err.message,
        stack: options.exposeStack ? err.stack : undefined,
      }))
    }
    return c.json(
      { error: status >= 500 ? 'Internal server error.' : err.message },
      status,
    )
  })

  app.notFound((c) => c.json({ error: 'Not found.' }, 404))

  // -------------------------------------------------------------------------
  // Middleware stack (order matters)
  // -------------------------------------------------------------------------

  // 1. Request logging (first so it captures total duration)
  app.use('*', requestLogger(options.accessLog ?? stdoutSink))

  // 2. CORS
  app.use(
    '*',
    cors({
      origin: options.corsOrigins,
      allowMethods: ['GET', 'POST', 'OPTIONS'],
      allowHeaders: ['Content-Type'],
      maxAge: 86400,
    }),
  )

  // 3. Rate limiting on generator endpoints
  app.use('/sequences/*', rateLimit({ windowMs: 60_000, max: options.rateLimitMax }))

  // -------------------------------------------------------------------------
  // Routes
  // -------------------------------------------------------------------------

  app.get('/health', (c) => c.json({ status: 'healthy' }))
  app.get('/', (c) => c.json({ name: API_NAME, version: API_VERSION }))
  app.route('/sequences', sequenceRoutes({ maxCount: options.maxCount, log: errorLog }))

  return app
}
