import { serve } from '@hono/node-server'
import { createApp } from './app'
import { loadEnv } from './lib/env'
import { logLine } from './lib/request-logger'

const env = loadEnv()

const app = createApp({
  maxCount: env.MAX_COUNT,
  corsOrigins: env.CORS_ORIGINS,
  rateLimitMax: env.RATE_LIMIT_MAX,
  exposeStack: env.NODE_ENV !== 'production',
})

// ---------------------------------------------------------------------------
// Server start + graceful shutdown
// ---------------------------------------------------------------------------

const server = serve({ fetch: app.fetch, port: env.PORT }, (info) => {
  process.stdout.write(logLine({
    event: 'server_started',
    port: info.port,
    env: env.NODE_ENV,
  }))
})

function shutdown(signal: string) {
  process.stdout.write(logLine({ event: 'shutdown', signal }))

  server.close(() => process.exit(0))
  setTimeout(() => process.exit(1), 10_000).unref()
}

process.on('SIGTERM', () => shutdown('SIGTERM'))
process.on('SIGINT', () => shutdown('SIGINT'))
