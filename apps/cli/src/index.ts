#!/usr/bin/env node
import { run } from './cli'
import { loadEnv } from './lib/env'
import { createLogger } from './lib/logger'

const env = loadEnv()
const logger = createLogger({ level: env.LOG_LEVEL })

try {
  process.exitCode = run(process.argv.slice(2), {
    out: (line) => { process.stdout.write(line + '\n') },
    err: (line) => { process.stderr.write(line + '\n') },
    logger,
  })
} catch (err) {
  logger.error('unhandled_error', {
    error: err instanceof Error ? err.message : String(err),
    stack: err instanceof Error ? err.stack : undefined,
  })
  process.exitCode = 1
}
