/**
 * Environment variable validation — fail-fast on startup.
 *
 * Every variable has a default; a value that is present but malformed
 * throws immediately rather than falling back silently.
 */

function optional(source: NodeJS.ProcessEnv, key: string, fallback: string): string {
  return source[key] ?? fallback
}

function positiveInt(key: string, raw: string): number {
  const value = Number(raw)
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new Error(`Invalid ${key}: expected a positive integer, got '${raw}'.`)
  }
  return value
}

export function loadEnv(source: NodeJS.ProcessEnv = process.env) {
  return {
    PORT: positiveInt('PORT', optional(source, 'PORT', '4000')),
    NODE_ENV: optional(source, 'NODE_ENV', 'development'),
    CORS_ORIGINS: optional(source, 'CORS_ORIGINS', 'http://localhost:3000').split(','),
    /** Upper bound on `count` for a single sequence request. */
    MAX_COUNT: positiveInt('MAX_COUNT', optional(source, 'MAX_COUNT', '10000')),
    /** Sequence requests per client per minute. */
    RATE_LIMIT_MAX: positiveInt('RATE_LIMIT_MAX', optional(source, 'RATE_LIMIT_MAX', '100')),
  } as const
}

export type ServerEnv = ReturnType<typeof loadEnv>
