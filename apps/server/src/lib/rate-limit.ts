/**
 * In-memory fixed-window rate limiter middleware for Hono.
 *
 * Each limiter owns its store, so separate route groups (and separate test
 * apps) never share counters. Expired entries are swept lazily on access,
 * leaving no background timer behind.
 */

import type { Context, Next } from 'hono'

export interface RateLimitConfig {
  /** Time window in milliseconds. */
  windowMs: number
  /** Maximum requests per window per key. */
  max: number
  /** Custom key extractor. Defaults to the first x-forwarded-for address. */
  keyFn?: (c: Context) => string
  now?: () => number
}

interface Entry {
  count: number
  resetAt: number
}

const SWEEP_EVERY = 1000

function clientKey(c: Context): string {
  return c.req.header('x-forwarded-for')?.split(',')[0]?.trim() || 'unknown'
}

export function rateLimit(config: RateLimitConfig) {
  const store = new Map<string, Entry>()
  const now = config.now ?? Date.now
  const keyFn = config.keyFn ?? clientKey
  let requests = 0

  function sweep(at: number): void {
    for (const [key, entry] of store) {
      if (at > entry.resetAt) store.delete(key)
    }
  }

  return async (c: Context, next: Next): Promise<Response | void> => {
    const at = now()
    if (++requests % SWEEP_EVERY === 0) sweep(at)

    const key = keyFn(c)
    const entry = store.get(key)

    if (!entry || at > entry.resetAt) {
      store.set(key, { count: 1, resetAt: at + config.windowMs })
      return next()
    }

    if (entry.count >= config.max) {
      c.header('Retry-After', String(Math.ceil((entry.resetAt - at) / 1000)))
      return c.json({ error: 'Too many requests. Please try again later.' }, 429)
    }

    entry.count++
    return next()
  }
}
