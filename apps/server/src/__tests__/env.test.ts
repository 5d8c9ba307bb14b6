import { describe, it, expect } from 'vitest'
import { loadEnv } from '../lib/env'

describe('loadEnv', () => {
  it('applies defaults', () => {
    expect(loadEnv({})).toEqual({
      PORT: 4000,
      NODE_ENV: 'development',
      CORS_ORIGINS: ['http://localhost:3000'],
      MAX_COUNT: 10000,
      RATE_LIMIT_MAX: 100,
    })
  })

  it('splits CORS_ORIGINS on commas', () => {
    const env = loadEnv({ CORS_ORIGINS: 'http://a.test,http://b.test' })
    expect(env.CORS_ORIGINS).toEqual(['http://a.test', 'http://b.test'])
  })

  it('fails fast on a malformed number', () => {
    expect(() => loadEnv({ MAX_COUNT: 'lots' })).toThrow(
      "Invalid MAX_COUNT: expected a positive integer, got 'lots'.",
    )
    expect(() => loadEnv({ PORT: '0' })).toThrow(/Invalid PORT/)
  })
})
