import { describe, it, expect, beforeEach } from 'vitest'
import { Hono } from 'hono'
import { rateLimit } from '../lib/rate-limit'

describe('Rate Limiter', () => {
  let app: Hono
  let clock: number

  beforeEach(() => {
    app = new Hono()
    clock = 1_000_000
  })

  const now = () => clock

  it('allows requests under the limit', async () => {
    app.get('/test', rateLimit({ windowMs: 60_000, max: 3, now }), (c) => c.text('ok'))

    for (let i = 0; i < 3; i++) {
      const res = await app.request('/test', {
        headers: { 'x-forwarded-for': '10.0.0.1' },
      })
      expect(res.status).toBe(200)
    }
  })

  it('returns 429 with Retry-After when the limit is exceeded', async () => {
    app.get('/test', rateLimit({ windowMs: 60_000, max: 2, now }), (c) => c.text('ok'))

    const headers = { 'x-forwarded-for': '10.0.0.2' }
    await app.request('/test', { headers })
    await app.request('/test', { headers })

    clock += 15_000
    const res = await app.request('/test', { headers })
    expect(res.status).toBe(429)
    expect(res.headers.get('Retry-After')).toBe('45')
    expect(await res.json()).toEqual({ error: 'Too many requests. Please try again later.' })
  })

  it('keys on the first forwarded address', async () => {
    app.get('/test', rateLimit({ windowMs: 60_000, max: 1, now }), (c) => c.text('ok'))

    const res1 = await app.request('/test', { headers: { 'x-forwarded-for': '10.0.0.3, 172.16.0.1' } })
    const res2 = await app.request('/test', { headers: { 'x-forwarded-for': '10.0.0.3' } })
    const res3 = await app.request('/test', { headers: { 'x-forwarded-for': '10.0.0.4' } })

    expect(res1.status).toBe(200)
    expect(res2.status).toBe(429)
    expect(res3.status).toBe(200)
  })

  it('supports custom key function', async () => {
    app.get(
      '/test',
      rateLimit({
        windowMs: 60_000,
        max: 1,
        now,
        keyFn: (c) => c.req.header('x-api-key') ?? 'anon',
      }),
      (c) => c.text('ok'),
    )

    const res1 = await app.request('/test', { headers: { 'x-api-key': 'test-key' } })
    const res2 = await app.request('/test', { headers: { 'x-api-key': 'test-key' } })

    expect(res1.status).toBe(200)
    expect(res2.status).toBe(429)
  })

  it('resets after window expires', async () => {
    app.get('/test', rateLimit({ windowMs: 50, max: 1, now }), (c) => c.text('ok'))

    const headers = { 'x-forwarded-for': '10.0.0.5' }
    expect((await app.request('/test', { headers })).status).toBe(200)
    expect((await app.request('/test', { headers })).status).toBe(429)

    clock += 51
    expect((await app.request('/test', { headers })).status).toBe(200)
  })

  it('keeps separate counters per limiter', async () => {
    app.get('/a', rateLimit({ windowMs: 60_000, max: 1, now }), (c) => c.text('a'))
    app.get('/b', rateLimit({ windowMs: 60_000, max: 1, now }), (c) => c.text('b'))

    const headers = { 'x-forwarded-for': '10.0.0.6' }
    expect((await app.request('/a', { headers })).status).toBe(200)
    expect((await app.request('/b', { headers })).status).toBe(200)
  })
})
