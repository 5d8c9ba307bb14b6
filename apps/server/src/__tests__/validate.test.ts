import { describe, it, expect } from 'vitest'
import { Hono } from 'hono'
import { z } from 'zod'
import { parseBody, parseQuery, isResponse } from '../lib/validate'

describe('Validation Helper', () => {
  const schema = z.object({
    base: z.number().int().min(2),
    seed: z.number().int().min(0).optional(),
  })

  function bodyApp() {
    const app = new Hono()
    app.post('/test', async (c) => {
      const result = await parseBody(c, schema)
      if (isResponse(result)) return result
      return c.json({ parsed: result })
    })
    return app
  }

  const send = (app: Hono, body: string) =>
    app.request('/test', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body,
    })

  describe('parseBody', () => {
    it('parses valid JSON body', async () => {
      const res = await send(bodyApp(), JSON.stringify({ base: 3, seed: 4 }))
      expect(res.status).toBe(200)
      expect(await res.json()).toEqual({ parsed: { base: 3, seed: 4 } })
    })

    it('returns 400 for invalid JSON', async () => {
      const res = await send(bodyApp(), 'not json')
      expect(res.status).toBe(400)
      expect(await res.json()).toEqual({ error: 'Invalid JSON body.' })
    })

    it('returns 400 with field errors for schema violations', async () => {
      const res = await send(bodyApp(), JSON.stringify({ base: 1, seed: -2 }))
      expect(res.status).toBe(400)
      const body = await res.json()
      expect(body.error).toBe('Validation failed.')
      expect(body.fields.base).toBeDefined()
      expect(body.fields.seed).toBeDefined()
    })

    it('rejects wrong types', async () => {
      const res = await send(bodyApp(), JSON.stringify({ base: '2' }))
      expect(res.status).toBe(400)
    })
  })

  describe('parseQuery', () => {
    const query = z.object({ count: z.coerce.number().int().min(0) })

    function queryApp() {
      const app = new Hono()
      app.get('/q', (c) => {
        const result = parseQuery(c, query)
        if (isResponse(result)) return result
        return c.json(result)
      })
      return app
    }

    it('coerces query values', async () => {
      const res = await queryApp().request('/q?count=7')
      expect(await res.json()).toEqual({ count: 7 })
    })

    it('returns 400 for invalid values', async () => {
      const res = await queryApp().request('/q?count=-1')
      expect(res.status).toBe(400)
      const body = await res.json()
      expect(body.fields.count).toBeDefined()
    })
  })

  describe('isResponse', () => {
    it('returns true for Response instances', () => {
      expect(isResponse(new Response())).toBe(true)
    })

    it('returns false for plain objects', () => {
      expect(isResponse({ base: 2 })).toBe(false)
      expect(isResponse(null)).toBe(false)
      expect(isResponse(42)).toBe(false)
    })
  })
})
