import { Hono } from 'hono'
import type { Context } from 'hono'
import {
  createHalton,
  createHaltonN,
  createVdCorput,
  firstPrimes,
  haltonConfigSchema,
  haltonNConfigSchema,
  nonPrimeBases,
  primesQuerySchema,
  vdcorputConfigSchema,
} from '@ilds-gen/core'
import { parseBody, parseQuery, isResponse } from '../lib/validate'
import { logLine, type LogSink } from '../lib/request-logger'

// Generator precondition failures (overflow, dimension mismatch) are thrown
// as IldsError and mapped to 400 by the app-level error handler.

export interface SequenceRouteOptions {
  /** Upper bound on points per request; N-D requests are bounded by count × dimension. */
  maxCount: number
  /** Receives warnings such as non-prime bases. */
  log: LogSink
}

function countTooLarge(c: Context, message: string): Response {
  return c.json({ error: 'Validation failed.', fields: { count: [message] } }, 400)
}

export function sequenceRoutes({ maxCount, log }: SequenceRouteOptions): Hono {
  const routes = new Hono()

  const warnNonPrime = (c: Context, bases: readonly number[]): void => {
    const composite = nonPrimeBases(bases)
    if (composite.length === 0) return
    log(logLine({
      level: 'warn',
      event: 'non_prime_base',
      path: c.req.path,
      bases: composite,
      hint: 'Non-prime bases may reduce sequence uniformity',
    }))
  }

  /** POST /sequences/vdcorput — integer Van der Corput values */
  routes.post('/vdcorput', async (c) => {
    const data = await parseBody(c, vdcorputConfigSchema)
    if (isResponse(data)) return data
    if (data.count > maxCount) return countTooLarge(c, `Count must be <= ${maxCount}`)

    warnNonPrime(c, [data.base])
    const vdc = createVdCorput(data)
    return c.json({
      base: vdc.base,
      scale: vdc.scale,
      factor: vdc.factor,
      seed: data.seed,
      values: vdc.popBatch(data.count),
    })
  })

  /** POST /sequences/halton — 2-D integer Halton points */
  routes.post('/halton', async (c) => {
    const data = await parseBody(c, haltonConfigSchema)
    if (isResponse(data)) return data
    if (data.count > maxCount) return countTooLarge(c, `Count must be <= ${maxCount}`)

    warnNonPrime(c, data.bases)
    const halton = createHalton(data)
    return c.json({
      bases: halton.bases,
      scales: halton.scales,
      seed: data.seed,
      points: halton.popBatch(data.count),
    })
  })

  /** POST /sequences/halton-n — N-D integer Halton points */
  routes.post('/halton-n', async (c) => {
    const data = await parseBody(c, haltonNConfigSchema)
    if (isResponse(data)) return data
    const dimension = data.bases?.length ?? data.dim ?? 0
    if (data.count * dimension > maxCount) {
      return countTooLarge(c, `Count × dimension must be <= ${maxCount}`)
    }

    const halton = createHaltonN(data)
    warnNonPrime(c, halton.bases)
    return c.json({
      bases: halton.bases,
      scales: halton.scales,
      seed: data.seed,
      points: halton.popBatch(data.count),
    })
  })

  /** GET /sequences/primes?count=N — first N primes */
  routes.get('/primes', (c) => {
    const query = parseQuery(c, primesQuerySchema)
    if (isResponse(query)) return query
    return c.json({ primes: firstPrimes(query.count) })
  })

  return routes
}
