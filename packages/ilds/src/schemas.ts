import { z } from 'zod'
import { DEFAULT_HALTON_BASES, DEFAULT_HALTON_SCALES } from './halton'
import { PRIME_TABLE } from './primes'
import { DEFAULT_BASE, DEFAULT_SCALE } from './vdcorput'

// Shape checks only. base^scale overflow is the generator constructor's job,
// since it depends on both fields together.

const base = z.number().int().min(2, 'Base must be >= 2').max(Number.MAX_SAFE_INTEGER)
const scale = z.number().int().min(0, 'Scale must be >= 0').max(64)
const seed = z.number().int().min(0).max(Number.MAX_SAFE_INTEGER)
const count = z.number().int().min(0)
// Explicit bases are held to the same dimension limit as `dim`.
const maxDim = PRIME_TABLE.length

export const vdcorputConfigSchema = z.object({
  base: base.default(DEFAULT_BASE),
  scale: scale.default(DEFAULT_SCALE),
  seed: seed.default(0),
  count,
})

export const haltonConfigSchema = z.object({
  bases: z.tuple([base, base]).default([DEFAULT_HALTON_BASES[0], DEFAULT_HALTON_BASES[1]]),
  scales: z.tuple([scale, scale]).default([DEFAULT_HALTON_SCALES[0], DEFAULT_HALTON_SCALES[1]]),
  seed: seed.default(0),
  count,
})

/**
 * Either explicit `bases`, or `dim` to take the first `dim` primes. Both may
 * be given only when `dim` equals `bases.length`.
 * `scales` gives one scale per dimension; otherwise `scale` applies to all.
 */
export const haltonNConfigSchema = z
  .object({
    bases: z.array(base).min(1).max(maxDim, `At most ${maxDim} dimensions`).optional(),
    dim: z.number().int().min(1).max(maxDim).optional(),
    scales: z.array(scale).min(1).max(maxDim, `At most ${maxDim} dimensions`).optional(),
    scale: scale.default(DEFAULT_SCALE),
    seed: seed.default(0),
    count,
  })
  .refine((v) => v.bases !== undefined || v.dim !== undefined, {
    message: 'Either bases or dim is required',
    path: ['bases'],
  })
  .refine((v) => v.bases === undefined || v.dim === undefined || v.dim === v.bases.length, {
    message: 'dim must equal the number of bases',
    path: ['dim'],
  })

/** Counts past the end of the prime table are clamped to it. */
export const primesQuerySchema = z.object({
  count: z.coerce
    .number()
    .int()
    .min(0)
    .default(20)
    .transform((n) => Math.min(n, PRIME_TABLE.length)),
})

export type VdCorputConfig = z.infer<typeof vdcorputConfigSchema>
export type HaltonConfig = z.infer<typeof haltonConfigSchema>
export type HaltonNConfig = z.infer<typeof haltonNConfigSchema>
export type PrimesQuery = z.infer<typeof primesQuerySchema>
