/**
 * Build reseeded generators from validated configs.
 * Shared by the CLI and the HTTP service so both resolve defaults the same way.
 */

import { Halton } from './halton'
import { HaltonN } from './halton-n'
import { firstPrimes } from './primes'
import type { HaltonConfig, HaltonNConfig, VdCorputConfig } from './schemas'
import { VdCorput } from './vdcorput'

type Seeded<T> = Omit<T, 'count'>

export function createVdCorput(config: Seeded<VdCorputConfig>): VdCorput {
  const vdc = new VdCorput(config.base, config.scale)
  vdc.reseed(config.seed)
  return vdc
}

export function createHalton(config: Seeded<HaltonConfig>): Halton {
  const halton = new Halton(config.bases, config.scales)
  halton.reseed(config.seed)
  return halton
}

export function createHaltonN(config: Seeded<HaltonNConfig>): HaltonN {
  const bases = config.bases ?? firstPrimes(config.dim ?? 0)
  const scales = config.scales ?? bases.map(() => config.scale)
  const halton = new HaltonN(bases, scales)
  halton.reseed(config.seed)
  return halton
}
