/**
 * @ilds-gen/core
 *
 * Integer low-discrepancy sequence generators built on exact digit reversal.
 *
 * - VdCorput: 1-D integer Van der Corput sequence in [0, base^scale)
 * - Halton: 2-D lock-step pair of VdCorput generators
 * - HaltonN: N-D generalization over an ordered list of bases
 */

// Generators
export {
  VdCorput,
  radicalInverse,
  scaleFactor,
  DEFAULT_BASE,
  DEFAULT_SCALE,
} from './vdcorput'
export {
  Halton,
  DEFAULT_HALTON_BASES,
  DEFAULT_HALTON_SCALES,
  type HaltonPoint,
} from './halton'
export { HaltonN } from './halton-n'
export { createVdCorput, createHalton, createHaltonN } from './factory'

// Primes
export { PRIME_TABLE, firstPrimes, isPrime, nonPrimeBases } from './primes'

// Errors
export {
  IldsError,
  InvalidBaseError,
  InvalidScaleError,
  ScaleOverflowError,
  InvalidSeedError,
  InvalidCountError,
  CounterOverflowError,
  DimensionMismatchError,
  isIldsError,
  type IldsErrorCode,
} from './errors'

// Config schemas
export {
  vdcorputConfigSchema,
  haltonConfigSchema,
  haltonNConfigSchema,
  primesQuerySchema,
  type VdCorputConfig,
  type HaltonConfig,
  type HaltonNConfig,
  type PrimesQuery,
} from './schemas'
