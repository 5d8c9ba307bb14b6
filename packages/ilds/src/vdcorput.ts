/**
 * Integer Van der Corput sequence.
 *
 * Maps the counter k = 1, 2, 3, ... to floor(base^scale * φ_b(k)), where φ_b is
 * the radical inverse in base b: the base-b digits of k reversed behind the
 * radix point. Computed with exact integer division, so output is identical on
 * every platform.
 *
 * Outputs are pairwise distinct for count ∈ [1, base^scale] and cover
 * [0, base^scale) exactly once. Past that point digits above `scale` fall off
 * and the sequence starts colliding with itself.
 */

import {
  CounterOverflowError,
  InvalidBaseError,
  InvalidCountError,
  InvalidScaleError,
  InvalidSeedError,
  ScaleOverflowError,
} from './errors'

export const DEFAULT_BASE = 2
export const DEFAULT_SCALE = 10

// ---------------------------------------------------------------------------
// Precondition checks (shared with Halton / HaltonN)
// ---------------------------------------------------------------------------

export function assertBase(base: number): void {
  if (!Number.isSafeInteger(base) || base < 2) throw new InvalidBaseError(base)
}

export function assertScale(scale: number): void {
  if (!Number.isInteger(scale) || scale < 0) throw new InvalidScaleError(scale)
}

export function assertSeed(seed: number): void {
  if (!Number.isSafeInteger(seed) || seed < 0) throw new InvalidSeedError(seed)
}

export function assertCount(count: number): void {
  if (!Number.isSafeInteger(count) || count < 0) throw new InvalidCountError(count)
}

/**
 * Compute base^scale exactly, or throw once the product leaves the safe
 * integer range.
 */
export function scaleFactor(base: number, scale: number): number {
  assertBase(base)
  assertScale(scale)
  let factor = 1
  for (let i = 0; i < scale; i++) {
    factor *= base
    if (factor > Number.MAX_SAFE_INTEGER) throw new ScaleOverflowError(base, scale)
  }
  return factor
}

/**
 * Integer radical inverse of `k` in `base`, scaled by `factor`.
 * Pure function; `VdCorput.pop` is this applied to the advancing counter.
 */
export function radicalInverse(k: number, base: number, factor: number): number {
  // base 0 or 1 never shrinks k
  assertBase(base)
  let result = 0
  let f = factor
  while (k !== 0) {
    // (x - x % b) / b is exact for any safe integer; Math.floor(x / b) can round up near 2^53
    f = (f - (f % base)) / base
    const remainder = k % base
    k = (k - remainder) / base
    result += remainder * f
  }
  return result
}

// ---------------------------------------------------------------------------
// Generator
// ---------------------------------------------------------------------------

/**
 * Stateful integer Van der Corput generator.
 *
 * @example
 * const vdc = new VdCorput(2, 10)
 * vdc.reseed(0)
 * vdc.pop() // 512
 * vdc.pop() // 256
 */
export class VdCorput {
  readonly base: number
  readonly scale: number
  /** base^scale, cached at construction. */
  readonly factor: number
  private cursor: number

  constructor(base: number = DEFAULT_BASE, scale: number = DEFAULT_SCALE) {
    this.factor = scaleFactor(base, scale)
    this.base = base
    this.scale = scale
    this.cursor = 0
  }

  /** Number of values drawn since the last reseed, plus the seed. */
  get count(): number {
    return this.cursor
  }

  /** Advance the counter and return the next value in [0, factor). */
  pop(): number {
    if (this.cursor >= Number.MAX_SAFE_INTEGER) throw new CounterOverflowError()
    this.cursor++
    return radicalInverse(this.cursor, this.base, this.factor)
  }

  /** Draw `n` successive values. */
  popBatch(n: number): number[] {
    assertCount(n)
    const out = new Array<number>(n)
    for (let i = 0; i < n; i++) out[i] = this.pop()
    return out
  }

  /**
   * Overwrite the counter. The next `pop()` returns the radical inverse of
   * `seed + 1`.
   */
  reseed(seed: number): void {
    assertSeed(seed)
    this.cursor = seed
  }
}
