/**
 * N-dimensional integer Halton sequence.
 *
 * Same contract as `Halton`, over an ordered list of Van der Corput
 * generators instead of a fixed pair. All dimensions are reseeded together,
 * so output i of every dimension corresponds to the same counter value.
 */

import { DimensionMismatchError } from './errors'
import { firstPrimes } from './primes'
import { VdCorput, assertCount } from './vdcorput'

export class HaltonN {
  private readonly vdcs: VdCorput[]

  constructor(bases: readonly number[], scales: readonly number[]) {
    if (bases.length === 0) {
      throw new DimensionMismatchError('HaltonN needs at least one base')
    }
    if (bases.length !== scales.length) {
      throw new DimensionMismatchError(
        `HaltonN got ${bases.length} bases but ${scales.length} scales`,
      )
    }
    this.vdcs = bases.map((base, i) => new VdCorput(base, scales[i]))
  }

  /**
   * Generator over the first `dim` primes, every dimension at `scale`.
   *
   * @example
   * HaltonN.withPrimeBases(3, 10).pop() // [512, 19683, 1953125]
   */
  static withPrimeBases(dim: number, scale: number): HaltonN {
    return new HaltonN(firstPrimes(dim), new Array<number>(dim).fill(scale))
  }

  get dimension(): number {
    return this.vdcs.length
  }

  get bases(): number[] {
    return this.vdcs.map((v) => v.base)
  }

  get scales(): number[] {
    return this.vdcs.map((v) => v.scale)
  }

  pop(): number[] {
    return this.vdcs.map((v) => v.pop())
  }

  popBatch(n: number): number[][] {
    assertCount(n)
    const out: number[][] = []
    for (let i = 0; i < n; i++) out.push(this.pop())
    return out
  }

  reseed(seed: number): void {
    for (const v of this.vdcs) v.reseed(seed)
  }
}
