/**
 * Integer Halton sequence (2-D): two Van der Corput generators advanced in
 * lock-step. Pick coprime bases (2 and 3 by default) so the two coordinates
 * do not share gaps.
 */

import { VdCorput, assertCount } from './vdcorput'

export type HaltonPoint = [number, number]

export const DEFAULT_HALTON_BASES: readonly [number, number] = [2, 3]
export const DEFAULT_HALTON_SCALES: readonly [number, number] = [11, 7]

/**
 * @example
 * const h = new Halton([2, 3], [11, 7])
 * h.reseed(0)
 * h.pop() // [1024, 729]
 */
export class Halton {
  private readonly vdc0: VdCorput
  private readonly vdc1: VdCorput

  constructor(
    bases: readonly [number, number] = DEFAULT_HALTON_BASES,
    scales: readonly [number, number] = DEFAULT_HALTON_SCALES,
  ) {
    this.vdc0 = new VdCorput(bases[0], scales[0])
    this.vdc1 = new VdCorput(bases[1], scales[1])
  }

  get bases(): HaltonPoint {
    return [this.vdc0.base, this.vdc1.base]
  }

  get scales(): HaltonPoint {
    return [this.vdc0.scale, this.vdc1.scale]
  }

  pop(): HaltonPoint {
    return [this.vdc0.pop(), this.vdc1.pop()]
  }

  popBatch(n: number): HaltonPoint[] {
    assertCount(n)
    const out: HaltonPoint[] = []
    for (let i = 0; i < n; i++) out.push(this.pop())
    return out
  }

  /** Reseed both dimensions to the same counter. */
  reseed(seed: number): void {
    this.vdc0.reseed(seed)
    this.vdc1.reseed(seed)
  }
}
