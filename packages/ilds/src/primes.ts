/**
 * Prime table for Halton bases.
 *
 * Distinct primes are pairwise coprime, which is what a Halton generator needs
 * from its bases; the first `dim` primes are the conventional choice.
 */

import table from './primes.json'

/** The first 1000 primes, 2 through 7919. */
export const PRIME_TABLE: readonly number[] = table

/** First `n` entries of the prime table. */
export function firstPrimes(n: number): number[] {
  if (!Number.isInteger(n) || n < 0 || n > PRIME_TABLE.length) {
    throw new RangeError(`Prime count must be an integer in [0, ${PRIME_TABLE.length}], got ${n}`)
  }
  return PRIME_TABLE.slice(0, n)
}

/** Trial division. */
export function isPrime(n: number): boolean {
  if (!Number.isInteger(n) || n < 2) return false
  if (n === 2) return true
  if (n % 2 === 0) return false
  for (let i = 3; i * i <= n; i += 2) {
    if (n % i === 0) return false
  }
  return true
}

/**
 * Bases that are legal but not prime. Such bases still generate a valid
 * sequence but can share factors with other dimensions and degrade uniformity.
 */
export function nonPrimeBases(bases: readonly number[]): number[] {
  return bases.filter((b) => !isPrime(b))
}
