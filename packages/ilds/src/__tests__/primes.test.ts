import { describe, it, expect } from 'vitest'
import { PRIME_TABLE, firstPrimes, isPrime, nonPrimeBases } from '../primes'

describe('PRIME_TABLE', () => {
  it('holds the first 1000 primes', () => {
    expect(PRIME_TABLE).toHaveLength(1000)
    expect(PRIME_TABLE.slice(0, 10)).toEqual([2, 3, 5, 7, 11, 13, 17, 19, 23, 29])
    expect(PRIME_TABLE[999]).toBe(7919)
  })

  it('contains only primes in increasing order', () => {
    let prev = 1
    for (const p of PRIME_TABLE) {
      expect(isPrime(p)).toBe(true)
      expect(p).toBeGreaterThan(prev)
      prev = p
    }
  })
})

describe('firstPrimes', () => {
  it('slices the table', () => {
    expect(firstPrimes(4)).toEqual([2, 3, 5, 7])
    expect(firstPrimes(0)).toEqual([])
  })

  it('rejects counts beyond the table', () => {
    expect(() => firstPrimes(1001)).toThrow(RangeError)
    expect(() => firstPrimes(-1)).toThrow(RangeError)
  })
})

describe('isPrime', () => {
  it('classifies small integers', () => {
    expect(isPrime(0)).toBe(false)
    expect(isPrime(1)).toBe(false)
    expect(isPrime(2)).toBe(true)
    expect(isPrime(9)).toBe(false)
    expect(isPrime(97)).toBe(true)
    expect(isPrime(7921)).toBe(false) // 89^2
  })
})

describe('nonPrimeBases', () => {
  it('returns composite bases in input order', () => {
    expect(nonPrimeBases([2, 4, 9, 3])).toEqual([4, 9])
    expect(nonPrimeBases([2, 3, 5])).toEqual([])
  })
})
