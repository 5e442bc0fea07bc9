/**
 * Seeded pseudo-random streams
 * @module core/random/seeded-random
 */

/**
 * A uniform random stream in [0, 1).
 *
 * Every component that needs randomness takes one of these explicitly so
 * that output depends only on the seed the caller chose.
 */
export interface RandomSource {
  next(): number
}

export const LOWERCASE_ALPHABET = 'abcdefghijklmnopqrstuvwxyz'
export const DIGIT_ALPHABET = '0123456789'
export const ALPHANUMERIC_ALPHABET = LOWERCASE_ALPHABET + DIGIT_ALPHABET

/**
 * Mulberry32 generator. Same seed, same sequence, in every process.
 *
 * @example
 * ```typescript
 * const rng = new SeededRandom(42)
 * const a = rng.next()
 * new SeededRandom(42).next() === a // true
 * ```
 */
export class SeededRandom implements RandomSource {
  private state: number

  constructor(seed: number) {
    this.state = normalizeSeed(seed)
  }

  next(): number {
    this.state = (this.state + 0x6d2b79f5) | 0
    let t = Math.imul(this.state ^ (this.state >>> 15), 1 | this.state)
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }

  /**
   * Integer in [0, bound)
   */
  nextInt(bound: number): number {
    return randomIndex(this, bound)
  }

  choice<T>(items: readonly T[]): T {
    return pickRandom(this, items)
  }

  string(alphabet: string, length: number): string {
    return randomString(this, alphabet, length)
  }
}

/**
 * Reduces any finite number to an unsigned 32-bit seed.
 * Negative and fractional seeds are accepted so that `seed + index`
 * never needs a range check at the call site.
 */
export function normalizeSeed(seed: number): number {
  if (!Number.isFinite(seed)) {
    return 0
  }
  return Math.trunc(seed) >>> 0
}

export function randomIndex(rng: RandomSource, bound: number): number {
  return Math.floor(rng.next() * bound)
}

export function pickRandom<T>(rng: RandomSource, items: readonly T[]): T {
  if (items.length === 0) {
    throw new RangeError('Cannot pick from an empty list')
  }
  return items[randomIndex(rng, items.length)]
}

export function randomString(
  rng: RandomSource,
  alphabet: string,
  length: number
): string {
  let result = ''
  for (let i = 0; i < length; i++) {
    result += alphabet[randomIndex(rng, alphabet.length)]
  }
  return result
}
