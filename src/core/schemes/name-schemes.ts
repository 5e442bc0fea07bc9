/**
 * Username schemes
 * @module core/schemes/name-schemes
 *
 * Every scheme is a pure map from (index, seed) to a username and ends in
 * the index itself, which is what makes names unique within a login set.
 * The random parts only add variety.
 */

import {
  ALPHANUMERIC_ALPHABET,
  SeededRandom,
} from '../random'
import { ADJECTIVES, NOUNS } from './vocabulary'

export const DEFAULT_SEED = 42

export const SEQUENTIAL_PREFIX = 'user'

export const RANDOMISH_PREFIX_LENGTH = 6

/**
 * Schemes a mixed login set chooses between, in draw order.
 */
export const MIXED_CHOICES = ['sequential', 'adjnoun', 'randomish'] as const

export type MixedChoice = (typeof MIXED_CHOICES)[number]

/**
 * Sequential style: user0, user1, user2, ...
 */
export function sequentialName(index: number): string {
  return `${SEQUENTIAL_PREFIX}${index}`
}

/**
 * Adjective + noun + index, e.g. brave_otter_11
 */
export function adjectiveNounName(index: number): string {
  const adjective = ADJECTIVES[index % ADJECTIVES.length]
  const noun = NOUNS[Math.floor(index / ADJECTIVES.length) % NOUNS.length]
  return `${adjective}_${noun}_${index}`
}

/**
 * Six random lowercase alphanumerics + index, e.g. xk29ab_7.
 * The generator is seeded with `seed + index` so each name stands alone.
 */
export function randomishName(index: number, seed: number = DEFAULT_SEED): string {
  const rng = new SeededRandom(seed + index)
  const prefix = rng.string(ALPHANUMERIC_ALPHABET, RANDOMISH_PREFIX_LENGTH)
  return `${prefix}_${index}`
}

/**
 * Which scheme a mixed login set uses at an index.
 */
export function mixedChoice(index: number, seed: number = DEFAULT_SEED): MixedChoice {
  return new SeededRandom(seed + index).choice(MIXED_CHOICES)
}

/**
 * One of the three other styles, picked per index by a generator seeded
 * with `seed + index`.
 */
export function mixedName(index: number, seed: number = DEFAULT_SEED): string {
  switch (mixedChoice(index, seed)) {
    case 'sequential':
      return sequentialName(index)
    case 'adjnoun':
      return adjectiveNounName(index)
    case 'randomish':
      return randomishName(index, seed)
  }
}
