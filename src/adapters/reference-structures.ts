/**
 * Reference membership structures, one per kind
 * @module adapters/reference-structures
 */

import { BloomFilter, CuckooFilter } from 'bloom-filters'
import type { MembershipStructure, StructureFactory } from './types'

export const DEFAULT_ERROR_RATE = 0.01

/**
 * Exact structure backed by a native Set.
 */
export const createExactStructure: StructureFactory = () => new Set<string>()

/**
 * Bloom filter sized for `capacity` items at the target false positive rate.
 */
export function createBloomStructure(
  errorRate: number = DEFAULT_ERROR_RATE
): StructureFactory {
  return (capacity: number): MembershipStructure => {
    const filter = BloomFilter.create(Math.max(1, capacity), errorRate)
    return {
      add: (username) => filter.add(username),
      has: (username) => filter.has(username),
    }
  }
}

/**
 * Cuckoo filter sized for `capacity` items. An insert that cannot find a
 * slot is dropped, which surfaces later as a false negative.
 */
export function createCuckooStructure(
  errorRate: number = DEFAULT_ERROR_RATE
): StructureFactory {
  return (capacity: number): MembershipStructure => {
    const filter = CuckooFilter.create(Math.max(1, capacity), errorRate)
    return {
      add: (username) => filter.add(username),
      has: (username) => filter.has(username),
    }
  }
}
