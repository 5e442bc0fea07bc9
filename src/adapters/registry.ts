/**
 * Adapter registry and dispatch
 * @module adapters/registry
 */

import type { LoginSource } from '../types/login'
import type { QuerySet } from '../types/query'
import type { ConfusionOutcome, MembershipKind } from '../types/outcome'
import { ConfigurationError } from '../utils/errors'
import { createStructureAdapter } from './structure-adapter'
import {
  DEFAULT_ERROR_RATE,
  createBloomStructure,
  createCuckooStructure,
  createExactStructure,
} from './reference-structures'
import type { AdapterLookup, MembershipAdapter } from './types'

export interface ReferenceAdapterOptions {
  /** Target false positive rate of the Bloom filter (default: 0.01) */
  bloomErrorRate?: number

  /** Target false positive rate of the Cuckoo filter (default: 0.01) */
  cuckooErrorRate?: number
}

/**
 * One adapter per kind: hash set, Bloom filter, Cuckoo filter.
 */
export function createReferenceAdapters(
  options: ReferenceAdapterOptions = {}
): Record<MembershipKind, MembershipAdapter> {
  return {
    exact: createStructureAdapter('exact', 'hash-set', createExactStructure),
    probabilistic_no_false_negative: createStructureAdapter(
      'probabilistic_no_false_negative',
      'bloom-filter',
      createBloomStructure(options.bloomErrorRate ?? DEFAULT_ERROR_RATE)
    ),
    probabilistic_approximate: createStructureAdapter(
      'probabilistic_approximate',
      'cuckoo-filter',
      createCuckooStructure(options.cuckooErrorRate ?? DEFAULT_ERROR_RATE)
    ),
  }
}

/**
 * Builds a lookup from a list of adapters.
 *
 * @throws {ConfigurationError} If two adapters declare the same kind
 */
export function createAdapterLookup(
  adapters: readonly MembershipAdapter[]
): AdapterLookup {
  const lookup: AdapterLookup = {}
  for (const adapter of adapters) {
    const existing = lookup[adapter.kind]
    if (existing) {
      throw new ConfigurationError(
        `Adapters '${existing.name}' and '${adapter.name}' both declare kind '${adapter.kind}'`,
        'adapters',
        { kind: adapter.kind }
      )
    }
    lookup[adapter.kind] = adapter
  }
  return lookup
}

/**
 * Evaluates the adapter registered for `kind` against a dataset.
 *
 * @throws {ConfigurationError} If no adapter is registered for the kind
 */
export function evaluate(
  kind: MembershipKind,
  logins: LoginSource,
  queries: QuerySet,
  adapters: AdapterLookup
): ConfusionOutcome {
  const adapter = adapters[kind]
  if (!adapter) {
    throw new ConfigurationError(
      `No membership adapter registered for kind '${kind}'`,
      'adapters',
      { kind }
    )
  }
  return adapter.evaluate(logins, queries)
}
