/**
 * Configuration for the dataset pipeline
 * @module pipeline/dataset-config
 */

import { DEFAULT_SEED } from '../core/schemes/name-schemes'
import { SCHEME_NAMES, isSchemeName } from '../core/schemes/registry'
import type {
  DatasetConfig,
  DatasetOptions,
  SizePair,
} from '../types/config'
import {
  ConfigurationError,
  InvalidParameterError,
  UnknownSchemeError,
  requireInRange,
  requireNonEmptyString,
  requireNonNegativeInteger,
} from '../utils/errors'

/**
 * Default dataset scales: 10K to 100M logins, queries at 10% of logins
 */
export const DEFAULT_SIZES: readonly SizePair[] = [
  { logins: 10_000, queries: 1_000 },
  { logins: 100_000, queries: 10_000 },
  { logins: 1_000_000, queries: 100_000 },
  { logins: 10_000_000, queries: 1_000_000 },
  { logins: 100_000_000, queries: 10_000_000 },
]

/**
 * Default pipeline configuration values
 */
export const DEFAULT_DATASET_CONFIG: DatasetConfig = {
  sizes: DEFAULT_SIZES.map((pair) => ({ ...pair })),
  dupRate: 0.5,
  seed: DEFAULT_SEED,
  scheme: 'mixed',
  outputDir: '.',
}

function validateSizes(sizes: SizePair[], dupRate: number): SizePair[] {
  if (!Array.isArray(sizes) || sizes.length === 0) {
    throw new ConfigurationError(
      'At least one (logins, queries) size pair is required',
      'sizes'
    )
  }

  const seenLogins = new Map<number, number>()
  const seenQueries = new Map<number, number>()

  return sizes.map((pair, index) => {
    requireNonNegativeInteger(pair.logins, `sizes[${index}].logins`)
    requireNonNegativeInteger(pair.queries, `sizes[${index}].queries`)
    if (pair.logins === 0 && pair.queries > 0 && dupRate > 0) {
      throw new ConfigurationError(
        `sizes[${index}] asks for present queries against an empty login set`,
        `sizes[${index}]`,
        { logins: pair.logins, queries: pair.queries, dupRate }
      )
    }

    // File names carry one count each; a repeat would overwrite a file
    const loginsAt = seenLogins.get(pair.logins)
    if (loginsAt !== undefined) {
      throw new ConfigurationError(
        `sizes[${index}] repeats the login count of sizes[${loginsAt}] (${pair.logins})`,
        `sizes[${index}]`,
        { logins: pair.logins }
      )
    }
    const queriesAt = seenQueries.get(pair.queries)
    if (queriesAt !== undefined) {
      throw new ConfigurationError(
        `sizes[${index}] repeats the query count of sizes[${queriesAt}] (${pair.queries})`,
        `sizes[${index}]`,
        { queries: pair.queries }
      )
    }
    seenLogins.set(pair.logins, index)
    seenQueries.set(pair.queries, index)

    return { logins: pair.logins, queries: pair.queries }
  })
}

/**
 * Merges user options with defaults and validates the result. Nothing is
 * generated until the whole configuration is known to be valid.
 *
 * @throws {InvalidParameterError} For out-of-range numbers
 * @throws {UnknownSchemeError} For an unsupported scheme
 * @throws {ConfigurationError} For an empty or inconsistent size list
 */
export function resolveDatasetConfig(options?: DatasetOptions): DatasetConfig {
  const dupRate = requireInRange(
    options?.dupRate ?? DEFAULT_DATASET_CONFIG.dupRate,
    0,
    1,
    'dupRate'
  )

  const seed = options?.seed ?? DEFAULT_DATASET_CONFIG.seed
  if (!Number.isSafeInteger(seed)) {
    throw new InvalidParameterError('seed', seed, 'must be an integer')
  }

  const scheme: string = options?.scheme ?? DEFAULT_DATASET_CONFIG.scheme
  if (!isSchemeName(scheme)) {
    throw new UnknownSchemeError(scheme, SCHEME_NAMES)
  }

  return {
    sizes: validateSizes(options?.sizes ?? DEFAULT_DATASET_CONFIG.sizes, dupRate),
    dupRate,
    seed,
    scheme,
    outputDir: requireNonEmptyString(
      options?.outputDir ?? DEFAULT_DATASET_CONFIG.outputDir,
      'outputDir'
    ),
  }
}
