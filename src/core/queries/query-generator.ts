/**
 * Query generation
 * @module core/queries/query-generator
 *
 * Each slot flips a coin against `dupRate`: heads picks an existing username
 * (present), tails synthesizes one that cannot be a member (absent). Both
 * branches draw from the caller's random stream and nothing else, so the
 * same stream seed always yields the same query set.
 *
 * The realised present fraction is binomially distributed around `dupRate`;
 * it is not adjusted to hit the target exactly.
 */

import type { LoginSetDescriptor, LoginSource } from '../../types/login'
import type { Query, QuerySet, QuerySummary } from '../../types/query'
import {
  InvalidParameterError,
  requireInRange,
  requireNonNegativeInteger,
} from '../../utils/errors'
import {
  LOWERCASE_ALPHABET,
  randomIndex,
  randomString,
  type RandomSource,
} from '../random'

/**
 * Prefix reserved for absent usernames. No scheme produces it: sequential
 * names start with "user", adjective-noun names with an adjective, and
 * randomish names carry no underscore before position 6.
 */
export const ABSENT_PREFIX = 'fake_'

export const ABSENT_SUFFIX_LENGTH = 6

/**
 * Upper bound on redraws for one absent slot against an imported login set.
 */
export const MAX_ABSENT_ATTEMPTS = 64

export function isReservedAbsentName(username: string): boolean {
  return username.startsWith(ABSENT_PREFIX)
}

export function describeLogins(logins: LoginSource): LoginSetDescriptor {
  return { scheme: logins.scheme, seed: logins.seed, size: logins.size }
}

function validateQueryParameters(
  logins: LoginSource,
  q: number,
  dupRate: number
): void {
  requireNonNegativeInteger(q, 'q')
  requireInRange(dupRate, 0, 1, 'dupRate')
  if (logins.size === 0 && q > 0 && dupRate > 0) {
    throw new InvalidParameterError(
      'logins',
      logins.size,
      'must not be empty when present queries are requested (dupRate > 0)'
    )
  }
}

function absentName(
  logins: LoginSource,
  slot: number,
  rng: RandomSource
): string {
  for (let attempt = 0; attempt < MAX_ABSENT_ATTEMPTS; attempt++) {
    const candidate = `${ABSENT_PREFIX}${randomString(rng, LOWERCASE_ALPHABET, ABSENT_SUFFIX_LENGTH)}_${slot}`
    if (!logins.has || !logins.has(candidate)) {
      return candidate
    }
  }
  throw new InvalidParameterError(
    'logins',
    logins.size,
    `no absent username found for slot ${slot} after ${MAX_ABSENT_ATTEMPTS} attempts`,
    { slot }
  )
}

/**
 * Lazily yields `q` queries against a login set.
 *
 * Parameters are validated on the call, not on first iteration, so a bad
 * request fails before anything is consumed.
 *
 * @throws {InvalidParameterError} For a negative `q`, a `dupRate` outside
 *   [0, 1], or an empty login set when present queries are possible
 */
export function queryStream(
  logins: LoginSource,
  q: number,
  dupRate: number,
  rng: RandomSource
): Iterable<Query> {
  validateQueryParameters(logins, q, dupRate)

  return {
    *[Symbol.iterator]() {
      for (let slot = 0; slot < q; slot++) {
        if (rng.next() < dupRate) {
          yield {
            username: logins.at(randomIndex(rng, logins.size)),
            present: true,
          }
        } else {
          yield { username: absentName(logins, slot, rng), present: false }
        }
      }
    },
  }
}

/**
 * Generates `q` queries with roughly `dupRate` of them present.
 *
 * @example
 * ```typescript
 * const logins = generateLogins(1000, 'sequential')
 * const { queries } = generateQueries(logins, 100, 0.5, new SeededRandom(7))
 * ```
 */
export function generateQueries(
  logins: LoginSource,
  q: number,
  dupRate: number,
  rng: RandomSource
): QuerySet {
  const queries = Array.from(queryStream(logins, q, dupRate, rng))

  return {
    dupRate,
    logins: describeLogins(logins),
    queries: Object.freeze(queries),
  }
}

export function summarizeQueries(querySet: QuerySet): QuerySummary {
  let present = 0
  for (const query of querySet.queries) {
    if (query.present) present++
  }
  const total = querySet.queries.length

  return {
    total,
    present,
    absent: total - present,
    presentFraction: total > 0 ? present / total : 0,
  }
}
