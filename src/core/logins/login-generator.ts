/**
 * Login set generation
 * @module core/logins/login-generator
 */

import type {
  LoginSchemeTag,
  LoginSequence,
  LoginSet,
  SchemeName,
} from '../../types/login'
import {
  InvalidParameterError,
  requireNonNegativeInteger,
} from '../../utils/errors'
import { DEFAULT_SEED } from '../schemes/name-schemes'
import { resolveScheme } from '../schemes/registry'

function requireIndex(index: number, size: number): number {
  if (!Number.isInteger(index) || index < 0 || index >= size) {
    throw new InvalidParameterError(
      'index',
      index,
      `must be an integer in [0, ${size})`
    )
  }
  return index
}

function materialize(
  usernames: string[],
  scheme: LoginSchemeTag,
  seed: number,
  has?: (username: string) => boolean
): LoginSet {
  const frozen = Object.freeze(usernames)
  const set: LoginSet = {
    scheme,
    seed,
    size: frozen.length,
    usernames: frozen,
    at: (index) => frozen[requireIndex(index, frozen.length)],
    [Symbol.iterator]: () => frozen[Symbol.iterator](),
  }
  return has ? { ...set, has } : set
}

/**
 * Generates `n` usernames for indices `0..n-1` in index order.
 *
 * @param n - Number of logins (non-negative integer)
 * @param scheme - Username scheme
 * @param seed - Seed for the randomish and mixed schemes
 * @throws {UnknownSchemeError} For an unsupported scheme, before any output
 * @throws {InvalidParameterError} For a negative or fractional `n`
 *
 * @example
 * ```typescript
 * generateLogins(3, 'sequential').usernames // ['user0', 'user1', 'user2']
 * ```
 */
export function generateLogins(
  n: number,
  scheme: SchemeName,
  seed: number = DEFAULT_SEED
): LoginSet {
  const nameFn = resolveScheme(scheme)
  requireNonNegativeInteger(n, 'n')

  const usernames = new Array<string>(n)
  for (let i = 0; i < n; i++) {
    usernames[i] = nameFn(i, seed)
  }

  return materialize(usernames, scheme, seed)
}

/**
 * Lazy counterpart of {@link generateLogins} for scales where holding every
 * username in memory is not wanted. Names are computed on access; each
 * iteration starts over from index 0.
 */
export function loginSequence(
  n: number,
  scheme: SchemeName,
  seed: number = DEFAULT_SEED
): LoginSequence {
  const nameFn = resolveScheme(scheme)
  requireNonNegativeInteger(n, 'n')

  return {
    scheme,
    seed,
    size: n,
    lazy: true,
    at: (index) => nameFn(requireIndex(index, n), seed),
    *[Symbol.iterator]() {
      for (let i = 0; i < n; i++) {
        yield nameFn(i, seed)
      }
    },
  }
}

/**
 * Wraps externally supplied usernames (for instance a login file read back
 * from disk) as a login set. Since nothing is known about how these names
 * were produced, the set carries a membership lookup.
 *
 * Login files hold one username per line, so empty names and names with a
 * line break are rejected along with repeats.
 *
 * @throws {InvalidParameterError} If a username is empty, spans lines or repeats
 */
export function importLogins(
  usernames: Iterable<string>,
  options: { seed?: number } = {}
): LoginSet {
  const lookup = new Set<string>()
  const ordered: string[] = []

  for (const username of usernames) {
    if (username.length === 0) {
      throw new InvalidParameterError('usernames', username, 'must not be empty', {
        index: ordered.length,
      })
    }
    if (/[\r\n]/.test(username)) {
      throw new InvalidParameterError(
        'usernames',
        username,
        'must not contain line breaks',
        { index: ordered.length }
      )
    }
    if (lookup.has(username)) {
      throw new InvalidParameterError(
        'usernames',
        username,
        'must not contain duplicates',
        { index: ordered.length }
      )
    }
    lookup.add(username)
    ordered.push(username)
  }

  return materialize(ordered, 'imported', options.seed ?? 0, (username) =>
    lookup.has(username)
  )
}
