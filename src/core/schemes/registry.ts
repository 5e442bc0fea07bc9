/**
 * Scheme lookup by name
 * @module core/schemes/registry
 */

import type { NameFunction, SchemeName } from '../../types/login'
import { UnknownSchemeError } from '../../utils/errors'
import {
  adjectiveNounName,
  mixedName,
  randomishName,
  sequentialName,
} from './name-schemes'

const SCHEMES: { readonly [K in SchemeName]: NameFunction } = {
  sequential: (index) => sequentialName(index),
  adjnoun: (index) => adjectiveNounName(index),
  randomish: randomishName,
  mixed: mixedName,
}

export const SCHEME_NAMES: readonly SchemeName[] = [
  'sequential',
  'adjnoun',
  'randomish',
  'mixed',
]

export function isSchemeName(value: unknown): value is SchemeName {
  return typeof value === 'string' && (SCHEME_NAMES as readonly string[]).includes(value)
}

/**
 * Returns the name function for a scheme.
 *
 * @throws {UnknownSchemeError} If the scheme is not one of {@link SCHEME_NAMES}
 */
export function resolveScheme(scheme: string): NameFunction {
  if (!isSchemeName(scheme)) {
    throw new UnknownSchemeError(scheme, SCHEME_NAMES)
  }
  return SCHEMES[scheme]
}
