/**
 * Username schemes supported by the name scheme library.
 */
export type SchemeName = 'sequential' | 'adjnoun' | 'randomish' | 'mixed'

/**
 * Tag carried by a login set: the scheme that produced it, or `imported`
 * for usernames read from an external source.
 */
export type LoginSchemeTag = SchemeName | 'imported'

/**
 * Maps an index (and seed) to a username.
 */
export type NameFunction = (index: number, seed: number) => string

/**
 * Identifies the login set a query set was generated against.
 */
export interface LoginSetDescriptor {
  scheme: LoginSchemeTag
  seed: number
  size: number
}

/**
 * Read-only, ordered view of a set of unique usernames.
 * Iteration yields usernames in index order.
 */
export interface LoginSource extends Iterable<string> {
  readonly scheme: LoginSchemeTag
  readonly seed: number
  readonly size: number

  /** Username at a 0-based index */
  at(index: number): string

  /**
   * Membership lookup. Only provided where absence of a candidate cannot be
   * established by construction (imported usernames).
   */
  has?(username: string): boolean
}

/**
 * A fully materialized login set. Immutable once created.
 */
export interface LoginSet extends LoginSource {
  readonly usernames: readonly string[]
}

/**
 * A lazy login set that computes each username on demand.
 * Iterating again restarts from index 0 and yields the same sequence.
 */
export interface LoginSequence extends LoginSource {
  readonly lazy: true
}
