import type { LoginSource } from '../types/login'
import type { QuerySet } from '../types/query'
import type { ConfusionOutcome, MembershipKind } from '../types/outcome'

/**
 * Minimal surface of a membership-testing structure.
 *
 * @example
 * ```typescript
 * const structure: MembershipStructure = new Set<string>()
 * structure.add('user0')
 * structure.has('user0') // true
 * ```
 */
export interface MembershipStructure {
  add(username: string): unknown
  has(username: string): boolean
}

/**
 * Creates an empty structure sized for `capacity` usernames.
 */
export type StructureFactory = (capacity: number) => MembershipStructure

/**
 * Evaluates one membership structure against a dataset with known ground
 * truth. Implementations are supplied from outside the harness; the kind
 * declares which guarantee the harness holds the result to.
 */
export interface MembershipAdapter {
  readonly kind: MembershipKind
  /** Human-readable name used in summaries and reports */
  readonly name: string
  evaluate(logins: LoginSource, queries: QuerySet): ConfusionOutcome
}

/**
 * Adapters available to the harness, at most one per kind.
 */
export type AdapterLookup = Partial<Record<MembershipKind, MembershipAdapter>>
