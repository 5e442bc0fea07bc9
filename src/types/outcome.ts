/**
 * Kinds of membership structures, named by the guarantee they carry.
 *
 * - `exact`: no false positives, no false negatives (hash set)
 * - `probabilistic_no_false_negative`: false positives only (Bloom filter)
 * - `probabilistic_approximate`: both error kinds possible (Cuckoo filter)
 */
export type MembershipKind =
  | 'exact'
  | 'probabilistic_no_false_negative'
  | 'probabilistic_approximate'

export const MEMBERSHIP_KINDS: readonly MembershipKind[] = [
  'exact',
  'probabilistic_no_false_negative',
  'probabilistic_approximate',
]

/**
 * Confusion counts and timing produced by evaluating one structure against
 * one (login set, query set) pair.
 */
export interface ConfusionOutcome {
  elapsedMs: number
  truePositives: number
  trueNegatives: number
  falsePositives: number
  falseNegatives: number
}

/**
 * Ratios derived from a confusion outcome.
 */
export interface OutcomeMetrics {
  total: number
  accuracy: number
  falsePositiveRate: number
  falseNegativeRate: number
}
