/**
 * Guarantees each membership kind is held to
 * @module harness/invariants
 */

import type {
  ConfusionOutcome,
  MembershipKind,
  OutcomeMetrics,
} from '../types/outcome'
import type { QuerySummary } from '../types/query'

/**
 * Accuracy of an exact structure may differ from 1 only by rounding.
 */
export const EXACT_ACCURACY_TOLERANCE = 1e-12

export interface InvariantInput {
  outcome: ConfusionOutcome
  metrics: OutcomeMetrics
  expected: QuerySummary
}

export interface InvariantRule {
  name: string
  description: string
  /** Returns a failure message, or undefined when the rule holds */
  check(input: InvariantInput): string | undefined
}

const noFalsePositives: InvariantRule = {
  name: 'no-false-positives',
  description: 'false positives must be 0',
  check: ({ outcome }) =>
    outcome.falsePositives === 0
      ? undefined
      : `reported ${outcome.falsePositives} false positive(s)`,
}

const noFalseNegatives: InvariantRule = {
  name: 'no-false-negatives',
  description: 'false negatives must be 0',
  check: ({ outcome }) =>
    outcome.falseNegatives === 0
      ? undefined
      : `reported ${outcome.falseNegatives} false negative(s)`,
}

const perfectAccuracy: InvariantRule = {
  name: 'perfect-accuracy',
  description: `accuracy must be 1.0 (within ${EXACT_ACCURACY_TOLERANCE})`,
  check: ({ metrics }) =>
    Math.abs(metrics.accuracy - 1) <= EXACT_ACCURACY_TOLERANCE
      ? undefined
      : `accuracy is ${metrics.accuracy}`,
}

const falsePositivesBounded: InvariantRule = {
  name: 'false-positives-bounded',
  description: 'false positives must lie in [0, absent queries]',
  check: ({ outcome, expected }) =>
    outcome.falsePositives >= 0 && outcome.falsePositives <= expected.absent
      ? undefined
      : `${outcome.falsePositives} false positive(s) against ${expected.absent} absent queries`,
}

const falsePositiveRateInRange: InvariantRule = {
  name: 'false-positive-rate-range',
  description: 'false positive rate must lie in [0, 1]',
  check: ({ metrics }) =>
    metrics.falsePositiveRate >= 0 && metrics.falsePositiveRate <= 1
      ? undefined
      : `false positive rate is ${metrics.falsePositiveRate}`,
}

const nonNegativeCounts: InvariantRule = {
  name: 'non-negative-counts',
  description: 'false positives and false negatives must be non-negative',
  check: ({ outcome }) =>
    outcome.falsePositives >= 0 && outcome.falseNegatives >= 0
      ? undefined
      : `FP=${outcome.falsePositives}, FN=${outcome.falseNegatives}`,
}

const accuracyInRange: InvariantRule = {
  name: 'accuracy-range',
  description: 'accuracy must lie in [0, 1]',
  check: ({ metrics }) =>
    metrics.accuracy >= 0 && metrics.accuracy <= 1
      ? undefined
      : `accuracy is ${metrics.accuracy}`,
}

export const KIND_INVARIANTS: { readonly [K in MembershipKind]: readonly InvariantRule[] } = {
  exact: [noFalsePositives, noFalseNegatives, perfectAccuracy],
  probabilistic_no_false_negative: [
    noFalseNegatives,
    falsePositivesBounded,
    falsePositiveRateInRange,
  ],
  probabilistic_approximate: [nonNegativeCounts, accuracyInRange],
}
