/**
 * Ratios derived from confusion outcomes.
 */

import type { ConfusionOutcome, OutcomeMetrics } from '../types/outcome'

export function totalQueries(outcome: ConfusionOutcome): number {
  return (
    outcome.truePositives +
    outcome.trueNegatives +
    outcome.falsePositives +
    outcome.falseNegatives
  )
}

/**
 * (TP + TN) / total. An empty query set has no misclassification and
 * scores 1.0.
 */
export function calculateAccuracy(outcome: ConfusionOutcome): number {
  const total = totalQueries(outcome)
  return total > 0 ? (outcome.truePositives + outcome.trueNegatives) / total : 1
}

/**
 * FP / (TN + FP), or 0 when no absent query was asked.
 */
export function calculateFalsePositiveRate(outcome: ConfusionOutcome): number {
  const absent = outcome.trueNegatives + outcome.falsePositives
  return absent > 0 ? outcome.falsePositives / absent : 0
}

/**
 * FN / (TP + FN), or 0 when no present query was asked.
 */
export function calculateFalseNegativeRate(outcome: ConfusionOutcome): number {
  const present = outcome.truePositives + outcome.falseNegatives
  return present > 0 ? outcome.falseNegatives / present : 0
}

export function calculateOutcomeMetrics(
  outcome: ConfusionOutcome
): OutcomeMetrics {
  return {
    total: totalQueries(outcome),
    accuracy: calculateAccuracy(outcome),
    falsePositiveRate: calculateFalsePositiveRate(outcome),
    falseNegativeRate: calculateFalseNegativeRate(outcome),
  }
}
