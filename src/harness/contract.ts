/**
 * Adapter contract checks
 * @module harness/contract
 *
 * An outcome must be a partition of the query set it describes: four
 * non-negative integer counts whose present side (TP + FN) and absent side
 * (TN + FP) match the ground truth of the queries.
 */

import type { ConfusionOutcome } from '../types/outcome'
import type { QuerySummary } from '../types/query'
import { AdapterContractViolationError } from '../utils/errors'
import { totalQueries } from './metrics'

const COUNT_FIELDS = [
  'truePositives',
  'trueNegatives',
  'falsePositives',
  'falseNegatives',
] as const

/**
 * Lists every way an outcome breaks the evaluation contract. An empty list
 * means the counts can be trusted.
 */
export function collectContractViolations(
  adapter: string,
  outcome: ConfusionOutcome,
  expected: QuerySummary
): AdapterContractViolationError[] {
  const violations: AdapterContractViolationError[] = []

  for (const field of COUNT_FIELDS) {
    const value = outcome[field]
    if (!Number.isSafeInteger(value) || value < 0) {
      violations.push(
        new AdapterContractViolationError(
          adapter,
          `${field} must be a non-negative integer, got ${value}`,
          { field, value }
        )
      )
    }
  }

  if (!Number.isFinite(outcome.elapsedMs) || outcome.elapsedMs < 0) {
    violations.push(
      new AdapterContractViolationError(
        adapter,
        `elapsedMs must be a finite non-negative number, got ${outcome.elapsedMs}`,
        { field: 'elapsedMs', value: outcome.elapsedMs }
      )
    )
  }

  // Sums over malformed counts would only repeat the problems above
  if (violations.length > 0) {
    return violations
  }

  const total = totalQueries(outcome)
  if (total !== expected.total) {
    violations.push(
      new AdapterContractViolationError(
        adapter,
        `counts sum to ${total} but ${expected.total} queries were asked`,
        { total, expected: expected.total }
      )
    )
  }

  const present = outcome.truePositives + outcome.falseNegatives
  if (present !== expected.present) {
    violations.push(
      new AdapterContractViolationError(
        adapter,
        `TP + FN is ${present} but ${expected.present} queries were present`,
        { present, expected: expected.present }
      )
    )
  }

  const absent = outcome.trueNegatives + outcome.falsePositives
  if (absent !== expected.absent) {
    violations.push(
      new AdapterContractViolationError(
        adapter,
        `TN + FP is ${absent} but ${expected.absent} queries were absent`,
        { absent, expected: expected.absent }
      )
    )
  }

  return violations
}
