import { describe, it, expect } from 'vitest'
import {
  calculateAccuracy,
  calculateFalseNegativeRate,
  calculateFalsePositiveRate,
  calculateOutcomeMetrics,
  totalQueries,
} from '../../../src/harness'
import type { ConfusionOutcome } from '../../../src/types'

function outcome(
  truePositives: number,
  trueNegatives: number,
  falsePositives: number,
  falseNegatives: number
): ConfusionOutcome {
  return {
    elapsedMs: 1,
    truePositives,
    trueNegatives,
    falsePositives,
    falseNegatives,
  }
}

describe('outcome metrics', () => {
  it('sums the four counts', () => {
    expect(totalQueries(outcome(40, 45, 5, 10))).toBe(100)
  })

  it('calculates accuracy as (TP + TN) / total', () => {
    expect(calculateAccuracy(outcome(40, 45, 5, 10))).toBe(0.85)
  })

  it('scores an empty query set as fully accurate', () => {
    expect(calculateAccuracy(outcome(0, 0, 0, 0))).toBe(1)
  })

  it('calculates the false positive rate over absent queries', () => {
    expect(calculateFalsePositiveRate(outcome(40, 45, 5, 10))).toBe(0.1)
  })

  it('guards the false positive rate against no absent queries', () => {
    expect(calculateFalsePositiveRate(outcome(50, 0, 0, 0))).toBe(0)
  })

  it('calculates the false negative rate over present queries', () => {
    expect(calculateFalseNegativeRate(outcome(40, 45, 5, 10))).toBe(0.2)
    expect(calculateFalseNegativeRate(outcome(0, 50, 0, 0))).toBe(0)
  })

  it('combines everything', () => {
    expect(calculateOutcomeMetrics(outcome(50, 25, 25, 0))).toEqual({
      total: 100,
      accuracy: 0.75,
      falsePositiveRate: 0.5,
      falseNegativeRate: 0,
    })
  })
})
