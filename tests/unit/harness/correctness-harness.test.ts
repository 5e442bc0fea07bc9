import { describe, it, expect, vi } from 'vitest'
import {
  assertOutcome,
  checkOutcome,
  KIND_INVARIANTS,
  runCorrectnessSuite,
} from '../../../src/harness'
import { createStructureAdapter } from '../../../src/adapters'
import type { MembershipAdapter } from '../../../src/adapters'
import type { ConfusionOutcome } from '../../../src/types'
import {
  AdapterContractViolationError,
  ConfigurationError,
  InvariantViolationError,
} from '../../../src/utils/errors'
import type { Logger } from '../../../src/utils/logger'
import { createToyDataset } from '../../fixtures/toy-dataset'

function outcome(
  truePositives: number,
  trueNegatives: number,
  falsePositives: number,
  falseNegatives: number
): ConfusionOutcome {
  return {
    elapsedMs: 0.5,
    truePositives,
    trueNegatives,
    falsePositives,
    falseNegatives,
  }
}

function createRecordingLogger(): Logger & {
  info: ReturnType<typeof vi.fn>
  warn: ReturnType<typeof vi.fn>
} {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }
}

const alwaysYes = () => ({ add: () => {}, has: () => true })
const alwaysNo = () => ({ add: () => {}, has: () => false })

describe('KIND_INVARIANTS', () => {
  it('declares rules for every kind', () => {
    expect(KIND_INVARIANTS.exact.map((rule) => rule.name)).toEqual([
      'no-false-positives',
      'no-false-negatives',
      'perfect-accuracy',
    ])
    expect(
      KIND_INVARIANTS.probabilistic_no_false_negative.map((rule) => rule.name)
    ).toEqual([
      'no-false-negatives',
      'false-positives-bounded',
      'false-positive-rate-range',
    ])
    expect(
      KIND_INVARIANTS.probabilistic_approximate.map((rule) => rule.name)
    ).toEqual(['non-negative-counts', 'accuracy-range'])
  })
})

describe('checkOutcome', () => {
  const { queries } = createToyDataset()

  it('passes a perfect exact outcome', () => {
    const verdict = checkOutcome('exact', outcome(50, 50, 0, 0), queries)

    expect(verdict.passed).toBe(true)
    expect(verdict.violations).toEqual([])
    expect(verdict.adapter).toBe('exact')
    expect(verdict.metrics?.accuracy).toBe(1)
    expect(verdict.expected).toEqual({
      total: 100,
      present: 50,
      absent: 50,
      presentFraction: 0.5,
    })
  })

  it('reports every exact rule a lossy outcome breaks', () => {
    const verdict = checkOutcome('exact', outcome(49, 48, 2, 1), queries, 'lossy')

    expect(verdict.passed).toBe(false)
    expect(verdict.violations.map((violation) => violation.message)).toEqual([
      "Invariant 'no-false-positives' violated for kind 'exact': reported 2 false positive(s)",
      "Invariant 'no-false-negatives' violated for kind 'exact': reported 1 false negative(s)",
      "Invariant 'perfect-accuracy' violated for kind 'exact': accuracy is 0.97",
    ])
    expect(verdict.violations[0]).toBeInstanceOf(InvariantViolationError)
    expect(verdict.violations[0].context).toMatchObject({ adapter: 'lossy' })
  })

  it('allows false positives for probabilistic_no_false_negative', () => {
    const verdict = checkOutcome(
      'probabilistic_no_false_negative',
      outcome(50, 0, 50, 0),
      queries
    )

    expect(verdict.passed).toBe(true)
    expect(verdict.metrics?.falsePositiveRate).toBe(1)
  })

  it('rejects a false negative for probabilistic_no_false_negative', () => {
    const verdict = checkOutcome(
      'probabilistic_no_false_negative',
      outcome(49, 50, 0, 1),
      queries
    )

    expect(verdict.passed).toBe(false)
    expect(verdict.violations).toHaveLength(1)
    expect(verdict.violations[0]).toMatchObject({
      kind: 'probabilistic_no_false_negative',
      invariant: 'no-false-negatives',
    })
  })

  it('accepts any partition for probabilistic_approximate', () => {
    const verdict = checkOutcome(
      'probabilistic_approximate',
      outcome(10, 20, 30, 40),
      queries
    )

    expect(verdict.passed).toBe(true)
    expect(verdict.metrics?.accuracy).toBe(0.3)
  })

  it('stops at the contract when the counts cannot describe the queries', () => {
    const verdict = checkOutcome('exact', outcome(50, 50, 0, 5), queries, 'broken')

    expect(verdict.passed).toBe(false)
    expect(verdict.metrics).toBeUndefined()
    expect(verdict.violations).toHaveLength(2)
    expect(verdict.violations[0]).toBeInstanceOf(AdapterContractViolationError)
  })
})

describe('assertOutcome', () => {
  const { queries } = createToyDataset()

  it('returns the verdict when the guarantee holds', () => {
    expect(assertOutcome('exact', outcome(50, 50, 0, 0), queries).passed).toBe(
      true
    )
  })

  it('throws the first violation', () => {
    expect(() =>
      assertOutcome('exact', outcome(50, 49, 1, 0), queries, 'leaky')
    ).toThrow(
      "Invariant 'no-false-positives' violated for kind 'exact': reported 1 false positive(s)"
    )
  })

  it('throws a contract violation before checking invariants', () => {
    expect(() =>
      assertOutcome('exact', outcome(-1, 51, 0, 50), queries)
    ).toThrow(AdapterContractViolationError)
  })
})

describe('runCorrectnessSuite', () => {
  const toy = createToyDataset()
  const dataset = { name: 'toy', logins: toy.logins, queries: toy.queries }

  it('evaluates every dataset against every registered kind in order', () => {
    const suite = runCorrectnessSuite(
      [dataset, { ...dataset, name: 'toy-again' }],
      [
        createStructureAdapter('probabilistic_approximate', 'no', alwaysNo),
        createStructureAdapter('exact', 'set', () => new Set<string>()),
      ]
    )

    expect(
      suite.results.map((result) => [result.dataset, result.kind, result.adapter])
    ).toEqual([
      ['toy', 'exact', 'set'],
      ['toy', 'probabilistic_approximate', 'no'],
      ['toy-again', 'exact', 'set'],
      ['toy-again', 'probabilistic_approximate', 'no'],
    ])
    expect(suite).toMatchObject({ passed: 4, failed: 0, success: true })
    expect(suite.results[0]).toMatchObject({ loginCount: 200, queryCount: 100 })
  })

  it('keeps going after an adapter breaks its guarantee', () => {
    const suite = runCorrectnessSuite(
      [dataset],
      [
        createStructureAdapter('exact', 'yes-man', alwaysYes),
        createStructureAdapter('probabilistic_no_false_negative', 'yes', alwaysYes),
      ]
    )

    expect(suite.results.map((result) => result.passed)).toEqual([false, true])
    expect(suite.results[0].failures.map((failure) => failure.code)).toEqual([
      'INVARIANT_VIOLATION',
      'INVARIANT_VIOLATION',
    ])
    expect(suite.results[0].outcome).toMatchObject({
      truePositives: 50,
      falsePositives: 50,
    })
    expect(suite).toMatchObject({ passed: 1, failed: 1, success: false })
  })

  it('records an adapter that throws', () => {
    const throwing: MembershipAdapter = {
      kind: 'exact',
      name: 'explodes',
      evaluate: () => {
        throw new Error('out of memory')
      },
    }
    const suite = runCorrectnessSuite(
      [dataset],
      [throwing, createStructureAdapter('probabilistic_approximate', 'no', alwaysNo)]
    )

    expect(suite.results[0]).toMatchObject({
      adapter: 'explodes',
      passed: false,
      failures: [{ code: 'ADAPTER_ERROR', message: 'out of memory' }],
    })
    expect(suite.results[0].outcome).toBeUndefined()
    expect(suite.results[1].passed).toBe(true)
  })

  it('records an adapter that breaks the contract', () => {
    const lying: MembershipAdapter = {
      kind: 'probabilistic_no_false_negative',
      name: 'liar',
      evaluate: () => outcome(1, 1, 1, 1),
    }
    const suite = runCorrectnessSuite([dataset], [lying])

    expect(suite.results[0].passed).toBe(false)
    expect(suite.results[0].metrics).toBeUndefined()
    expect(suite.results[0].failures[0]).toEqual({
      code: 'ADAPTER_CONTRACT_VIOLATION',
      message:
        "Adapter 'liar' violated the evaluation contract: counts sum to 4 but 100 queries were asked",
    })
  })

  it('restricts the run to the requested kinds', () => {
    const suite = runCorrectnessSuite(
      [dataset],
      [
        createStructureAdapter('exact', 'set', () => new Set<string>()),
        createStructureAdapter('probabilistic_approximate', 'no', alwaysNo),
      ],
      { kinds: ['probabilistic_approximate'] }
    )

    expect(suite.results.map((result) => result.kind)).toEqual([
      'probabilistic_approximate',
    ])
    expect(suite.success).toBe(true)
  })

  it('fails a requested kind that has no adapter', () => {
    const suite = runCorrectnessSuite(
      [dataset],
      [createStructureAdapter('probabilistic_approximate', 'no', alwaysNo)],
      { kinds: ['exact'] }
    )

    expect(suite.results).toHaveLength(1)
    expect(suite.results[0]).toMatchObject({
      kind: 'exact',
      adapter: 'exact',
      passed: false,
      failures: [
        {
          code: 'CONFIGURATION_ERROR',
          message: "No membership adapter registered for kind 'exact'",
        },
      ],
    })
    expect(suite).toMatchObject({ passed: 0, failed: 1, success: false })
  })

  it('does not report success when nothing was checked', () => {
    const suite = runCorrectnessSuite([dataset], [])

    expect(suite.results).toEqual([])
    expect(suite.success).toBe(false)
  })

  it('logs passes at info and failures at warn', () => {
    const logger = createRecordingLogger()

    runCorrectnessSuite(
      [dataset],
      [
        createStructureAdapter('exact', 'set', () => new Set<string>()),
        createStructureAdapter('probabilistic_no_false_negative', 'no', alwaysNo),
      ],
      { logger }
    )

    expect(logger.info).toHaveBeenCalledTimes(1)
    expect(logger.info.mock.calls[0][0]).toBe('set on toy: passed')
    expect(logger.warn).toHaveBeenCalledTimes(1)
    expect(logger.warn.mock.calls[0][0]).toBe('no on toy: failed')
  })

  it('rejects two adapters for the same kind', () => {
    expect(() =>
      runCorrectnessSuite(
        [dataset],
        [
          createStructureAdapter('exact', 'one', () => new Set<string>()),
          createStructureAdapter('exact', 'two', () => new Set<string>()),
        ]
      )
    ).toThrow(ConfigurationError)
  })
})
