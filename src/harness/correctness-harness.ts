/**
 * Correctness harness for membership structures
 * @module harness/correctness-harness
 *
 * Outcomes are first checked against the evaluation contract, then against
 * the invariants of the kind the adapter declares. Failures are collected
 * per (kind, dataset) combination; one failing combination never stops the
 * others from being evaluated.
 */

import { createAdapterLookup, evaluate } from '../adapters/registry'
import type { MembershipAdapter } from '../adapters/types'
import { summarizeQueries } from '../core/queries/query-generator'
import type { LoginSource } from '../types/login'
import type {
  ConfusionOutcome,
  MembershipKind,
  OutcomeMetrics,
} from '../types/outcome'
import { MEMBERSHIP_KINDS } from '../types/outcome'
import type { QuerySet, QuerySummary } from '../types/query'
import {
  InvariantViolationError,
  LoginOracleError,
} from '../utils/errors'
import { createSilentLogger, type Logger } from '../utils/logger'
import { collectContractViolations } from './contract'
import { KIND_INVARIANTS } from './invariants'
import { calculateOutcomeMetrics } from './metrics'
import { formatOutcomeSummary } from './report'

/**
 * Result of holding one outcome to the guarantee of its kind.
 */
export interface CorrectnessVerdict {
  kind: MembershipKind
  adapter: string
  outcome: ConfusionOutcome
  expected: QuerySummary
  /** Undefined when the counts break the contract and ratios would be meaningless */
  metrics?: OutcomeMetrics
  violations: LoginOracleError[]
  passed: boolean
}

/**
 * A named (login set, query set) pair evaluated by the suite.
 */
export interface CorrectnessDataset {
  name: string
  logins: LoginSource
  queries: QuerySet
}

export interface CorrectnessFailure {
  code: string
  message: string
}

export interface CorrectnessResult {
  dataset: string
  kind: MembershipKind
  adapter: string
  loginCount: number
  queryCount: number
  outcome?: ConfusionOutcome
  metrics?: OutcomeMetrics
  failures: CorrectnessFailure[]
  passed: boolean
}

export interface CorrectnessSuiteResult {
  results: CorrectnessResult[]
  passed: number
  failed: number
  success: boolean
}

export interface CorrectnessSuiteOptions {
  /**
   * Kinds to check (default: every kind with an adapter). A requested kind
   * without an adapter is recorded as a failure.
   */
  kinds?: readonly MembershipKind[]
  logger?: Logger
}

/**
 * Checks an outcome against the contract and the invariants of `kind`.
 * Violations are returned, not thrown.
 */
export function checkOutcome(
  kind: MembershipKind,
  outcome: ConfusionOutcome,
  queries: QuerySet,
  adapter: string = kind
): CorrectnessVerdict {
  const expected = summarizeQueries(queries)
  const contractViolations = collectContractViolations(adapter, outcome, expected)

  if (contractViolations.length > 0) {
    return {
      kind,
      adapter,
      outcome,
      expected,
      violations: contractViolations,
      passed: false,
    }
  }

  const metrics = calculateOutcomeMetrics(outcome)
  const violations: LoginOracleError[] = []

  for (const rule of KIND_INVARIANTS[kind]) {
    const failure = rule.check({ outcome, metrics, expected })
    if (failure !== undefined) {
      violations.push(
        new InvariantViolationError(kind, rule.name, failure, {
          adapter,
          description: rule.description,
        })
      )
    }
  }

  return {
    kind,
    adapter,
    outcome,
    expected,
    metrics,
    violations,
    passed: violations.length === 0,
  }
}

/**
 * Like {@link checkOutcome}, but throws the first violation.
 *
 * @throws {AdapterContractViolationError} If the counts break the contract
 * @throws {InvariantViolationError} If the kind's guarantee does not hold
 */
export function assertOutcome(
  kind: MembershipKind,
  outcome: ConfusionOutcome,
  queries: QuerySet,
  adapter?: string
): CorrectnessVerdict {
  const verdict = checkOutcome(kind, outcome, queries, adapter)
  if (verdict.violations.length > 0) {
    throw verdict.violations[0]
  }
  return verdict
}

function toFailure(error: unknown): CorrectnessFailure {
  if (error instanceof LoginOracleError) {
    return { code: error.code, message: error.message }
  }
  return {
    code: 'ADAPTER_ERROR',
    message: error instanceof Error ? error.message : String(error),
  }
}

/**
 * Evaluates every adapter against every dataset.
 *
 * @example
 * ```typescript
 * const suite = runCorrectnessSuite(
 *   [{ name: 'toy', logins, queries }],
 *   Object.values(createReferenceAdapters())
 * )
 * suite.success // true when every combination held its guarantee
 * ```
 */
export function runCorrectnessSuite(
  datasets: readonly CorrectnessDataset[],
  adapters: readonly MembershipAdapter[],
  options: CorrectnessSuiteOptions = {}
): CorrectnessSuiteResult {
  const logger = options.logger ?? createSilentLogger()
  const lookup = createAdapterLookup(adapters)
  const kinds =
    options.kinds ?? MEMBERSHIP_KINDS.filter((kind) => lookup[kind] !== undefined)

  const results: CorrectnessResult[] = []

  for (const dataset of datasets) {
    for (const kind of kinds) {
      const adapterName = lookup[kind]?.name ?? kind
      const result: CorrectnessResult = {
        dataset: dataset.name,
        kind,
        adapter: adapterName,
        loginCount: dataset.logins.size,
        queryCount: dataset.queries.queries.length,
        failures: [],
        passed: false,
      }

      try {
        const outcome = evaluate(kind, dataset.logins, dataset.queries, lookup)
        const verdict = checkOutcome(kind, outcome, dataset.queries, adapterName)
        result.outcome = outcome
        result.metrics = verdict.metrics
        result.failures = verdict.violations.map(toFailure)
        result.passed = verdict.passed
      } catch (error) {
        result.failures = [toFailure(error)]
      }

      if (result.passed && result.outcome) {
        logger.info(`${adapterName} on ${dataset.name}: passed`, {
          summary: formatOutcomeSummary(result.outcome),
        })
      } else {
        logger.warn(`${adapterName} on ${dataset.name}: failed`, {
          kind,
          failures: result.failures.map((failure) => failure.message),
        })
      }

      results.push(result)
    }
  }

  const passed = results.filter((result) => result.passed).length

  return {
    results,
    passed,
    failed: results.length - passed,
    // An empty run checked nothing
    success: results.length > 0 && passed === results.length,
  }
}
