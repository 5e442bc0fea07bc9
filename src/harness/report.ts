/**
 * Human-readable summaries of harness results.
 * Generates one-line summaries, confusion matrices and markdown reports.
 */

import type { ConfusionOutcome } from '../types/outcome'
import type {
  CorrectnessResult,
  CorrectnessSuiteResult,
} from './correctness-harness'
import { calculateOutcomeMetrics } from './metrics'

export interface ReportOptions {
  title: string
  description?: string
  includeTimestamp?: boolean
  /** Timestamp shown when includeTimestamp is set (default: now) */
  timestamp?: Date
}

/**
 * Formats a percentage (0-1 value to percentage string).
 */
function formatPercent(value: number, decimals: number = 2): string {
  return `${(value * 100).toFixed(decimals)}%`
}

/**
 * Formats milliseconds to human-readable duration.
 */
export function formatDuration(ms: number): string {
  if (ms < 1) return `${(ms * 1000).toFixed(2)} μs`
  if (ms < 1000) return `${ms.toFixed(2)} ms`
  if (ms < 60000) return `${(ms / 1000).toFixed(2)} s`
  return `${(ms / 60000).toFixed(2)} min`
}

/**
 * One line with runtime, counts, accuracy and false positive rate, e.g.
 * `Runtime: 0.001250s | TP=50, TN=50, FP=0, FN=0, Accuracy=1.0000, FP Rate=0.0000`
 */
export function formatOutcomeSummary(outcome: ConfusionOutcome): string {
  const metrics = calculateOutcomeMetrics(outcome)
  return (
    `Runtime: ${(outcome.elapsedMs / 1000).toFixed(6)}s | ` +
    `TP=${outcome.truePositives}, TN=${outcome.trueNegatives}, ` +
    `FP=${outcome.falsePositives}, FN=${outcome.falseNegatives}, ` +
    `Accuracy=${metrics.accuracy.toFixed(4)}, ` +
    `FP Rate=${metrics.falsePositiveRate.toFixed(4)}`
  )
}

/**
 * Creates a confusion matrix summary string.
 */
export function formatConfusionMatrix(outcome: ConfusionOutcome): string {
  const { truePositives, falsePositives, trueNegatives, falseNegatives } =
    outcome

  return `
              Predicted
              +       -
Actual  +   ${truePositives.toString().padStart(6)}  ${falseNegatives.toString().padStart(6)}
        -   ${falsePositives.toString().padStart(6)}  ${trueNegatives.toString().padStart(6)}
`.trim()
}

function generateResultRow(result: CorrectnessResult): string {
  const status = result.passed ? 'PASS' : 'FAIL'
  if (!result.outcome || !result.metrics) {
    return `| ${result.dataset} | ${result.adapter} | ${result.kind} | - | - | - | - | - | - | - | ${status} |`
  }
  const { outcome, metrics } = result
  return [
    '',
    result.dataset,
    result.adapter,
    result.kind,
    outcome.truePositives,
    outcome.trueNegatives,
    outcome.falsePositives,
    outcome.falseNegatives,
    formatPercent(metrics.accuracy),
    formatPercent(metrics.falsePositiveRate),
    formatDuration(outcome.elapsedMs),
    status,
    '',
  ]
    .join(' | ')
    .trim()
}

/**
 * Generates a markdown report of a correctness suite run.
 */
export function generateCorrectnessReport(
  suite: CorrectnessSuiteResult,
  options: ReportOptions
): string {
  const lines: string[] = [`# ${options.title}`, '']

  if (options.description) {
    lines.push(options.description, '')
  }

  if (options.includeTimestamp) {
    lines.push(
      `*Generated: ${(options.timestamp ?? new Date()).toISOString()}*`,
      ''
    )
  }

  lines.push(
    '## Summary',
    '',
    `- Combinations: ${suite.results.length}`,
    `- Passed: ${suite.passed}`,
    `- Failed: ${suite.failed}`,
    '',
    '## Results',
    '',
    '| Dataset | Adapter | Kind | TP | TN | FP | FN | Accuracy | FP Rate | Time | Status |',
    '| --- | --- | --- | --- | --- | --- | --- | --- | --- | --- | --- |',
    ...suite.results.map(generateResultRow)
  )

  const failing = suite.results.filter((result) => !result.passed)
  if (failing.length > 0) {
    lines.push('', '## Failures', '')
    for (const result of failing) {
      lines.push(`### ${result.adapter} on ${result.dataset}`, '')
      for (const failure of result.failures) {
        lines.push(`- \`${failure.code}\`: ${failure.message}`)
      }
      lines.push('')
    }
  }

  return lines.join('\n').trimEnd() + '\n'
}
