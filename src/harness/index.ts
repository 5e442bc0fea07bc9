export {
  totalQueries,
  calculateAccuracy,
  calculateFalsePositiveRate,
  calculateFalseNegativeRate,
  calculateOutcomeMetrics,
} from './metrics'
export { collectContractViolations } from './contract'
export {
  KIND_INVARIANTS,
  EXACT_ACCURACY_TOLERANCE,
  type InvariantRule,
  type InvariantInput,
} from './invariants'
export {
  checkOutcome,
  assertOutcome,
  runCorrectnessSuite,
  type CorrectnessVerdict,
  type CorrectnessDataset,
  type CorrectnessFailure,
  type CorrectnessResult,
  type CorrectnessSuiteResult,
  type CorrectnessSuiteOptions,
} from './correctness-harness'
export {
  formatOutcomeSummary,
  formatConfusionMatrix,
  formatDuration,
  generateCorrectnessReport,
  type ReportOptions,
} from './report'
