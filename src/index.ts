// Name schemes
export {
  sequentialName,
  adjectiveNounName,
  randomishName,
  mixedName,
  mixedChoice,
  resolveScheme,
  isSchemeName,
  SCHEME_NAMES,
  DEFAULT_SEED,
  ADJECTIVES,
  NOUNS,
} from './core/schemes'

// Random streams
export { SeededRandom, normalizeSeed, type RandomSource } from './core/random'

// Logins and queries
export { generateLogins, loginSequence, importLogins } from './core/logins'
export {
  generateQueries,
  queryStream,
  summarizeQueries,
  isReservedAbsentName,
  ABSENT_PREFIX,
} from './core/queries'

// Dataset files
export {
  formatLoginsCsv,
  formatQueriesCsv,
  parseLoginsCsv,
  parseQueriesCsv,
  writeLoginsCsv,
  writeQueriesCsv,
  readLoginsCsv,
  readQueriesCsv,
  type WriteResult,
} from './dataset'

// Membership adapters
export {
  createStructureAdapter,
  createExactStructure,
  createBloomStructure,
  createCuckooStructure,
  createReferenceAdapters,
  createAdapterLookup,
  evaluate,
  type MembershipStructure,
  type StructureFactory,
  type MembershipAdapter,
  type AdapterLookup,
  type ReferenceAdapterOptions,
} from './adapters'

// Correctness harness
export {
  calculateOutcomeMetrics,
  checkOutcome,
  assertOutcome,
  runCorrectnessSuite,
  formatOutcomeSummary,
  formatConfusionMatrix,
  generateCorrectnessReport,
  KIND_INVARIANTS,
  type CorrectnessVerdict,
  type CorrectnessDataset,
  type CorrectnessResult,
  type CorrectnessSuiteResult,
  type CorrectnessSuiteOptions,
  type ReportOptions,
} from './harness'

// Pipeline
export {
  materializeDatasets,
  buildDataset,
  resolveDatasetConfig,
  DEFAULT_DATASET_CONFIG,
  type MaterializedDataset,
} from './pipeline'

// Types
export type {
  SchemeName,
  LoginSchemeTag,
  LoginSource,
  LoginSet,
  LoginSequence,
  Query,
  QuerySet,
  QuerySummary,
  MembershipKind,
  ConfusionOutcome,
  OutcomeMetrics,
  SizePair,
  DatasetOptions,
  DatasetConfig,
} from './types'
export { MEMBERSHIP_KINDS } from './types'

// Errors
export {
  LoginOracleError,
  InvalidParameterError,
  UnknownSchemeError,
  ConfigurationError,
  AdapterContractViolationError,
  InvariantViolationError,
} from './utils/errors'

// Logging
export {
  defaultLogger,
  createSilentLogger,
  createPrefixedLogger,
  type Logger,
} from './utils/logger'
