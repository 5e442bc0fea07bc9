export type {
  SchemeName,
  LoginSchemeTag,
  NameFunction,
  LoginSetDescriptor,
  LoginSource,
  LoginSet,
  LoginSequence,
} from './login'

export type { Query, QuerySet, QuerySummary } from './query'

export type {
  MembershipKind,
  ConfusionOutcome,
  OutcomeMetrics,
} from './outcome'

export { MEMBERSHIP_KINDS } from './outcome'

export type { SizePair, DatasetOptions, DatasetConfig } from './config'
