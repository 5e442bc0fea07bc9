export {
  queryStream,
  generateQueries,
  summarizeQueries,
  describeLogins,
  isReservedAbsentName,
  ABSENT_PREFIX,
  ABSENT_SUFFIX_LENGTH,
  MAX_ABSENT_ATTEMPTS,
} from './query-generator'
