export {
  sequentialName,
  adjectiveNounName,
  randomishName,
  mixedName,
  mixedChoice,
  DEFAULT_SEED,
  SEQUENTIAL_PREFIX,
  RANDOMISH_PREFIX_LENGTH,
  MIXED_CHOICES,
  type MixedChoice,
} from './name-schemes'
export { ADJECTIVES, NOUNS } from './vocabulary'
export { SCHEME_NAMES, isSchemeName, resolveScheme } from './registry'
