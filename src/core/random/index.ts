export {
  SeededRandom,
  normalizeSeed,
  randomIndex,
  pickRandom,
  randomString,
  LOWERCASE_ALPHABET,
  DIGIT_ALPHABET,
  ALPHANUMERIC_ALPHABET,
  type RandomSource,
} from './seeded-random'
