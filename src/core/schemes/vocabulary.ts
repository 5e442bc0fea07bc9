/**
 * Word lists for adjective-noun usernames. Both lists cycle, so the pair
 * alone repeats every 64 indices; the index suffix keeps names unique.
 */
export const ADJECTIVES: readonly string[] = [
  'swift',
  'silent',
  'bright',
  'brave',
  'clever',
  'fuzzy',
  'lucky',
  'mighty',
]

export const NOUNS: readonly string[] = [
  'tiger',
  'otter',
  'falcon',
  'panda',
  'lynx',
  'koala',
  'dragon',
  'llama',
]
