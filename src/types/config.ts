import type { SchemeName } from './login'

/**
 * One dataset scale: number of logins and number of queries.
 */
export interface SizePair {
  logins: number
  queries: number
}

/**
 * Options accepted by the dataset pipeline. Every field is optional and
 * falls back to {@link DatasetConfig} defaults.
 */
export interface DatasetOptions {
  /** Dataset scales to produce, in order */
  sizes?: SizePair[]

  /** Target fraction of present queries (0-1, default: 0.5) */
  dupRate?: number

  /** Seed shared by the name schemes and the query stream (default: 42) */
  seed?: number

  /** Username scheme (default: 'mixed') */
  scheme?: SchemeName

  /** Directory the CSV files are written to (default: '.') */
  outputDir?: string
}

/**
 * Fully resolved and validated pipeline configuration.
 */
export type DatasetConfig = Required<DatasetOptions>
