/**
 * Dataset pipeline: configuration in, login and query files out
 * @module pipeline/dataset-pipeline
 */

import { mkdir, rm } from 'fs/promises'
import { join } from 'path'
import { generateLogins, loginSequence } from '../core/logins/login-generator'
import {
  generateQueries,
  queryStream,
} from '../core/queries/query-generator'
import { SeededRandom } from '../core/random'
import { writeLoginsCsv, writeQueriesCsv } from '../dataset/csv-writer'
import type { CorrectnessDataset } from '../harness/correctness-harness'
import type { DatasetConfig, DatasetOptions, SizePair } from '../types/config'
import type { LoginSet } from '../types/login'
import type { Query, QuerySummary } from '../types/query'
import { createSilentLogger, type Logger } from '../utils/logger'
import { resolveDatasetConfig } from './dataset-config'

export interface MaterializeOptions {
  logger?: Logger
}

export interface MaterializedDataset {
  logins: number
  queries: number
  loginFile: string
  queryFile: string
  summary: QuerySummary
  elapsedMs: number
}

export function loginFileName(logins: number): string {
  return `logins_${logins}.csv`
}

export function queryFileName(queries: number): string {
  return `queries_${queries}.csv`
}

/**
 * Generates one in-memory dataset for the harness. It holds exactly the
 * usernames and queries {@link materializeDatasets} writes for the same pair.
 */
export function buildDataset(
  pair: SizePair,
  config: Pick<DatasetConfig, 'scheme' | 'seed' | 'dupRate'>
): CorrectnessDataset & { logins: LoginSet } {
  const logins = generateLogins(pair.logins, config.scheme, config.seed)
  const queries = generateQueries(
    logins,
    pair.queries,
    config.dupRate,
    new SeededRandom(config.seed)
  )
  return {
    name: `${pair.logins} logins / ${pair.queries} queries`,
    logins,
    queries,
  }
}

async function materializePair(
  pair: SizePair,
  config: DatasetConfig,
  logger: Logger
): Promise<MaterializedDataset> {
  const startTime = performance.now()
  const loginFile = join(config.outputDir, loginFileName(pair.logins))
  const queryFile = join(config.outputDir, queryFileName(pair.queries))

  const logins = loginSequence(pair.logins, config.scheme, config.seed)
  await writeLoginsCsv(loginFile, logins)
  logger.info(`Generated ${pair.logins} logins -> ${loginFile}`)

  let present = 0
  const counted = function* (queries: Iterable<Query>): Generator<Query> {
    for (const query of queries) {
      if (query.present) present++
      yield query
    }
  }

  try {
    const stream = queryStream(
      logins,
      pair.queries,
      config.dupRate,
      new SeededRandom(config.seed)
    )
    await writeQueriesCsv(queryFile, counted(stream))
  } catch (error) {
    // The login file alone is not a usable dataset
    await rm(loginFile, { force: true })
    throw error
  }

  const summary: QuerySummary = {
    total: pair.queries,
    present,
    absent: pair.queries - present,
    presentFraction: pair.queries > 0 ? present / pair.queries : 0,
  }
  logger.info(
    `Generated ${pair.queries} queries (dupRate=${config.dupRate}) -> ${queryFile}`,
    { present: summary.present, absent: summary.absent }
  )

  return {
    logins: pair.logins,
    queries: pair.queries,
    loginFile,
    queryFile,
    summary,
    elapsedMs: performance.now() - startTime,
  }
}

/**
 * Writes `logins_<n>.csv` and `queries_<q>.csv` for every configured size
 * pair. Identical options always produce byte-identical files.
 *
 * The configuration is validated in full first. A failure while writing a
 * pair removes that pair's files and rejects; pairs already written stay.
 */
export async function materializeDatasets(
  options?: DatasetOptions,
  { logger = createSilentLogger() }: MaterializeOptions = {}
): Promise<MaterializedDataset[]> {
  const config = resolveDatasetConfig(options)
  await mkdir(config.outputDir, { recursive: true })

  logger.info('Materializing datasets', {
    scheme: config.scheme,
    seed: config.seed,
    dupRate: config.dupRate,
    sizes: config.sizes.length,
  })

  const results: MaterializedDataset[] = []
  for (const pair of config.sizes) {
    results.push(await materializePair(pair, config, logger))
  }
  return results
}
