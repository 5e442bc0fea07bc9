#!/usr/bin/env npx tsx
/**
 * Generate Datasets Script
 *
 * Writes logins_<n>.csv / queries_<q>.csv for the default scales
 * (10K to 100M logins, queries at 10%), then checks the reference
 * membership structures against the smallest scale.
 *
 * The largest scale writes several gigabytes and takes a while.
 *
 * Usage:
 *   npx tsx scripts/generate-datasets.ts
 */

import {
  DEFAULT_DATASET_CONFIG,
  buildDataset,
  createPrefixedLogger,
  createReferenceAdapters,
  defaultLogger,
  generateCorrectnessReport,
  materializeDatasets,
  runCorrectnessSuite,
} from '../src'

const config = {
  ...DEFAULT_DATASET_CONFIG,
  outputDir: 'datasets',
}

async function main(): Promise<void> {
  const logger = createPrefixedLogger('generate', defaultLogger)

  await materializeDatasets(config, { logger })

  const smallest = config.sizes[0]
  const suite = runCorrectnessSuite(
    [buildDataset(smallest, config)],
    Object.values(createReferenceAdapters()),
    { logger: createPrefixedLogger('harness', defaultLogger) }
  )

  console.log(
    generateCorrectnessReport(suite, {
      title: 'Membership Structure Correctness',
      description: `scheme=${config.scheme}, seed=${config.seed}, dupRate=${config.dupRate}`,
    })
  )

  if (!suite.success) {
    process.exitCode = 1
  }
}

main().catch((error: unknown) => {
  defaultLogger.error('Dataset generation failed', {
    error: error instanceof Error ? error.message : String(error),
  })
  process.exitCode = 1
})
