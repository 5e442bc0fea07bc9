export {
  resolveDatasetConfig,
  DEFAULT_DATASET_CONFIG,
  DEFAULT_SIZES,
} from './dataset-config'
export {
  materializeDatasets,
  buildDataset,
  loginFileName,
  queryFileName,
  type MaterializeOptions,
  type MaterializedDataset,
} from './dataset-pipeline'
