export type {
  MembershipStructure,
  StructureFactory,
  MembershipAdapter,
  AdapterLookup,
} from './types'
export { createStructureAdapter } from './structure-adapter'
export {
  createExactStructure,
  createBloomStructure,
  createCuckooStructure,
  DEFAULT_ERROR_RATE,
} from './reference-structures'
export {
  createReferenceAdapters,
  createAdapterLookup,
  evaluate,
  type ReferenceAdapterOptions,
} from './registry'
