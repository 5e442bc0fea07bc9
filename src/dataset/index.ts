export {
  LOGIN_HEADER,
  QUERY_HEADER,
  escapeCSVField,
  formatHeader,
  formatLoginRow,
  formatQueryRow,
  formatLoginsCsv,
  formatQueriesCsv,
  parseCSVLine,
  parseLoginsCsv,
  parseQueriesCsv,
} from './csv-format'
export {
  writeLoginsCsv,
  writeQueriesCsv,
  WRITE_CHUNK_SIZE,
  type WriteResult,
} from './csv-writer'
export { readLoginsCsv, readQueriesCsv } from './csv-reader'
