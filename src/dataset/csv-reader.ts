/**
 * Streaming readers for login and query files
 * @module dataset/csv-reader
 */

import { createReadStream } from 'fs'
import { createInterface } from 'readline'
import type { Query } from '../types/query'
import {
  LOGIN_HEADER,
  QUERY_HEADER,
  parseLoginRow,
  parseQueryRow,
  requireHeader,
} from './csv-format'

async function* readRows(path: string): AsyncGenerator<string> {
  const lines = createInterface({
    input: createReadStream(path, { encoding: 'utf8' }),
    crlfDelay: Infinity,
  })
  try {
    for await (const line of lines) {
      if (line.length > 0) {
        yield line
      }
    }
  } finally {
    lines.close()
  }
}

/**
 * Reads the usernames of a login file in file order.
 */
export async function readLoginsCsv(path: string): Promise<string[]> {
  const usernames: string[] = []
  let header: string | undefined
  let lineNumber = 0

  for await (const line of readRows(path)) {
    lineNumber++
    if (lineNumber === 1) {
      header = line
      requireHeader(header, LOGIN_HEADER, 'loginFile')
      continue
    }
    usernames.push(parseLoginRow(line))
  }

  requireHeader(header, LOGIN_HEADER, 'loginFile')
  return usernames
}

/**
 * Reads the queries of a query file in file order.
 */
export async function readQueriesCsv(path: string): Promise<Query[]> {
  const queries: Query[] = []
  let header: string | undefined
  let lineNumber = 0

  for await (const line of readRows(path)) {
    lineNumber++
    if (lineNumber === 1) {
      header = line
      requireHeader(header, QUERY_HEADER, 'queryFile')
      continue
    }
    queries.push(parseQueryRow(line, lineNumber))
  }

  requireHeader(header, QUERY_HEADER, 'queryFile')
  return queries
}
