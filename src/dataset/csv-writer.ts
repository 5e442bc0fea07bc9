/**
 * Streaming writers for login and query files
 * @module dataset/csv-writer
 *
 * Rows are pulled from an iterable and written as they are produced, so a
 * lazy login sequence of any size is written without materializing it.
 */

import { createWriteStream } from 'fs'
import { rm } from 'fs/promises'
import { once } from 'events'
import { finished } from 'stream/promises'
import type { Query } from '../types/query'
import {
  LOGIN_HEADER,
  QUERY_HEADER,
  formatHeader,
  formatLoginRow,
  formatQueryRow,
} from './csv-format'

/**
 * Rows are batched into chunks of about this many characters per write.
 */
export const WRITE_CHUNK_SIZE = 64 * 1024

export interface WriteResult {
  path: string
  rows: number
}

async function writeRows<T>(
  path: string,
  header: readonly string[],
  rows: Iterable<T>,
  formatRow: (row: T) => string
): Promise<WriteResult> {
  const stream = createWriteStream(path, { encoding: 'utf8' })
  let streamError: Error | undefined
  stream.on('error', (error) => {
    streamError = error
  })

  const flush = async (chunk: string): Promise<void> => {
    if (streamError) throw streamError
    if (!stream.write(chunk)) {
      await once(stream, 'drain')
    }
  }

  let count = 0
  try {
    let chunk = formatHeader(header)
    for (const row of rows) {
      chunk += formatRow(row)
      count++
      if (chunk.length >= WRITE_CHUNK_SIZE) {
        await flush(chunk)
        chunk = ''
      }
    }
    if (chunk.length > 0) {
      await flush(chunk)
    }
    stream.end()
    await finished(stream)
  } catch (error) {
    // A partially written file is never a valid dataset
    stream.destroy()
    await rm(path, { force: true })
    throw error
  }

  return { path, rows: count }
}

/**
 * Writes a login file (header `username`).
 */
export function writeLoginsCsv(
  path: string,
  usernames: Iterable<string>
): Promise<WriteResult> {
  return writeRows(path, LOGIN_HEADER, usernames, formatLoginRow)
}

/**
 * Writes a query file (header `username,is_present`).
 */
export function writeQueriesCsv(
  path: string,
  queries: Iterable<Query>
): Promise<WriteResult> {
  return writeRows(path, QUERY_HEADER, queries, formatQueryRow)
}
