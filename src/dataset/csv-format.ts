/**
 * Login and query file formats
 * @module dataset/csv-format
 *
 * Login file: header `username`, one username per row.
 * Query file: header `username,is_present`, flag 1 (present) or 0 (absent).
 * Rows keep generation order.
 */

import type { Query } from '../types/query'
import { InvalidParameterError } from '../utils/errors'

export const LOGIN_HEADER = ['username'] as const

export const QUERY_HEADER = ['username', 'is_present'] as const

/**
 * Quotes a field when it contains a delimiter, a quote or a line break.
 */
export function escapeCSVField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`
  }
  return value
}

export function formatLoginRow(username: string): string {
  return `${escapeCSVField(username)}\n`
}

export function formatQueryRow(query: Query): string {
  return `${escapeCSVField(query.username)},${query.present ? 1 : 0}\n`
}

export function formatHeader(header: readonly string[]): string {
  return `${header.join(',')}\n`
}

export function formatLoginsCsv(usernames: Iterable<string>): string {
  let content = formatHeader(LOGIN_HEADER)
  for (const username of usernames) {
    content += formatLoginRow(username)
  }
  return content
}

export function formatQueriesCsv(queries: Iterable<Query>): string {
  let content = formatHeader(QUERY_HEADER)
  for (const query of queries) {
    content += formatQueryRow(query)
  }
  return content
}

/**
 * Parses a single CSV line, handling quoted fields.
 */
export function parseCSVLine(line: string, delimiter: string = ','): string[] {
  const result: string[] = []
  let current = ''
  let inQuotes = false

  for (let i = 0; i < line.length; i++) {
    const char = line[i]

    if (char === '"') {
      if (inQuotes && line[i + 1] === '"') {
        current += '"'
        i++
      } else {
        inQuotes = !inQuotes
      }
    } else if (char === delimiter && !inQuotes) {
      result.push(current)
      current = ''
    } else {
      current += char
    }
  }

  result.push(current)
  return result
}

function requireHeader(
  line: string | undefined,
  expected: readonly string[],
  file: string
): void {
  const actual = line === undefined ? [] : parseCSVLine(line)
  if (
    actual.length !== expected.length ||
    actual.some((field, i) => field.trim() !== expected[i])
  ) {
    throw new InvalidParameterError(
      file,
      line,
      `header must be '${expected.join(',')}'`
    )
  }
}

function splitLines(content: string): string[] {
  return content.split(/\r?\n/).filter((line) => line.length > 0)
}

export function parseLoginRow(line: string): string {
  return parseCSVLine(line)[0]
}

export function parseQueryRow(line: string, lineNumber: number): Query {
  const [username, flag] = parseCSVLine(line)
  if (flag !== '0' && flag !== '1') {
    throw new InvalidParameterError(
      'is_present',
      flag,
      'must be 0 or 1',
      { line: lineNumber }
    )
  }
  return { username, present: flag === '1' }
}

export function parseLoginsCsv(content: string): string[] {
  const lines = splitLines(content)
  requireHeader(lines[0], LOGIN_HEADER, 'loginFile')
  return lines.slice(1).map(parseLoginRow)
}

export function parseQueriesCsv(content: string): Query[] {
  const lines = splitLines(content)
  requireHeader(lines[0], QUERY_HEADER, 'queryFile')
  return lines.slice(1).map((line, i) => parseQueryRow(line, i + 2))
}

export { requireHeader }
