import { describe, it, expect } from 'vitest'
import {
  escapeCSVField,
  formatLoginsCsv,
  formatQueriesCsv,
  parseCSVLine,
  parseLoginsCsv,
  parseQueriesCsv,
} from '../../../src/dataset'
import { InvalidParameterError } from '../../../src/utils/errors'

describe('formatLoginsCsv', () => {
  it('writes a username header and one row per username', () => {
    expect(formatLoginsCsv(['user0', 'brave_otter_11', 'xk29ab_7'])).toBe(
      'username\nuser0\nbrave_otter_11\nxk29ab_7\n'
    )
  })

  it('writes only the header for no usernames', () => {
    expect(formatLoginsCsv([])).toBe('username\n')
  })
})

describe('formatQueriesCsv', () => {
  it('writes is_present as 1 or 0', () => {
    expect(
      formatQueriesCsv([
        { username: 'user3', present: true },
        { username: 'fake_qwerty_1', present: false },
      ])
    ).toBe('username,is_present\nuser3,1\nfake_qwerty_1,0\n')
  })
})

describe('escapeCSVField', () => {
  it('leaves plain values alone', () => {
    expect(escapeCSVField('swift_tiger_0')).toBe('swift_tiger_0')
  })

  it('quotes values with delimiters, quotes or line breaks', () => {
    expect(escapeCSVField('a,b')).toBe('"a,b"')
    expect(escapeCSVField('say "hi"')).toBe('"say ""hi"""')
    expect(escapeCSVField('two\nlines')).toBe('"two\nlines"')
  })
})

describe('parseCSVLine', () => {
  it('splits on the delimiter', () => {
    expect(parseCSVLine('user0,1')).toEqual(['user0', '1'])
  })

  it('handles quoted fields and escaped quotes', () => {
    expect(parseCSVLine('"a,b",0')).toEqual(['a,b', '0'])
    expect(parseCSVLine('"say ""hi""",1')).toEqual(['say "hi"', '1'])
  })
})

describe('parseLoginsCsv', () => {
  it('reads usernames back in order', () => {
    expect(parseLoginsCsv('username\nuser0\nuser1\n')).toEqual(['user0', 'user1'])
  })

  it('accepts CRLF line endings', () => {
    expect(parseLoginsCsv('username\r\nuser0\r\nuser1\r\n')).toEqual([
      'user0',
      'user1',
    ])
  })

  it('reads back what formatLoginsCsv wrote, including quoted names', () => {
    const usernames = ['user0', 'a,b', 'say "hi"']

    expect(parseLoginsCsv(formatLoginsCsv(usernames))).toEqual(usernames)
  })

  it('rejects a missing or wrong header', () => {
    expect(() => parseLoginsCsv('')).toThrow(InvalidParameterError)
    expect(() => parseLoginsCsv('name\nuser0\n')).toThrow(
      "Invalid parameter 'loginFile': header must be 'username'"
    )
  })
})

describe('parseQueriesCsv', () => {
  it('reads queries back in order', () => {
    expect(parseQueriesCsv('username,is_present\nuser0,1\nfake_abcdef_1,0\n')).toEqual([
      { username: 'user0', present: true },
      { username: 'fake_abcdef_1', present: false },
    ])
  })

  it('rejects flags other than 0 and 1', () => {
    expect(() => parseQueriesCsv('username,is_present\nuser0,yes\n')).toThrow(
      "Invalid parameter 'is_present': must be 0 or 1"
    )
  })

  it('reports the line of a bad flag', () => {
    try {
      parseQueriesCsv('username,is_present\nuser0,1\nuser1,2\n')
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidParameterError)
      if (error instanceof InvalidParameterError) {
        expect(error.context).toMatchObject({ line: 3 })
      }
    }
  })

  it('rejects a login file header', () => {
    expect(() => parseQueriesCsv('username\nuser0\n')).toThrow(
      "Invalid parameter 'queryFile': header must be 'username,is_present'"
    )
  })
})
