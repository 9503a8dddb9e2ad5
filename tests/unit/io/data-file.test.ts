import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, readFileSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import {
  applyReplaceChar,
  detectSeparator,
  formatDataFile,
  parseDataFile,
  resolveColumns,
  splitDataLine,
  writeDataFile,
  WHITESPACE_SEPARATOR,
} from '../../../src/io/data-file.js'
import { defaultStandard } from '../../../src/standard/ods-standard.js'
import { ExportColumnError } from '../../../src/utils/errors.js'

describe('detectSeparator', () => {
  it('should prefer tab, then comma, then semicolon', () => {
    expect(detectSeparator('a\tb,c')).toBe('\t')
    expect(detectSeparator('a,b;c')).toBe(',')
    expect(detectSeparator('a;b')).toBe(';')
    expect(detectSeparator('a  b')).toBe(WHITESPACE_SEPARATOR)
  })
})

describe('splitDataLine', () => {
  it('should split and trim cells', () => {
    expect(splitDataLine(' a , b ,c', ',')).toEqual(['a', 'b', 'c'])
  })

  it('should keep separators inside quotes', () => {
    expect(splitDataLine('"a,b",c', ',')).toEqual(['a,b', 'c'])
    expect(splitDataLine('"say ""hi""",x', ',')).toEqual(['say "hi"', 'x'])
  })

  it('should split on whitespace runs', () => {
    expect(splitDataLine('  a   b\t c  ', WHITESPACE_SEPARATOR)).toEqual(['a', 'b', 'c'])
  })

  it('should accept multi-character separators', () => {
    expect(splitDataLine('a||b||c', '||')).toEqual(['a', 'b', 'c'])
  })

  it('should keep empty cells', () => {
    expect(splitDataLine('a,,c,', ',')).toEqual(['a', '', 'c', ''])
  })
})

describe('applyReplaceChar', () => {
  it('should remove or replace a substring', () => {
    expect(applyReplaceChar('#src_id', '#')).toBe('src_id')
    expect(applyReplaceChar('src-id', '-,_')).toBe('src_id')
    expect(applyReplaceChar('src id', [' ', '_'])).toBe('src_id')
    expect(applyReplaceChar('src id', [''])).toBe('src id')
  })
})

describe('parseDataFile', () => {
  it('should key rows by header', () => {
    const rows = parseDataFile('src_id,src_start_utc\nsrc-a,2024-03-01T00:00:00\n\nsrc-b,\n')

    expect(rows).toEqual([
      { src_id: 'src-a', src_start_utc: '2024-03-01T00:00:00' },
      { src_id: 'src-b', src_start_utc: null },
    ])
  })

  it('should fill short rows with null', () => {
    expect(parseDataFile('a;b;c\r\n1;2\r\n')).toEqual([{ a: '1', b: '2', c: null }])
  })

  it('should rewrite headers before mapping them', () => {
    const rows = parseDataFile('#Source  Start\nsrc-a 2024-03-01T00:00:00', {
      sep: WHITESPACE_SEPARATOR,
      replaceChar: '#',
      headerMap: { Source: 'src_id', Start: 'src_start_utc' },
    })

    expect(rows).toEqual([{ src_id: 'src-a', src_start_utc: '2024-03-01T00:00:00' }])
  })

  it('should return no rows for empty content', () => {
    expect(parseDataFile('\n  \n')).toEqual([])
  })
})

describe('resolveColumns', () => {
  it('should expand all to every standard field', () => {
    expect(resolveColumns('all', defaultStandard)).toEqual([...defaultStandard.fields.keys()])
  })

  it('should split a comma-separated list', () => {
    expect(resolveColumns('src_id, site_id', defaultStandard)).toEqual(['src_id', 'site_id'])
  })

  it('should reject unknown columns', () => {
    expect(() => resolveColumns(['src_id', 'flux', 'gain'], defaultStandard)).toThrow(
      'Cannot export unknown column(s): flux, gain'
    )
    expect(() => resolveColumns('flux', defaultStandard)).toThrow(ExportColumnError)
  })
})

describe('formatDataFile', () => {
  it('should write a header and quote cells that need it', () => {
    const text = formatDataFile(
      [
        { src_id: 'a,b', notes: 'say "hi"', slew_sec: 0 },
        { src_id: 'c', notes: null },
      ],
      ['src_id', 'notes', 'slew_sec']
    )

    expect(text).toBe('src_id,notes,slew_sec\n"a,b","say ""hi""",0\nc,,\n')
  })

  it('should use the given separator', () => {
    expect(formatDataFile([{ a: 'x,y', b: true }], ['a', 'b'], '\t')).toBe('a\tb\nx,y\ttrue\n')
  })
})

describe('writeDataFile', () => {
  let dir: string

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'ods-data-'))
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it('should write the selected columns', () => {
    const path = join(dir, 'out.csv')
    writeDataFile(path, [{ src_id: 'src-a', site_id: 'site-a' }], defaultStandard, {
      columns: 'site_id,src_id',
      sep: ';',
    })

    expect(readFileSync(path, 'utf8')).toBe('site_id;src_id\nsite-a;src-a\n')
  })

  it('should not write a file for unknown columns', () => {
    const path = join(dir, 'bad.csv')
    expect(() => writeDataFile(path, [], defaultStandard, { columns: ['flux'] })).toThrow(
      ExportColumnError
    )
    expect(() => readFileSync(path, 'utf8')).toThrow()
  })
})
