/**
 * Delimited data files (CSV, TSV, whitespace columns)
 * @module io/data-file
 */

import { writeFileSync } from 'node:fs'
import type { ExternalRecord } from '../types/record.js'
import type { OdsStandard } from '../types/schema.js'
import type { ReplaceChar } from '../types/input.js'
import { ExportColumnError } from '../utils/errors.js'

/** Detect the separator from the header row */
export const AUTO_SEPARATOR = 'auto'
/** Split on runs of whitespace */
export const WHITESPACE_SEPARATOR = '\\s+'

const AUTO_CANDIDATES = ['\t', ',', ';']

export interface DataFileOptions {
  /** Separator, `'auto'` or `'\\s+'` (default: 'auto') */
  sep?: string
  replaceChar?: ReplaceChar
  /** Data-file header → field name */
  headerMap?: Readonly<Record<string, string>>
}

export type DataRow = Record<string, string | null>

/**
 * Picks tab, comma or semicolon when the header row contains one, in that
 * order, and whitespace runs otherwise.
 */
export function detectSeparator(headerLine: string): string {
  return AUTO_CANDIDATES.find((candidate) => headerLine.includes(candidate)) ?? WHITESPACE_SEPARATOR
}

/**
 * Splits one line into trimmed cells. Double quotes group a cell and `""`
 * inside quotes is a literal quote.
 */
export function splitDataLine(line: string, sep: string): string[] {
  const whitespace = sep === WHITESPACE_SEPARATOR
  const text = whitespace ? line.trim() : line
  const result: string[] = []
  let current = ''
  let inQuotes = false

  for (let i = 0; i < text.length; i++) {
    const char = text[i]

    if (char === '"') {
      if (inQuotes && text[i + 1] === '"') {
        current += '"'
        i++
      } else {
        inQuotes = !inQuotes
      }
    } else if (!inQuotes && whitespace && /\s/.test(char)) {
      result.push(current.trim())
      current = ''
      while (i + 1 < text.length && /\s/.test(text[i + 1])) i++
    } else if (!inQuotes && !whitespace && text.startsWith(sep, i)) {
      result.push(current.trim())
      current = ''
      i += sep.length - 1
    } else {
      current += char
    }
  }

  result.push(current.trim())
  return result
}

/**
 * Applies a `replaceChar` rule to a header name: `'x'` removes `x`,
 * `'x,y'` replaces it with `y`.
 */
export function applyReplaceChar(header: string, replaceChar: ReplaceChar): string {
  const [from, to = ''] =
    typeof replaceChar === 'string' ? replaceChar.split(',') : replaceChar
  return from ? header.split(from).join(to) : header
}

/**
 * Parses delimited text with a header row into rows keyed by (rewritten)
 * header names. Empty cells and cells past the end of a short row are null.
 */
export function parseDataFile(content: string, options: DataFileOptions = {}): DataRow[] {
  const lines = content.split(/\r?\n/).filter((line) => line.trim().length > 0)
  if (lines.length === 0) {
    return []
  }

  const requested = options.sep ?? AUTO_SEPARATOR
  const sep = requested === AUTO_SEPARATOR ? detectSeparator(lines[0]) : requested
  const { replaceChar, headerMap = {} } = options

  const headers = splitDataLine(lines[0], sep).map((header) => {
    const replaced = replaceChar === undefined ? header : applyReplaceChar(header, replaceChar)
    return headerMap[replaced] ?? replaced
  })

  return lines.slice(1).map((line) => {
    const values = splitDataLine(line, sep)
    const row: DataRow = {}
    headers.forEach((header, index) => {
      const value = values[index]
      row[header] = value === undefined || value === '' ? null : value
    })
    return row
  })
}

/**
 * Resolves export columns: `'all'` is every standard field, a string is a
 * comma-separated list.
 *
 * @throws {ExportColumnError} If a column is not a standard field
 */
export function resolveColumns(
  columns: 'all' | string | readonly string[],
  standard: OdsStandard
): string[] {
  const resolved =
    columns === 'all'
      ? [...standard.fields.keys()]
      : typeof columns === 'string'
        ? columns.split(',').map((column) => column.trim())
        : [...columns]
  const missing = resolved.filter((column) => !standard.fields.has(column))
  if (missing.length > 0) {
    throw new ExportColumnError(missing)
  }
  return resolved
}

function formatCell(value: ExternalRecord[string] | undefined, sep: string): string {
  if (value === null || value === undefined) return ''
  const text = String(value)
  return text.includes(sep) || text.includes('"') ? `"${text.replace(/"/g, '""')}"` : text
}

export function formatDataFile(
  records: readonly ExternalRecord[],
  columns: readonly string[],
  sep: string = ','
): string {
  const lines = [columns.join(sep)]
  for (const record of records) {
    lines.push(columns.map((column) => formatCell(record[column], sep)).join(sep))
  }
  return `${lines.join('\n')}\n`
}

/**
 * Writes records as a delimited file. Columns are checked before anything
 * is written.
 */
export function writeDataFile(
  path: string,
  records: readonly ExternalRecord[],
  standard: OdsStandard,
  options: { columns?: 'all' | string | readonly string[]; sep?: string } = {}
): void {
  const columns = resolveColumns(options.columns ?? 'all', standard)
  writeFileSync(path, formatDataFile(records, columns, options.sep ?? ','), 'utf8')
}
