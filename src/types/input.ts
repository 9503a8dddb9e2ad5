import type { OdsRecordInput } from './record.js'

/**
 * How a delimited data file's header is rewritten before mapping.
 * - `'x'` or `['x']` removes every `x`
 * - `'x,y'` or `['x', 'y']` replaces every `x` with `y`
 */
export type ReplaceChar = string | [string] | [string, string]

/**
 * Header remapping for delimited files: data-file header → standard field,
 * or the path of a JSON file holding that mapping.
 */
export type HeaderMap = Record<string, string> | string

/**
 * Reference to records held outside the process.
 */
export interface FileReference {
  path: string
  /** `'ods'` for an ODS JSON document, `'data'` for a delimited file (default: by extension) */
  format?: 'ods' | 'data'
  /** Separator for delimited files (default: 'auto') */
  sep?: string
  replaceChar?: ReplaceChar
  headerMap?: HeaderMap
}

/**
 * Input accepted by `OdsEngine.add`, tagged by shape so the engine never
 * inspects runtime types to decide what it was given.
 */
export type OdsInput =
  | { kind: 'record'; record: OdsRecordInput }
  | { kind: 'list'; records: readonly unknown[] }
  | { kind: 'attributes'; source: object }
  | { kind: 'file'; reference: FileReference }

/**
 * Builds an `OdsInput` for a single record.
 */
export function recordInput(record: OdsRecordInput): OdsInput {
  return { kind: 'record', record }
}

/**
 * Builds an `OdsInput` for a list of records.
 */
export function listInput(records: readonly unknown[]): OdsInput {
  return { kind: 'list', records }
}

/**
 * Builds an `OdsInput` for a file on disk.
 */
export function fileInput(
  path: string,
  options: Omit<FileReference, 'path'> = {}
): OdsInput {
  return { kind: 'file', reference: { path, ...options } }
}
