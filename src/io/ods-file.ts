/**
 * ODS JSON documents: `{ [dataKey]: records[] }`
 * @module io/ods-file
 */

import type { ExternalRecord } from '../types/record.js'
import type { OdsStandard } from '../types/schema.js'
import { StructuralInputError, isPlainObject } from '../utils/errors.js'
import { readJsonFile, writeJsonFile } from './json-file.js'

export type OdsDocument = Record<string, ExternalRecord[]>

/**
 * Extracts the raw record list from a parsed ODS document.
 *
 * @throws {StructuralInputError} If the document is not an object or its
 *   data key does not hold a list
 */
export function parseOdsDocument(document: unknown, standard: OdsStandard): unknown[] {
  if (!isPlainObject(document)) {
    throw new StructuralInputError('ODS document must be a JSON object')
  }
  const records = document[standard.dataKey]
  if (!Array.isArray(records)) {
    throw new StructuralInputError(`ODS document has no '${standard.dataKey}' list`, {
      keys: Object.keys(document),
    })
  }
  return records
}

export function toOdsDocument(
  records: readonly ExternalRecord[],
  standard: OdsStandard
): OdsDocument {
  return { [standard.dataKey]: [...records] }
}

export function readOdsFile(path: string, standard: OdsStandard): unknown[] {
  return parseOdsDocument(readJsonFile(path), standard)
}

export function writeOdsFile(
  path: string,
  records: readonly ExternalRecord[],
  standard: OdsStandard
): void {
  writeJsonFile(path, toOdsDocument(records, standard))
}
