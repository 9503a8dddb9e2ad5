import { readFileSync } from 'node:fs'
import { extname } from 'node:path'
import type { FileReference } from '../types/input.js'
import type { OdsStandard } from '../types/schema.js'
import type { RecordLoader } from '../types/config.js'
import { StructuralInputError, isPlainObject } from '../utils/errors.js'
import { readJsonFile } from './json-file.js'
import { readOdsFile } from './ods-file.js'
import { parseDataFile } from './data-file.js'

/**
 * Reads a header map from a JSON file of `{ header: field }` pairs.
 */
export function readHeaderMap(path: string): Record<string, string> {
  const content = readJsonFile(path)
  if (!isPlainObject(content)) {
    throw new StructuralInputError('header map must be a JSON object', { path })
  }
  const map: Record<string, string> = {}
  for (const [header, field] of Object.entries(content)) {
    if (typeof field !== 'string') {
      throw new StructuralInputError(`header map value for '${header}' is not a string`, {
        path,
      })
    }
    map[header] = field
  }
  return map
}

/**
 * Record loader over the local file system. `.json` files are read as ODS
 * documents and anything else as a delimited data file, unless the
 * reference names its format.
 */
export class FileRecordLoader implements RecordLoader {
  load(reference: FileReference, standard: OdsStandard): unknown[] {
    const format =
      reference.format ?? (extname(reference.path).toLowerCase() === '.json' ? 'ods' : 'data')

    if (format === 'ods') {
      return readOdsFile(reference.path, standard)
    }

    const headerMap =
      typeof reference.headerMap === 'string'
        ? readHeaderMap(reference.headerMap)
        : reference.headerMap
    return parseDataFile(readFileSync(reference.path, 'utf8'), {
      sep: reference.sep,
      replaceChar: reference.replaceChar,
      headerMap,
    })
  }
}
