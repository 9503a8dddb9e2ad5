import { readFileSync, writeFileSync } from 'node:fs'
import { StructuralInputError, errorMessage } from '../utils/errors.js'

/**
 * Reads and parses a JSON file, appending `.json` when the path has no
 * such extension.
 *
 * @throws {StructuralInputError} If the content is not valid JSON
 */
export function readJsonFile(path: string): unknown {
  const fileName = path.endsWith('.json') ? path : `${path}.json`
  const content = readFileSync(fileName, 'utf8')
  try {
    return JSON.parse(content)
  } catch (error) {
    throw new StructuralInputError(`invalid JSON (${errorMessage(error)})`, {
      path: fileName,
    })
  }
}

export function writeJsonFile(path: string, payload: unknown, indent: number = 2): void {
  writeFileSync(path, `${JSON.stringify(payload, null, indent)}\n`, 'utf8')
}
