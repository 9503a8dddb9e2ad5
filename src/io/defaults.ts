/**
 * Default record values loaded from JSON files
 * @module io/defaults
 */

import { fileURLToPath } from 'node:url'
import type { FieldValue } from '../types/record.js'
import { ConfigurationError, isPlainObject } from '../utils/errors.js'
import { readJsonFile } from './json-file.js'

/**
 * Directory of the packaged defaults files referenced as `$name`.
 */
export const SYSTEM_DEFAULTS_DIR = fileURLToPath(new URL('../../data/defaults/', import.meta.url))

function toDefaults(content: unknown, source: string): Record<string, FieldValue> {
  if (!isPlainObject(content)) {
    throw new ConfigurationError(`Defaults in ${source} must be a JSON object`, 'defaults')
  }
  const defaults: Record<string, FieldValue> = {}
  for (const [key, value] of Object.entries(content)) {
    if (
      value === null ||
      typeof value === 'string' ||
      typeof value === 'number' ||
      typeof value === 'boolean'
    ) {
      defaults[key] = value
    } else {
      throw new ConfigurationError(
        `Default for '${key}' in ${source} must be a string, number, boolean or null`,
        'defaults'
      )
    }
  }
  return defaults
}

/**
 * Loads defaults from a file source.
 *
 * - `'$name'` reads `name.json` from the packaged defaults directory
 * - `'path.json'` reads the whole file
 * - `'path.json:key'` reads one key of it
 *
 * @example
 * ```typescript
 * loadDefaults('$ata')
 * loadDefaults('./sites.json:ata')
 * ```
 *
 * @throws {ConfigurationError} If the source is not one of these forms or
 *   does not hold a map of plain values
 */
export function loadDefaults(source: string): Record<string, FieldValue> {
  if (source.startsWith('$')) {
    const name = source.slice(1)
    if (!/^[\w-]+$/.test(name)) {
      throw new ConfigurationError(`Invalid system defaults name: ${source}`, 'defaults')
    }
    return toDefaults(readJsonFile(`${SYSTEM_DEFAULTS_DIR}${name}.json`), source)
  }

  const extensionAt = source.indexOf('.json')
  if (extensionAt < 0) {
    throw new ConfigurationError(`Not a valid defaults source: ${source}`, 'defaults')
  }

  const path = source.slice(0, extensionAt + '.json'.length)
  const rest = source.slice(path.length)
  const content = readJsonFile(path)
  if (!rest) {
    return toDefaults(content, source)
  }

  const key = rest.startsWith(':') ? rest.slice(1) : rest
  if (!isPlainObject(content) || !(key in content)) {
    throw new ConfigurationError(`No key '${key}' in ${path}`, 'defaults')
  }
  return toDefaults(content[key], source)
}
