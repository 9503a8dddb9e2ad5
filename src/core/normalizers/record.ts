import type {
  FieldValue,
  NormalizedRecord,
  OdsRecord,
  OdsRecordInput,
} from '../../types/record.js'
import type { OdsStandard } from '../../types/schema.js'
import type { DateInterpreter } from '../../types/config.js'
import type { FieldCoercion } from './types.js'
import { getFieldNormalizer, toRawValue } from './field.js'
import { interpretDate as defaultInterpretDate } from './date.js'

/**
 * Options for record normalization.
 */
export interface NormalizeOptions {
  /** Date interpreter for time fields (default: `interpretDate` on system time) */
  interpretDate?: DateInterpreter
}

const hasOwn = (obj: object, key: string): boolean =>
  Object.prototype.hasOwnProperty.call(obj, key)

/**
 * Coerces one value to the declared type of `field`.
 * Fields the standard does not know are passed through as raw values.
 */
export function normalizeField(
  field: string,
  value: unknown,
  standard: OdsStandard,
  options: NormalizeOptions = {}
): FieldCoercion {
  if (value === null || value === undefined) {
    return { ok: true, value: null }
  }
  const definition = standard.fields.get(field)
  const normalizer = definition ? getFieldNormalizer(definition.type) : undefined
  if (!normalizer) {
    return { ok: true, value: toRawValue(value) }
  }
  return normalizer(value, {
    interpretDate: options.interpretDate ?? ((v) => defaultInterpretDate(v)),
  })
}

/**
 * Builds a complete record from partial input.
 *
 * Each standard field takes the input's value when the key is present,
 * otherwise the default, otherwise `null`. Values are coerced to the field
 * type; values that cannot be coerced are kept raw and listed in
 * `parseFailures`. Input keys outside the standard are dropped and listed in
 * `unknownFields`.
 *
 * @example
 * ```typescript
 * const { record } = normalizeRecord(
 *   { src_id: 'casa', src_start_utc: '2024-01-01T00:00:00' },
 *   { site_id: 'ata' },
 *   standard
 * )
 * record.site_id        // 'ata'
 * record.src_start_utc  // Date 2024-01-01T00:00:00Z
 * record.notes          // null
 * ```
 */
export function normalizeRecord(
  input: OdsRecordInput,
  defaults: Readonly<Record<string, FieldValue>>,
  standard: OdsStandard,
  options: NormalizeOptions = {}
): NormalizedRecord {
  const record: OdsRecord = {}
  const parseFailures: string[] = []

  for (const field of standard.fields.keys()) {
    let value: unknown = null
    if (hasOwn(input, field) && input[field] !== undefined) {
      value = input[field]
    } else if (hasOwn(defaults, field)) {
      value = defaults[field]
    }
    const coercion = normalizeField(field, value, standard, options)
    record[field] = coercion.value
    if (!coercion.ok) {
      parseFailures.push(field)
    }
  }

  const unknownFields = Object.keys(input).filter(
    (key) => !standard.fields.has(key)
  )

  return { record, unknownFields, parseFailures }
}

/**
 * Extracts the own enumerable key/value pairs of an arbitrary object,
 * e.g. parsed command-line options or a class instance.
 */
export function extractAttributes(source: object): OdsRecordInput {
  const attributes: OdsRecordInput = {}
  for (const [key, value] of Object.entries(source)) {
    if (typeof value !== 'function') {
      attributes[key] = value
    }
  }
  return attributes
}

/**
 * Deep-copies a record; `Date` values are cloned so no instant is shared.
 */
export function cloneRecord(record: OdsRecord): OdsRecord {
  const copy: OdsRecord = {}
  for (const [key, value] of Object.entries(record)) {
    copy[key] = value instanceof Date ? new Date(value.getTime()) : value
  }
  return copy
}
