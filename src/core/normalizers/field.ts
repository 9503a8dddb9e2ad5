import type { OdsFieldType } from '../../types/schema.js'
import type { FieldValue } from '../../types/record.js'
import type { FieldCoercion, FieldNormalizer } from './types.js'
import { formatIsoSeconds } from './date.js'

const TRUE_STRINGS = new Set(['true', 't', 'yes', 'y', '1'])
const FALSE_STRINGS = new Set(['false', 'f', 'no', 'n', '0'])

/**
 * Central registry of field normalizers, keyed by field type.
 */
const fieldNormalizerRegistry = new Map<OdsFieldType, FieldNormalizer>()

/**
 * Turns anything into a storable value for a failed coercion.
 */
export function toRawValue(value: unknown): FieldValue {
  if (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    value instanceof Date
  ) {
    return value
  }
  return String(value)
}

const failed = (value: unknown): FieldCoercion => ({
  ok: false,
  value: toRawValue(value),
})

const isBlank = (value: unknown): boolean =>
  typeof value === 'string' && value.trim() === ''

function toNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null
  }
  if (typeof value === 'string') {
    const parsed = Number(value.trim())
    return Number.isFinite(parsed) ? parsed : null
  }
  return null
}

export const normalizeStr: FieldNormalizer = (value) => {
  if (typeof value === 'string') return { ok: true, value }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return { ok: true, value: String(value) }
  }
  if (value instanceof Date) return { ok: true, value: formatIsoSeconds(value) }
  return failed(value)
}

export const normalizeFloat: FieldNormalizer = (value) => {
  if (isBlank(value)) return { ok: true, value: null }
  const parsed = toNumber(value)
  return parsed === null ? failed(value) : { ok: true, value: parsed }
}

export const normalizeInt: FieldNormalizer = (value) => {
  if (isBlank(value)) return { ok: true, value: null }
  const parsed = toNumber(value)
  return parsed === null || !Number.isInteger(parsed)
    ? failed(value)
    : { ok: true, value: parsed }
}

export const normalizeBool: FieldNormalizer = (value) => {
  if (isBlank(value)) return { ok: true, value: null }
  if (typeof value === 'boolean') return { ok: true, value }
  if (typeof value === 'number' && (value === 0 || value === 1)) {
    return { ok: true, value: value === 1 }
  }
  if (typeof value === 'string') {
    const lowered = value.trim().toLowerCase()
    if (TRUE_STRINGS.has(lowered)) return { ok: true, value: true }
    if (FALSE_STRINGS.has(lowered)) return { ok: true, value: false }
  }
  return failed(value)
}

export const normalizeTime: FieldNormalizer = (value, context) => {
  if (isBlank(value)) return { ok: true, value: null }
  const instant = context.interpretDate(value)
  return instant === null ? failed(value) : { ok: true, value: instant }
}

/**
 * Registers the normalizer used for a field type.
 * Overwriting an existing type logs a warning.
 *
 * @example
 * ```typescript
 * registerFieldNormalizer('str', (value) => ({ ok: true, value: String(value).trim() }))
 * ```
 */
export function registerFieldNormalizer(
  type: OdsFieldType,
  fn: FieldNormalizer
): void {
  if (fieldNormalizerRegistry.has(type)) {
    console.warn(
      `Field normalizer for '${type}' is already registered. Overwriting with new implementation.`
    )
  }
  fieldNormalizerRegistry.set(type, fn)
}

/**
 * Retrieves the normalizer for a field type.
 */
export function getFieldNormalizer(type: OdsFieldType): FieldNormalizer | undefined {
  return fieldNormalizerRegistry.get(type)
}

/**
 * Lists field types with a registered normalizer.
 */
export function listFieldNormalizers(): OdsFieldType[] {
  return Array.from(fieldNormalizerRegistry.keys())
}

/**
 * Restores the built-in normalizers, dropping any overrides.
 *
 * @internal
 */
export function resetFieldNormalizers(): void {
  fieldNormalizerRegistry.clear()
  fieldNormalizerRegistry.set('str', normalizeStr)
  fieldNormalizerRegistry.set('float', normalizeFloat)
  fieldNormalizerRegistry.set('int', normalizeInt)
  fieldNormalizerRegistry.set('bool', normalizeBool)
  fieldNormalizerRegistry.set('time', normalizeTime)
}

resetFieldNormalizers()
