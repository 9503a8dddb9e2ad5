import type { FieldValue } from '../../types/record.js'
import type { DateInterpreter } from '../../types/config.js'

/**
 * Result of coercing one value to a field's declared type.
 * A failed coercion carries the raw value so it can still be stored and
 * reported by the standard's validity predicate.
 */
export type FieldCoercion =
  | { ok: true; value: FieldValue }
  | { ok: false; value: FieldValue }

/**
 * Context handed to every field normalizer.
 */
export interface FieldNormalizerContext {
  interpretDate: DateInterpreter
}

/**
 * Coerces a non-null raw value to a field type.
 *
 * @example
 * ```typescript
 * const upper: FieldNormalizer = (value) =>
 *   typeof value === 'string'
 *     ? { ok: true, value: value.toUpperCase() }
 *     : { ok: false, value: String(value) }
 * ```
 */
export type FieldNormalizer = (
  value: unknown,
  context: FieldNormalizerContext
) => FieldCoercion
