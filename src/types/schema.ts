import type { OdsRecord } from './record.js'

/**
 * Value types a standard field may declare.
 * - `'str'` - free text
 * - `'float'` - floating point number
 * - `'int'` - integer
 * - `'bool'` - boolean flag
 * - `'time'` - absolute instant, held as a `Date` inside a store
 */
export type OdsFieldType = 'str' | 'float' | 'int' | 'bool' | 'time'

/**
 * Configuration for a single standard field.
 */
export interface OdsFieldDefinition {
  /** Declared value type */
  type: OdsFieldType
  /** Whether a record missing this field is invalid (default: true) */
  required?: boolean
  /** Inclusive numeric range checked by the validity predicate */
  range?: [number, number]
  /** Human readable description */
  description?: string
}

/**
 * Result of the standard's validity predicate.
 */
export interface ValidityResult {
  valid: boolean
  /** Human readable failure reasons; empty when valid */
  reasons: string[]
}

/**
 * Fields with a fixed meaning for the engine and the ephemeris checks.
 */
export interface StandardRoles {
  source: string
  latitude: string
  longitude: string
  elevation: string
  rightAscension: string
  declination: string
}

/**
 * The field schema an instance is validated against.
 * Immutable once built; shared by reference between instances.
 */
export interface OdsStandard {
  readonly version: string
  /** Key holding the record array in an ODS document */
  readonly dataKey: string
  /** Field definitions in canonical order */
  readonly fields: ReadonlyMap<string, OdsFieldDefinition>
  readonly timeFields: ReadonlySet<string>
  /** Observation start field */
  readonly start: string
  /** Observation stop field */
  readonly stop: string
  /** Canonical sort key, also the duplicate equivalence key */
  readonly sortOrderTime: readonly string[]
  /** Fields with a fixed meaning; a custom standard may leave some out */
  readonly roles: Readonly<Partial<StandardRoles>>
  /** Validity predicate */
  valid(record: OdsRecord): ValidityResult
}

/**
 * Extra record check contributed on top of the per-field checks.
 * Returns failure reasons, or an empty array.
 */
export type RecordCheck = (record: OdsRecord, standard: OdsStandard) => string[]
