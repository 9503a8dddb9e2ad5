/**
 * A single field value inside an ODS record.
 * `null` is the absent marker: a record always carries every schema field,
 * with `null` where no value was supplied.
 */
export type FieldValue = string | number | boolean | Date | null

/**
 * An ODS record: one schedule entry keyed by standard field name.
 */
export type OdsRecord = Record<string, FieldValue>

/**
 * Loose record shape accepted from callers before normalization.
 * Keys that are not standard fields are dropped during normalization.
 */
export type OdsRecordInput = Record<string, unknown>

/**
 * A record as written to an ODS file: time fields are ISO strings.
 */
export type ExternalRecord = Record<string, string | number | boolean | null>

/**
 * A closed time window, both ends inclusive.
 */
export interface TimeWindow {
  start: Date
  stop: Date
}

/**
 * Outcome of normalizing one input into a complete record.
 */
export interface NormalizedRecord {
  /** The record, carrying every standard field */
  record: OdsRecord
  /** Input keys that are not standard fields */
  unknownFields: string[]
  /** Fields whose value could not be coerced to the declared type */
  parseFailures: string[]
}
