import type {
  ExternalRecord,
  FieldValue,
  NormalizedRecord,
  OdsRecord,
  OdsRecordInput,
} from '../types/record.js'
import type { OdsStandard } from '../types/schema.js'
import type { DateInterpreter } from '../types/config.js'
import {
  cloneRecord,
  normalizeField,
  normalizeRecord,
} from './normalizers/record.js'
import { formatIsoSeconds } from './normalizers/date.js'
import { sortEntries, sortKeyValue } from './sort.js'

export const DEFAULT_WORKING_INSTANCE = 'primary'

/**
 * Key of the `inputSets` entry collecting field names outside the standard.
 */
export const INVALID_FIELDS_KEY = 'invalid'

/**
 * Sentinels the earliest/latest scan starts from.
 */
const FAR_FUTURE_MS = 8.64e15
const FAR_PAST_MS = -8.64e15

/**
 * Value passed to `updateEntry` to remove a record.
 */
export const DELETE_ENTRY = 'delete'

export type EntryUpdate = OdsRecordInput | typeof DELETE_ENTRY

export interface OdsInstanceOptions {
  /** Date interpreter for time fields (default: `interpretDate` on system time) */
  interpretDate?: DateInterpreter
}

/**
 * Key that tells distinct values apart, instants by their time.
 */
function distinctKey(value: FieldValue): string {
  if (value instanceof Date) return `date:${value.getTime()}`
  return `${typeof value}:${String(value)}`
}

/**
 * One named collection of ODS records plus metadata derived from them.
 *
 * Records are appended in insertion order; only `sort` reorders them.
 * Derived metadata (`validRecords`, `invalidRecords`, `inputSets`,
 * `earliest`/`latest`) is rebuilt by a full scan in `genInfo` and is stale
 * between an append and the next scan.
 */
export class OdsInstance {
  readonly name: string
  readonly standard: OdsStandard

  /** The records, each carrying every standard field */
  entries: OdsRecord[] = []
  /** Indices of records passing the standard's validity predicate */
  validRecords: number[] = []
  /** Failure reasons keyed by index of each invalid record */
  invalidRecords = new Map<number, string[]>()
  /** Distinct values per field; `'invalid'` holds unknown field names */
  inputSets = new Map<string, Set<FieldValue>>()
  /** Fields that have exactly one distinct value, with that value */
  singleValued: Record<string, FieldValue> = {}
  numberOfRecords = 0
  /** Earliest start instant, or null if no record has one */
  earliest: Date | null = null
  /** Latest stop instant, or null if no record has one */
  latest: Date | null = null

  private readonly unknownFields = new Set<string>()
  private readonly interpretDate?: DateInterpreter

  constructor(
    name: string,
    standard: OdsStandard,
    options: OdsInstanceOptions = {}
  ) {
    this.name = name
    this.standard = standard
    this.interpretDate = options.interpretDate
  }

  /**
   * Normalizes `entry` against the standard, filling absent fields from
   * `defaults`, and appends it. Metadata is not recomputed.
   */
  newRecord(
    entry: OdsRecordInput,
    defaults: Readonly<Record<string, FieldValue>> = {}
  ): NormalizedRecord {
    const normalized = normalizeRecord(entry, defaults, this.standard, {
      interpretDate: this.interpretDate,
    })
    for (const field of normalized.unknownFields) {
      this.unknownFields.add(field)
    }
    this.entries.push(normalized.record)
    return normalized
  }

  /**
   * Appends a copy of an already normalized record. Metadata is not recomputed.
   */
  append(record: OdsRecord): void {
    this.entries.push(cloneRecord(record))
  }

  /**
   * Replaces the record sequence wholesale and recomputes metadata.
   */
  replaceEntries(records: readonly OdsRecord[]): void {
    this.entries = records.map(cloneRecord)
    this.genInfo()
  }

  /**
   * Rebuilds all derived metadata with a full scan.
   */
  genInfo(): void {
    const { start, stop, fields } = this.standard
    let earliest = FAR_FUTURE_MS
    let latest = FAR_PAST_MS

    const invalidFields = new Set<FieldValue>(this.unknownFields)
    const inputSets = new Map<string, Set<FieldValue>>([
      [INVALID_FIELDS_KEY, invalidFields],
    ])
    const seen = new Map<string, Set<string>>()

    this.validRecords = []
    this.invalidRecords = new Map()
    this.numberOfRecords = this.entries.length

    this.entries.forEach((entry, index) => {
      for (const [key, value] of Object.entries(entry)) {
        if (!fields.has(key)) {
          invalidFields.add(key)
          continue
        }
        let keys = seen.get(key)
        let values = inputSets.get(key)
        if (!keys || !values) {
          keys = new Set()
          values = new Set()
          seen.set(key, keys)
          inputSets.set(key, values)
        }
        const distinct = distinctKey(value)
        if (!keys.has(distinct)) {
          keys.add(distinct)
          values.add(value)
        }
        if (value instanceof Date) {
          const time = value.getTime()
          if (key === start && time < earliest) {
            earliest = time
          } else if (key === stop && time > latest) {
            latest = time
          }
        }
      }

      const { valid, reasons } = this.standard.valid(entry)
      if (valid) {
        this.validRecords.push(index)
      } else {
        this.invalidRecords.set(index, reasons)
      }
    })

    this.inputSets = inputSets
    this.earliest = earliest === FAR_FUTURE_MS ? null : new Date(earliest)
    this.latest = latest === FAR_PAST_MS ? null : new Date(latest)

    this.singleValued = {}
    for (const [key, values] of inputSets) {
      if (key !== INVALID_FIELDS_KEY && values.size === 1) {
        const [only] = values
        this.singleValued[key] = only
      }
    }
  }

  /**
   * Patches or deletes the record at `index`.
   *
   * A patch applies only standard fields, coerced as on insertion, and
   * returns how many changed value. `'delete'` removes the record and returns
   * its field count. An index outside the instance is a no-op returning 0.
   * Metadata is recomputed whenever something changed.
   */
  updateEntry(index: number, updates: EntryUpdate): number {
    if (!Number.isInteger(index) || index < 0 || index >= this.entries.length) {
      return 0
    }

    let count = 0
    if (updates === DELETE_ENTRY) {
      count = Object.keys(this.entries[index]).length
      this.entries.splice(index, 1)
    } else {
      const entry = this.entries[index]
      for (const [key, value] of Object.entries(updates)) {
        if (!this.standard.fields.has(key)) continue
        const next = normalizeField(key, value, this.standard, {
          interpretDate: this.interpretDate,
        }).value
        if (sortKeyValue(entry[key]) !== sortKeyValue(next)) {
          entry[key] = next
          count++
        }
      }
    }

    if (count) {
      this.genInfo()
    }
    return count
  }

  /**
   * Sorts the records on `keyOrder`, optionally collapsing records with
   * equal keys to the last of them, and recomputes metadata.
   */
  sort(
    keyOrder: readonly string[] = this.standard.sortOrderTime,
    collapse: boolean = true,
    reverse: boolean = false
  ): void {
    this.entries = sortEntries(this.entries, keyOrder, { collapse, reverse })
    this.genInfo()
  }

  /**
   * Records in their written form, time fields as ISO-8601 seconds strings.
   */
  toExternal(): ExternalRecord[] {
    return this.entries.map((entry) => {
      const external: ExternalRecord = {}
      for (const [key, value] of Object.entries(entry)) {
        external[key] = value instanceof Date ? formatIsoSeconds(value) : value
      }
      return external
    })
  }
}
