import type { FieldValue, OdsRecord } from '../types/record.js'
import { cloneRecord } from './normalizers/record.js'

/**
 * Options for sorting records.
 */
export interface SortEntriesOptions {
  /** Reduce records sharing a sort key to the last one (default: false) */
  collapse?: boolean
  /** Sort descending (default: false) */
  reverse?: boolean
}

/**
 * Internal record wrapper for sorting.
 */
interface SortableRecord {
  /** String-coerced values of the sort terms */
  sortKeys: string[]
  /** Original index in the input array */
  originalIndex: number
}

/**
 * String form of a value inside a sort key. Instants use their ISO form so
 * that lexicographic order is chronological.
 */
export function sortKeyValue(value: FieldValue | undefined): string {
  if (value === null || value === undefined) return 'null'
  if (value instanceof Date) return value.toISOString()
  return String(value)
}

/**
 * Lexicographic tuple comparison over string keys (code-unit order).
 */
export function compareSortKeys(a: readonly string[], b: readonly string[]): number {
  const length = Math.min(a.length, b.length)
  for (let i = 0; i < length; i++) {
    if (a[i] < b[i]) return -1
    if (a[i] > b[i]) return 1
  }
  return a.length - b.length
}

/**
 * Composite sort key of a record over `terms`.
 */
export function recordSortKey(
  record: OdsRecord,
  terms: readonly string[]
): string[] {
  return terms.map((term) => sortKeyValue(record[term]))
}

/**
 * Sorts records by the string-coerced values of `terms`.
 *
 * Without `collapse` every record is kept and the original position breaks
 * ties. With `collapse` records whose keys collide are reduced to one: the
 * last of them in input order, so later additions replace earlier ones. The returned records are copies.
 *
 * @example
 * ```typescript
 * sortEntries(entries, ['src_start_utc', 'src_end_utc'])
 * sortEntries(entries, standard.sortOrderTime, { collapse: true })
 * ```
 */
export function sortEntries(
  entries: readonly OdsRecord[],
  terms: readonly string[],
  options: SortEntriesOptions = {}
): OdsRecord[] {
  const { collapse = false, reverse = false } = options

  let sortable: SortableRecord[] = entries.map((record, originalIndex) => ({
    sortKeys: recordSortKey(record, terms),
    originalIndex,
  }))

  if (collapse) {
    const latest = new Map<string, SortableRecord>()
    for (const item of sortable) {
      latest.set(JSON.stringify(item.sortKeys), item)
    }
    sortable = [...latest.values()]
  }

  sortable.sort(
    (a, b) =>
      compareSortKeys(a.sortKeys, b.sortKeys) || a.originalIndex - b.originalIndex
  )
  if (reverse) {
    sortable.reverse()
  }

  return sortable.map((item) => cloneRecord(entries[item.originalIndex]))
}
