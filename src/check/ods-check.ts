/**
 * Read-only analyses over an instance: coverage, continuity, duplicates
 * @module check/ods-check
 */

import type { OdsRecord } from '../types/record.js'
import type { AdjustSide } from '../types/config.js'
import type { Logger } from '../utils/logger.js'
import type { OdsInstance } from '../core/instance.js'
import { createSilentLogger } from '../utils/logger.js'
import { CoverageError } from '../utils/errors.js'
import { mergeIntervals, totalLength } from '../core/intervals.js'
import { sortEntries, sortKeyValue } from '../core/sort.js'
import { cloneRecord } from '../core/normalizers/record.js'
import { addSeconds, formatIsoSeconds } from '../core/normalizers/date.js'

export const ADJUST_SIDES: readonly AdjustSide[] = ['start', 'stop']

/**
 * Result of a coverage analysis.
 */
export interface CoverageResult {
  /** Time covered by at least one record, in milliseconds */
  totalMs: number
  /** First covered instant to last covered instant, in milliseconds */
  spanMs: number
  /** `totalMs / spanMs`, in [0, 1] */
  fraction: number
  /** Merged covered spans in start order */
  merged: Array<[Date, Date]>
}

export interface OdsCheckOptions {
  logger?: Logger
}

function formatDuration(ms: number): string {
  const seconds = Math.round(ms / 1000)
  const hours = Math.floor(seconds / 3600)
  const minutes = Math.floor((seconds % 3600) / 60)
  const rest = seconds % 60
  return `${hours}:${String(minutes).padStart(2, '0')}:${String(rest).padStart(2, '0')}`
}

/**
 * Checks over ODS instances and records.
 */
export class OdsCheck {
  private readonly logger: Logger

  constructor(options: OdsCheckOptions = {}) {
    this.logger = options.logger ?? createSilentLogger()
  }

  /**
   * Whether two records hold the same values in `fields` (all standard
   * fields of `fields` when given as an instance's standard field list).
   * Values compare by their string form; a field missing from either
   * record makes them different.
   */
  isSame(a: OdsRecord, b: OdsRecord, fields: Iterable<string>): boolean {
    for (const field of fields) {
      if (!(field in a) || !(field in b)) return false
      if (sortKeyValue(a[field]) !== sortKeyValue(b[field])) return false
    }
    return true
  }

  /**
   * Whether `instance` already holds a record equal to `record`.
   */
  isDuplicate(
    instance: OdsInstance,
    record: OdsRecord,
    fields: Iterable<string> = instance.standard.fields.keys()
  ): boolean {
    const fieldList = [...fields]
    return instance.entries.some((entry) => this.isSame(entry, record, fieldList))
  }

  /**
   * Fraction of the instance's overall span covered by its records.
   *
   * Records without start/stop instants, or with start after stop, are
   * left out.
   *
   * @throws {CoverageError} If no record has a usable span, or the merged
   *   spans have zero total length
   */
  coverage(instance: OdsInstance): CoverageResult {
    const { start, stop } = instance.standard
    const intervals: Array<[Date, Date]> = []
    for (const entry of sortEntries(instance.entries, [stop, start])) {
      const from = entry[start]
      const to = entry[stop]
      if (from instanceof Date && to instanceof Date && from <= to) {
        intervals.push([from, to])
      }
    }
    if (intervals.length === 0) {
      throw new CoverageError('no records with a start and stop time', {
        instance: instance.name,
      })
    }

    const merged = mergeIntervals(intervals)
    const totalMs = totalLength(merged)
    const spanMs = merged[merged.length - 1][1].getTime() - merged[0][0].getTime()
    if (spanMs <= 0) {
      throw new CoverageError('total span is zero', { instance: instance.name })
    }

    const fraction = totalMs / spanMs
    this.logger.info(
      `Time covered: ${formatDuration(totalMs)} of ${formatDuration(spanMs)} (${(100 * fraction).toFixed(1)}%)`
    )
    return { totalMs, spanMs, fraction, merged }
  }

  /**
   * Removes overlaps between consecutive records.
   *
   * Records are sorted by (start, stop). Where the next record starts before
   * the current one stops, either the next start moves to `offsetSec` after
   * the current stop (`'start'`) or the current stop moves to `offsetSec`
   * before the next start (`'stop'`). This is a single pass; an adjustment
   * that leaves a record inverted or an overlap in place is logged, not
   * resolved.
   *
   * @returns Adjusted copies of the records; copies in their original order
   *   when `adjust` is not a known side
   */
  continuity(
    instance: OdsInstance,
    offsetSec: number = 1,
    adjust: AdjustSide = 'stop'
  ): OdsRecord[] {
    if (!ADJUST_SIDES.includes(adjust)) {
      this.logger.warn(`Invalid adjust side '${String(adjust)}'`)
      return instance.entries.map(cloneRecord)
    }

    const { start, stop } = instance.standard
    const adjusted = sortEntries(instance.entries, [start, stop])

    for (let i = 0; i < adjusted.length - 1; i++) {
      const current = adjusted[i]
      const next = adjusted[i + 1]
      let thisStop = current[stop]
      let nextStart = next[start]
      if (!(thisStop instanceof Date) || !(nextStart instanceof Date)) continue
      if (nextStart >= thisStop) continue

      if (adjust === 'start') {
        nextStart = addSeconds(thisStop, offsetSec)
      } else {
        thisStop = addSeconds(nextStart, -offsetSec)
      }
      current[stop] = thisStop
      next[start] = nextStart

      const currentStart = current[start]
      const nextStop = next[stop]
      if (
        nextStart < thisStop ||
        (currentStart instanceof Date && currentStart > thisStop) ||
        (nextStop instanceof Date && nextStart > nextStop)
      ) {
        this.logger.warn(
          `Entries ${i} and ${i + 1} still need fixing after adjusting ${adjust} (${formatIsoSeconds(thisStop)} / ${formatIsoSeconds(nextStart)})`
        )
      }
    }

    return adjusted
  }
}
