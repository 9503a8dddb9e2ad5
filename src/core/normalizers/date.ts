import type { Clock, DateInterpreter } from '../../types/config.js'

/**
 * Seconds per offset unit accepted after a `/` in a date string.
 */
export const TIME_UNITS: Record<string, number> = {
  d: 24 * 3600,
  h: 3600,
  m: 60,
  s: 1,
}

/**
 * Keywords resolved against the clock, with their offset in seconds.
 */
const RELATIVE_KEYWORDS: Record<string, number> = {
  now: 0,
  today: 0,
  current: 0,
  yesterday: -24 * 3600,
  tomorrow: 24 * 3600,
}

const MS_PER_SECOND = 1000

/**
 * Options for date interpretation.
 */
export interface InterpretDateOptions {
  /** Reference clock for relative keywords (default: system time) */
  clock?: Clock
}

/**
 * Validates if a date is valid (checks month/day ranges and leap years).
 *
 * @example
 * ```typescript
 * isValidDate(2024, 2, 29)  // true (leap year)
 * isValidDate(2023, 2, 29)  // false
 * ```
 */
export function isValidDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12) {
    return false
  }

  const daysInMonth = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31]

  const isLeapYear = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
  if (isLeapYear && month === 2) {
    daysInMonth[1] = 29
  }

  return day >= 1 && day <= daysInMonth[month - 1]
}

/**
 * Parses an ISO-8601 date or date-time. Strings without a zone designator
 * are read as UTC.
 */
/**
 * The instant, or null when it lies outside the range `Date` can hold.
 */
function representable(date: Date): Date | null {
  return isNaN(date.getTime()) ? null : date
}

function parseIsoString(str: string): Date | null {
  const match = str.match(
    /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(\.\d+)?)?)?\s*(Z|[+-]\d{2}:?\d{2})?$/i
  )
  if (!match) return null

  const year = parseInt(match[1], 10)
  const month = parseInt(match[2], 10)
  const day = parseInt(match[3], 10)
  const hour = match[4] ? parseInt(match[4], 10) : 0
  const minute = match[5] ? parseInt(match[5], 10) : 0
  const second = match[6] ? parseInt(match[6], 10) : 0
  const millis = match[7] ? Math.round(parseFloat(match[7]) * MS_PER_SECOND) : 0

  if (!isValidDate(year, month, day)) return null
  if (hour > 23 || minute > 59 || second > 59) return null

  let time = Date.UTC(year, month - 1, day, hour, minute, second, millis)

  const zone = match[8]
  if (zone && zone.toUpperCase() !== 'Z') {
    const sign = zone[0] === '-' ? -1 : 1
    const digits = zone.slice(1).replace(':', '')
    const offsetMinutes =
      parseInt(digits.slice(0, 2), 10) * 60 + parseInt(digits.slice(2), 10)
    time -= sign * offsetMinutes * 60 * MS_PER_SECOND
  }

  return new Date(time)
}

/**
 * Splits `base/offset` strings. The offset is a number with an optional
 * d/h/m/s unit; without a unit it is minutes.
 */
function splitOffset(str: string): { base: string; seconds: number } | null {
  const match = str.match(/^([^/]+)\/\s*([+-]?\d+(?:\.\d+)?)\s*([dhms]?)$/i)
  if (!match) return null
  const unit = match[3] ? match[3].toLowerCase() : 'm'
  return {
    base: match[1].trim(),
    seconds: parseFloat(match[2]) * TIME_UNITS[unit],
  }
}

/**
 * Interprets a date-like value as an absolute instant.
 *
 * Understands:
 * - `Date` objects (copied)
 * - Unix timestamps in seconds (< 1e10) or milliseconds
 * - `'now'`, `'today'`, `'current'`, `'yesterday'`, `'tomorrow'`
 * - `'YYYY'` and `'YYYY-MM'` (first instant of the year/month)
 * - ISO-8601 dates and date-times, UTC unless a zone is given
 * - any of the above followed by `/offset`, e.g. `'now/-30'` or `'2024-01-01/2h'`
 *
 * @returns The instant, or null if the value cannot be interpreted
 *
 * @example
 * ```typescript
 * interpretDate('2024-01-30T12:00:00')  // 2024-01-30T12:00:00.000Z
 * interpretDate('2024-01')              // 2024-01-01T00:00:00.000Z
 * interpretDate('2024-01-01/90s')       // 2024-01-01T00:01:30.000Z
 * interpretDate('not a date')           // null
 * ```
 */
export function interpretDate(
  value: unknown,
  options: InterpretDateOptions = {}
): Date | null {
  if (value == null) return null

  if (value instanceof Date) {
    return isNaN(value.getTime()) ? null : new Date(value.getTime())
  }

  if (typeof value === 'number') {
    if (!Number.isFinite(value)) return null
    const timestamp = Math.abs(value) < 10000000000 ? value * MS_PER_SECOND : value
    return representable(new Date(timestamp))
  }

  if (typeof value !== 'string') return null

  const str = value.trim()
  if (!str) return null

  const offset = splitOffset(str)
  if (offset) {
    const base = interpretDate(offset.base, options)
    return base ? representable(addSeconds(base, offset.seconds)) : null
  }

  const keyword = str.toLowerCase()
  if (keyword in RELATIVE_KEYWORDS) {
    const now = options.clock ? options.clock() : new Date()
    return addSeconds(now, RELATIVE_KEYWORDS[keyword])
  }

  if (/^\d{4}$/.test(str)) {
    return new Date(Date.UTC(parseInt(str, 10), 0, 1))
  }

  const yearMonth = str.match(/^(\d{4})-(\d{2})$/)
  if (yearMonth) {
    const month = parseInt(yearMonth[2], 10)
    if (month < 1 || month > 12) return null
    return new Date(Date.UTC(parseInt(yearMonth[1], 10), month - 1, 1))
  }

  return parseIsoString(str)
}

/**
 * Creates a `DateInterpreter` bound to a clock.
 */
export function createDateInterpreter(clock?: Clock): DateInterpreter {
  return (value: unknown) => interpretDate(value, { clock })
}

/**
 * Formats an instant as ISO-8601 with seconds and no zone, in UTC.
 *
 * @example
 * ```typescript
 * formatIsoSeconds(new Date('2024-01-30T12:00:00.250Z'))  // '2024-01-30T12:00:00'
 * ```
 */
export function formatIsoSeconds(date: Date): string {
  return date.toISOString().slice(0, 19)
}

/**
 * Returns a new instant `seconds` after `date`.
 */
export function addSeconds(date: Date, seconds: number): Date {
  return new Date(date.getTime() + seconds * MS_PER_SECOND)
}

/**
 * Generates back-to-back observation windows starting at `start`,
 * leaving one second between consecutive observations.
 *
 * @example
 * ```typescript
 * generateObservationTimes(new Date('2024-01-01T00:00:00Z'), [60, 60])
 * // [[00:00:00, 00:01:00], [00:01:01, 00:02:01]]
 * ```
 */
export function generateObservationTimes(
  start: Date,
  obsLenSec: readonly number[]
): Array<[Date, Date]> {
  const times: Array<[Date, Date]> = []
  let current = new Date(start.getTime())
  for (const length of obsLenSec) {
    times.push([current, addSeconds(current, length)])
    current = addSeconds(current, length + 1)
  }
  return times
}
