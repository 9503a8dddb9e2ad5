import type { FieldValue, OdsRecord, TimeWindow } from './record.js'
import type { OdsStandard } from './schema.js'
import type { FileReference } from './input.js'
import type { Logger, LogLevel } from '../utils/logger.js'

/**
 * Anything the date interpreter understands: keywords such as `'now'`,
 * ISO strings, `base/offset` strings, Unix timestamps or `Date`s.
 */
export type DateInput = string | number | Date

/**
 * Converts a date-like value to an absolute instant, or `null` if it cannot.
 */
export type DateInterpreter = (value: unknown) => Date | null

/**
 * Source of the current time; injected so culls against "now" are testable.
 */
export type Clock = () => Date

/**
 * Which records `cullByTime` removes.
 * - `'stale'` - records that stopped before the cull time
 * - `'inactive'` - stale records and records that start after the cull time
 */
export type CullMode = 'stale' | 'inactive'

/**
 * Which side of an overlap `continuity` moves.
 */
export type AdjustSide = 'start' | 'stop'

/**
 * Post-merge culls applied by `writeOds`.
 */
export type CullStep = 'time' | 'duplicate'

/**
 * Where shared default values come from.
 * - a map of field → value
 * - `'from_ods'` - fields with a single distinct value in the working instance
 * - `'$name'` - a packaged system defaults file
 * - `'path.json'` or `'path.json:key'` - a JSON file, optionally one key of it
 */
export type DefaultsSource = Record<string, FieldValue> | string

/**
 * Ephemeris collaborator: the window inside the record's span during which
 * its target is above the elevation limit, or `null` if it never is.
 */
export interface HorizonChecker {
  aboveHorizon(
    record: OdsRecord,
    elevationLimitDeg: number,
    timeStepSec: number
  ): TimeWindow | null
}

/**
 * I/O collaborator resolving a file reference into raw records.
 */
export interface RecordLoader {
  load(reference: FileReference, standard: OdsStandard): unknown[]
}

/**
 * Options for constructing an `OdsEngine`.
 */
export interface OdsEngineOptions {
  /** Standard used for every instance (default: the ODS 1.0 standard) */
  standard?: OdsStandard
  /** Name of the initial working instance (default: 'primary') */
  workingInstance?: string
  /** Shared defaults applied to absent fields */
  defaults?: Record<string, FieldValue>
  /** Logger; takes precedence over `logLevel` */
  logger?: Logger
  /** Console level when no logger is given (default: 'warn') */
  logLevel?: LogLevel
  interpretDate?: DateInterpreter
  clock?: Clock
  horizon?: HorizonChecker
  loader?: RecordLoader
}
