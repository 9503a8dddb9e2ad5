import { existsSync } from 'node:fs'
import { v4 as uuidv4 } from 'uuid'
import type { FieldValue, OdsRecord, OdsRecordInput } from '../types/record.js'
import type { OdsStandard } from '../types/schema.js'
import type { OdsInput } from '../types/input.js'
import type {
  AdjustSide,
  CullMode,
  CullStep,
  DateInput,
  DateInterpreter,
  DefaultsSource,
  HorizonChecker,
  OdsEngineOptions,
  RecordLoader,
} from '../types/config.js'
import type { Logger } from '../utils/logger.js'
import {
  createLevelLogger,
  createPrefixedLogger,
} from '../utils/logger.js'
import {
  DateParseError,
  EntryIndexError,
  InstanceNotFoundError,
  StructuralInputError,
  errorMessage,
  isOdsError,
  isPlainObject,
  requireNonEmptyString,
  requireOneOf,
} from '../utils/errors.js'
import { defaultStandard } from '../standard/ods-standard.js'
import {
  DEFAULT_WORKING_INSTANCE,
  OdsInstance,
  type EntryUpdate,
} from './instance.js'
import {
  createDateInterpreter,
  generateObservationTimes,
} from './normalizers/date.js'
import { cloneRecord, extractAttributes } from './normalizers/record.js'
import { OdsCheck, type CoverageResult } from '../check/ods-check.js'
import { EphemerisHorizonChecker } from '../check/horizon.js'
import { FileRecordLoader } from '../io/loader.js'
import { parseOdsDocument, writeOdsFile } from '../io/ods-file.js'
import { writeDataFile } from '../io/data-file.js'
import { fetchOdsDocument, type FetchOptions } from '../io/remote.js'
import { loadDefaults } from '../io/defaults.js'

export const CULL_MODES: readonly CullMode[] = ['stale', 'inactive']

/** Defaults source taking the single-valued fields of the working instance */
export const DEFAULTS_FROM_ODS = 'from_ods'

export interface NewInstanceOptions {
  /** Replace an existing instance of the same name */
  overwrite?: boolean
  /** Make the new instance the working instance */
  setAsWorking?: boolean
}

export interface AddOptions {
  /** Target instance (default: the working instance) */
  instanceName?: string
  /**
   * Collapse duplicates after adding (default: true for lists and files,
   * false for single records)
   */
  removeDuplicates?: boolean
}

/**
 * New start/stop times for `updateOdsTimes`: either one explicit pair per
 * record (`null` leaves a record alone), or back-to-back observations from
 * `start`.
 */
export type OdsTimesUpdate =
  | { times: ReadonlyArray<readonly [DateInput, DateInput] | null> }
  | { start: DateInput; obsLenSec: number | readonly number[] }

export interface WriteOdsOptions {
  /**
   * Records to add: an instance name, an ODS file path or an input
   * (default: the working instance)
   */
  adds?: string | OdsInput
  /** Instance name or ODS file path updated with `adds` (default: none) */
  original?: string
  /** Culls applied after merging (default: ['time', 'duplicate']) */
  cull?: readonly CullStep[]
}

export interface ExportOptions {
  /** Columns to write: 'all', a comma-separated list or an array (default: 'all') */
  columns?: 'all' | string | readonly string[]
  /** Separator (default: ',') */
  sep?: string
}

export interface MonitorOptions extends ExportOptions, FetchOptions {}

/**
 * Reconciliation engine over a registry of named ODS instances.
 *
 * Every operation targets the working instance unless given an instance
 * name. Unknown instances and bad parameters are logged and reported by
 * the return value (`false`, `0`, `[]` or `null`); nothing throws through
 * the engine.
 *
 * @example
 * ```typescript
 * const engine = new OdsEngine({ defaults: { site_id: 'ata' } })
 * engine.add(listInput(records))
 * engine.cullByTime('now', 'stale')
 * engine.writeOds('ods.json')
 * ```
 */
export class OdsEngine {
  readonly standard: OdsStandard
  /** Shared defaults for fields absent from added records */
  defaults: Record<string, FieldValue>

  private readonly instances = new Map<string, OdsInstance>()
  private workingName: string
  private readonly logger: Logger
  private readonly interpretDate: DateInterpreter
  private readonly horizon: HorizonChecker
  private readonly loader: RecordLoader
  private readonly check: OdsCheck

  constructor(options: OdsEngineOptions = {}) {
    this.standard = options.standard ?? defaultStandard
    this.defaults = { ...options.defaults }
    this.logger =
      options.logger ??
      createPrefixedLogger('ods', createLevelLogger(options.logLevel ?? 'warn'))
    this.interpretDate = options.interpretDate ?? createDateInterpreter(options.clock)
    this.horizon = options.horizon ?? new EphemerisHorizonChecker(this.standard)
    this.loader = options.loader ?? new FileRecordLoader()
    this.check = new OdsCheck({ logger: this.logger })

    this.workingName = options.workingInstance ?? DEFAULT_WORKING_INSTANCE
    this.instances.set(this.workingName, this.createInstance(this.workingName))
  }

  get workingInstance(): string {
    return this.workingName
  }

  // ============================================================================
  // Registry
  // ============================================================================

  /**
   * Creates an empty instance. An existing name is left alone unless
   * `overwrite` is set.
   */
  newInstance(name: string, options: NewInstanceOptions = {}): boolean {
    const { overwrite = false, setAsWorking = false } = options
    try {
      requireNonEmptyString(name, 'name')
    } catch (error) {
      this.logger.error(errorMessage(error))
      return false
    }
    if (this.instances.has(name) && !overwrite) {
      this.logger.warn(`Instance ${name} already exists; use overwrite to replace it`)
      return false
    }
    this.instances.set(name, this.createInstance(name))
    if (setAsWorking) {
      this.setWorkingInstance(name)
    }
    return true
  }

  setWorkingInstance(name: string): boolean {
    if (!this.instances.has(name)) {
      this.logger.warn(`ODS instance ${name} does not exist`)
      return false
    }
    this.workingName = name
    this.logger.info(`The ODS working instance is ${name}`)
    return true
  }

  /**
   * The named instance (default: the working instance), or null.
   */
  getInstance(name?: string): OdsInstance | null {
    return this.resolve(name)
  }

  listInstances(): string[] {
    return [...this.instances.keys()]
  }

  /**
   * Removes an instance. The working instance cannot be dropped.
   */
  dropInstance(name: string): boolean {
    if (name === this.workingName) {
      this.logger.warn(`Cannot drop the working instance ${name}`)
      return false
    }
    if (!this.instances.delete(name)) {
      this.logger.error(new InstanceNotFoundError(name).message)
      return false
    }
    return true
  }

  // ============================================================================
  // Configuration
  // ============================================================================

  /**
   * Replaces the shared defaults from `source` and returns them. Without a
   * source the current defaults are returned unchanged.
   *
   * - a map is copied as is
   * - `'from_ods'` takes the single-valued fields of the working instance
   * - `'$name'` and `'path.json[:key]'` are read from file
   *
   * @returns The new defaults, or null if the source could not be used
   */
  getDefaults(source?: DefaultsSource): Record<string, FieldValue> | null {
    if (source === undefined) {
      return { ...this.defaults }
    }

    let label: string
    if (typeof source !== 'string') {
      this.defaults = { ...source }
      label = 'input map'
    } else if (source === DEFAULTS_FROM_ODS) {
      const working = this.resolve()
      if (!working) return null
      this.defaults = { ...working.singleValued }
      label = source
    } else {
      try {
        this.defaults = loadDefaults(source)
      } catch (error) {
        this.logger.warn(`Cannot use defaults from ${source}: ${errorMessage(error)}`)
        return null
      }
      label = source
    }

    this.logger.info(`Default values from ${label}:`)
    for (const [key, value] of Object.entries(this.defaults)) {
      this.logger.info(`\t${key.padEnd(26)}  ${String(value)}`)
    }
    return { ...this.defaults }
  }

  // ============================================================================
  // Adding records
  // ============================================================================

  /**
   * Normalizes and appends records, then recomputes metadata once.
   *
   * Lists are added element by element; elements that are not objects are
   * logged and skipped. Files go through the record loader and a loader
   * failure adds nothing.
   *
   * @returns The number of records appended
   */
  add(input: OdsInput, options: AddOptions = {}): number {
    const instance = this.resolve(options.instanceName)
    if (!instance) return 0

    let added: number
    let removeDuplicates: boolean
    switch (input.kind) {
      case 'record':
        instance.newRecord(input.record, this.defaults)
        added = 1
        removeDuplicates = options.removeDuplicates ?? false
        break
      case 'attributes':
        instance.newRecord(extractAttributes(input.source), this.defaults)
        added = 1
        removeDuplicates = options.removeDuplicates ?? false
        break
      case 'list':
        added = this.appendAll(instance, input.records)
        this.logger.info(`Read ${added} records from list`)
        removeDuplicates = options.removeDuplicates ?? true
        break
      case 'file': {
        let records: unknown[]
        try {
          records = this.loader.load(input.reference, this.standard)
        } catch (error) {
          this.logger.error(`Failed to read ${input.reference.path}: ${errorMessage(error)}`)
          return 0
        }
        added = this.appendAll(instance, records)
        this.logger.info(`Read ${added} records from ${input.reference.path}`)
        removeDuplicates = options.removeDuplicates ?? true
        break
      }
    }

    if (removeDuplicates) {
      this.collapseDuplicates(instance)
    } else {
      instance.genInfo()
    }
    this.report(instance)
    return added
  }

  /**
   * Appends the records of `fromName` to `toName`.
   */
  merge(
    fromName: string,
    toName: string = this.workingName,
    removeDuplicates: boolean = true
  ): number {
    const from = this.resolve(fromName)
    if (!from || !this.resolve(toName)) return 0
    this.logger.info(`Updating ${toName} from ${fromName}`)
    return this.add(
      { kind: 'list', records: [...from.entries] },
      { instanceName: toName, removeDuplicates }
    )
  }

  /**
   * Reads an ODS document, or the ODS JSON file at a path, into an instance.
   */
  readOds(source: unknown, instanceName?: string): boolean {
    const instance = this.resolve(instanceName)
    if (!instance) return false

    let records: unknown[]
    try {
      records =
        typeof source === 'string'
          ? this.loader.load({ path: source, format: 'ods' }, this.standard)
          : parseOdsDocument(source, this.standard)
    } catch (error) {
      this.logger.warn(`Failed to read ODS input: ${errorMessage(error)}; keeping instance as is`)
      return false
    }

    const added = this.appendAll(instance, records)
    instance.genInfo()
    this.logger.info(`Read ${added} records into ${instance.name}`)
    this.report(instance)
    return true
  }

  // ============================================================================
  // Culling
  // ============================================================================

  /**
   * Removes records by time. `'stale'` removes records that stop before
   * `cullTime`; `'inactive'` also removes records that start after it.
   * Records without start/stop instants are kept.
   */
  cullByTime(
    cullTime: DateInput = 'now',
    mode: CullMode = 'stale',
    instanceName?: string
  ): boolean {
    try {
      requireOneOf(mode, CULL_MODES, 'mode')
    } catch (error) {
      this.logger.warn(errorMessage(error))
      return false
    }
    const instance = this.resolve(instanceName)
    if (!instance) return false
    const time = this.interpretDate(cullTime)
    if (!time) {
      this.logger.warn(new DateParseError(cullTime).message)
      return false
    }

    this.logger.info(`Culling ${instance.name} for ${time.toISOString()} by ${mode}`)
    const { start, stop } = this.standard
    const starting = instance.entries.length
    const retained = instance.entries.filter((record) => {
      const stopTime = record[stop]
      if (stopTime instanceof Date && time > stopTime) return false
      const startTime = record[start]
      if (mode === 'inactive' && startTime instanceof Date && time < startTime) {
        return false
      }
      return true
    })
    instance.replaceEntries(retained)
    this.logger.info(`Retaining ${retained.length} of ${starting}`)
    return true
  }

  /**
   * Keeps only records passing the validity predicate. When no record
   * passes, all are retained.
   */
  cullByInvalid(instanceName?: string): boolean {
    const instance = this.resolve(instanceName)
    if (!instance) return false

    instance.genInfo()
    this.logger.info(`Culling ${instance.name} for invalid records`)
    const starting = instance.numberOfRecords
    if (instance.validRecords.length === 0) {
      this.logger.info('No valid records; retaining all')
      return true
    }
    if (instance.validRecords.length === starting) {
      this.logger.info('Retaining all')
      return true
    }
    instance.replaceEntries(instance.validRecords.map((index) => instance.entries[index]))
    this.logger.info(`Retaining ${instance.numberOfRecords} of ${starting}`)
    return true
  }

  /**
   * Collapses records with equal time sort keys, leaving the instance sorted.
   */
  cullByDuplicate(instanceName?: string): boolean {
    const instance = this.resolve(instanceName)
    if (!instance) return false
    this.collapseDuplicates(instance)
    return true
  }

  sortAndDedup(
    keyOrder?: readonly string[],
    collapse: boolean = true,
    reverse: boolean = false,
    instanceName?: string
  ): boolean {
    const instance = this.resolve(instanceName)
    if (!instance) return false
    instance.sort(keyOrder, collapse, reverse)
    return true
  }

  // ============================================================================
  // Updating records
  // ============================================================================

  /**
   * Patches or deletes (`'delete'`) one record.
   *
   * @returns The number of fields applied or removed; 0 on a miss
   */
  updateEntry(index: number, updates: EntryUpdate, instanceName?: string): number {
    const instance = this.resolve(instanceName)
    if (!instance) return 0
    const count = instance.updateEntry(index, updates)
    if (!count) {
      const inRange = Number.isInteger(index) && index >= 0 && index < instance.entries.length
      this.logger.warn(
        inRange
          ? `No standard fields changed in entry ${index} of ${instance.name}`
          : new EntryIndexError(index, instance.entries.length).message
      )
    }
    return count
  }

  /**
   * Keeps records whose target rises above `elLimDeg` within their span and
   * narrows their start/stop to the time above the limit.
   */
  updateByElevation(
    elLimDeg: number = 10,
    dtSec: number = 120,
    instanceName?: string
  ): boolean {
    const instance = this.resolve(instanceName)
    if (!instance) return false
    this.logger.info(`Updating ${instance.name} for elevation limit ${elLimDeg}`)

    const { start, stop } = this.standard
    const updated: OdsRecord[] = []
    try {
      for (const record of instance.entries) {
        const window = this.horizon.aboveHorizon(record, elLimDeg, dtSec)
        if (window) {
          updated.push({ ...cloneRecord(record), [start]: window.start, [stop]: window.stop })
        }
      }
    } catch (error) {
      this.logger.error(`Elevation update failed: ${errorMessage(error)}`)
      return false
    }
    instance.replaceEntries(updated)
    return true
  }

  /**
   * Replaces the records by their overlap-free version from `continuity`.
   */
  updateByContinuity(
    offsetSec: number = 1,
    adjust: AdjustSide = 'start',
    instanceName?: string
  ): boolean {
    const instance = this.resolve(instanceName)
    if (!instance) return false
    instance.replaceEntries(this.check.continuity(instance, offsetSec, adjust))
    return true
  }

  /**
   * Resets start/stop of every record, either from explicit pairs or as
   * back-to-back observations one second apart.
   */
  updateOdsTimes(update: OdsTimesUpdate, instanceName?: string): boolean {
    const instance = this.resolve(instanceName)
    if (!instance) return false
    const count = instance.numberOfRecords

    let times: ReadonlyArray<readonly [DateInput, DateInput] | null>
    if ('times' in update) {
      if (update.times.length !== count) {
        this.logger.warn("times list doesn't have the right number of entries")
        return false
      }
      times = update.times
    } else {
      const lengths =
        typeof update.obsLenSec === 'number'
          ? new Array<number>(count).fill(update.obsLenSec)
          : update.obsLenSec
      if (lengths.length !== count) {
        this.logger.warn("obsLenSec doesn't have the right number of entries")
        return false
      }
      const start = this.interpretDate(update.start)
      if (!start) {
        this.logger.warn(`Invalid start time: ${String(update.start)}`)
        return false
      }
      times = generateObservationTimes(start, lengths)
    }

    const { start, stop } = this.standard
    const updated: OdsRecord[] = []
    for (const [index, record] of instance.entries.entries()) {
      const pair = times[index]
      if (!pair) {
        updated.push(record)
        continue
      }
      const from = this.interpretDate(pair[0])
      const to = this.interpretDate(pair[1])
      if (!from || !to) {
        this.logger.warn(`Invalid times for entry ${index}: ${String(pair[0])}, ${String(pair[1])}`)
        return false
      }
      updated.push({ ...record, [start]: from, [stop]: to })
    }
    instance.replaceEntries(updated)
    return true
  }

  // ============================================================================
  // Checks
  // ============================================================================

  /**
   * Indices of records active at `cTime`, i.e. whose `[start, stop]`
   * contains it.
   *
   * With a source (an ODS file path or a record list) the records are read
   * into a transient instance first; otherwise the working instance is used.
   */
  checkActive(cTime: DateInput = 'now', source?: string | readonly unknown[]): number[] {
    const time = this.interpretDate(cTime)
    if (!time) {
      this.logger.warn(`Invalid time: ${String(cTime)}`)
      return []
    }

    if (source === undefined) {
      this.logger.info('Not reading a new ODS instance for checkActive')
      const working = this.resolve()
      return working ? this.activeIndices(working, time) : []
    }

    return this.withTransient((name) => {
      if (typeof source === 'string') {
        this.readOds(source, name)
      } else {
        this.add({ kind: 'list', records: source }, { instanceName: name, removeDuplicates: false })
      }
      const instance = this.resolve(name)
      return instance ? this.activeIndices(instance, time) : []
    })
  }

  coverage(instanceName?: string): CoverageResult | null {
    const instance = this.resolve(instanceName)
    if (!instance) return null
    try {
      return this.check.coverage(instance)
    } catch (error) {
      if (isOdsError(error)) {
        this.logger.warn(error.message, error.context)
        return null
      }
      throw error
    }
  }

  /**
   * Overlap-free copies of the records; the instance is not changed.
   */
  continuity(
    offsetSec: number = 1,
    adjust: AdjustSide = 'stop',
    instanceName?: string
  ): OdsRecord[] {
    const instance = this.resolve(instanceName)
    if (!instance) return []
    return this.check.continuity(instance, offsetSec, adjust)
  }

  /**
   * Logs a validity summary of an instance.
   */
  instanceReport(instanceName?: string): boolean {
    const instance = this.resolve(instanceName)
    if (!instance) return false
    this.report(instance)
    return true
  }

  // ============================================================================
  // Output
  // ============================================================================

  /**
   * Reads, merges, culls and writes an ODS file in one pass.
   *
   * The records of `adds` are merged into `original` (or into nothing),
   * the `cull` steps run, and the result is written to `fileName`. An empty
   * result is written with a warning.
   */
  writeOds(fileName: string, options: WriteOdsOptions = {}): boolean {
    const { adds, original, cull = ['time', 'duplicate'] } = options
    const transients: string[] = []
    const transient = (): string => {
      const name = `transient-${uuidv4()}`
      this.newInstance(name)
      transients.push(name)
      return name
    }

    try {
      let addName: string
      if (adds === undefined) {
        addName = this.workingName
      } else if (typeof adds === 'string') {
        if (this.instances.has(adds)) {
          addName = adds
        } else {
          addName = transient()
          if (!this.readOds(adds, addName)) return false
        }
      } else {
        addName = transient()
        this.add(adds, { instanceName: addName })
      }

      let updateName: string
      if (original === undefined) {
        updateName = transient()
      } else if (this.instances.has(original)) {
        updateName = original
      } else {
        updateName = transient()
        if (!this.readOds(original, updateName)) return false
      }

      this.merge(addName, updateName, true)
      const target = this.resolve(updateName)
      if (!target) return false

      const preCull = target.numberOfRecords
      if (cull.includes('time')) {
        this.cullByTime('now', 'stale', updateName)
      }
      if (cull.includes('duplicate')) {
        this.cullByDuplicate(updateName)
      }
      if (!target.numberOfRecords) {
        this.logger.warn(`Writing an empty ODS file! Pre-cull count was ${preCull}`)
      }
      writeOdsFile(fileName, target.toExternal(), this.standard)
      return true
    } catch (error) {
      this.logger.error(`Failed to write ${fileName}: ${errorMessage(error)}`)
      return false
    } finally {
      for (const name of transients) {
        this.instances.delete(name)
      }
    }
  }

  /**
   * Writes an instance as a delimited data file.
   */
  writeFile(fileName: string, options: ExportOptions = {}, instanceName?: string): boolean {
    const instance = this.resolve(instanceName)
    if (!instance) return false
    if (!instance.numberOfRecords) {
      this.logger.warn('Writing an empty ODS file!')
    }
    try {
      writeDataFile(fileName, instance.toExternal(), this.standard, options)
    } catch (error) {
      this.logger.error(`Failed to write ${fileName}: ${errorMessage(error)}`)
      return false
    }
    return true
  }

  /**
   * Fetches the ODS at `url`, keeps the records active now and merges them
   * into the delimited log at `logFile`, rewriting it.
   *
   * @returns The number of records in the rewritten log, or null on failure
   */
  async onlineOdsMonitor(
    url: string,
    logFile: string,
    options: MonitorOptions = {}
  ): Promise<number | null> {
    const { columns = 'all', sep = ',', fetch } = options

    let document: unknown
    try {
      document = await fetchOdsDocument(url, { fetch })
    } catch (error) {
      this.logger.error(`Failed to fetch ${url}: ${errorMessage(error)}`)
      return null
    }

    return this.withTransient((webName) =>
      this.withTransient((logName) => {
        if (!this.readOds(document, webName)) return null
        this.cullByTime('now', 'inactive', webName)

        if (existsSync(logFile)) {
          this.add(
            { kind: 'file', reference: { path: logFile, format: 'data', sep } },
            { instanceName: logName }
          )
        } else {
          this.logger.info(`Starting new log ${logFile}`)
        }
        this.merge(webName, logName, true)

        const log = this.resolve(logName)
        if (!log || !this.writeFile(logFile, { columns, sep }, logName)) return null
        return log.numberOfRecords
      })
    )
  }

  // ============================================================================
  // Internals
  // ============================================================================

  private createInstance(name: string): OdsInstance {
    return new OdsInstance(name, this.standard, { interpretDate: this.interpretDate })
  }

  private resolve(name?: string): OdsInstance | null {
    const resolved = name ?? this.workingName
    const instance = this.instances.get(resolved)
    if (!instance) {
      this.logger.error(
        `${new InstanceNotFoundError(resolved).message}; create it with newInstance or use another name`
      )
      return null
    }
    return instance
  }

  private appendAll(instance: OdsInstance, records: readonly unknown[]): number {
    let count = 0
    records.forEach((entry, index) => {
      if (!isPlainObject(entry)) {
        const error = new StructuralInputError(`record ${index} is not an object`)
        this.logger.warn(error.message, error.context)
        return
      }
      const input: OdsRecordInput = entry
      instance.newRecord(input, this.defaults)
      count++
    })
    return count
  }

  private collapseDuplicates(instance: OdsInstance): void {
    this.logger.info(`Culling ${instance.name} for duplicates`)
    const starting = instance.entries.length
    instance.sort()
    if (instance.entries.length === starting) {
      this.logger.info('Retaining all')
    } else {
      this.logger.info(`Retaining ${instance.numberOfRecords} of ${starting}`)
    }
  }

  private activeIndices(instance: OdsInstance, time: Date): number[] {
    const { start, stop } = this.standard
    const active: number[] = []
    instance.entries.forEach((record, index) => {
      const from = record[start]
      const to = record[stop]
      if (from instanceof Date && to instanceof Date && from <= time && time <= to) {
        active.push(index)
      }
    })
    return active
  }

  private report(instance: OdsInstance): void {
    const total = instance.numberOfRecords
    const invalid = instance.invalidRecords.size
    if (total && invalid === total) {
      this.logger.warn(`All records (${total}) were invalid`)
    } else if (invalid) {
      this.logger.warn(`${invalid} / ${total} were not valid`)
      for (const [index, reasons] of instance.invalidRecords) {
        this.logger.warn(`Entry ${index}: ${reasons.join(', ')}`)
      }
    } else {
      this.logger.info(`${total} are all valid`)
    }
  }

  private withTransient<T>(run: (name: string) => T): T {
    const name = `transient-${uuidv4()}`
    this.newInstance(name)
    try {
      return run(name)
    } finally {
      this.instances.delete(name)
    }
  }
}
