import { describe, it, expect, vi, beforeEach } from 'vitest'
import { OdsEngine } from '../../src/core/engine.js'
import { recordSortKey } from '../../src/core/sort.js'
import { defaultStandard } from '../../src/standard/ods-standard.js'
import type { Logger } from '../../src/utils/logger.js'
import type { OdsRecord } from '../../src/types/record.js'
import type { HorizonChecker, RecordLoader } from '../../src/types/config.js'
import { fixedClock, makeRecord, makeWindow } from '../fixtures/records.js'

const createMockLogger = (): Logger => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
})

const srcIds = (records: readonly OdsRecord[]) => records.map((record) => record.src_id)

describe('OdsEngine', () => {
  let logger: Logger
  let engine: OdsEngine

  beforeEach(() => {
    logger = createMockLogger()
    engine = new OdsEngine({ logger, clock: fixedClock })
  })

  const entries = (name?: string): OdsRecord[] => engine.getInstance(name)?.entries ?? []

  describe('registry', () => {
    it('should start with the working instance', () => {
      expect(engine.listInstances()).toEqual(['primary'])
      expect(engine.workingInstance).toBe('primary')
    })

    it('should create instances once unless overwriting', () => {
      expect(engine.newInstance('other')).toBe(true)
      engine.add({ kind: 'record', record: makeRecord() }, { instanceName: 'other' })

      expect(engine.newInstance('other')).toBe(false)
      expect(entries('other')).toHaveLength(1)
      expect(logger.warn).toHaveBeenCalledWith(
        'Instance other already exists; use overwrite to replace it'
      )

      expect(engine.newInstance('other', { overwrite: true })).toBe(true)
      expect(entries('other')).toHaveLength(0)
    })

    it('should reject blank names', () => {
      expect(engine.newInstance('  ')).toBe(false)
      expect(logger.error).toHaveBeenCalledWith("Invalid parameter 'name': must not be empty")
    })

    it('should switch the working instance', () => {
      engine.newInstance('other', { setAsWorking: true })
      expect(engine.workingInstance).toBe('other')

      expect(engine.setWorkingInstance('missing')).toBe(false)
      expect(engine.workingInstance).toBe('other')
    })

    it('should log unknown instances and return a failure value', () => {
      expect(engine.getInstance('missing')).toBeNull()
      expect(engine.add({ kind: 'record', record: makeRecord() }, { instanceName: 'missing' })).toBe(0)
      expect(engine.cullByTime('now', 'stale', 'missing')).toBe(false)
      expect(engine.coverage('missing')).toBeNull()
      expect(engine.continuity(1, 'stop', 'missing')).toEqual([])
      expect(logger.error).toHaveBeenCalledWith(
        "ODS instance 'missing' does not exist; create it with newInstance or use another name"
      )
    })

    it('should not drop the working instance', () => {
      engine.newInstance('other')

      expect(engine.dropInstance('primary')).toBe(false)
      expect(engine.dropInstance('missing')).toBe(false)
      expect(engine.dropInstance('other')).toBe(true)
      expect(engine.listInstances()).toEqual(['primary'])
    })
  })

  describe('add', () => {
    it('should add single records without removing duplicates', () => {
      engine.add({ kind: 'record', record: makeRecord() })
      engine.add({ kind: 'record', record: makeRecord() })

      expect(entries()).toHaveLength(2)
      expect(engine.getInstance()?.numberOfRecords).toBe(2)
    })

    it('should remove duplicates from lists by default', () => {
      const added = engine.add({
        kind: 'list',
        records: [makeRecord({ notes: 'first' }), makeRecord({ notes: 'second' }), makeRecord({ src_id: 'src-b' })],
      })

      expect(added).toBe(3)
      expect(entries().map((entry) => entry.notes ?? entry.src_id)).toEqual(['second', 'src-b'])
    })

    it('should keep duplicates when asked', () => {
      engine.add(
        { kind: 'list', records: [makeRecord(), makeRecord()] },
        { removeDuplicates: false }
      )
      expect(entries()).toHaveLength(2)
    })

    it('should skip list elements that are not records', () => {
      const added = engine.add({ kind: 'list', records: [makeRecord(), 42, null] })

      expect(added).toBe(1)
      expect(logger.warn).toHaveBeenCalledWith('Cannot interpret input: record 1 is not an object', {
        reason: 'record 1 is not an object',
      })
    })

    it('should keep out-of-range timestamps raw and flag the record', () => {
      const add = () => engine.add({ kind: 'list', records: [makeRecord({ src_start_utc: 1e17 })] })

      expect(add).not.toThrow()
      expect(entries()[0].src_start_utc).toBe(1e17)
      expect(engine.getInstance()?.invalidRecords.get(0)).toContain(
        "src_start_utc is not a valid time: '100000000000000000'"
      )
    })

    it('should add the attributes of an object', () => {
      class ParsedOptions {
        src_id = 'src-opt'
        src_start_utc = 'now'
        src_end_utc = 'now/60'
      }

      expect(engine.add({ kind: 'attributes', source: new ParsedOptions() })).toBe(1)
      expect(entries()[0].src_end_utc).toEqual(new Date('2024-03-01T02:00:00Z'))
    })

    it('should apply the shared defaults', () => {
      engine.defaults = { site_id: 'site-x', notes: 'default note' }
      engine.add({ kind: 'record', record: { src_id: 'src-a', notes: 'own note' } })

      expect(entries()[0].site_id).toBe('site-x')
      expect(entries()[0].notes).toBe('own note')
    })

    it('should log loader failures and add nothing', () => {
      const loader: RecordLoader = {
        load: () => {
          throw new Error('boom')
        },
      }
      const failing = new OdsEngine({ logger, loader })

      expect(failing.add({ kind: 'file', reference: { path: 'missing.csv' } })).toBe(0)
      expect(logger.error).toHaveBeenCalledWith('Failed to read missing.csv: boom')
    })
  })

  describe('merge', () => {
    const setA = [makeRecord({ src_id: 'a' }), makeRecord({ src_id: 'shared' })]
    const setB = [makeRecord({ src_id: 'b' }), makeRecord({ src_id: 'shared' })]
    const setC = [makeRecord({ src_id: 'c' })]

    const load = (target: OdsEngine, name: string, records: readonly unknown[]) => {
      target.newInstance(name)
      target.add({ kind: 'list', records }, { instanceName: name })
    }

    it('should append the records of one instance to another', () => {
      load(engine, 'a', setA)

      expect(engine.merge('a')).toBe(2)
      expect(srcIds(entries())).toEqual(['a', 'shared'])
      expect(srcIds(entries('a'))).toEqual(['a', 'shared'])
    })

    it('should be associative in content', () => {
      const left = new OdsEngine({ logLevel: 'silent' })
      load(left, 'a', setA)
      load(left, 'b', setB)
      load(left, 'c', setC)
      left.newInstance('ab')
      left.merge('a', 'ab')
      left.merge('b', 'ab')
      left.merge('ab', 'primary')
      left.merge('c', 'primary')

      const right = new OdsEngine({ logLevel: 'silent' })
      load(right, 'a', setA)
      load(right, 'b', setB)
      load(right, 'c', setC)
      right.newInstance('bc')
      right.merge('b', 'bc')
      right.merge('c', 'bc')
      right.merge('a', 'primary')
      right.merge('bc', 'primary')

      expect(left.getInstance()?.entries).toEqual(right.getInstance()?.entries)
      expect(srcIds(left.getInstance()?.entries ?? [])).toEqual(['a', 'b', 'c', 'shared'])
    })

    it('should let merged records replace those with the same time key', () => {
      engine.add({ kind: 'record', record: makeRecord({ notes: 'original' }) })
      load(engine, 'adds', [makeRecord({ notes: 'update' })])

      engine.merge('adds', 'primary')

      expect(entries().map((entry) => entry.notes)).toEqual(['update'])
    })

    it('should hold the same records by time key whichever order sets are merged in', () => {
      const keysAfter = (order: readonly string[]) => {
        const target = new OdsEngine({ logLevel: 'silent' })
        load(target, 'a', setA)
        load(target, 'b', setB)
        for (const name of order) {
          target.merge(name, 'primary')
        }
        return (target.getInstance()?.entries ?? []).map((entry) =>
          recordSortKey(entry, defaultStandard.sortOrderTime)
        )
      }

      expect(keysAfter(['a', 'b'])).toEqual(keysAfter(['b', 'a']))
      expect(keysAfter(['a', 'b'])).toHaveLength(3)
    })

    it('should refuse unknown instances', () => {
      expect(engine.merge('missing')).toBe(0)
    })
  })

  describe('cullByTime', () => {
    beforeEach(() => {
      engine.add(
        {
          kind: 'list',
          records: [
            makeWindow('stops-now', '2024-03-01T00:00:00', '2024-03-01T01:00:00'),
            makeWindow('stale', '2024-03-01T00:00:00', '2024-03-01T00:59:59'),
            makeWindow('starts-now', '2024-03-01T01:00:00', '2024-03-01T02:00:00'),
            makeWindow('future', '2024-03-01T01:00:01', '2024-03-01T02:00:00'),
            makeWindow('no-stop', '2024-03-01T00:00:00', 'unknown'),
          ],
        },
        { removeDuplicates: false }
      )
    })

    it('should remove records that stopped before the cull time', () => {
      expect(engine.cullByTime('now', 'stale')).toBe(true)
      expect(srcIds(entries())).toEqual(['stops-now', 'starts-now', 'future', 'no-stop'])
    })

    it('should also remove records that start after the cull time', () => {
      engine.cullByTime('now', 'inactive')
      expect(srcIds(entries())).toEqual(['stops-now', 'starts-now', 'no-stop'])
    })

    it('should accept explicit times', () => {
      engine.cullByTime('2024-03-01T01:30:00', 'stale')
      expect(srcIds(entries())).toEqual(['starts-now', 'future', 'no-stop'])
    })

    it('should log unreadable cull times', () => {
      expect(engine.cullByTime('whenever')).toBe(false)
      expect(entries()).toHaveLength(5)
      expect(logger.warn).toHaveBeenCalledWith("Cannot interpret 'whenever' as a date")
    })
  })

  describe('cullByInvalid', () => {
    it('should keep only valid records', () => {
      engine.add({
        kind: 'list',
        records: [makeRecord({ src_id: 'ok' }), makeRecord({ src_id: 'bad', site_lat_deg: 100 })],
      })

      engine.cullByInvalid()

      expect(srcIds(entries())).toEqual(['ok'])
      expect(engine.getInstance()?.invalidRecords.size).toBe(0)
    })

    it('should retain everything when nothing is valid', () => {
      engine.add({ kind: 'list', records: [makeRecord({ src_id: null }), makeRecord({ site_id: null })] })

      expect(engine.cullByInvalid()).toBe(true)
      expect(entries()).toHaveLength(2)
      expect(logger.info).toHaveBeenCalledWith('No valid records; retaining all')
    })
  })

  describe('cullByDuplicate and sortAndDedup', () => {
    beforeEach(() => {
      engine.add(
        {
          kind: 'list',
          records: [
            makeWindow('late', '2024-03-01T05:00:00', '2024-03-01T06:00:00'),
            makeWindow('early', '2024-03-01T00:00:00', '2024-03-01T01:00:00'),
            makeWindow('late', '2024-03-01T05:00:00', '2024-03-01T06:00:00'),
          ],
        },
        { removeDuplicates: false }
      )
    })

    it('should collapse duplicates and sort by time', () => {
      engine.cullByDuplicate()
      expect(srcIds(entries())).toEqual(['early', 'late'])
    })

    it('should be idempotent', () => {
      engine.sortAndDedup()
      const once = entries().map((entry) => ({ ...entry }))
      engine.sortAndDedup()
      expect(entries()).toEqual(once)
    })

    it('should sort on custom keys without collapsing', () => {
      engine.sortAndDedup(['src_id'], false, true)
      expect(srcIds(entries())).toEqual(['late', 'late', 'early'])
    })
  })

  describe('updateEntry', () => {
    beforeEach(() => {
      engine.add({ kind: 'record', record: makeRecord() })
    })

    it('should patch an entry', () => {
      expect(engine.updateEntry(0, { src_id: 'src-z' })).toBe(1)
      expect(entries()[0].src_id).toBe('src-z')
    })

    it('should log an index outside the instance', () => {
      expect(engine.updateEntry(5, 'delete')).toBe(0)
      expect(logger.warn).toHaveBeenCalledWith('Entry 5 is out of range (instance holds 1 records)')
    })

    it('should log a patch without standard fields', () => {
      expect(engine.updateEntry(0, { beam_id: 1 })).toBe(0)
      expect(logger.warn).toHaveBeenCalledWith('No standard fields changed in entry 0 of primary')
    })
  })

  describe('updateOdsTimes', () => {
    beforeEach(() => {
      engine.add(
        { kind: 'list', records: [makeRecord({ src_id: 'a' }), makeRecord({ src_id: 'b' })] },
        { removeDuplicates: false }
      )
    })

    it('should set explicit times, skipping null pairs', () => {
      expect(
        engine.updateOdsTimes({ times: [['2024-04-01T00:00:00', '2024-04-01T00:10:00'], null] })
      ).toBe(true)

      expect(entries()[0].src_start_utc).toEqual(new Date('2024-04-01T00:00:00Z'))
      expect(entries()[0].src_end_utc).toEqual(new Date('2024-04-01T00:10:00Z'))
      expect(entries()[1].src_start_utc).toEqual(new Date('2024-03-01T00:00:00Z'))
    })

    it('should generate back-to-back observations', () => {
      engine.updateOdsTimes({ start: '2024-04-01T00:00:00', obsLenSec: 600 })

      expect(entries().map((entry) => [entry.src_start_utc, entry.src_end_utc])).toEqual([
        [new Date('2024-04-01T00:00:00Z'), new Date('2024-04-01T00:10:00Z')],
        [new Date('2024-04-01T00:10:01Z'), new Date('2024-04-01T00:20:01Z')],
      ])
    })

    it('should reject lists of the wrong length', () => {
      expect(engine.updateOdsTimes({ times: [null] })).toBe(false)
      expect(engine.updateOdsTimes({ start: 'now', obsLenSec: [60] })).toBe(false)
      expect(logger.warn).toHaveBeenCalledWith("times list doesn't have the right number of entries")
      expect(logger.warn).toHaveBeenCalledWith("obsLenSec doesn't have the right number of entries")
    })

    it('should reject unreadable times without changing anything', () => {
      expect(engine.updateOdsTimes({ times: [['later', 'much later'], null] })).toBe(false)
      expect(entries()[0].src_start_utc).toEqual(new Date('2024-03-01T00:00:00Z'))
    })
  })

  describe('updateByElevation', () => {
    it('should keep records above the horizon with narrowed times', () => {
      const window = {
        start: new Date('2024-03-01T00:30:00Z'),
        stop: new Date('2024-03-01T01:30:00Z'),
      }
      const horizon: HorizonChecker = {
        aboveHorizon: vi.fn((record: OdsRecord) => (record.src_id === 'up' ? window : null)),
      }
      const withHorizon = new OdsEngine({ logger, horizon })
      withHorizon.add({
        kind: 'list',
        records: [makeRecord({ src_id: 'up' }), makeRecord({ src_id: 'down' })],
      })

      expect(withHorizon.updateByElevation(15, 60)).toBe(true)

      const [record] = withHorizon.getInstance()?.entries ?? []
      expect(withHorizon.getInstance()?.entries).toHaveLength(1)
      expect(record.src_id).toBe('up')
      expect(record.src_start_utc).toEqual(window.start)
      expect(record.src_end_utc).toEqual(window.stop)
      expect(horizon.aboveHorizon).toHaveBeenCalledWith(expect.objectContaining({ src_id: 'up' }), 15, 60)
    })
  })

  describe('continuity', () => {
    beforeEach(() => {
      engine.add({
        kind: 'list',
        records: [
          makeWindow('second', '2024-03-01T01:00:00', '2024-03-01T03:00:00'),
          makeWindow('first', '2024-03-01T00:00:00', '2024-03-01T02:00:00'),
        ],
      })
    })

    it('should move the next start by default when updating', () => {
      engine.updateByContinuity()

      expect(entries().map((entry) => [entry.src_id, entry.src_start_utc, entry.src_end_utc])).toEqual([
        ['first', new Date('2024-03-01T00:00:00Z'), new Date('2024-03-01T02:00:00Z')],
        ['second', new Date('2024-03-01T02:00:01Z'), new Date('2024-03-01T03:00:00Z')],
      ])
    })

    it('should return adjusted copies without changing the instance', () => {
      const adjusted = engine.continuity(10, 'stop')

      expect(adjusted[0].src_end_utc).toEqual(new Date('2024-03-01T00:59:50Z'))
      expect(entries()[0].src_end_utc).toEqual(new Date('2024-03-01T02:00:00Z'))
    })
  })

  describe('checkActive', () => {
    it('should find records containing the time in the working instance', () => {
      engine.add(
        {
          kind: 'list',
          records: [
            makeWindow('a', '2024-03-01T00:00:00', '2024-03-01T01:00:00'),
            makeWindow('b', '2024-03-01T02:00:00', '2024-03-01T03:00:00'),
            makeWindow('c', '2024-03-01T00:30:00', 'unknown'),
          ],
        },
        { removeDuplicates: false }
      )

      expect(engine.checkActive()).toEqual([0])
      expect(engine.checkActive('2024-03-01T02:30:00')).toEqual([1])
    })

    it('should read a source into a transient instance', () => {
      const active = engine.checkActive('now', [
        makeWindow('a', '2024-03-01T02:00:00', '2024-03-01T03:00:00'),
        makeWindow('b', '2024-03-01T00:00:00', '2024-03-01T02:00:00'),
      ])

      expect(active).toEqual([1])
      expect(engine.listInstances()).toEqual(['primary'])
      expect(entries()).toHaveLength(0)
    })

    it('should return nothing for an unreadable time', () => {
      expect(engine.checkActive('sometime')).toEqual([])
    })
  })

  describe('coverage', () => {
    it('should cover the whole span when records overlap', () => {
      engine.add({
        kind: 'list',
        records: [
          makeWindow('a', '2024-03-01T00:00:00', '2024-03-01T02:00:00'),
          makeWindow('b', '2024-03-01T01:00:00', '2024-03-01T03:00:00'),
        ],
      })

      const result = engine.coverage()

      expect(result?.totalMs).toBe(3 * 3600 * 1000)
      expect(result?.spanMs).toBe(3 * 3600 * 1000)
      expect(result?.fraction).toBe(1)
    })

    it('should report gaps', () => {
      engine.add({
        kind: 'list',
        records: [
          makeWindow('a', '2024-03-01T00:00:00', '2024-03-01T01:00:00'),
          makeWindow('b', '2024-03-01T02:00:00', '2024-03-01T03:00:00'),
        ],
      })

      expect(engine.coverage()?.fraction).toBeCloseTo(2 / 3)
    })

    it('should log and return null without usable records', () => {
      expect(engine.coverage()).toBeNull()
      expect(logger.warn).toHaveBeenCalledWith(
        'Cannot compute coverage: no records with a start and stop time',
        { reason: 'no records with a start and stop time', instance: 'primary' }
      )
    })
  })

  describe('getDefaults', () => {
    it('should return the current defaults without a source', () => {
      engine.defaults = { site_id: 'site-a' }
      expect(engine.getDefaults()).toEqual({ site_id: 'site-a' })
    })

    it('should copy a map', () => {
      const source = { site_id: 'site-m' }
      expect(engine.getDefaults(source)).toEqual({ site_id: 'site-m' })
      source.site_id = 'changed'
      expect(engine.defaults).toEqual({ site_id: 'site-m' })
    })

    it('should take single-valued fields from the working instance', () => {
      engine.add({
        kind: 'list',
        records: [makeRecord({ src_id: 'a' }), makeRecord({ src_id: 'b' })],
      })

      const defaults = engine.getDefaults('from_ods')

      expect(defaults?.site_id).toBe('site-a')
      expect(defaults && 'src_id' in defaults).toBe(false)
    })

    it('should read packaged system defaults', () => {
      const defaults = engine.getDefaults('$ata')

      expect(defaults?.site_id).toBe('ATA')
      expect(defaults?.site_lat_deg).toBe(40.817431)
      expect(logger.info).toHaveBeenCalledWith('Default values from $ata:')
    })

    it('should reject unknown sources and keep the current defaults', () => {
      engine.defaults = { site_id: 'site-a' }

      expect(engine.getDefaults('somewhere')).toBeNull()
      expect(engine.defaults).toEqual({ site_id: 'site-a' })
      expect(logger.warn).toHaveBeenCalledWith(
        'Cannot use defaults from somewhere: Not a valid defaults source: somewhere'
      )
    })
  })

  describe('instanceReport', () => {
    it('should summarize invalid records', () => {
      engine.add(
        { kind: 'list', records: [makeRecord(), makeRecord({ src_id: null })] },
        { removeDuplicates: false }
      )
      vi.mocked(logger.warn).mockClear()

      engine.instanceReport()

      expect(vi.mocked(logger.warn).mock.calls).toEqual([
        ['1 / 2 were not valid'],
        ['Entry 1: missing src_id'],
      ])
    })

    it('should warn when every record is invalid', () => {
      engine.add({ kind: 'record', record: { src_id: 'only' } })
      expect(logger.warn).toHaveBeenCalledWith('All records (1) were invalid')
    })
  })
})
