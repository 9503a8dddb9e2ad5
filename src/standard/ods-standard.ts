import type {
  OdsFieldDefinition,
  OdsFieldType,
  OdsStandard,
  RecordCheck,
  StandardRoles,
  ValidityResult,
} from '../types/schema.js'
import type { FieldValue, OdsRecord } from '../types/record.js'
import { ConfigurationError } from '../utils/errors.js'

/**
 * Everything needed to build an `OdsStandard`.
 */
export interface StandardDefinition {
  version: string
  dataKey: string
  /** Field definitions; insertion order is the canonical field order */
  fields: Record<string, OdsFieldDefinition>
  start: string
  stop: string
  sortOrderTime: string[]
  roles?: Partial<StandardRoles>
  /** Record-level checks run after the per-field checks */
  checks?: RecordCheck[]
}

function matchesType(value: FieldValue, type: OdsFieldType): boolean {
  switch (type) {
    case 'time':
      return value instanceof Date && !isNaN(value.getTime())
    case 'float':
      return typeof value === 'number' && Number.isFinite(value)
    case 'int':
      return typeof value === 'number' && Number.isInteger(value)
    case 'bool':
      return typeof value === 'boolean'
    case 'str':
      return typeof value === 'string'
  }
}

function describeValue(value: FieldValue): string {
  return value instanceof Date ? value.toISOString() : String(value)
}

/**
 * Per-field checks: presence, declared type and range.
 */
function checkFields(
  record: OdsRecord,
  fields: ReadonlyMap<string, OdsFieldDefinition>
): string[] {
  const reasons: string[] = []
  for (const [field, definition] of fields) {
    const value = record[field] ?? null
    if (value === null) {
      if (definition.required !== false) {
        reasons.push(`missing ${field}`)
      }
      continue
    }
    if (!matchesType(value, definition.type)) {
      reasons.push(
        definition.type === 'time'
          ? `${field} is not a valid time: '${describeValue(value)}'`
          : `${field} should be ${definition.type}, got '${describeValue(value)}'`
      )
      continue
    }
    if (definition.range && typeof value === 'number') {
      const [low, high] = definition.range
      if (value < low || value > high) {
        reasons.push(`${field} out of range [${low}, ${high}]: ${value}`)
      }
    }
  }
  return reasons
}

/**
 * Builds an immutable standard from its definition.
 *
 * @throws {ConfigurationError} If start/stop, sort terms or roles name
 *   fields that are not defined, or start/stop are not time fields
 */
export function createStandard(definition: StandardDefinition): OdsStandard {
  const fields = new Map<string, OdsFieldDefinition>(
    Object.entries(definition.fields).map(([name, field]) => [name, { ...field }])
  )

  if (fields.size === 0) {
    throw new ConfigurationError('A standard needs at least one field', 'fields')
  }

  for (const [role, field] of [
    ['start', definition.start],
    ['stop', definition.stop],
  ] as const) {
    const fieldDefinition = fields.get(field)
    if (!fieldDefinition) {
      throw new ConfigurationError(`${role} field '${field}' is not defined`, role)
    }
    if (fieldDefinition.type !== 'time') {
      throw new ConfigurationError(`${role} field '${field}' must be a time field`, role)
    }
  }

  const unknownTerms = definition.sortOrderTime.filter((term) => !fields.has(term))
  if (unknownTerms.length > 0) {
    throw new ConfigurationError(
      `sort terms are not defined: ${unknownTerms.join(', ')}`,
      'sortOrderTime'
    )
  }

  const roles = { ...definition.roles }
  for (const [role, field] of Object.entries(roles)) {
    if (field !== undefined && !fields.has(field)) {
      throw new ConfigurationError(`role ${role} field '${field}' is not defined`, 'roles')
    }
  }

  const timeFields = new Set(
    [...fields].filter(([, field]) => field.type === 'time').map(([name]) => name)
  )
  const checks = [...(definition.checks ?? [])]

  const standard: OdsStandard = {
    version: definition.version,
    dataKey: definition.dataKey,
    fields,
    timeFields,
    start: definition.start,
    stop: definition.stop,
    sortOrderTime: [...definition.sortOrderTime],
    roles,
    valid(record: OdsRecord): ValidityResult {
      const reasons = checkFields(record, fields)
      const start = record[definition.start]
      const stop = record[definition.stop]
      if (start instanceof Date && stop instanceof Date && start > stop) {
        reasons.push(`${definition.start} is after ${definition.stop}`)
      }
      for (const check of checks) {
        reasons.push(...check(record, standard))
      }
      return { valid: reasons.length === 0, reasons }
    },
  }
  return Object.freeze(standard)
}

/**
 * Frequency band must not be inverted.
 */
const checkFrequencyBand: RecordCheck = (record) => {
  const lower = record.freq_lower_hz
  const upper = record.freq_upper_hz
  if (typeof lower === 'number' && typeof upper === 'number' && lower > upper) {
    return ['freq_lower_hz is above freq_upper_hz']
  }
  return []
}

/**
 * Definition of the ODS 1.0 standard.
 */
export const ODS_V1_DEFINITION: StandardDefinition = {
  version: '1.0',
  dataKey: 'ods_data',
  fields: {
    site_id: { type: 'str', description: 'Observatory identifier' },
    site_lat_deg: { type: 'float', range: [-90, 90] },
    site_lon_deg: { type: 'float', range: [-180, 360] },
    site_el_m: { type: 'float' },
    src_id: { type: 'str', description: 'Target identifier' },
    src_is_pulsar_bool: { type: 'bool' },
    corr_integ_time_sec: { type: 'float' },
    src_ra_j2000_deg: { type: 'float', range: [0, 360] },
    src_dec_j2000_deg: { type: 'float', range: [-90, 90] },
    src_start_utc: { type: 'time' },
    src_end_utc: { type: 'time' },
    slew_sec: { type: 'float' },
    trk_rate_dec_deg_per_sec: { type: 'float' },
    trk_rate_ra_deg_per_sec: { type: 'float' },
    freq_lower_hz: { type: 'float' },
    freq_upper_hz: { type: 'float' },
    notes: { type: 'str', required: false },
  },
  start: 'src_start_utc',
  stop: 'src_end_utc',
  sortOrderTime: ['src_start_utc', 'src_end_utc', 'src_id', 'site_id'],
  roles: {
    source: 'src_id',
    latitude: 'site_lat_deg',
    longitude: 'site_lon_deg',
    elevation: 'site_el_m',
    rightAscension: 'src_ra_j2000_deg',
    declination: 'src_dec_j2000_deg',
  },
  checks: [checkFrequencyBand],
}

/**
 * Standards known by version.
 */
const STANDARDS: Record<string, StandardDefinition> = {
  '1.0': ODS_V1_DEFINITION,
}

export const LATEST_STANDARD_VERSION = '1.0'

/**
 * Returns a standard by version (`'latest'` for the newest).
 *
 * @throws {ConfigurationError} If the version is unknown
 */
export function getStandard(version: string = 'latest'): OdsStandard {
  const key = version === 'latest' ? LATEST_STANDARD_VERSION : version
  const definition = STANDARDS[key]
  if (!definition) {
    throw new ConfigurationError(
      `Unknown standard version '${version}' (known: ${Object.keys(STANDARDS).join(', ')})`,
      'version'
    )
  }
  return createStandard(definition)
}

/**
 * The ODS 1.0 standard.
 */
export const defaultStandard: OdsStandard = createStandard(ODS_V1_DEFINITION)
