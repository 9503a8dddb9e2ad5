/**
 * Approximate ephemeris for horizon checks
 * @module check/horizon
 */

import type { OdsRecord, TimeWindow } from '../types/record.js'
import type { OdsStandard } from '../types/schema.js'
import type { HorizonChecker } from '../types/config.js'
import { requirePositive } from '../utils/errors.js'

const DEG = Math.PI / 180
const MS_PER_DAY = 86400000
const UNIX_EPOCH_JD = 2440587.5
const J2000_JD = 2451545.0

export interface SiteLocation {
  latDeg: number
  lonDeg: number
}

export interface SkyPosition {
  raDeg: number
  decDeg: number
}

function wrapDegrees(angle: number): number {
  const wrapped = angle % 360
  return wrapped < 0 ? wrapped + 360 : wrapped
}

/**
 * Julian date of an instant.
 */
export function julianDate(date: Date): number {
  return date.getTime() / MS_PER_DAY + UNIX_EPOCH_JD
}

/**
 * Greenwich mean sidereal time in degrees.
 */
export function greenwichSiderealTimeDeg(date: Date): number {
  const days = julianDate(date) - J2000_JD
  return wrapDegrees(280.46061837 + 360.98564736629 * days)
}

/**
 * Local mean sidereal time in degrees for an east-positive longitude.
 */
export function localSiderealTimeDeg(date: Date, lonDeg: number): number {
  return wrapDegrees(greenwichSiderealTimeDeg(date) + lonDeg)
}

/**
 * Altitude of a J2000 position above the horizon, in degrees.
 * Precession, nutation and refraction are ignored.
 */
export function altitudeDeg(
  date: Date,
  site: SiteLocation,
  position: SkyPosition
): number {
  const hourAngle = (localSiderealTimeDeg(date, site.lonDeg) - position.raDeg) * DEG
  const lat = site.latDeg * DEG
  const dec = position.decDeg * DEG
  const sinAlt =
    Math.sin(dec) * Math.sin(lat) + Math.cos(dec) * Math.cos(lat) * Math.cos(hourAngle)
  return Math.asin(Math.max(-1, Math.min(1, sinAlt))) / DEG
}

function numberField(record: OdsRecord, field: string | undefined): number | null {
  if (field === undefined) return null
  const value = record[field]
  return typeof value === 'number' && Number.isFinite(value) ? value : null
}

/**
 * Horizon checker sampling the record's span at a fixed step and returning
 * the first and last sample above the elevation limit.
 *
 * Site and target are read through the standard's roles; records missing
 * any of them, or without start/stop instants, are never above the horizon.
 */
export class EphemerisHorizonChecker implements HorizonChecker {
  constructor(private readonly standard: OdsStandard) {}

  aboveHorizon(
    record: OdsRecord,
    elevationLimitDeg: number,
    timeStepSec: number
  ): TimeWindow | null {
    requirePositive(timeStepSec, 'timeStepSec')

    const start = record[this.standard.start]
    const stop = record[this.standard.stop]
    if (!(start instanceof Date) || !(stop instanceof Date)) return null

    const { roles } = this.standard
    const latDeg = numberField(record, roles.latitude)
    const lonDeg = numberField(record, roles.longitude)
    const raDeg = numberField(record, roles.rightAscension)
    const decDeg = numberField(record, roles.declination)
    if (latDeg === null || lonDeg === null || raDeg === null || decDeg === null) {
      return null
    }

    let first: Date | null = null
    let last: Date | null = null
    const stepMs = timeStepSec * 1000
    for (let time = start.getTime(); time < stop.getTime(); time += stepMs) {
      const sample = new Date(time)
      if (altitudeDeg(sample, { latDeg, lonDeg }, { raDeg, decDeg }) > elevationLimitDeg) {
        first = first ?? sample
        last = sample
      }
    }

    return first && last ? { start: first, stop: last } : null
  }
}
