export {
  OdsCheck,
  ADJUST_SIDES,
  type CoverageResult,
  type OdsCheckOptions,
} from './ods-check.js'

export {
  EphemerisHorizonChecker,
  altitudeDeg,
  julianDate,
  greenwichSiderealTimeDeg,
  localSiderealTimeDeg,
  type SiteLocation,
  type SkyPosition,
} from './horizon.js'
