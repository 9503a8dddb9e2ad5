// Main entry point
export { Ods, OdsEngineBuilder } from './builder/engine-builder.js'
export { StandardBuilder, FieldDefinitionBuilder } from './builder/standard-builder.js'

// Core classes
export {
  OdsEngine,
  CULL_MODES,
  DEFAULTS_FROM_ODS,
  type NewInstanceOptions,
  type AddOptions,
  type OdsTimesUpdate,
  type WriteOdsOptions,
  type ExportOptions,
  type MonitorOptions,
} from './core/engine.js'
export {
  OdsInstance,
  DEFAULT_WORKING_INSTANCE,
  INVALID_FIELDS_KEY,
  DELETE_ENTRY,
  type EntryUpdate,
  type OdsInstanceOptions,
} from './core/instance.js'
export {
  sortEntries,
  sortKeyValue,
  recordSortKey,
  compareSortKeys,
  type SortEntriesOptions,
} from './core/sort.js'
export { mergeIntervals, totalLength, type Interval } from './core/intervals.js'

// Normalizers
export * from './core/normalizers/index.js'

// Standards
export {
  createStandard,
  getStandard,
  defaultStandard,
  ODS_V1_DEFINITION,
  LATEST_STANDARD_VERSION,
  type StandardDefinition,
} from './standard/ods-standard.js'

// Checks
export * from './check/index.js'

// File and network I/O
export * from './io/index.js'

// Types
export * from './types/index.js'

// Errors
export {
  OdsError,
  InstanceNotFoundError,
  EntryIndexError,
  DateParseError,
  CoverageError,
  ExportColumnError,
  StructuralInputError,
  ConfigurationError,
  InvalidParameterError,
  requirePositive,
  requireNonEmptyString,
  requireOneOf,
  requirePlainObject,
  isPlainObject,
  isOdsError,
  errorMessage,
} from './utils/errors.js'

// Logging
export {
  defaultLogger,
  createSilentLogger,
  createPrefixedLogger,
  createLevelLogger,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
} from './utils/logger.js'
