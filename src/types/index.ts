export type {
  FieldValue,
  OdsRecord,
  OdsRecordInput,
  ExternalRecord,
  TimeWindow,
  NormalizedRecord,
} from './record.js'

export type {
  OdsFieldType,
  OdsFieldDefinition,
  ValidityResult,
  StandardRoles,
  OdsStandard,
  RecordCheck,
} from './schema.js'

export type {
  ReplaceChar,
  HeaderMap,
  FileReference,
  OdsInput,
} from './input.js'
export { recordInput, listInput, fileInput } from './input.js'

export type {
  DateInput,
  DateInterpreter,
  Clock,
  CullMode,
  AdjustSide,
  CullStep,
  DefaultsSource,
  HorizonChecker,
  RecordLoader,
  OdsEngineOptions,
} from './config.js'
