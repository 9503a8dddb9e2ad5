export {
  interpretDate,
  createDateInterpreter,
  formatIsoSeconds,
  addSeconds,
  generateObservationTimes,
  isValidDate,
  TIME_UNITS,
  type InterpretDateOptions,
} from './date.js'

export {
  registerFieldNormalizer,
  getFieldNormalizer,
  listFieldNormalizers,
  resetFieldNormalizers,
  normalizeStr,
  normalizeFloat,
  normalizeInt,
  normalizeBool,
  normalizeTime,
} from './field.js'

export {
  normalizeRecord,
  normalizeField,
  extractAttributes,
  cloneRecord,
  type NormalizeOptions,
} from './record.js'

export type {
  FieldCoercion,
  FieldNormalizer,
  FieldNormalizerContext,
} from './types.js'
