export { readJsonFile, writeJsonFile } from './json-file.js'
export {
  parseOdsDocument,
  toOdsDocument,
  readOdsFile,
  writeOdsFile,
  type OdsDocument,
} from './ods-file.js'
export {
  AUTO_SEPARATOR,
  WHITESPACE_SEPARATOR,
  detectSeparator,
  splitDataLine,
  applyReplaceChar,
  parseDataFile,
  resolveColumns,
  formatDataFile,
  writeDataFile,
  type DataFileOptions,
  type DataRow,
} from './data-file.js'
export { FileRecordLoader, readHeaderMap } from './loader.js'
export { fetchOdsDocument, type FetchOptions } from './remote.js'
export { loadDefaults, SYSTEM_DEFAULTS_DIR } from './defaults.js'
