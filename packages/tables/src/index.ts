export type {
  CellValue,
  ReadonlyTableRecord,
  RecordSink,
  RecordSource,
  SinkOptions,
  SourceOptions,
  TableFormat,
  TableRecord,
} from './types.js';
export {
  BurnishError,
  SheetNotFoundError,
  SourceConsumedError,
  UnsupportedFormatError,
  getErrorMessage,
  toError,
} from './errors.js';
export { defaultDelimiter, detectFormat, isDelimitedFormat, supportedExtensions } from './formats.js';
export { buildRecord, castCell, cloneRecord, recordFromObject, recordToObject, stringifyValue, toCellValue } from './values.js';
export { ResourcePool, releaseResources, sharedResourcePool, type PooledResource } from './resource-pool.js';
export { CsvRecordSource } from './csv/csv-source.js';
export { CsvRecordSink } from './csv/csv-sink.js';
export { SpreadsheetRecordSource } from './spreadsheet/spreadsheet-source.js';
export { SpreadsheetRecordSink } from './spreadsheet/spreadsheet-sink.js';
export { createRecordSink, openRecordSource } from './record-io.js';
export { discoverFiles, type DiscoverOptions } from './file-discovery.js';
