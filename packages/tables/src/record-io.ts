import { CsvRecordSink } from './csv/csv-sink.js';
import { CsvRecordSource } from './csv/csv-source.js';
import { detectFormat, isDelimitedFormat } from './formats.js';
import { sharedResourcePool, type ResourcePool } from './resource-pool.js';
import { SpreadsheetRecordSink } from './spreadsheet/spreadsheet-sink.js';
import { SpreadsheetRecordSource } from './spreadsheet/spreadsheet-source.js';
import type { RecordSink, RecordSource, SinkOptions, SourceOptions } from './types.js';

/**
 * Open a record source for `filePath`, choosing the reader by extension.
 */
export function openRecordSource(
  filePath: string,
  options: SourceOptions = {},
  pool: ResourcePool = sharedResourcePool
): RecordSource {
  const format = detectFormat(filePath);
  return isDelimitedFormat(format)
    ? new CsvRecordSource(filePath, format, options, pool)
    : new SpreadsheetRecordSource(filePath, format, options, pool);
}

export function createRecordSink(filePath: string, options: SinkOptions = {}): RecordSink {
  const format = detectFormat(filePath);
  return isDelimitedFormat(format)
    ? new CsvRecordSink(filePath, format, options)
    : new SpreadsheetRecordSink(filePath, format, options);
}
