export type CellValue = string | number | boolean | Date | null;

/**
 * One row of a table. A Map rather than a plain object: column order is
 * output order, and objects would move integer-like column names first.
 */
export type TableRecord = Map<string, CellValue>;

export type ReadonlyTableRecord = ReadonlyMap<string, CellValue>;

export type TableFormat = 'csv' | 'tsv' | 'xls' | 'xlsx' | 'ods';

export interface SourceOptions {
  /** Worksheet to read from spreadsheet formats; the first sheet when omitted */
  sheetName?: string | undefined;
  /** Field delimiter for delimited text; derived from the extension when omitted */
  delimiter?: string | undefined;
  /** Convert numeric text cells to numbers (default true) */
  castNumbers?: boolean | undefined;
  encoding?: BufferEncoding | undefined;
}

export interface SinkOptions {
  sheetName?: string | undefined;
  delimiter?: string | undefined;
}

/**
 * A finite, one-shot stream of records read from a table file.
 */
export interface RecordSource {
  readonly filePath: string;
  readonly format: TableFormat;
  /** Header columns, known once the first row has been read */
  readonly columns: readonly string[];
  records(): AsyncGenerator<TableRecord, void, undefined>;
  close(): Promise<void>;
}

/**
 * Persists a sequence of records, truncating or creating the destination.
 * Returns the number of records written.
 */
export interface RecordSink {
  readonly filePath: string;
  readonly format: TableFormat;
  write(
    records: AsyncIterable<TableRecord> | Iterable<TableRecord>,
    fallbackColumns?: () => readonly string[]
  ): Promise<number>;
}
