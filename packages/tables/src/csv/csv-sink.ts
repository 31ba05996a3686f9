import fs from 'node:fs';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';

import { stringify } from 'csv-stringify';

import { defaultDelimiter } from '../formats.js';
import { recordRows } from '../rows.js';
import type { RecordSink, SinkOptions, TableRecord } from '../types.js';

/**
 * Writes records as delimited text with unix line endings.
 */
export class CsvRecordSink implements RecordSink {
  constructor(
    readonly filePath: string,
    readonly format: 'csv' | 'tsv',
    private readonly options: SinkOptions = {}
  ) {}

  async write(
    records: AsyncIterable<TableRecord> | Iterable<TableRecord>,
    fallbackColumns: () => readonly string[] = () => []
  ): Promise<number> {
    let written = 0;
    const rows = recordRows(records, fallbackColumns, () => {
      written += 1;
    });

    const stringifier = stringify({
      cast: {
        boolean: (value) => (value ? 'true' : 'false'),
        date: (value) => value.toISOString(),
      },
      delimiter: this.options.delimiter ?? defaultDelimiter(this.format),
      record_delimiter: '\n',
    });

    await pipeline(Readable.from(rows), stringifier, fs.createWriteStream(this.filePath));
    return written;
  }
}
