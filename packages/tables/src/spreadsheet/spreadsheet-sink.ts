import fs from 'node:fs/promises';

import * as XLSX from 'xlsx';

import { recordRows } from '../rows.js';
import type { CellValue, RecordSink, SinkOptions, TableRecord } from '../types.js';

import { BOOK_TYPES, DEFAULT_SHEET_NAME, type SpreadsheetFormat } from './workbook.js';

/**
 * Writes records into a single-sheet workbook.
 */
export class SpreadsheetRecordSink implements RecordSink {
  constructor(
    readonly filePath: string,
    readonly format: SpreadsheetFormat,
    private readonly options: SinkOptions = {}
  ) {}

  async write(
    records: AsyncIterable<TableRecord> | Iterable<TableRecord>,
    fallbackColumns: () => readonly string[] = () => []
  ): Promise<number> {
    let written = 0;
    const rows: CellValue[][] = [];
    for await (const row of recordRows(records, fallbackColumns, () => {
      written += 1;
    })) {
      rows.push(row);
    }

    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(
      workbook,
      XLSX.utils.aoa_to_sheet(rows, { cellDates: true }),
      this.options.sheetName ?? DEFAULT_SHEET_NAME
    );

    const output: unknown = XLSX.write(workbook, { bookType: BOOK_TYPES[this.format], type: 'buffer' });
    if (!Buffer.isBuffer(output)) {
      throw new Error(`Workbook writer returned no buffer for ${this.filePath}`);
    }
    await fs.writeFile(this.filePath, output);
    return written;
  }
}
