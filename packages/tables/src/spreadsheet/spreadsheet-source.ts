import fs from 'node:fs/promises';

import * as XLSX from 'xlsx';

import { SheetNotFoundError, SourceConsumedError } from '../errors.js';
import { sharedResourcePool, type PooledResource, type ResourcePool } from '../resource-pool.js';
import type { CellValue, RecordSource, SourceOptions, TableRecord } from '../types.js';
import { buildRecord, castCell, stringifyValue, toCellValue } from '../values.js';

import type { SpreadsheetFormat } from './workbook.js';

/**
 * Reads one worksheet of an xls, xlsx or ods workbook. The workbook is
 * loaded whole; records are then yielded row by row.
 */
export class SpreadsheetRecordSource implements RecordSource {
  private header: string[] = [];
  private consumed = false;
  private handle: PooledResource | undefined;

  constructor(
    readonly filePath: string,
    readonly format: SpreadsheetFormat,
    private readonly options: SourceOptions = {},
    private readonly pool: ResourcePool = sharedResourcePool
  ) {}

  get columns(): readonly string[] {
    return this.header;
  }

  async *records(): AsyncGenerator<TableRecord, void, undefined> {
    if (this.consumed) {
      throw new SourceConsumedError(`Records of ${this.filePath} have already been read`, { filePath: this.filePath });
    }
    this.consumed = true;

    const rows = await this.readRows();
    let released = false;
    this.handle = this.pool.acquire({
      label: this.filePath,
      release: () => {
        released = true;
        rows.length = 0;
      },
    });

    const castNumbers = this.options.castNumbers ?? true;

    try {
      const [headerRow, ...body] = rows;
      this.header = (headerRow ?? []).map((cell) => stringifyValue(toCellValue(cell)));
      for (const row of body) {
        if (released) break;
        const values = this.header.map((_, index): CellValue => {
          const value = toCellValue(row[index]);
          return castNumbers && typeof value === 'string' ? castCell(value) : value;
        });
        yield buildRecord(this.header, values);
      }
    } finally {
      await this.close();
    }
  }

  close(): Promise<void> {
    if (this.handle) {
      const handle = this.handle;
      this.handle = undefined;
      this.pool.free(handle);
    }
    return Promise.resolve();
  }

  private async readRows(): Promise<unknown[][]> {
    const buffer = await fs.readFile(this.filePath);
    const workbook = XLSX.read(buffer, { cellDates: true, type: 'buffer' });
    const sheetName = this.options.sheetName ?? workbook.SheetNames[0];
    const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
    if (!sheet) {
      throw new SheetNotFoundError(`Sheet "${sheetName ?? '(first)'}" not found in ${this.filePath}`, {
        available: workbook.SheetNames,
        filePath: this.filePath,
      });
    }
    return XLSX.utils.sheet_to_json<unknown[]>(sheet, { blankrows: false, defval: null, header: 1, raw: true });
  }
}
