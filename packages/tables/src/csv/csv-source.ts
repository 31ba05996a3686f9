import fs from 'node:fs';

import { parse } from 'csv-parse';

import { SourceConsumedError } from '../errors.js';
import { defaultDelimiter } from '../formats.js';
import { sharedResourcePool, type PooledResource, type ResourcePool } from '../resource-pool.js';
import type { RecordSource, SourceOptions, TableRecord } from '../types.js';
import { buildRecord, castCell } from '../values.js';

/**
 * Streams records from a CSV or TSV file. The first row is the header.
 */
export class CsvRecordSource implements RecordSource {
  private header: string[] = [];
  private consumed = false;
  private handle: PooledResource | undefined;

  constructor(
    readonly filePath: string,
    readonly format: 'csv' | 'tsv',
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

    const input = fs.createReadStream(this.filePath, { encoding: this.options.encoding ?? 'utf8' });
    const parser = parse({
      bom: true,
      delimiter: this.options.delimiter ?? defaultDelimiter(this.format),
      relax_column_count: true,
      skip_empty_lines: true,
    });
    input.on('error', (error) => parser.destroy(error));
    input.pipe(parser);

    this.handle = this.pool.acquire({
      label: this.filePath,
      release: () => {
        input.destroy();
        parser.destroy();
      },
    });

    const castNumbers = this.options.castNumbers ?? true;

    try {
      for await (const row of parser) {
        if (!Array.isArray(row)) continue;
        const cells = row.map((cell) => String(cell));
        if (this.header.length === 0) {
          this.header = cells;
          continue;
        }
        const values = this.header.map((_, index) => {
          const cell = cells[index] ?? '';
          return castNumbers ? castCell(cell) : cell;
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
}
