import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { CsvRecordSink } from '../csv/csv-sink.js';
import { CsvRecordSource } from '../csv/csv-source.js';
import { SourceConsumedError } from '../errors.js';
import { ResourcePool } from '../resource-pool.js';
import type { CellValue, RecordSource, TableRecord } from '../types.js';
import { recordToObject } from '../values.js';

async function collect(source: RecordSource): Promise<TableRecord[]> {
  const records: TableRecord[] = [];
  for await (const record of source.records()) {
    records.push(record);
  }
  return records;
}

describe('CsvRecordSource', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'burnish-csv-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { force: true, recursive: true });
  });

  it('should read the header and cast numeric cells', async () => {
    const filePath = path.join(tempDir, 'people.csv');
    await fs.writeFile(filePath, 'name,age,zip\nAda,36,007\nBob,,12.5\n');

    const source = new CsvRecordSource(filePath, 'csv');
    const records = await collect(source);

    expect(source.columns).toEqual(['name', 'age', 'zip']);
    expect(records.map(recordToObject)).toEqual([
      { age: 36, name: 'Ada', zip: '007' },
      { age: '', name: 'Bob', zip: 12.5 },
    ]);
    expect([...(records[0]?.keys() ?? [])]).toEqual(['name', 'age', 'zip']);
  });

  it('should keep text when number casting is disabled', async () => {
    const filePath = path.join(tempDir, 'people.csv');
    await fs.writeFile(filePath, 'name,age\nAda,36\n');

    const records = await collect(new CsvRecordSource(filePath, 'csv', { castNumbers: false }));

    expect(records[0]?.get('age')).toBe('36');
  });

  it('should split tab separated files and pad short rows', async () => {
    const filePath = path.join(tempDir, 'people.tsv');
    await fs.writeFile(filePath, 'name\tcity\tcountry\nAda\tLondon\nBob\tParis\tFR\n');

    const records = await collect(new CsvRecordSource(filePath, 'tsv'));

    expect(records.map(recordToObject)).toEqual([
      { city: 'London', country: '', name: 'Ada' },
      { city: 'Paris', country: 'FR', name: 'Bob' },
    ]);
  });

  it('should strip a byte order mark from the header', async () => {
    const filePath = path.join(tempDir, 'bom.csv');
    await fs.writeFile(filePath, '\ufeffid,label\n1,one\n');

    const source = new CsvRecordSource(filePath, 'csv');
    await collect(source);

    expect(source.columns).toEqual(['id', 'label']);
  });

  it('should yield nothing for an empty file', async () => {
    const filePath = path.join(tempDir, 'empty.csv');
    await fs.writeFile(filePath, '');

    const source = new CsvRecordSource(filePath, 'csv');

    expect(await collect(source)).toEqual([]);
    expect(source.columns).toEqual([]);
  });

  it('should refuse to be read twice', async () => {
    const filePath = path.join(tempDir, 'once.csv');
    await fs.writeFile(filePath, 'a\n1\n');
    const source = new CsvRecordSource(filePath, 'csv');
    await collect(source);

    await expect(collect(source)).rejects.toBeInstanceOf(SourceConsumedError);
  });

  it('should reject when the file does not exist', async () => {
    const source = new CsvRecordSource(path.join(tempDir, 'missing.csv'), 'csv');

    await expect(collect(source)).rejects.toThrow(/ENOENT/);
  });

  it('should return its handle to the pool when iteration finishes or stops early', async () => {
    const filePath = path.join(tempDir, 'rows.csv');
    await fs.writeFile(filePath, 'n\n1\n2\n3\n');
    const pool = new ResourcePool();

    await collect(new CsvRecordSource(filePath, 'csv', {}, pool));
    expect(pool.size).toBe(0);

    for await (const record of new CsvRecordSource(filePath, 'csv', {}, pool).records()) {
      expect(record.get('n')).toBe(1);
      expect(pool.size).toBe(1);
      break;
    }
    expect(pool.size).toBe(0);
  });

  it('should let the pool release a source that is still open', async () => {
    const filePath = path.join(tempDir, 'rows.csv');
    await fs.writeFile(filePath, 'n\n1\n2\n');
    const pool = new ResourcePool();
    const iterator = new CsvRecordSource(filePath, 'csv', {}, pool).records();

    await iterator.next();

    expect(pool.releaseAll()).toBe(1);
    expect(pool.size).toBe(0);
    await iterator.return();
  });
});

describe('CsvRecordSink', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'burnish-csv-sink-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { force: true, recursive: true });
  });

  it('should write the header from the first record with unix line endings', async () => {
    const filePath = path.join(tempDir, 'out.csv');
    const records: TableRecord[] = [
      new Map<string, string | number>([
        ['name', 'Ada'],
        ['age', 36],
      ]),
      new Map<string, string | number>([
        ['name', 'Lovelace, Ada'],
        ['age', 37],
      ]),
    ];

    const written = await new CsvRecordSink(filePath, 'csv').write(records);

    expect(written).toBe(2);
    expect(await fs.readFile(filePath, 'utf8')).toBe('name,age\nAda,36\n"Lovelace, Ada",37\n');
  });

  it('should render dates, booleans and nulls', async () => {
    const filePath = path.join(tempDir, 'out.tsv');
    const record: TableRecord = new Map<string, CellValue>([
      ['when', new Date('2024-03-01T12:00:00.000Z')],
      ['active', false],
      ['note', null],
    ]);

    await new CsvRecordSink(filePath, 'tsv').write([record]);

    expect(await fs.readFile(filePath, 'utf8')).toBe('when\tactive\tnote\n2024-03-01T12:00:00.000Z\tfalse\t\n');
  });

  it('should fall back to the given columns when there are no records', async () => {
    const filePath = path.join(tempDir, 'out.csv');

    const written = await new CsvRecordSink(filePath, 'csv').write([], () => ['id', 'label']);

    expect(written).toBe(0);
    expect(await fs.readFile(filePath, 'utf8')).toBe('id,label\n');
  });

  it('should write an empty file when there are no records and no columns', async () => {
    const filePath = path.join(tempDir, 'out.csv');

    await new CsvRecordSink(filePath, 'csv').write([]);

    expect(await fs.readFile(filePath, 'utf8')).toBe('');
  });
});
