import type { CellValue, TableRecord } from './types.js';

/**
 * Flatten records into header-first rows. The header comes from the first
 * record; with no records at all it comes from `fallbackColumns`.
 */
export async function* recordRows(
  records: AsyncIterable<TableRecord> | Iterable<TableRecord>,
  fallbackColumns: () => readonly string[],
  onRecord: () => void
): AsyncGenerator<CellValue[], void, undefined> {
  let header: string[] | undefined;

  for await (const record of records) {
    if (!header) {
      header = [...record.keys()];
      yield header;
    }
    onRecord();
    yield header.map((column) => record.get(column) ?? null);
  }

  if (!header) {
    const columns = fallbackColumns();
    if (columns.length > 0) {
      yield [...columns];
    }
  }
}
