import type { CellValue, ReadonlyTableRecord, TableRecord } from './types.js';

const NUMERIC_TEXT = /^-?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?$/;

/**
 * Convert a raw text cell to a number only when the number prints back as
 * the same text. `007`, `1.50`, `1e3`, ` 12` and integers past 2^53 stay text.
 */
export function castCell(raw: string): CellValue {
  if (!NUMERIC_TEXT.test(raw)) {
    return raw;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || String(value) !== raw) {
    return raw;
  }
  return Number.isInteger(value) && !Number.isSafeInteger(value) ? raw : value;
}

/**
 * Narrow an arbitrary cell read from a workbook to a CellValue.
 */
export function toCellValue(cell: unknown): CellValue {
  if (cell === null || cell === undefined) return null;
  if (typeof cell === 'string' || typeof cell === 'number' || typeof cell === 'boolean') return cell;
  if (cell instanceof Date) return cell;
  return String(cell);
}

/**
 * Text form of a value as filters and templates see it.
 */
export function stringifyValue(value: CellValue | undefined): string {
  if (value === null || value === undefined) return '';
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

export function buildRecord(columns: readonly string[], cells: readonly CellValue[]): TableRecord {
  const record: TableRecord = new Map();
  columns.forEach((column, index) => {
    record.set(column, cells[index] ?? null);
  });
  return record;
}

export function cloneRecord(record: ReadonlyTableRecord): TableRecord {
  return new Map(record);
}

/**
 * Build a record from plain object entries, in their enumeration order.
 */
export function recordFromObject(values: Readonly<Record<string, CellValue>>): TableRecord {
  return new Map(Object.entries(values));
}

export function recordToObject(record: ReadonlyTableRecord): Record<string, CellValue> {
  return Object.fromEntries(record);
}
