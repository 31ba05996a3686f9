import * as XLSX from 'xlsx';

import type { TableFormat } from '../types.js';

export type SpreadsheetFormat = Exclude<TableFormat, 'csv' | 'tsv'>;

export const BOOK_TYPES: Readonly<Record<SpreadsheetFormat, XLSX.BookType>> = {
  ods: 'ods',
  xls: 'xls',
  xlsx: 'xlsx',
};

export const DEFAULT_SHEET_NAME = 'Sheet1';
