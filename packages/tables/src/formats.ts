import path from 'node:path';

import { UnsupportedFormatError } from './errors.js';
import type { TableFormat } from './types.js';

const EXTENSION_FORMATS: Readonly<Record<string, TableFormat>> = {
  '.csv': 'csv',
  '.ods': 'ods',
  '.tab': 'tsv',
  '.tsv': 'tsv',
  '.xls': 'xls',
  '.xlsx': 'xlsx',
};

export function supportedExtensions(): string[] {
  return Object.keys(EXTENSION_FORMATS);
}

/**
 * Resolve the table format of a file from its extension.
 */
export function detectFormat(filePath: string): TableFormat {
  const extension = path.extname(filePath).toLowerCase();
  const format = EXTENSION_FORMATS[extension];
  if (!format) {
    throw new UnsupportedFormatError(`Unsupported table format "${extension || '(none)'}" for ${filePath}`, {
      filePath,
      supported: supportedExtensions(),
    });
  }
  return format;
}

export function isDelimitedFormat(format: TableFormat): format is 'csv' | 'tsv' {
  return format === 'csv' || format === 'tsv';
}

export function defaultDelimiter(format: 'csv' | 'tsv'): string {
  return format === 'tsv' ? '\t' : ',';
}
