import type { CellValue, TableRecord } from '@burnish/tables';
import { stringifyValue, toCellValue } from '@burnish/tables';
import { z } from 'zod';

import { TemplateFieldError } from '../errors.js';
import type { ColumnFactory } from '../types.js';

import { anyOptions, defineRecordRule, mappingSchema, readColumn, type RecordRuleDefinition } from './rule-definition.js';
import { formatTemplate, type FieldResolver } from './template.js';

const columnValue = z.union([
  z.string(),
  z.number(),
  z.boolean(),
  z.date(),
  z.null(),
  z.custom<ColumnFactory>((value) => typeof value === 'function', { message: 'Expected a function' }),
]);

const orderOptions = z.object({ ignoreMissing: z.boolean().optional() }).passthrough();

/**
 * Resolver that fills `{name}` fields from the record's columns.
 */
export function recordResolver(record: TableRecord): FieldResolver {
  return (field) => {
    if (typeof field === 'number') {
      throw new TemplateFieldError(`Positional field {${field}} cannot be filled from a record`, { field });
    }
    return stringifyValue(readColumn(record, field));
  };
}

export function orderColumns(record: TableRecord, order: readonly string[], ignoreMissing = false): TableRecord {
  const ordered: TableRecord = new Map();
  for (const column of order) {
    const value = record.get(column);
    if (value !== undefined) ordered.set(column, value);
  }
  if (!ignoreMissing) {
    for (const [column, value] of record) {
      if (!ordered.has(column)) ordered.set(column, value);
    }
  }
  return ordered;
}

export function renameColumns(record: TableRecord, renames: ReadonlyMap<string, string>): TableRecord {
  const renamed: TableRecord = new Map();
  for (const [column, value] of record) {
    renamed.set(renames.get(column) ?? column, value);
  }
  return renamed;
}

export const recordRules = {
  addColumns: defineRecordRule({
    apply: (record, [columns]) => {
      for (const [column, value] of columns) {
        if (record.has(column)) continue;
        let added: CellValue;
        if (typeof value === 'function') {
          added = toCellValue(value(new Map(record)));
        } else if (typeof value === 'string') {
          added = formatTemplate(value, recordResolver(record));
        } else {
          added = value;
        }
        record.set(column, added);
      }
      return record;
    },
    args: z.tuple([mappingSchema(columnValue)]),
    options: anyOptions,
  }),
  orderColumns: defineRecordRule({
    apply: (record, [order], options) => orderColumns(record, order, options.ignoreMissing),
    args: z.tuple([z.array(z.string())]),
    options: orderOptions,
  }),
  removeColumns: defineRecordRule({
    apply: (record, [columns]) => {
      for (const column of columns) record.delete(column);
      return record;
    },
    args: z.tuple([z.array(z.string())]),
    options: anyOptions,
  }),
  renameColumns: defineRecordRule({
    apply: (record, [renames]) => renameColumns(record, new Map(renames)),
    args: z.tuple([mappingSchema(z.string())]),
    options: anyOptions,
  }),
} satisfies Record<string, RecordRuleDefinition>;

export type RecordRuleName = keyof typeof recordRules;
