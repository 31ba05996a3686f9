import type { CellValue, ReadonlyTableRecord } from '@burnish/tables';
import { stringifyValue } from '@burnish/tables';
import { z } from 'zod';

import { ConfigurationError, formatIssues } from '../errors.js';
import { compilePattern, matchStart } from '../rules/patterns.js';
import type { CallableFilter, CompiledFilter, RuleOptions } from '../types.js';

export const FILTER_KEYS: ReadonlySet<string> = new Set(['columnFilter', 'valueFilter', 'callableFilter']);

const patternSchema = z.union([z.string(), z.instanceof(RegExp)]);

const filterSchema = z.object({
  callableFilter: z
    .custom<CallableFilter>((value) => typeof value === 'function', { message: 'Expected a function' })
    .nullish(),
  columnFilter: patternSchema.nullish(),
  valueFilter: patternSchema.nullish(),
});

/**
 * Validate the filter options of a value rule and compile their patterns.
 */
export function compileFilter(options: RuleOptions): CompiledFilter {
  const result = filterSchema.safeParse(options);
  if (!result.success) {
    throw new ConfigurationError(`Invalid filter options: ${formatIssues(result.error)}`);
  }
  const { callableFilter, columnFilter, valueFilter } = result.data;

  return {
    callable: callableFilter ?? undefined,
    column: columnFilter == null ? undefined : compilePattern(columnFilter),
    extra: Object.fromEntries(Object.entries(options).filter(([key]) => !FILTER_KEYS.has(key))),
    value: valueFilter == null ? undefined : compilePattern(valueFilter),
  };
}

/**
 * Whether a value rule may rewrite `column`. Checks the column pattern, then
 * the value pattern, then the callable; stops at the first that rejects.
 */
export function isAllowed(
  filter: CompiledFilter,
  record: ReadonlyTableRecord,
  column: string,
  value: CellValue
): boolean {
  if (filter.column && !matchStart(filter.column, column)) return false;
  if (filter.value && !matchStart(filter.value, stringifyValue(value))) return false;
  if (filter.callable && !filter.callable(record, column, filter.extra)) return false;
  return true;
}

export function allowed(record: ReadonlyTableRecord, column: string, value: CellValue, options: RuleOptions): boolean {
  return isAllowed(compileFilter(options), record, column, value);
}
