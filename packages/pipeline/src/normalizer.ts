import { buildRecord, type ReadonlyTableRecord, type TableRecord } from '@burnish/tables';

import { isAllowed } from './filters/filter-predicate.js';
import type { RecordRuleRegistration, RuleRegistry, ValueRuleRegistration } from './registry/rule-registry.js';

export interface RecordNormalizer {
  normalize(record: ReadonlyTableRecord): TableRecord;
  /** Output header for a source with these columns and no records */
  header(columns: readonly string[]): string[];
}

/**
 * Run one record through the value phase, then the record phase.
 *
 * Each value rule sees the record as left by the rules and columns before it;
 * the snapshot handed to a rule is taken before that column is replaced.
 */
export function normalizeRecord(
  record: ReadonlyTableRecord,
  valueRules: readonly ValueRuleRegistration[],
  recordRules: readonly RecordRuleRegistration[]
): TableRecord {
  let current: TableRecord = new Map(record);

  for (const registration of valueRules) {
    for (const [column, value] of current) {
      if (!isAllowed(registration.filter, current, column, value)) continue;
      current.set(column, registration.transform(new Map(current), column));
    }
  }

  for (const registration of recordRules) {
    current = registration.transform(new Map(current));
  }

  return current;
}

/**
 * Columns an empty record with `columns` ends up with after the record rules.
 * Value rules never add or drop columns, so they are skipped.
 */
export function projectHeader(
  columns: readonly string[],
  recordRules: readonly RecordRuleRegistration[]
): string[] {
  let current = buildRecord(columns, []);
  for (const registration of recordRules) {
    current = registration.transform(new Map(current));
  }
  return [...current.keys()];
}

/**
 * Bind the registry's current rules into a per-record normalizer.
 */
export function createNormalizer(registry: Pick<RuleRegistry, 'valueRules' | 'recordRules'>): RecordNormalizer {
  const valueRules = registry.valueRules;
  const recordRules = registry.recordRules;
  return {
    header: (columns) => projectHeader(columns, recordRules),
    normalize: (record) => normalizeRecord(record, valueRules, recordRules),
  };
}

export async function* normalizeRecords(
  records: AsyncIterable<TableRecord>,
  normalizer: RecordNormalizer
): AsyncGenerator<TableRecord, void, undefined> {
  for await (const record of records) {
    yield normalizer.normalize(record);
  }
}
