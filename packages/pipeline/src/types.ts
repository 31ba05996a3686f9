import type { CellValue, ReadonlyTableRecord, TableRecord } from '@burnish/tables';

export type RuleKind = 'value' | 'record';

/** A regular expression given as source text or as a RegExp */
export type Pattern = string | RegExp;

/**
 * An ordered mapping. Plain objects enumerate integer-like keys first, so
 * use the entry-list form when such keys must keep their position.
 */
export type OrderedMapping<T> = Readonly<Record<string, T>> | readonly (readonly [string, T])[];

/** Ordered mapping whose keys are patterns; RegExp keys need the entry-list form */
export type PatternMapping<T> = Readonly<Record<string, T>> | readonly (readonly [Pattern, T])[];

export type RuleOptions = Readonly<Record<string, unknown>>;

export type CallableFilter = (record: ReadonlyTableRecord, column: string, extra: RuleOptions) => unknown;

export type FilterOptions = {
  readonly columnFilter?: Pattern | null | undefined;
  readonly valueFilter?: Pattern | null | undefined;
  readonly callableFilter?: CallableFilter | null | undefined;
};

/** Options of a value rule: its filters plus any extra options, handed to the callable filter */
export type ValueRuleOptions = FilterOptions & { readonly [option: string]: unknown };

export type StripOptions = ValueRuleOptions & { readonly chars?: string | undefined };

export type AmountOptions = ValueRuleOptions & { readonly amount?: number | undefined };

export type OrderColumnsOptions = { readonly ignoreMissing?: boolean | undefined };

export type SubstituteValue = string | number | boolean | null;

export type ColumnFactory = (record: ReadonlyTableRecord) => CellValue;

export type ColumnValue = CellValue | ColumnFactory;

/** Computes the new value of `column` from a snapshot of the record */
export type ValueTransform = (snapshot: ReadonlyTableRecord, column: string) => CellValue;

export type RecordTransform = (record: TableRecord) => TableRecord;

export interface CompiledFilter {
  readonly column?: RegExp | undefined;
  readonly value?: RegExp | undefined;
  readonly callable?: CallableFilter | undefined;
  /** Options other than the three filters */
  readonly extra: RuleOptions;
}
