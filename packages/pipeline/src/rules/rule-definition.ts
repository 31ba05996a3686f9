import type { CellValue, ReadonlyTableRecord, TableRecord } from '@burnish/tables';
import { z } from 'zod';

import { ConfigurationError, MissingColumnError, formatIssues } from '../errors.js';
import type { RecordTransform, RuleOptions, ValueTransform } from '../types.js';

import { compilePattern } from './patterns.js';

/**
 * A rule as stored in the rule table: its kind, and how to bind raw
 * arguments and options into a transform. Binding validates both, so a bad
 * registration fails at the call that made it.
 */
export interface ValueRuleDefinition {
  readonly kind: 'value';
  bind(rule: string, args: readonly unknown[], options: RuleOptions): ValueTransform;
}

export interface RecordRuleDefinition {
  readonly kind: 'record';
  bind(rule: string, args: readonly unknown[], options: RuleOptions): RecordTransform;
}

export type RuleDefinition = ValueRuleDefinition | RecordRuleDefinition;

type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

interface ValueRuleConfig<A, O> {
  args: Schema<A>;
  options: Schema<O>;
  apply(value: CellValue, args: A, options: O): CellValue;
  onBind?(rule: string, options: RuleOptions): void;
}

interface RecordRuleConfig<A, O> {
  args: Schema<A>;
  options: Schema<O>;
  apply(record: TableRecord, args: A, options: O): TableRecord;
}

function parseWith<T>(rule: string, what: 'arguments' | 'options', schema: Schema<T>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(`Invalid ${what} for rule "${rule}": ${formatIssues(result.error)}`, { rule });
  }
  return result.data;
}

/**
 * Read a column, failing when the record does not have it.
 */
export function readColumn(record: ReadonlyTableRecord, column: string): CellValue {
  const value = record.get(column);
  if (value === undefined) {
    throw new MissingColumnError(column, { columns: [...record.keys()] });
  }
  return value;
}

export function defineValueRule<A, O>(config: ValueRuleConfig<A, O>): ValueRuleDefinition {
  return {
    bind(rule, args, options) {
      const parsedArgs = parseWith(rule, 'arguments', config.args, args);
      const parsedOptions = parseWith(rule, 'options', config.options, options);
      config.onBind?.(rule, options);
      return (snapshot, column) => config.apply(readColumn(snapshot, column), parsedArgs, parsedOptions);
    },
    kind: 'value',
  };
}

export function defineRecordRule<A, O>(config: RecordRuleConfig<A, O>): RecordRuleDefinition {
  return {
    bind(rule, args, options) {
      const parsedArgs = parseWith(rule, 'arguments', config.args, args);
      const parsedOptions = parseWith(rule, 'options', config.options, options);
      return (record) => config.apply(record, parsedArgs, parsedOptions);
    },
    kind: 'record',
  };
}

export const noArgs = z.tuple([]);

export const anyOptions = z.record(z.string(), z.unknown());

export const patternSchema = z.union([z.string(), z.instanceof(RegExp)]);

/**
 * Ordered mapping schema accepting an object or a list of entries. The output
 * is always a list of entries; pattern keys come out compiled.
 */
export function mappingSchema<V>(value: Schema<V>) {
  return z
    .union([z.array(z.tuple([z.string(), value])), z.record(z.string(), value)])
    .transform((mapping): [string, V][] => (Array.isArray(mapping) ? mapping : Object.entries(mapping)));
}

export function patternMappingSchema<V>(value: Schema<V>) {
  return z
    .union([z.array(z.tuple([patternSchema, value])), z.record(z.string(), value)])
    .transform((mapping): [RegExp, V][] =>
      (Array.isArray(mapping) ? mapping : Object.entries(mapping)).map(([pattern, to]) => [compilePattern(pattern), to])
    );
}
