import fs from 'node:fs/promises';
import path from 'node:path';

import { getLogger } from '@burnish/logger';
import { err, ok, type Result } from 'neverthrow';

import { ConfigurationError, SerializationError, UnknownRuleError, formatIssues, getErrorMessage, toError } from './errors.js';
import { compileFilter } from './filters/filter-predicate.js';
import { computeUid, uidHashCode } from './identity/uid.js';
import { createNormalizer } from './normalizer.js';
import {
  RuleRegistry,
  snapshotArgument,
  snapshotOptions,
  type RecordRuleRegistration,
  type RuleRegistration,
  type ValueRuleRegistration,
} from './registry/rule-registry.js';
import { isRuleName, lookupRule, type RuleName } from './rules/rule-table.js';
import {
  applyToFile,
  applyToFiles,
  defaultOutputName,
  type ApplyAllOptions,
  type ApplyOptions,
} from './runner.js';
import { pipelineEnvelopeSchema, serializeRules, type PipelineEnvelope } from './serialization/envelope.js';
import type {
  AmountOptions,
  ColumnValue,
  OrderColumnsOptions,
  OrderedMapping,
  PatternMapping,
  RuleOptions,
  StripOptions,
  SubstituteValue,
  ValueRuleOptions,
} from './types.js';

const logger = getLogger('pipeline');

/**
 * A chain of normalization rules applied to every record of a table file.
 *
 * Rules are added through the builder methods, each returning the pipeline.
 * Identity (`uid`) is derived from the registered rules, so two pipelines
 * holding the same rules in the same order are equal whatever their names.
 *
 * @example
 * const pipeline = new Pipeline('contacts')
 *   .strip()
 *   .lower({ columnFilter: /^email$/ })
 *   .renameColumns({ mail: 'email' });
 * const result = await pipeline.apply('contacts.csv');
 */
export class Pipeline {
  private readonly registry = new RuleRegistry();
  private explicitName: string | undefined;

  constructor(name?: string) {
    if (name !== undefined) {
      this.name = name;
    }
  }

  /** The explicit name, or the current uid while none is set */
  get name(): string {
    return this.explicitName ?? this.uid;
  }

  set name(value: string) {
    if (typeof value !== 'string' || value.length === 0) {
      throw new ConfigurationError('Pipeline name must be a non-empty string', { name: String(value) });
    }
    this.explicitName = value;
  }

  /** SHA-1 of the registered rules, recomputed on every read */
  get uid(): string {
    return computeUid(this.registry.rules);
  }

  get rules(): readonly RuleRegistration[] {
    return this.registry.rules;
  }

  get valueRules(): readonly ValueRuleRegistration[] {
    return this.registry.valueRules;
  }

  get recordRules(): readonly RecordRuleRegistration[] {
    return this.registry.recordRules;
  }

  /**
   * Append a rule by name. Arguments and options are validated against the
   * rule; the rule's kind comes from the rule table.
   */
  register(rule: RuleName, args: readonly unknown[] = [], options: RuleOptions = {}): this {
    if (!isRuleName(rule)) {
      throw new UnknownRuleError(String(rule));
    }
    const definition = lookupRule(rule);
    const boundArgs = Object.freeze(args.map(snapshotArgument));
    const boundOptions = snapshotOptions(options);

    if (definition.kind === 'value') {
      const filter = compileFilter(boundOptions);
      this.registry.append({
        args: boundArgs,
        filter,
        kind: 'value',
        options: boundOptions,
        rule,
        transform: definition.bind(rule, boundArgs, boundOptions),
      });
    } else {
      this.registry.append({
        args: boundArgs,
        kind: 'record',
        options: boundOptions,
        rule,
        transform: definition.bind(rule, boundArgs, boundOptions),
      });
    }

    logger.debug({ kind: definition.kind, rule }, 'Registered rule');
    return this;
  }

  /** Remove every rule */
  clear(): this {
    this.registry.clear();
    return this;
  }

  lower(options: ValueRuleOptions = {}): this {
    return this.register('lower', [], options);
  }

  upper(options: ValueRuleOptions = {}): this {
    return this.register('upper', [], options);
  }

  capitalize(options: ValueRuleOptions = {}): this {
    return this.register('capitalize', [], options);
  }

  title(options: ValueRuleOptions = {}): this {
    return this.register('title', [], options);
  }

  /** Trim whitespace, or the characters of `chars`, from both ends of text values */
  strip(options: StripOptions = {}): this {
    return this.register('strip', [], options);
  }

  lstrip(options: StripOptions = {}): this {
    return this.register('lstrip', [], options);
  }

  rstrip(options: StripOptions = {}): this {
    return this.register('rstrip', [], options);
  }

  increment(options: AmountOptions = {}): this {
    return this.register('increment', [], options);
  }

  decrement(options: AmountOptions = {}): this {
    return this.register('decrement', [], options);
  }

  /** Literal substring replacements, applied in order */
  replace(replacements: OrderedMapping<string>, options: ValueRuleOptions = {}): this {
    return this.register('replace', [replacements], options);
  }

  /** Replace the whole value with that of the first pattern matching its start */
  substitute(substitutes: PatternMapping<SubstituteValue>, options: ValueRuleOptions = {}): this {
    return this.register('substitute', [substitutes], options);
  }

  /**
   * Reformat the value through every matching pattern in turn. Templates
   * reference captures as `{0}`, `{}` or `{name}`.
   */
  translateText(translations: PatternMapping<string>, options: ValueRuleOptions = {}): this {
    return this.register('translateText', [translations], options);
  }

  /**
   * Reformat dates. Keys are source formats tried strictly in order, values
   * the target format for that source (dayjs tokens).
   */
  translateDate(translations: OrderedMapping<string>, options: ValueRuleOptions = {}): this {
    return this.register('translateDate', [translations], options);
  }

  addColumns(columns: OrderedMapping<ColumnValue>): this {
    return this.register('addColumns', [columns]);
  }

  removeColumns(columns: readonly string[]): this {
    return this.register('removeColumns', [columns]);
  }

  renameColumns(renames: OrderedMapping<string>): this {
    return this.register('renameColumns', [renames]);
  }

  orderColumns(order: readonly string[], options: OrderColumnsOptions = {}): this {
    return this.register('orderColumns', [order], options);
  }

  equals(other: unknown): boolean {
    return other instanceof Pipeline && other.uid === this.uid;
  }

  hashCode(): number {
    return uidHashCode(this.uid);
  }

  toString(): string {
    return `<Pipeline (${this.registry.size} rules) "${this.name}">`;
  }

  /**
   * Normalize `fromFile` into `toFile` (default `<base>.<suffix><ext>` beside
   * the input). Overwrites `toFile` without asking, including when it is the
   * input itself.
   */
  async apply(fromFile: string, toFile?: string, options: ApplyOptions = {}): Promise<Result<string, Error>> {
    const destination = toFile ?? defaultOutputName(fromFile);
    try {
      return ok(await applyToFile(createNormalizer(this.registry), fromFile, destination, options));
    } catch (error) {
      logger.error({ error: getErrorMessage(error), fromFile, pipeline: this.name }, 'Failed to normalize file');
      return err(toError(error));
    }
  }

  /**
   * Normalize every file matching a glob pattern (brace alternatives and
   * ranges included), up to `maxWorkers` files at a time.
   */
  async applyAll(pattern: string, options: ApplyAllOptions = {}): Promise<Result<string[], Error>> {
    try {
      return ok(await applyToFiles(createNormalizer(this.registry), pattern, options));
    } catch (error) {
      return err(toError(error));
    }
  }

  export(): PipelineEnvelope {
    const rules = serializeRules(this.registry.rules, (loss) => {
      if (loss.reason === 'callable') {
        logger.warn(loss, 'Callable argument exported as null; a loaded pipeline will not match this one');
      } else {
        logger.warn(loss, 'RegExp flags cannot be exported and were dropped');
      }
    });
    return { name: this.name, rules, uid: this.uid };
  }

  async exportToFile(toFile: string): Promise<Result<string, Error>> {
    const directory = path.dirname(path.resolve(toFile));
    let isDirectory = false;
    try {
      isDirectory = (await fs.stat(directory)).isDirectory();
    } catch (error) {
      logger.debug({ directory, error: getErrorMessage(error) }, 'Export directory is not accessible');
    }
    if (!isDirectory) {
      return err(new ConfigurationError(`Export directory does not exist: ${directory}`, { directory }));
    }

    try {
      await fs.writeFile(toFile, `${JSON.stringify(this.export(), undefined, 2)}\n`, 'utf8');
      return ok(toFile);
    } catch (error) {
      return err(toError(error));
    }
  }

  /**
   * Rebuild a pipeline from an exported envelope. A uid that differs from the
   * envelope's is logged as a warning; the pipeline is still returned.
   */
  static load(envelope: unknown): Result<Pipeline, Error> {
    const parsed = pipelineEnvelopeSchema.safeParse(envelope);
    if (!parsed.success) {
      return err(new SerializationError(`Invalid pipeline envelope: ${formatIssues(parsed.error)}`));
    }
    const { name, rules, uid } = parsed.data;

    const pipeline = new Pipeline();
    for (const [rule, args, options] of rules) {
      if (!isRuleName(rule)) {
        return err(new UnknownRuleError(rule));
      }
      try {
        pipeline.register(rule, args, options);
      } catch (error) {
        return err(toError(error));
      }
    }

    if (name !== uid) {
      if (name.length === 0) {
        return err(new SerializationError('Pipeline envelope has an empty name'));
      }
      pipeline.name = name;
    }

    if (pipeline.uid !== uid) {
      logger.warn(
        { expected: uid, name: pipeline.name, received: pipeline.uid },
        'Loaded pipeline uid does not match the envelope; some rules did not round-trip'
      );
    }
    return ok(pipeline);
  }

  static async loadFromFile(fromFile: string): Promise<Result<Pipeline, Error>> {
    let content: string;
    try {
      content = await fs.readFile(fromFile, 'utf8');
    } catch (error) {
      return err(toError(error));
    }

    let envelope: unknown;
    try {
      envelope = JSON.parse(content);
    } catch (error) {
      return err(new SerializationError(`Invalid JSON in ${fromFile}: ${getErrorMessage(error)}`, { fromFile }));
    }
    return Pipeline.load(envelope);
  }
}
