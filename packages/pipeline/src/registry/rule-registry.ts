import { RuleKindConflictError } from '../errors.js';
import type { RuleName } from '../rules/rule-table.js';
import type { CompiledFilter, RecordTransform, RuleKind, RuleOptions, ValueTransform } from '../types.js';

interface RegistrationBase<K extends RuleKind> {
  readonly kind: K;
  readonly rule: RuleName;
  /** Arguments as given, kept for identity and export */
  readonly args: readonly unknown[];
  readonly options: RuleOptions;
}

export interface ValueRuleRegistration extends RegistrationBase<'value'> {
  readonly filter: CompiledFilter;
  readonly transform: ValueTransform;
}

export interface RecordRuleRegistration extends RegistrationBase<'record'> {
  readonly transform: RecordTransform;
}

export type RuleRegistration = ValueRuleRegistration | RecordRuleRegistration;

function isPlainObject(value: object): boolean {
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

/**
 * Frozen deep copy of a registration argument. Arrays and plain objects are
 * copied; callables keep their identity.
 */
export function snapshotArgument(value: unknown): unknown {
  if (typeof value !== 'object' || value === null) return value;
  if (value instanceof RegExp) return new RegExp(value.source, value.flags);
  if (value instanceof Date) return new Date(value.getTime());
  if (Array.isArray(value)) return Object.freeze(value.map((item: unknown) => snapshotArgument(item)));
  if (!isPlainObject(value)) return value;
  return snapshotOptions(value);
}

export function snapshotOptions(options: object): Readonly<Record<string, unknown>> {
  return Object.freeze(
    Object.fromEntries(Object.entries(options).map(([key, item]: [string, unknown]) => [key, snapshotArgument(item)]))
  );
}

/**
 * Ordered, append-only list of rule registrations. Insertion order is
 * application order.
 */
export class RuleRegistry {
  private readonly entries: RuleRegistration[] = [];
  private readonly kinds = new Map<string, RuleKind>();

  get size(): number {
    return this.entries.length;
  }

  get rules(): readonly RuleRegistration[] {
    return [...this.entries];
  }

  get valueRules(): readonly ValueRuleRegistration[] {
    return this.entries.filter((entry): entry is ValueRuleRegistration => entry.kind === 'value');
  }

  get recordRules(): readonly RecordRuleRegistration[] {
    return this.entries.filter((entry): entry is RecordRuleRegistration => entry.kind === 'record');
  }

  append(registration: RuleRegistration): void {
    const known = this.kinds.get(registration.rule);
    if (known !== undefined && known !== registration.kind) {
      throw new RuleKindConflictError(
        `Rule "${registration.rule}" is registered as a ${known} rule and cannot be added as a ${registration.kind} rule`,
        { rule: registration.rule }
      );
    }
    this.kinds.set(registration.rule, registration.kind);
    this.entries.push(Object.freeze(registration));
  }

  clear(): void {
    this.entries.length = 0;
    this.kinds.clear();
  }
}
