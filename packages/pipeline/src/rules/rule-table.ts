import type { RuleKind } from '../types.js';

import { recordRules, type RecordRuleName } from './record-rules.js';
import type { RecordRuleDefinition, ValueRuleDefinition } from './rule-definition.js';
import { valueRules, type ValueRuleName } from './value-rules.js';

export type RuleName = ValueRuleName | RecordRuleName;

export function isValueRuleName(rule: string): rule is ValueRuleName {
  return Object.hasOwn(valueRules, rule);
}

export function isRecordRuleName(rule: string): rule is RecordRuleName {
  return Object.hasOwn(recordRules, rule);
}

export function isRuleName(rule: string): rule is RuleName {
  return isValueRuleName(rule) || isRecordRuleName(rule);
}

export function lookupRule(rule: RuleName): ValueRuleDefinition | RecordRuleDefinition {
  return isValueRuleName(rule) ? valueRules[rule] : recordRules[rule];
}

export function ruleKindOf(rule: RuleName): RuleKind {
  return lookupRule(rule).kind;
}

export function ruleNames(): RuleName[] {
  return [...Object.keys(valueRules), ...Object.keys(recordRules)].filter(isRuleName);
}
