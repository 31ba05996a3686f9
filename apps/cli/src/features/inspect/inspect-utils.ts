import { isRuleName, ruleKindOf, type PipelineEnvelope, type RuleKind, type SerializedRule } from '@burnish/pipeline';

export interface RuleSummary {
  position: number;
  rule: string;
  kind: RuleKind | 'unknown';
  args: SerializedRule[1];
  options: SerializedRule[2];
}

export interface PipelineSummary {
  name: string;
  uid: string;
  ruleCount: number;
  rules: RuleSummary[];
}

export function describeEnvelope(envelope: PipelineEnvelope): PipelineSummary {
  return {
    name: envelope.name,
    uid: envelope.uid,
    ruleCount: envelope.rules.length,
    rules: envelope.rules.map(([rule, args, options], index) => ({
      position: index + 1,
      rule,
      kind: isRuleName(rule) ? ruleKindOf(rule) : 'unknown',
      args,
      options,
    })),
  };
}

/**
 * One line per rule, e.g. `2. replace [value] [{"a":"b"}] {"columnFilter":"^name$"}`.
 * Empty arguments and options are left out.
 */
export function formatRuleLine(summary: RuleSummary): string {
  let line = `${summary.position}. ${summary.rule} [${summary.kind}]`;
  if (summary.args.length > 0) {
    line += ` ${JSON.stringify(summary.args)}`;
  }
  if (Object.keys(summary.options).length > 0) {
    line += ` ${JSON.stringify(summary.options)}`;
  }
  return line;
}

export function formatSummary(summary: PipelineSummary): string {
  if (summary.rules.length === 0) {
    return '(no rules)';
  }
  return summary.rules.map(formatRuleLine).join('\n');
}
