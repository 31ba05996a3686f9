import { z } from 'zod';

import type { JsonValue, SanitizeLoss } from '../identity/json-safe.js';
import { toJsonSafe } from '../identity/json-safe.js';
import type { RuleRegistration } from '../registry/rule-registry.js';

export const serializedRuleSchema = z.tuple([z.string().min(1), z.array(z.unknown()), z.record(z.string(), z.unknown())]);

export const pipelineEnvelopeSchema = z.object({
  name: z.string(),
  rules: z.array(serializedRuleSchema),
  uid: z.string().regex(/^[0-9a-f]{40}$/, { message: 'Expected a SHA-1 hex digest' }),
});

export type SerializedRule = [rule: string, args: JsonValue[], options: Record<string, JsonValue>];

export interface PipelineEnvelope {
  name: string;
  uid: string;
  rules: SerializedRule[];
}

export type ParsedEnvelope = z.infer<typeof pipelineEnvelopeSchema>;

export interface ExportLoss extends SanitizeLoss {
  readonly rule: string;
  readonly index: number;
}

function asJsonArray(value: JsonValue): JsonValue[] {
  return Array.isArray(value) ? value : [];
}

function asJsonObject(value: JsonValue): Record<string, JsonValue> {
  return value !== null && typeof value === 'object' && !Array.isArray(value) ? value : {};
}

/**
 * Serialize registrations into envelope rules, reporting every argument that
 * could not be carried over exactly.
 */
export function serializeRules(
  registrations: readonly Pick<RuleRegistration, 'rule' | 'args' | 'options'>[],
  onLoss: (loss: ExportLoss) => void
): SerializedRule[] {
  return registrations.map((registration, index) => {
    const report = (loss: SanitizeLoss) => onLoss({ ...loss, index, rule: registration.rule });
    return [
      registration.rule,
      asJsonArray(toJsonSafe(registration.args, 'export', report, '$.args')),
      asJsonObject(toJsonSafe(registration.options, 'export', report, '$.options')),
    ];
  });
}
