import { getLogger } from '@burnish/logger';
import type { CellValue } from '@burnish/tables';
import { stringifyValue } from '@burnish/tables';
import dayjs from 'dayjs';
import customParseFormat from 'dayjs/plugin/customParseFormat.js';
import { z } from 'zod';

import { matchStart } from './patterns.js';
import {
  anyOptions,
  defineValueRule,
  mappingSchema,
  noArgs,
  patternMappingSchema,
  type ValueRuleDefinition,
} from './rule-definition.js';
import { captureResolver, formatTemplate } from './template.js';

dayjs.extend(customParseFormat);

const logger = getLogger('value-rules');

const TITLE_INITIAL = /(?<!\p{L})\p{L}/gu;

const stripOptions = z.object({ chars: z.string().optional() }).passthrough();

const amountOptions = z.object({ amount: z.number().finite().optional() }).passthrough();

const substituteValue = z.union([z.string(), z.number(), z.boolean(), z.null()]);

type StripSide = 'both' | 'start' | 'end';

export function stripText(text: string, side: StripSide, chars?: string): string {
  if (chars === undefined) {
    if (side === 'start') return text.trimStart();
    if (side === 'end') return text.trimEnd();
    return text.trim();
  }

  const strip = new Set(chars);
  const characters = [...text];
  let start = 0;
  let end = characters.length;
  if (side !== 'end') {
    while (start < end && strip.has(characters[start] ?? '')) start += 1;
  }
  if (side !== 'start') {
    while (end > start && strip.has(characters[end - 1] ?? '')) end -= 1;
  }
  return characters.slice(start, end).join('');
}

function textRule(transform: (text: string) => string): ValueRuleDefinition {
  return defineValueRule({
    apply: (value) => (typeof value === 'string' ? transform(value) : value),
    args: noArgs,
    options: anyOptions,
  });
}

function stripRule(side: StripSide): ValueRuleDefinition {
  return defineValueRule({
    apply: (value, _args, options) => (typeof value === 'string' ? stripText(value, side, options.chars) : value),
    args: noArgs,
    options: stripOptions,
  });
}

function amountRule(sign: 1 | -1): ValueRuleDefinition {
  return defineValueRule({
    apply: (value, _args, options) => (typeof value === 'number' ? value + sign * (options.amount ?? 1) : value),
    args: noArgs,
    options: amountOptions,
  });
}

export function translateDateValue(value: CellValue, translations: readonly (readonly [string, string])[]): CellValue {
  if (value instanceof Date) {
    const target = translations[0]?.[1];
    return target === undefined ? value : dayjs(value).format(target);
  }

  const text = stringifyValue(value);
  for (const [sourceFormat, targetFormat] of translations) {
    const parsed = dayjs(text, sourceFormat, true);
    if (parsed.isValid()) {
      return parsed.format(targetFormat);
    }
  }
  return value;
}

export const valueRules = {
  capitalize: textRule((text) => text.charAt(0).toUpperCase() + text.slice(1).toLowerCase()),
  decrement: amountRule(-1),
  increment: amountRule(1),
  lower: textRule((text) => text.toLowerCase()),
  lstrip: stripRule('start'),
  replace: defineValueRule({
    apply: (value, [replacements]) => {
      if (typeof value !== 'string') return value;
      return replacements.reduce((text, [from, to]) => text.replaceAll(from, () => to), value);
    },
    args: z.tuple([mappingSchema(z.string())]),
    options: anyOptions,
  }),
  rstrip: stripRule('end'),
  strip: stripRule('both'),
  substitute: defineValueRule({
    apply: (value, [substitutes]) => {
      const text = stringifyValue(value);
      const hit = substitutes.find(([pattern]) => matchStart(pattern, text) !== null);
      return hit ? hit[1] : value;
    },
    args: z.tuple([patternMappingSchema(substituteValue)]),
    options: anyOptions,
  }),
  title: textRule((text) => text.toLowerCase().replace(TITLE_INITIAL, (letter) => letter.toUpperCase())),
  translateDate: defineValueRule({
    apply: (value, [translations]) => translateDateValue(value, translations),
    args: z.tuple([mappingSchema(z.string())]),
    onBind: (rule, options) => {
      if (options['columnFilter'] == null) {
        logger.warn({ rule }, 'Date translation without a columnFilter may rewrite unrelated columns');
      }
    },
    options: anyOptions,
  }),
  translateText: defineValueRule({
    apply: (value, [translations]) =>
      translations.reduce<CellValue>((current, [pattern, template]) => {
        const match = matchStart(pattern, stringifyValue(current));
        return match ? formatTemplate(template, captureResolver(match)) : current;
      }, value),
    args: z.tuple([patternMappingSchema(z.string())]),
    options: anyOptions,
  }),
  upper: textRule((text) => text.toUpperCase()),
} satisfies Record<string, ValueRuleDefinition>;

export type ValueRuleName = keyof typeof valueRules;
