import { ConfigurationError, getErrorMessage } from '../errors.js';
import type { Pattern } from '../types.js';

const compiled = new Map<string, RegExp>();

/**
 * Compile a pattern into a sticky RegExp so that `exec` only matches at the
 * start of the input. Global and sticky flags of a given RegExp are dropped;
 * the other flags are kept.
 */
export function compilePattern(pattern: Pattern): RegExp {
  const source = typeof pattern === 'string' ? pattern : pattern.source;
  const flags = typeof pattern === 'string' ? '' : pattern.flags.replace(/[gy]/g, '');
  const key = `/${source}/${flags}`;

  const cached = compiled.get(key);
  if (cached) return cached;

  let regex: RegExp;
  try {
    regex = new RegExp(source, `${flags}y`);
  } catch (error) {
    throw new ConfigurationError(`Invalid pattern ${key}: ${getErrorMessage(error)}`, { pattern: source });
  }
  compiled.set(key, regex);
  return regex;
}

/**
 * Match `regex` against the start of `text`.
 */
export function matchStart(regex: RegExp, text: string): RegExpExecArray | null {
  regex.lastIndex = 0;
  return regex.exec(text);
}

export function matchesStart(pattern: Pattern, text: string): boolean {
  return matchStart(compilePattern(pattern), text) !== null;
}

/**
 * Entries of an ordered mapping, in order.
 */
export function mappingEntries<K extends string | RegExp, T>(
  mapping: Readonly<Record<string, T>> | readonly (readonly [K, T])[]
): (readonly [K | string, T])[] {
  return isEntryList(mapping) ? [...mapping] : Object.entries(mapping);
}

function isEntryList<K, T>(
  mapping: Readonly<Record<string, T>> | readonly (readonly [K, T])[]
): mapping is readonly (readonly [K, T])[] {
  return Array.isArray(mapping);
}
