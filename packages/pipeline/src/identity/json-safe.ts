export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type SanitizeMode = 'hash' | 'export';

export interface SanitizeLoss {
  readonly path: string;
  readonly reason: 'callable' | 'regexp-flags';
}

/**
 * Convert a registration argument to JSON. Object keys keep insertion order.
 *
 * In `hash` mode callables become a `[callable name]` marker and flagged
 * RegExps keep their flags, so they still contribute to identity. In
 * `export` mode callables become null and RegExps their bare source; each
 * such loss is reported through `onLoss`.
 */
export function toJsonSafe(
  value: unknown,
  mode: SanitizeMode,
  onLoss?: (loss: SanitizeLoss) => void,
  path = '$'
): JsonValue {
  if (value === null || value === undefined) return null;

  switch (typeof value) {
    case 'string':
    case 'boolean':
      return value;
    case 'number':
      return Number.isFinite(value) ? value : null;
    case 'bigint':
      return value.toString();
    case 'function':
      if (mode === 'hash') return `[callable ${value.name || 'anonymous'}]`;
      onLoss?.({ path, reason: 'callable' });
      return null;
    case 'symbol':
      return value.toString();
    default:
      break;
  }

  if (value instanceof RegExp) {
    if (value.flags === '') return value.source;
    if (mode === 'hash') return `/${value.source}/${value.flags}`;
    onLoss?.({ path, reason: 'regexp-flags' });
    return value.source;
  }

  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString();
  }

  if (Array.isArray(value)) {
    return value.map((item: unknown, index) => toJsonSafe(item, mode, onLoss, `${path}[${index}]`));
  }

  const result: Record<string, JsonValue> = {};
  for (const [key, item] of Object.entries(value)) {
    if (item === undefined) continue;
    result[key] = toJsonSafe(item, mode, onLoss, `${path}.${key}`);
  }
  return result;
}
