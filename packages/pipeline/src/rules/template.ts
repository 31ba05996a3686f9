import { TemplateFieldError } from '../errors.js';

/** Resolves a replacement field: an index for `{0}` or `{}`, a name for `{name}` */
export type FieldResolver = (field: number | string) => string;

/**
 * Format a brace template. `{0}` is a positional field, `{}` the next
 * positional field, `{name}` a named field; `{{` and `}}` are literal braces.
 */
export function formatTemplate(template: string, resolve: FieldResolver): string {
  let output = '';
  let autoIndex = 0;
  let index = 0;

  while (index < template.length) {
    const char = template.charAt(index);

    if (char === '{') {
      if (template.charAt(index + 1) === '{') {
        output += '{';
        index += 2;
        continue;
      }
      const close = template.indexOf('}', index + 1);
      if (close === -1) {
        throw new TemplateFieldError(`Unclosed "{" in template "${template}"`, { template });
      }
      const field = template.slice(index + 1, close);
      if (field.includes('{')) {
        throw new TemplateFieldError(`Unexpected "{" in field of template "${template}"`, { template });
      }
      if (field === '') {
        output += resolve(autoIndex);
        autoIndex += 1;
      } else {
        output += resolve(/^\d+$/.test(field) ? Number(field) : field);
      }
      index = close + 1;
      continue;
    }

    if (char === '}') {
      if (template.charAt(index + 1) !== '}') {
        throw new TemplateFieldError(`Single "}" in template "${template}"`, { template });
      }
      output += '}';
      index += 2;
      continue;
    }

    output += char;
    index += 1;
  }

  return output;
}

/**
 * Resolver over the captures of a match. Groups that did not participate in
 * the match resolve to an empty string.
 */
export function captureResolver(match: RegExpExecArray): FieldResolver {
  const positional = match.slice(1);
  const named = match.groups ?? {};

  return (field) => {
    if (typeof field === 'number') {
      if (field >= positional.length) {
        throw new TemplateFieldError(`Template field {${field}} has no capture group`, {
          field,
          groups: positional.length,
        });
      }
      return positional[field] ?? '';
    }
    if (!Object.hasOwn(named, field)) {
      throw new TemplateFieldError(`Template field {${field}} has no named capture group`, { field });
    }
    return named[field] ?? '';
  };
}
