import { BurnishError } from '@burnish/tables';
import type { z } from 'zod';

export { BurnishError, SheetNotFoundError, UnsupportedFormatError, getErrorMessage, toError } from '@burnish/tables';

/**
 * Invalid pipeline setup: bad name, rule arguments or options, or an export
 * destination that cannot be written.
 */
export class ConfigurationError extends BurnishError {
  readonly code = 'CONFIGURATION_ERROR';
  readonly severity = 'error' as const;
}

/**
 * A rule read a column the record does not have.
 */
export class MissingColumnError extends BurnishError {
  readonly code = 'MISSING_COLUMN';
  readonly severity = 'error' as const;

  constructor(
    readonly column: string,
    context?: Record<string, unknown>
  ) {
    super(`Column "${column}" is not present in the record`, { column, ...context });
  }
}

export class TemplateFieldError extends BurnishError {
  readonly code = 'TEMPLATE_FIELD';
  readonly severity = 'error' as const;
}

export class UnknownRuleError extends BurnishError {
  readonly code = 'UNKNOWN_RULE';
  readonly severity = 'error' as const;

  constructor(readonly rule: string) {
    super(`Unknown rule "${rule}"`, { rule });
  }
}

export class RuleKindConflictError extends BurnishError {
  readonly code = 'RULE_KIND_CONFLICT';
  readonly severity = 'error' as const;
}

export class SerializationError extends BurnishError {
  readonly code = 'SERIALIZATION_ERROR';
  readonly severity = 'error' as const;
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
      return `${issue.message}${path}`;
    })
    .join(', ');
}
