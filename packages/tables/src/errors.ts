/**
 * Base error for every failure raised by burnish packages.
 */
export abstract class BurnishError extends Error {
  abstract readonly code: string;
  abstract readonly severity: 'error' | 'warning';

  readonly timestamp: string;
  readonly context?: Record<string, unknown> | undefined;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message);
    this.timestamp = new Date().toISOString();
    this.context = context;
    this.name = this.constructor.name;
  }

  toJSON() {
    return {
      code: this.code,
      context: this.context,
      message: this.message,
      name: this.name,
      severity: this.severity,
      timestamp: this.timestamp,
    };
  }
}

export class UnsupportedFormatError extends BurnishError {
  readonly code = 'UNSUPPORTED_FORMAT';
  readonly severity = 'error' as const;
}

export class SheetNotFoundError extends BurnishError {
  readonly code = 'SHEET_NOT_FOUND';
  readonly severity = 'error' as const;
}

export class SourceConsumedError extends BurnishError {
  readonly code = 'SOURCE_CONSUMED';
  readonly severity = 'error' as const;
}

/**
 * Extract error message from unknown error value
 */
export function getErrorMessage(error: unknown, defaultMessage?: string): string {
  if (error instanceof Error && typeof error.message === 'string') {
    return error.message;
  }
  return defaultMessage || String(error);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
