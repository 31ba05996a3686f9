import type { ExitCode } from './exit-codes.js';

/**
 * Response envelope printed in --json mode.
 */
export interface CLIResponse<T = unknown> {
  success: boolean;
  command: string;
  /** ISO 8601 timestamp of when the response was generated */
  timestamp: string;
  data?: T;
  error?:
    | {
        code: string;
        message: string;
        /** Only in development */
        stack?: string | undefined;
      }
    | undefined;
  metadata?: Record<string, unknown> | undefined;
}

export function createSuccessResponse<T>(command: string, data: T, metadata?: Record<string, unknown>): CLIResponse<T> {
  const response: CLIResponse<T> = {
    success: true,
    command,
    timestamp: new Date().toISOString(),
    data,
  };

  if (metadata) {
    response.metadata = metadata;
  }

  return response;
}

export function createErrorResponse(command: string, error: Error, code: string): CLIResponse<never> {
  const errorObj: { code: string; message: string; stack?: string | undefined } = {
    code,
    message: error.message,
  };

  if (process.env['NODE_ENV'] === 'development' && error.stack) {
    errorObj.stack = error.stack;
  }

  return {
    success: false,
    command,
    timestamp: new Date().toISOString(),
    error: errorObj,
  };
}

export function exitCodeToErrorCode(exitCode: ExitCode): string {
  const codes: Record<number, string> = {
    1: 'GENERAL_ERROR',
    2: 'INVALID_ARGS',
    4: 'NOT_FOUND',
    8: 'VALIDATION_ERROR',
    11: 'CONFIG_ERROR',
  };
  return codes[exitCode] ?? 'UNKNOWN_ERROR';
}
