import { getLogger } from '@burnish/logger';
import * as p from '@clack/prompts';
import pc from 'picocolors';

import { createErrorResponse, createSuccessResponse, exitCodeToErrorCode } from './cli-response.js';
import { ExitCodes, type ExitCode } from './exit-codes.js';

const logger = getLogger('output');

export type OutputFormat = 'json' | 'text';

/**
 * Formats CLI output as human-readable text or as a JSON response.
 */
export class OutputManager {
  private startTime: number = Date.now();

  constructor(private format: OutputFormat = 'text') {}

  isJsonMode(): boolean {
    return this.format === 'json';
  }

  isTextMode(): boolean {
    return this.format === 'text';
  }

  /**
   * Output a success response (JSON mode only).
   */
  json<T>(command: string, data: T, metadata?: Record<string, unknown>): void {
    if (this.format === 'json') {
      const response = createSuccessResponse(command, data, {
        duration_ms: Date.now() - this.startTime,
        ...metadata,
      });
      console.log(JSON.stringify(response, undefined, 2));
    }
  }

  /**
   * Output an error response and exit.
   */
  error(command: string, error: Error, exitCode: ExitCode = ExitCodes.GENERAL_ERROR): never {
    const errorCode = exitCodeToErrorCode(exitCode);

    if (this.format === 'json') {
      // stdout, so callers can parse the response
      console.log(JSON.stringify(createErrorResponse(command, error, errorCode), undefined, 2));
    } else {
      this.displayTextError(error, errorCode);
    }

    process.exit(exitCode);
  }

  intro(message: string): void {
    if (this.format === 'text') {
      p.intro(pc.bgCyan(pc.black(` ${message} `)));
    }
  }

  outro(message: string): void {
    if (this.format === 'text') {
      p.outro(message);
    }
  }

  note(message: string, title?: string): void {
    if (this.format === 'text') {
      p.note(message, title);
    }
  }

  info(message: string): void {
    if (this.format === 'text') {
      p.log.info(message);
    }
  }

  warn(message: string): void {
    if (this.format === 'text') {
      p.log.warn(pc.yellow(message));
    } else {
      logger.warn(message);
    }
  }

  private displayTextError(error: Error, code: string): void {
    p.log.error(`${pc.red('Error')}: ${error.message}`);

    if (code === 'INVALID_ARGS') {
      p.note('Check your command arguments and try again.\nRun with --help for usage information.', 'Tip');
    } else if (code === 'CONFIG_ERROR') {
      p.note('Check the rules file. Run `burnish inspect <rules-file>` to see what it contains.', 'Tip');
    }

    if (process.env['NODE_ENV'] === 'development' && error.stack) {
      logger.debug(`Stack trace:\n${error.stack}`);
    }
  }
}
