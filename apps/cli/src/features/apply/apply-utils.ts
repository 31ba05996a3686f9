// Pure helpers for the apply command

import {
  ConfigurationError,
  MissingColumnError,
  SerializationError,
  SheetNotFoundError,
  TemplateFieldError,
  UnknownRuleError,
  UnsupportedFormatError,
} from '@burnish/pipeline';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import type { z } from 'zod';

import { ExitCodes, type ExitCode } from '../shared/exit-codes.js';
import type { ApplyCommandOptionsSchema } from '../shared/schemas.js';

export type ApplyCommandOptions = z.infer<typeof ApplyCommandOptionsSchema>;

export type ApplyHandlerParams =
  | {
      mode: 'single';
      rulesFile: string;
      inputFile: string;
      outputFile?: string | undefined;
      sheetName?: string | undefined;
    }
  | {
      mode: 'batch';
      rulesFile: string;
      pattern: string;
      maxWorkers?: number | undefined;
      sheetName?: string | undefined;
    };

const GLOB_MAGIC = /[*?[\]{}]/;

export function hasGlobMagic(pattern: string): boolean {
  return GLOB_MAGIC.test(pattern);
}

/**
 * A plain path runs the pipeline on one file; anything with glob syntax
 * fans out over every match.
 */
export function buildApplyParams(pattern: string, options: ApplyCommandOptions): Result<ApplyHandlerParams, Error> {
  if (!hasGlobMagic(pattern)) {
    if (options.workers !== undefined) {
      return err(new Error('--workers only applies to glob patterns'));
    }
    return ok({
      mode: 'single',
      rulesFile: options.rules,
      inputFile: pattern,
      outputFile: options.output,
      sheetName: options.sheet,
    });
  }

  if (options.output !== undefined) {
    return err(new Error('--output cannot be combined with a glob pattern; outputs are named after each input'));
  }
  return ok({
    mode: 'batch',
    rulesFile: options.rules,
    pattern,
    maxWorkers: options.workers,
    sheetName: options.sheet,
  });
}

function isNotFound(error: Error): boolean {
  return 'code' in error && error.code === 'ENOENT';
}

export function exitCodeForError(error: Error): ExitCode {
  if (isNotFound(error) || error instanceof SheetNotFoundError) {
    return ExitCodes.NOT_FOUND;
  }
  if (error instanceof MissingColumnError || error instanceof TemplateFieldError) {
    return ExitCodes.VALIDATION_ERROR;
  }
  if (
    error instanceof ConfigurationError ||
    error instanceof SerializationError ||
    error instanceof UnknownRuleError ||
    error instanceof UnsupportedFormatError
  ) {
    return ExitCodes.CONFIG_ERROR;
  }
  return ExitCodes.GENERAL_ERROR;
}
