import { getErrorMessage, Pipeline } from '@burnish/pipeline';
import type { Command } from 'commander';
import type { Result } from 'neverthrow';
import pc from 'picocolors';

import { ExitCodes } from '../shared/exit-codes.js';
import { OutputManager } from '../shared/output.js';
import { ApplyCommandOptionsSchema } from '../shared/schemas.js';

import { buildApplyParams, exitCodeForError, type ApplyHandlerParams } from './apply-utils.js';

interface ApplyCommandResult {
  pipeline: string;
  uid: string;
  outputs: string[];
}

export function registerApplyCommand(program: Command): void {
  program
    .command('apply')
    .description('Run a saved rule pipeline over a table file or a glob of files')
    .argument('<pattern>', 'Input file, or a glob pattern such as "exports/*.csv"')
    .requiredOption('-r, --rules <file>', 'Pipeline rules file written by export')
    .option('-o, --output <file>', 'Output file (single input only); defaults to the input name with a suffix')
    .option('-w, --workers <count>', 'Files processed concurrently (glob patterns only)')
    .option('-s, --sheet <name>', 'Sheet to read from spreadsheet inputs')
    .option('--json', 'Output results in JSON format')
    .action(async (pattern: string, rawOptions: unknown) => {
      await executeApplyCommand(pattern, rawOptions);
    });
}

async function executeApplyCommand(pattern: string, rawOptions: unknown): Promise<void> {
  const isJsonMode =
    typeof rawOptions === 'object' && rawOptions !== null && 'json' in rawOptions && rawOptions.json === true;
  const output: OutputManager = new OutputManager(isJsonMode ? 'json' : 'text');

  const parseResult = ApplyCommandOptionsSchema.safeParse(rawOptions);
  if (!parseResult.success) {
    const firstError = parseResult.error.issues[0];
    output.error('apply', new Error(firstError?.message ?? 'Invalid options'), ExitCodes.INVALID_ARGS);
  }

  const paramsResult = buildApplyParams(pattern, parseResult.data);
  if (paramsResult.isErr()) {
    output.error('apply', paramsResult.error, ExitCodes.INVALID_ARGS);
  }
  const params = paramsResult.value;

  output.intro('burnish apply');

  const pipelineResult = await Pipeline.loadFromFile(params.rulesFile);
  if (pipelineResult.isErr()) {
    const error = pipelineResult.error;
    output.error(
      'apply',
      new Error(`Could not load ${params.rulesFile}: ${getErrorMessage(error)}`),
      exitCodeForError(error)
    );
  }
  const pipeline = pipelineResult.value;
  output.info(`Loaded ${pipeline.toString()}`);

  const outputsResult = await runPipeline(pipeline, params);
  if (outputsResult.isErr()) {
    output.error('apply', outputsResult.error, exitCodeForError(outputsResult.error));
  }
  const outputs = outputsResult.value;

  const result: ApplyCommandResult = { pipeline: pipeline.name, uid: pipeline.uid, outputs };
  if (output.isJsonMode()) {
    output.json('apply', result);
    return;
  }

  if (outputs.length === 0) {
    output.warn(`No files matched ${pattern}`);
  } else {
    output.note(outputs.join('\n'), 'Written');
  }
  output.outro(pc.green(`Normalized ${outputs.length} file${outputs.length === 1 ? '' : 's'}`));
}

async function runPipeline(pipeline: Pipeline, params: ApplyHandlerParams): Promise<Result<string[], Error>> {
  if (params.mode === 'single') {
    const written = await pipeline.apply(params.inputFile, params.outputFile, { sheetName: params.sheetName });
    return written.map((file) => [file]);
  }
  return pipeline.applyAll(params.pattern, { maxWorkers: params.maxWorkers, sheetName: params.sheetName });
}
