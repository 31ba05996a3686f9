import { getErrorMessage, Pipeline } from '@burnish/pipeline';
import type { Command } from 'commander';

import { exitCodeForError } from '../apply/apply-utils.js';
import { ExitCodes } from '../shared/exit-codes.js';
import { OutputManager } from '../shared/output.js';
import { InspectCommandOptionsSchema } from '../shared/schemas.js';

import { describeEnvelope, formatSummary } from './inspect-utils.js';

export function registerInspectCommand(program: Command): void {
  program
    .command('inspect')
    .description('List the rules in a saved pipeline file')
    .argument('<rules-file>', 'Pipeline rules file written by export')
    .option('--json', 'Output results in JSON format')
    .action(async (rulesFile: string, rawOptions: unknown) => {
      await executeInspectCommand(rulesFile, rawOptions);
    });
}

async function executeInspectCommand(rulesFile: string, rawOptions: unknown): Promise<void> {
  const parseResult = InspectCommandOptionsSchema.safeParse(rawOptions);
  const output: OutputManager = new OutputManager(parseResult.success && parseResult.data.json ? 'json' : 'text');
  if (!parseResult.success) {
    output.error('inspect', new Error(parseResult.error.issues[0]?.message ?? 'Invalid options'), ExitCodes.INVALID_ARGS);
  }

  const pipelineResult = await Pipeline.loadFromFile(rulesFile);
  if (pipelineResult.isErr()) {
    const error = pipelineResult.error;
    output.error('inspect', new Error(`Could not load ${rulesFile}: ${getErrorMessage(error)}`), exitCodeForError(error));
  }

  const summary = describeEnvelope(pipelineResult.value.export());
  if (output.isJsonMode()) {
    output.json('inspect', summary);
    return;
  }

  output.intro('burnish inspect');
  output.note(formatSummary(summary), `${summary.name} (${summary.ruleCount} rules)`);
  output.outro(`uid ${summary.uid}`);
}
