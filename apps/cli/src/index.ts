#!/usr/bin/env node
import { getLogger } from '@burnish/logger';
import { Command } from 'commander';

import { registerApplyCommand } from './features/apply/apply.js';
import { registerInspectCommand } from './features/inspect/inspect.js';

const logger = getLogger('CLI');
const program = new Command();

async function main() {
  program.name('burnish').description('Normalize CSV and spreadsheet files with saved rule pipelines').version('0.1.0');

  registerApplyCommand(program);
  registerInspectCommand(program);

  await program.parseAsync();
}

process.on('unhandledRejection', (reason) => {
  logger.error(`Unhandled Rejection: ${String(reason)}`);
  process.exit(1);
});

process.on('uncaughtException', (error) => {
  logger.error(`Uncaught Exception: ${error.message}`);
  process.exit(1);
});

main().catch((error: unknown) => {
  logger.error(`CLI failed: ${String(error)}`);
  process.exit(1);
});
