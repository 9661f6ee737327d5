#!/usr/bin/env node
import './config'; // Must be the first import
import { Command } from 'commander';
import { analyzeCommand } from './commands';
import { logger } from './utils/logger';
import { getServiceVersion, shutdown } from './utils/otel_provider';

async function main() {
  const program = new Command();

  program
    .name('lookml-table-provenance')
    .description('Resolves which warehouse tables every LookML view reads from, and how')
    .version(getServiceVersion())
    .addCommand(analyzeCommand);

  try {
    await program.parseAsync(process.argv);
  } finally {
    await shutdown();
  }
}

main().catch((error: unknown) => {
  logger.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
