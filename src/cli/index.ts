#!/usr/bin/env node

import { Command } from 'commander';
import { config as loadDotenv } from 'dotenv';
import { APP_NAME } from '../core/config/constants.js';
import { registerCleanCommand } from './commands/clean.js';
import { registerFixCommands } from './commands/fix.js';
import { registerKeyCommand } from './commands/key.js';
import { registerScrapeCommand } from './commands/scrape.js';
import { reportError } from './run.js';

export function buildProgram(): Command {
  const program = new Command();

  program
    .name(APP_NAME)
    .description('Sync a remote video catalog into MySQL, object storage and downstream sites')
    .version('1.0.0')
    .option('--verbose', 'Debug logging', false);

  registerScrapeCommand(program);
  registerFixCommands(program);
  registerCleanCommand(program);
  registerKeyCommand(program);

  return program;
}

export async function runCli(argv: string[] = process.argv): Promise<void> {
  loadDotenv();
  const program = buildProgram();
  await program.parseAsync(argv);
}

if (process.env.NODE_ENV !== 'test') {
  runCli().catch((error: unknown) => {
    reportError(error);
    process.exit(1);
  });
}
