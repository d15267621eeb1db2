// src/cli/commands/clean.ts
import { Command } from 'commander';
import { cleanAllSites } from '../../core/distribution/fanout.js';
import { runCommand, type GlobalOptions, type RuntimeFactory } from '../run.js';
import { printCleanResults } from '../summary.js';

export function registerCleanCommand(program: Command, createRuntime?: RuntimeFactory): void {
  program
    .command('site_clean')
    .description('Ask every configured site to run its cleanup job')
    .action(async () => {
      await runCommand('Site cleanup', program.opts<GlobalOptions>(), async (runtime) => {
        printCleanResults(await cleanAllSites(runtime.distributor));
        // A site that failed to clean is reported, not an abort
        return true;
      }, createRuntime);
    });
}
