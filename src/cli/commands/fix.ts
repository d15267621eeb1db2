// src/cli/commands/fix.ts
import { Command } from 'commander';
import { DistributionRemediation } from '../../core/remediation/distribution.js';
import { UploadRemediation } from '../../core/remediation/upload.js';
import type { MirrorTarget } from '../../core/types/index.js';
import { runCommand, type GlobalOptions, type RuntimeFactory } from '../run.js';
import { printRemediationSummary } from '../summary.js';

function registerUploadFix(program: Command, target: MirrorTarget, createRuntime?: RuntimeFactory): void {
  program
    .command(`${target}_fix`)
    .description(`Retry failed uploads against the ${target.toUpperCase()} object store`)
    .action(async () => {
      await runCommand(`Upload remediation (${target})`, program.opts<GlobalOptions>(), async (runtime) => {
        const remediation = new UploadRemediation(
          {
            catalog: runtime.catalog,
            mirror: runtime.mirror(target),
            checkpoints: runtime.checkpoints,
          },
          { delayMs: runtime.config.delays.remediationMs }
        );
        printRemediationSummary('Uploads', await remediation.run());
        return true;
      }, createRuntime);
    });
}

export function registerFixCommands(program: Command, createRuntime?: RuntimeFactory): void {
  registerUploadFix(program, 'oss', createRuntime);
  registerUploadFix(program, 's3', createRuntime);

  program
    .command('site_fix')
    .description('Re-push records that downstream sites failed to accept')
    .action(async () => {
      await runCommand('Distribution remediation', program.opts<GlobalOptions>(), async (runtime) => {
        const remediation = new DistributionRemediation({
          records: runtime.records,
          distributor: runtime.distributor,
          checkpoints: runtime.checkpoints,
        });
        printRemediationSummary('Distributions', await remediation.run());
        return true;
      }, createRuntime);
    });
}
