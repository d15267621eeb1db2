// src/cli/commands/scrape.ts
import { Command } from 'commander';
import { IngestionOrchestrator } from '../../core/orchestrator.js';
import { runCommand, type GlobalOptions, type RuntimeFactory } from '../run.js';
import { printSyncReport } from '../summary.js';

export function registerScrapeCommand(program: Command, createRuntime?: RuntimeFactory): void {
  program
    .command('scraper')
    .description('Ingest the catalog page by page, resuming from the checkpoint')
    .action(async () => {
      await runCommand('Catalog sync', program.opts<GlobalOptions>(), async (runtime) => {
        const { config } = runtime;
        const orchestrator = new IngestionOrchestrator(
          {
            catalog: runtime.catalog,
            records: runtime.records,
            mirror: runtime.mirror(),
            distributor: runtime.distributor,
            checkpoints: runtime.checkpoints,
          },
          {
            pageSize: config.catalog.pageSize,
            itemDelayMs: config.delays.itemMs,
            pageDelayMs: config.delays.pageMs,
          }
        );

        const report = await orchestrator.run();
        printSyncReport(report, runtime.checkpoints.path);
        return report.status === 'done';
      }, createRuntime);
    });
}
