// src/cli/summary.ts
import type { SyncReport } from '../core/orchestrator.js';
import type { RemediationSummary } from '../core/remediation/types.js';

const RULE = '━'.repeat(50);

function seconds(ms: number): string {
  return `${(ms / 1000).toFixed(1)}s`;
}

export function printSyncReport(report: SyncReport, checkpointPath: string): void {
  console.log('\n' + RULE);
  console.log(
    `Summary: ${report.persisted} stored, ${report.skipped} skipped, ${report.dropped} dropped, ` +
      `pages ${report.startPage}-${report.lastPage} (${report.pagesProcessed} checkpointed), ${seconds(report.duration)}`
  );
  console.log(
    `Queued for remediation: ${report.uploadFailures} uploads, ${report.distributionFailures} distributions`
  );
  if (report.error) {
    console.log(`\nAborted: ${report.error.message}`);
    if (report.error.suggestion) {
      console.log(`  ${report.error.suggestion}`);
    }
  }
  console.log(`Checkpoint: ${checkpointPath}`);
}

export function printRemediationSummary(label: string, summary: RemediationSummary): void {
  console.log('\n' + RULE);
  console.log(
    `${label}: ${summary.fixed} fixed, ${summary.dropped} dropped, ${summary.failed} still failing, ${seconds(summary.duration)}`
  );

  if (summary.failures.length > 0) {
    console.log('\nStill failing:');
    summary.failures.forEach(({ id, error }) => {
      console.log(`  - ${id}: ${error}`);
    });
  }
}

export function printCleanResults(results: Map<string, boolean>): void {
  console.log('\n' + RULE);
  for (const [domain, cleaned] of results) {
    console.log(`${cleaned ? '✓' : '✗'} ${domain}`);
  }
}
