// src/core/remediation/distribution.ts
import { countFailures, type CheckpointStore } from '../checkpoint/index.js';
import type { DistributionAdapter } from '../distribution/types.js';
import { describeError } from '../errors.js';
import { logger } from '../logger.js';
import type { RecordStore } from '../records/types.js';
import type { DistributionFailures, StoredRecord } from '../types/index.js';
import type { RemediationSummary } from './types.js';

export interface DistributionRemediationDeps {
  records: RecordStore;
  distributor: DistributionAdapter;
  checkpoints: CheckpointStore;
}

/**
 * Re-pushes each domain's failed ids to that domain only, reloading the rows
 * from the record store. The outcome replaces the domain's entry rather than
 * adding to it, so ids a site has since accepted leave the checkpoint.
 */
export class DistributionRemediation {
  constructor(private readonly deps: DistributionRemediationDeps) {}

  async run(): Promise<RemediationSummary> {
    const { checkpoints } = this.deps;
    const startTime = Date.now();

    const checkpoint = await checkpoints.load();
    const pending = countFailures(checkpoint.failedDistribution);
    if (pending === 0) {
      logger.info('remediation', 'No failed distributions recorded, nothing to do');
      return { total: 0, fixed: 0, dropped: 0, failed: 0, duration: 0, failures: [] };
    }

    const next: DistributionFailures = new Map();
    const failures: RemediationSummary['failures'] = [];
    let dropped = 0;

    for (const domain of [...checkpoint.failedDistribution.keys()].sort()) {
      const previous = checkpoint.failedDistribution.get(domain);
      if (!previous || previous.size === 0) continue;

      const outcome = await this.redrive(domain, previous);
      dropped += outcome.dropped;
      if (outcome.remaining.size > 0) {
        next.set(domain, outcome.remaining);
        for (const id of outcome.remaining) {
          failures.push({ id: `${domain} ${id}`, error: outcome.error ?? 'rejected by site' });
        }
      }
    }

    checkpoint.failedDistribution = next;
    await checkpoints.save(checkpoint);

    const failed = countFailures(next);
    return {
      total: pending,
      fixed: pending - failed - dropped,
      dropped,
      failed,
      duration: Date.now() - startTime,
      failures,
    };
  }

  private async redrive(
    domain: string,
    previous: Set<string>
  ): Promise<{ remaining: Set<string>; dropped: number; error?: string }> {
    const { records, distributor } = this.deps;
    const ids = [...previous].sort();
    logger.info('remediation', `Re-pushing ${ids.length} records to ${domain}`);

    let batch: StoredRecord[];
    try {
      batch = await records.fetchMany(ids);
    } catch (error) {
      logger.error('remediation', `Could not reload records for ${domain}: ${describeError(error)}`);
      return { remaining: new Set(previous), dropped: 0, error: 'records unavailable' };
    }
    if (batch.length === 0) {
      logger.error('remediation', `None of the ${ids.length} records for ${domain} could be reloaded, keeping them queued`);
      return { remaining: new Set(previous), dropped: 0, error: 'records unavailable' };
    }

    const reloaded = new Set(batch.map((record) => record.externalId));
    const missing = ids.filter((id) => !reloaded.has(id));
    if (missing.length > 0) {
      logger.warn('remediation', `No longer in the record store, dropping for ${domain}: ${missing.join(', ')}`);
    }

    const result = await distributor.push(batch, domain);
    switch (result.kind) {
      case 'ok':
        logger.info(
          'remediation',
          result.value.size === 0
            ? `✓ ${domain} accepted all ${batch.length} records`
            : `✗ ${domain} rejected ${result.value.size} of ${batch.length} records`
        );
        return { remaining: result.value, dropped: missing.length };
      case 'retryable':
        return { remaining: new Set(reloaded), dropped: missing.length, error: result.message };
      case 'fatal':
        logger.error('remediation', `✗ ${domain}: ${result.error.message}`);
        return { remaining: new Set(reloaded), dropped: missing.length, error: result.error.message };
    }
  }
}
