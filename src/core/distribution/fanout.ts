// src/core/distribution/fanout.ts
import { logger } from '../logger.js';
import type { DistributionFailures, StoredRecord } from '../types/index.js';
import type { DistributionAdapter } from './types.js';

/**
 * Pushes `batch` to each domain in turn. A domain that could not be reached
 * is charged with every id in the batch; otherwise it is charged with exactly
 * the ids it rejected.
 */
export async function pushToDomains(
  distributor: DistributionAdapter,
  batch: StoredRecord[],
  domains: string[]
): Promise<DistributionFailures> {
  const failures: DistributionFailures = new Map();
  const batchIds = batch.map((record) => record.externalId);

  for (const domain of domains) {
    const result = await distributor.push(batch, domain);
    switch (result.kind) {
      case 'ok':
        failures.set(domain, result.value);
        break;
      case 'retryable':
      case 'fatal':
        logger.error('site', `Charging all ${batchIds.length} records to ${domain}`);
        failures.set(domain, new Set(batchIds));
        break;
    }
  }

  return failures;
}

export async function cleanAllSites(distributor: DistributionAdapter): Promise<Map<string, boolean>> {
  const results = new Map<string, boolean>();
  if (distributor.domains.length === 0) {
    logger.warn('site', 'No site domains configured, nothing to clean');
    return results;
  }

  for (const domain of distributor.domains) {
    results.set(domain, await distributor.cleanup(domain));
  }
  return results;
}
