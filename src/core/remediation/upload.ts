// src/core/remediation/upload.ts
import { CatalogSession } from '../catalog/session.js';
import type { CatalogAdapter } from '../catalog/types.js';
import type { CheckpointStore } from '../checkpoint/index.js';
import { UPLOAD_REMEDIATION_ATTEMPTS } from '../config/constants.js';
import { sleep } from '../http.js';
import { logger } from '../logger.js';
import type { RecordMirror } from '../storage/mirror.js';
import type { RemediationSummary } from './types.js';

export interface UploadRemediationDeps {
  catalog: CatalogAdapter;
  mirror: RecordMirror;
  checkpoints: CheckpointStore;
}

export interface UploadRemediationOptions {
  delayMs: number;
}

/**
 * Re-mirrors every record in `failedUploadIds`.
 *
 * Keys are derived from the detail fetched now, not from the stored row, so a
 * record whose title changed upstream lands under its new keys. The set
 * written back is exactly what failed in this pass.
 */
export class UploadRemediation {
  constructor(
    private readonly deps: UploadRemediationDeps,
    private readonly options: UploadRemediationOptions
  ) {}

  async run(): Promise<RemediationSummary> {
    const { catalog, mirror, checkpoints } = this.deps;
    const startTime = Date.now();

    const checkpoint = await checkpoints.load();
    const ids = [...checkpoint.failedUploadIds].sort();
    if (ids.length === 0) {
      logger.info('remediation', 'No failed uploads recorded, nothing to do');
      return { total: 0, fixed: 0, dropped: 0, failed: 0, duration: 0, failures: [] };
    }

    logger.info('remediation', `Retrying ${ids.length} failed uploads against ${mirror.storeName}`);
    const session = new CatalogSession(catalog, checkpoint.credentialToken, async (token) => {
      checkpoint.credentialToken = token;
      await checkpoints.save(checkpoint);
    });

    const stillFailing = new Set<string>();
    const failures: RemediationSummary['failures'] = [];
    let fixed = 0;
    let dropped = 0;

    for (const [index, id] of ids.entries()) {
      if (index > 0) await sleep(this.options.delayMs);

      const result = await session.call(() => catalog.fetchDetail(id), UPLOAD_REMEDIATION_ATTEMPTS);
      switch (result.kind) {
        case 'retryable':
          stillFailing.add(id);
          failures.push({ id, error: result.message });
          break;
        case 'fatal':
          stillFailing.add(id);
          failures.push({ id, error: result.error.message });
          logger.error('remediation', `Detail for ${id} unavailable: ${result.error.message}`);
          break;
        case 'ok': {
          const detail = result.value;
          if (!detail) {
            dropped++;
            logger.warn('remediation', `Detail for ${id} is empty, dropping it from the queue`);
            break;
          }
          const mirrored = await mirror.mirror({
            externalId: id,
            title: detail.title,
            mediaList: detail.mediaList,
            coverUrl: detail.coverUrl,
          });
          if (mirrored) {
            fixed++;
            logger.info('remediation', `✓ ${id}`);
          } else {
            stillFailing.add(id);
            failures.push({ id, error: 'mirror failed' });
            logger.warn('remediation', `✗ ${id}`);
          }
          break;
        }
      }
    }

    checkpoint.failedUploadIds = stillFailing;
    await checkpoints.save(checkpoint);

    return {
      total: ids.length,
      fixed,
      dropped,
      failed: stillFailing.size,
      duration: Date.now() - startTime,
      failures,
    };
  }
}
