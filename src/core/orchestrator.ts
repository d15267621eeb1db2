// src/core/orchestrator.ts
import { CatalogSession } from './catalog/session.js';
import type { CatalogAdapter } from './catalog/types.js';
import { CheckpointStore, countFailures, failuresFor, unionFailures } from './checkpoint/index.js';
import { pushToDomains } from './distribution/fanout.js';
import type { DistributionAdapter } from './distribution/types.js';
import { ErrorCode, SyncError, describeError, isSessionError, toSyncError } from './errors.js';
import { sleep } from './http.js';
import { logger } from './logger.js';
import type { RecordStore } from './records/types.js';
import type { RecordMirror } from './storage/mirror.js';
import { MAX_CREDENTIAL_REFRESHES } from './config/constants.js';
import type {
  CatalogItem,
  DistributionFailures,
  StoredRecord,
  SyncCheckpoint,
  SyncPhase,
  VideoDetail,
  VideoRecord,
} from './types/index.js';

export interface IngestionDeps {
  catalog: CatalogAdapter;
  records: RecordStore;
  mirror: RecordMirror;
  distributor: DistributionAdapter;
  checkpoints: CheckpointStore;
}

export interface IngestionOptions {
  pageSize: number;
  itemDelayMs: number;
  pageDelayMs: number;
}

export interface SyncReport {
  status: 'done' | 'aborted';
  startPage: number;
  lastPage: number;
  pagesProcessed: number;
  persisted: number;
  skipped: number;
  dropped: number;
  uploadFailures: number;
  distributionFailures: number;
  duration: number;
  error?: SyncError;
}

/** Work done on the current page that has not reached the checkpoint yet. */
interface PageProgress {
  persistedIds: string[];
  failedUploads: Set<string>;
}

export function buildRecord(item: CatalogItem, detail: VideoDetail): VideoRecord {
  return {
    externalId: item.externalId,
    title: item.title || detail.title,
    coverUrl: detail.coverUrl,
    mediaList: detail.mediaList,
    description: detail.description,
    totalEpisodes: item.totalEpisodes,
    freeEpisodes: detail.freeEpisodes,
    tags: item.tags,
    downloadUrl: detail.downloadUrl,
  };
}

/**
 * Drives catalog ingestion page by page:
 * fetch → dedupe → enrich → persist → mirror → distribute → checkpoint.
 *
 * `lastPage` only moves once a page's persistence and distribution outcomes
 * are in the checkpoint, so a crash costs at most one page of repeated detail
 * fetches, and those are deduplicated against the record store.
 */
export class IngestionOrchestrator {
  private phase: SyncPhase = 'idle';

  constructor(
    private readonly deps: IngestionDeps,
    private readonly options: IngestionOptions
  ) {}

  get currentPhase(): SyncPhase {
    return this.phase;
  }

  async run(): Promise<SyncReport> {
    const { catalog, checkpoints } = this.deps;
    const startTime = Date.now();

    const checkpoint = await checkpoints.load();
    const session = new CatalogSession(catalog, checkpoint.credentialToken, async (token) => {
      checkpoint.credentialToken = token;
      await checkpoints.save(checkpoint);
    });

    // The last completed page is scanned again: items can shift across page boundaries
    let page = Math.max(1, checkpoint.lastPage);
    logger.info('sync', checkpoint.lastPage === 0 ? 'Starting from page 1' : `Resuming at page ${page}`);

    const report: SyncReport = {
      status: 'done',
      startPage: page,
      lastPage: checkpoint.lastPage,
      pagesProcessed: 0,
      persisted: 0,
      skipped: 0,
      dropped: 0,
      uploadFailures: 0,
      distributionFailures: 0,
      duration: 0,
    };

    let finished = false;
    while (!finished) {
      this.phase = 'fetching_page';
      const listed = await session.call(
        () => catalog.listPage(page, this.options.pageSize),
        MAX_CREDENTIAL_REFRESHES + 1
      );

      switch (listed.kind) {
        case 'retryable':
        case 'fatal': {
          const error = listed.kind === 'fatal'
            ? listed.error
            : new SyncError(ErrorCode.TOKEN_EXPIRED, listed.message);
          report.error = error;
          this.phase = 'aborted';
          finished = true;
          logger.error('sync', `Page ${page} could not be fetched, stopping: ${error.message}`);
          break;
        }
        case 'ok': {
          if (listed.value.length === 0) {
            this.phase = 'done';
            finished = true;
            logger.info('sync', `Page ${page} is empty, catalog exhausted`);
            break;
          }

          const progress: PageProgress = { persistedIds: [], failedUploads: new Set() };
          try {
            await this.processItems(page, listed.value, session, progress, report);
          } catch (error) {
            report.error = toSyncError(error, ErrorCode.PERSISTENCE_ERROR);
            logger.error('sync', `Page ${page} aborted during ${this.phase}: ${report.error.message}`);
            this.phase = 'aborted';
            finished = true;
            await this.recordAbandonedPage(checkpoint, progress, report);
            break;
          }

          this.phase = 'distributing';
          const distributionFailures = await this.distribute(progress.persistedIds);

          this.phase = 'checkpointing';
          for (const id of progress.failedUploads) checkpoint.failedUploadIds.add(id);
          unionFailures(checkpoint.failedDistribution, distributionFailures);
          checkpoint.lastPage = page;
          await checkpoints.save(checkpoint);

          report.pagesProcessed++;
          report.lastPage = page;
          report.uploadFailures += progress.failedUploads.size;
          report.distributionFailures += countFailures(distributionFailures);
          logger.info('sync', `Page ${page} checkpointed`);

          page++;
          await sleep(this.options.pageDelayMs);
          break;
        }
      }
    }

    report.status = report.error ? 'aborted' : 'done';
    report.duration = Date.now() - startTime;
    return report;
  }

  private async processItems(
    page: number,
    items: CatalogItem[],
    session: CatalogSession,
    progress: PageProgress,
    report: SyncReport
  ): Promise<void> {
    const { catalog, records, mirror } = this.deps;
    logger.info('sync', `Page ${page}: ${items.length} items`);

    for (const item of items) {
      const { externalId, title } = item;

      this.phase = 'enriching_item';
      if (await records.exists(externalId)) {
        report.skipped++;
        logger.info('sync', `Already stored, skipping '${title}' (${externalId})`);
        continue;
      }

      const detailed = await session.call(
        () => catalog.fetchDetail(externalId),
        MAX_CREDENTIAL_REFRESHES + 1
      );
      let detail: VideoDetail | null = null;
      switch (detailed.kind) {
        case 'ok':
          detail = detailed.value;
          break;
        case 'retryable':
          throw new SyncError(ErrorCode.TOKEN_EXPIRED, detailed.message);
        case 'fatal':
          if (isSessionError(detailed.error)) {
            throw detailed.error;
          }
          this.drop(report, externalId, detailed.error);
          continue;
      }
      if (!detail) {
        this.drop(report, externalId, new SyncError(ErrorCode.DATA_QUALITY, `Detail for ${externalId} is empty`));
        continue;
      }

      this.phase = 'persisting';
      const record = buildRecord(item, detail);
      if (!(await records.insert(record))) {
        this.drop(report, externalId, new SyncError(ErrorCode.PERSISTENCE_ERROR, `Could not persist ${externalId}`));
        continue;
      }
      progress.persistedIds.push(externalId);
      report.persisted++;

      this.phase = 'mirroring';
      if (!(await mirror.mirror(record))) {
        progress.failedUploads.add(externalId);
        logger.warn('sync', `Queued ${externalId} for upload remediation`);
      }

      await sleep(this.options.itemDelayMs);
    }
  }

  /** Items dropped here are not queued for remediation. */
  private drop(report: SyncReport, externalId: string, error: SyncError): void {
    report.dropped++;
    logger.warn('sync', `Dropping ${externalId} [${error.code}]: ${error.message}`);
  }

  private async distribute(ids: string[]): Promise<DistributionFailures> {
    const { records, distributor } = this.deps;

    if (ids.length === 0) {
      logger.info('sync', 'No new records on this page to distribute');
      return new Map();
    }
    if (distributor.domains.length === 0) {
      logger.warn('sync', 'No site domains configured, skipping distribution');
      return new Map();
    }

    let batch: StoredRecord[];
    try {
      batch = await records.fetchMany(ids);
    } catch (error) {
      logger.error('sync', `Could not reload ${ids.length} records for distribution: ${describeError(error)}`);
      return failuresFor(distributor.domains, ids);
    }
    if (batch.length === 0) {
      logger.error('sync', `None of ${ids.length} persisted records could be reloaded`);
      return failuresFor(distributor.domains, ids);
    }

    logger.info('sync', `Distributing ${batch.length} records to ${distributor.domains.length} domains`);
    const failures = await pushToDomains(distributor, batch, distributor.domains);

    const reloaded = new Set(batch.map((record) => record.externalId));
    const missing = ids.filter((id) => !reloaded.has(id));
    if (missing.length > 0) {
      logger.warn('sync', `Records missing on reload, charged to every domain: ${missing.join(', ')}`);
      unionFailures(failures, failuresFor(distributor.domains, missing));
    }
    return failures;
  }

  /**
   * Keeps what a half-processed page already did: its mirror failures and,
   * since persisted records will be skipped on the rescan, its undistributed
   * records. `lastPage` stays where it was.
   */
  private async recordAbandonedPage(
    checkpoint: SyncCheckpoint,
    progress: PageProgress,
    report: SyncReport
  ): Promise<void> {
    if (progress.persistedIds.length === 0 && progress.failedUploads.size === 0) {
      return;
    }

    const undistributed = failuresFor(this.deps.distributor.domains, progress.persistedIds);
    for (const id of progress.failedUploads) checkpoint.failedUploadIds.add(id);
    unionFailures(checkpoint.failedDistribution, undistributed);
    report.uploadFailures += progress.failedUploads.size;
    report.distributionFailures += countFailures(undistributed);

    try {
      await this.deps.checkpoints.save(checkpoint);
    } catch (error) {
      logger.error('checkpoint', `Could not record the abandoned page: ${describeError(error)}`);
    }
  }
}
