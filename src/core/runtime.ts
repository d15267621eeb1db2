// src/core/runtime.ts
import type { S3Client } from '@aws-sdk/client-s3';
import type { Dispatcher } from 'undici';
import { KeyDeriver } from './address/key-deriver.js';
import { HttpCatalogClient } from './catalog/client.js';
import { CheckpointStore } from './checkpoint/index.js';
import { requireObjectStore, type AppConfig } from './config/env.js';
import { SiteDistributor } from './distribution/site.js';
import { describeError } from './errors.js';
import { createDispatcher } from './http.js';
import { logger } from './logger.js';
import { MysqlRecordStore } from './records/mysql.js';
import { MediaDownloader } from './storage/download.js';
import { AssetMirror } from './storage/mirror.js';
import { S3ObjectStore, createS3Client } from './storage/object-store.js';
import type { MirrorTarget } from './types/index.js';

/**
 * Builds adapters from config on first use and releases them in `close()`.
 * Commands only pay for the connections they touch.
 */
export class Runtime {
  private readonly dispatchers: Dispatcher[] = [];
  private readonly s3Clients: S3Client[] = [];
  private recordStore?: MysqlRecordStore;
  private catalogClient?: HttpCatalogClient;
  private siteDistributor?: SiteDistributor;
  private checkpointStore?: CheckpointStore;

  constructor(readonly config: AppConfig) {}

  get catalog(): HttpCatalogClient {
    if (!this.catalogClient) {
      const { catalog } = this.config;
      this.catalogClient = new HttpCatalogClient({
        baseUrl: catalog.baseUrl,
        loginPath: catalog.loginPath,
        listPath: catalog.listPath,
        detailPath: catalog.detailPath,
        credentials: catalog.credentials,
        tokenHeader: catalog.tokenHeader,
        referer: catalog.referer || undefined,
        origin: catalog.origin || undefined,
        userAgent: catalog.userAgent,
        dispatcher: this.track(createDispatcher({
          connectTimeoutMs: catalog.connectTimeoutMs,
          readTimeoutMs: catalog.readTimeoutMs,
        })),
      });
    }
    return this.catalogClient;
  }

  get records(): MysqlRecordStore {
    if (!this.recordStore) {
      this.recordStore = MysqlRecordStore.fromConfig(this.config.database);
    }
    return this.recordStore;
  }

  get distributor(): SiteDistributor {
    if (!this.siteDistributor) {
      const { sites } = this.config;
      this.siteDistributor = new SiteDistributor({
        domains: sites.domains,
        apiToken: sites.apiToken,
        syncPath: sites.syncPath,
        cleanPath: sites.cleanPath,
        dispatcher: this.track(createDispatcher({
          connectTimeoutMs: sites.timeoutMs,
          readTimeoutMs: sites.timeoutMs,
        })),
      });
    }
    return this.siteDistributor;
  }

  get checkpoints(): CheckpointStore {
    if (!this.checkpointStore) {
      this.checkpointStore = new CheckpointStore(this.config.checkpointPath);
    }
    return this.checkpointStore;
  }

  /** A mirror bound to one object store; throws CONFIG_INVALID if that store is not configured. */
  mirror(target: MirrorTarget = this.config.mirror.target): AssetMirror {
    const storeConfig = requireObjectStore(this.config, target);
    const client = createS3Client(target, storeConfig, this.config.objectReadTimeoutMs);
    this.s3Clients.push(client);

    const downloader = new MediaDownloader(this.track(createDispatcher({
      connectTimeoutMs: this.config.catalog.connectTimeoutMs,
      readTimeoutMs: this.config.objectReadTimeoutMs,
    })));
    const store = new S3ObjectStore(target, client, storeConfig.bucket, downloader);
    const keys = new KeyDeriver(this.config.mirror.keySecret, this.config.mirror.keyPrefix);

    return new AssetMirror(store, keys, downloader, { skipExisting: this.config.mirror.skipExisting });
  }

  /** Releases everything opened so far; a resource that fails to close does not keep the rest open. */
  async close(): Promise<void> {
    for (const client of this.s3Clients) {
      client.destroy();
    }
    const closing = await Promise.allSettled([
      ...(this.recordStore ? [this.recordStore.close()] : []),
      ...this.dispatchers.map((dispatcher) => dispatcher.close()),
    ]);
    for (const result of closing) {
      if (result.status === 'rejected') {
        logger.warn('cli', `Could not release a connection: ${describeError(result.reason)}`);
      }
    }
  }

  private track(dispatcher: Dispatcher): Dispatcher {
    this.dispatchers.push(dispatcher);
    return dispatcher;
  }
}
