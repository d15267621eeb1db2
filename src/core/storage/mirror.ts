// src/core/storage/mirror.ts
import type { KeyDeriver } from '../address/key-deriver.js';
import { describeError } from '../errors.js';
import { logger } from '../logger.js';
import { DEFAULT_COVER_CONTENT_TYPE, PLAYLIST_FILENAME } from '../config/constants.js';
import type { VideoRecord } from '../types/index.js';
import type { Downloaded } from './download.js';
import type { ObjectStore } from './object-store.js';

export type MirrorSource = Pick<VideoRecord, 'externalId' | 'title' | 'mediaList' | 'coverUrl'>;

export interface BlobSource {
  bytes(url: string): Promise<Downloaded>;
}

/** What the ingestion loop and upload remediation need from a mirror. */
export interface RecordMirror {
  readonly storeName: string;
  mirror(record: MirrorSource): Promise<boolean>;
}

export interface MirrorOptions {
  /** Leave objects that are already in the store untouched. */
  skipExisting: boolean;
}

/**
 * Copies one record's playlists and cover into the object store.
 *
 * Success is all-or-nothing per record: the caller learns only whether every
 * upload landed, not which one failed.
 */
export class AssetMirror implements RecordMirror {
  constructor(
    private readonly store: ObjectStore,
    private readonly keys: KeyDeriver,
    private readonly covers: BlobSource,
    private readonly options: MirrorOptions
  ) {}

  get storeName(): string {
    return this.store.name;
  }

  async mirror(record: MirrorSource): Promise<boolean> {
    const { externalId, title } = record;
    logger.info('storage', `Mirroring '${title}' (${externalId}) to ${this.store.name}`);

    try {
      for (const [index, locator] of record.mediaList.entries()) {
        const episode = index + 1;
        if (!locator) {
          logger.warn('storage', `Skipping empty media locator for ${externalId} episode ${episode}`);
          continue;
        }
        const key = `${this.keys.derive(title, externalId, 'mediaSegment', episode)}/${PLAYLIST_FILENAME}`;
        if (await this.alreadyStored(key)) continue;
        await this.store.putStream(key, locator);
      }

      const coverKey = this.keys.derive(title, externalId, 'cover');
      if (!(await this.alreadyStored(coverKey))) {
        const cover = await this.covers.bytes(record.coverUrl);
        await this.store.putBlob(coverKey, cover.bytes, cover.contentType ?? DEFAULT_COVER_CONTENT_TYPE);
      }
    } catch (error) {
      logger.error('storage', `Mirroring ${externalId} failed: ${describeError(error)}`);
      return false;
    }

    logger.info('storage', `Mirrored '${title}' (${externalId})`);
    return true;
  }

  private async alreadyStored(key: string): Promise<boolean> {
    if (!this.options.skipExisting) return false;
    const exists = await this.store.exists(key);
    if (exists) {
      logger.debug('storage', `Already stored, skipping ${key}`);
    }
    return exists;
  }
}
