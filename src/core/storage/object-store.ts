// src/core/storage/object-store.ts
import {
  HeadObjectCommand,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
} from '@aws-sdk/client-s3';
import { ErrorCode, SyncError, describeError } from '../errors.js';
import { logger } from '../logger.js';
import { PLAYLIST_CONTENT_TYPE } from '../config/constants.js';
import type { ObjectStoreConfig } from '../config/env.js';
import type { MirrorTarget } from '../types/index.js';
import { MediaDownloader } from './download.js';
import { absolutizeSegments } from './playlist.js';

export interface ObjectStore {
  readonly name: string;
  exists(key: string): Promise<boolean>;
  putBlob(key: string, bytes: Uint8Array, contentType: string): Promise<void>;
  /** Downloads a playlist, absolutizes its segment lines and stores it at `key`. */
  putStream(key: string, sourceUrl: string): Promise<void>;
}

export function createS3Client(target: MirrorTarget, config: ObjectStoreConfig, readTimeoutMs: number): S3Client {
  return new S3Client({
    region: config.region,
    credentials: {
      accessKeyId: config.accessKeyId,
      secretAccessKey: config.secretAccessKey,
    },
    // OSS speaks the S3 protocol on its own endpoint with virtual-hosted buckets
    ...(target === 'oss' && config.endpoint ? { endpoint: config.endpoint, forcePathStyle: false } : {}),
    maxAttempts: 3,
    requestHandler: { requestTimeout: readTimeoutMs },
  });
}

export class S3ObjectStore implements ObjectStore {
  constructor(
    readonly name: string,
    private readonly client: S3Client,
    private readonly bucket: string,
    private readonly downloader: MediaDownloader
  ) {}

  async exists(key: string): Promise<boolean> {
    try {
      await this.client.send(new HeadObjectCommand({ Bucket: this.bucket, Key: key }));
      logger.debug('storage', `[${this.name}] exists: ${key}`);
      return true;
    } catch (error) {
      if (error instanceof S3ServiceException && (error.name === 'NotFound' || error.name === 'NoSuchKey' || error.$metadata.httpStatusCode === 404)) {
        return false;
      }
      // Treated as absent; the upload reports its own failure
      logger.error('storage', `[${this.name}] existence check failed for ${key}: ${describeError(error)}`);
      return false;
    }
  }

  async putBlob(key: string, bytes: Uint8Array, contentType: string): Promise<void> {
    try {
      await this.client.send(new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: bytes,
        ContentType: contentType,
      }));
    } catch (error) {
      throw new SyncError(ErrorCode.MIRROR_ERROR, `[${this.name}] upload of ${key} failed: ${describeError(error)}`, true);
    }
    logger.info('storage', `[${this.name}] uploaded ${key}`);
  }

  async putStream(key: string, sourceUrl: string): Promise<void> {
    let playlist: string;
    try {
      playlist = await this.downloader.text(sourceUrl);
    } catch (error) {
      throw new SyncError(ErrorCode.MIRROR_ERROR, `Playlist download failed: ${describeError(error)}`, true, undefined, { sourceUrl });
    }
    if (!playlist) {
      throw new SyncError(ErrorCode.MIRROR_ERROR, `Playlist at ${sourceUrl} is empty`, false, undefined, { sourceUrl });
    }

    const body = absolutizeSegments(playlist, sourceUrl);
    await this.putBlob(key, Buffer.from(body, 'utf-8'), PLAYLIST_CONTENT_TYPE);
  }
}
