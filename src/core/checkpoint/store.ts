// src/core/checkpoint/store.ts
import * as path from 'path';
import * as fs from 'fs/promises';
import { existsSync } from 'fs';
import { ErrorCode, SyncError, describeError } from '../errors.js';
import { logger } from '../logger.js';
import type { SyncCheckpoint } from '../types/index.js';
import { CheckpointFileSchema, type CheckpointFile } from './types.js';

export function emptyCheckpoint(): SyncCheckpoint {
  return {
    lastPage: 0,
    failedUploadIds: new Set(),
    failedDistribution: new Map(),
  };
}

export function toCheckpointFile(checkpoint: SyncCheckpoint): CheckpointFile {
  const failedDistribution: Record<string, string[]> = {};
  for (const domain of [...checkpoint.failedDistribution.keys()].sort()) {
    const ids = checkpoint.failedDistribution.get(domain);
    if (ids && ids.size > 0) {
      failedDistribution[domain] = [...ids].sort();
    }
  }

  return {
    lastPage: checkpoint.lastPage,
    credentialToken: checkpoint.credentialToken ?? null,
    failedUploadIds: [...checkpoint.failedUploadIds].sort(),
    failedDistribution,
  };
}

export function fromCheckpointFile(file: CheckpointFile): SyncCheckpoint {
  return {
    lastPage: file.lastPage,
    credentialToken: file.credentialToken ?? undefined,
    failedUploadIds: new Set(file.failedUploadIds),
    failedDistribution: new Map(
      Object.entries(file.failedDistribution).map(([domain, ids]) => [domain, new Set(ids)])
    ),
  };
}

/**
 * Durable pipeline state in a single JSON file.
 *
 * One writer, one process: two processes sharing a checkpoint file will
 * overwrite each other's progress and are not supported.
 */
export class CheckpointStore {
  private savedPage = 0;

  constructor(private readonly filePath: string) {}

  get path(): string {
    return this.filePath;
  }

  async load(): Promise<SyncCheckpoint> {
    if (!existsSync(this.filePath)) {
      logger.warn('checkpoint', `No checkpoint at ${this.filePath}, starting fresh`);
      const checkpoint = emptyCheckpoint();
      await this.save(checkpoint);
      return checkpoint;
    }

    let raw: unknown;
    try {
      const content = await fs.readFile(this.filePath, 'utf-8');
      raw = JSON.parse(content);
    } catch (error) {
      throw this.corrupt(describeError(error));
    }

    const parsed = CheckpointFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw this.corrupt(parsed.error.issues.map((issue) => issue.message).join('; '));
    }

    const checkpoint = fromCheckpointFile(parsed.data);
    this.savedPage = checkpoint.lastPage;
    logger.debug('checkpoint', `Loaded checkpoint at page ${checkpoint.lastPage}`);
    return checkpoint;
  }

  /** Writes to a temp file, fsyncs it and renames it over the checkpoint. */
  async save(checkpoint: SyncCheckpoint): Promise<void> {
    if (checkpoint.lastPage < this.savedPage) {
      throw new SyncError(
        ErrorCode.CHECKPOINT_CORRUPT,
        `Refusing to move lastPage back from ${this.savedPage} to ${checkpoint.lastPage}`
      );
    }

    const body = JSON.stringify(toCheckpointFile(checkpoint), null, 2) + '\n';
    const tempPath = `${this.filePath}.${process.pid}.tmp`;

    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const handle = await fs.open(tempPath, 'w');
    try {
      await handle.writeFile(body, 'utf-8');
      await handle.sync();
    } finally {
      await handle.close();
    }
    await fs.rename(tempPath, this.filePath);

    this.savedPage = checkpoint.lastPage;
    logger.debug('checkpoint', `Saved checkpoint (lastPage=${checkpoint.lastPage})`);
  }

  private corrupt(detail: string): SyncError {
    return new SyncError(
      ErrorCode.CHECKPOINT_CORRUPT,
      `Checkpoint file ${this.filePath} is unreadable: ${detail}`,
      false,
      'Inspect or restore the file by hand; it is never discarded automatically',
      { path: this.filePath }
    );
  }
}
