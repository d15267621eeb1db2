// src/core/types/index.ts
export type ResourceKind = 'mediaSegment' | 'cover';

export type MirrorTarget = 'oss' | 's3';

/** One catalog entry as it is persisted and distributed. */
export interface VideoRecord {
  externalId: string;
  title: string;
  coverUrl: string;
  /** Per-episode playlist locators, episode 1 first. */
  mediaList: string[];
  description: string;
  totalEpisodes: number;
  freeEpisodes: number;
  tags: string[];
  downloadUrl: string;
}

/** Column values of a stored row, keyed by column name. */
export type StoredColumns = Record<string, string | number | null>;

/** A record read back from the record store, with the row it came from. Sites receive `columns`. */
export interface StoredRecord extends VideoRecord {
  columns: StoredColumns;
}

export interface CatalogItem {
  externalId: string;
  title: string;
  tags: string[];
  totalEpisodes: number;
}

export interface VideoDetail {
  title: string;
  mediaList: string[];
  coverUrl: string;
  description: string;
  downloadUrl: string;
  freeEpisodes: number;
}

export interface CatalogCredentials {
  username: string;
  password: string;
  domain: string;
}

/** Domain -> externalIds that domain has not accepted. */
export type DistributionFailures = Map<string, Set<string>>;

export interface SyncCheckpoint {
  lastPage: number;
  credentialToken?: string;
  failedUploadIds: Set<string>;
  failedDistribution: DistributionFailures;
}

export type SyncPhase =
  | 'idle'
  | 'fetching_page'
  | 'enriching_item'
  | 'persisting'
  | 'mirroring'
  | 'distributing'
  | 'checkpointing'
  | 'done'
  | 'aborted';
