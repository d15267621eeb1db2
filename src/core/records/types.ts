// src/core/records/types.ts
import type { StoredRecord, VideoRecord } from '../types/index.js';

export interface RecordStore {
  /** Throws when the store cannot answer; a `false` must mean "not stored". */
  exists(externalId: string): Promise<boolean>;
  /** `false` when the write failed; the record must then be treated as absent. */
  insert(record: VideoRecord): Promise<boolean>;
  /** Rows found for `externalIds`; missing ids are simply absent. */
  fetchMany(externalIds: Iterable<string>): Promise<StoredRecord[]>;
  close(): Promise<void>;
}
