// src/core/distribution/types.ts
import type { AdapterResult } from '../errors.js';
import type { StoredRecord } from '../types/index.js';

export interface DistributionAdapter {
  readonly domains: string[];
  /** Ids the domain rejected; an empty set means everything was accepted. */
  push(batch: StoredRecord[], domain: string): Promise<AdapterResult<Set<string>>>;
  cleanup(domain: string): Promise<boolean>;
}
