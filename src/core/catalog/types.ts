// src/core/catalog/types.ts
import type { AdapterResult } from '../errors.js';
import type { CatalogItem, VideoDetail } from '../types/index.js';

export interface CatalogAdapter {
  /** Installs the session token sent with list and detail calls. */
  useToken(token: string | undefined): void;
  authenticate(): Promise<AdapterResult<string>>;
  listPage(pageNumber: number, pageSize: number): Promise<AdapterResult<CatalogItem[]>>;
  /** `null` when the catalog answered but had no detail for the id. */
  fetchDetail(externalId: string): Promise<AdapterResult<VideoDetail | null>>;
}
