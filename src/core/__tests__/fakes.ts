// src/core/__tests__/fakes.ts
import { ErrorCode, SyncError, fatal, ok, tokenExpired, type AdapterResult } from '../errors.js';
import type { CatalogAdapter } from '../catalog/types.js';
import type { DistributionAdapter } from '../distribution/types.js';
import { INSERT_COLUMNS, toInsertValues } from '../records/mysql.js';
import type { RecordStore } from '../records/types.js';
import type { MirrorSource, RecordMirror } from '../storage/mirror.js';
import type { CatalogItem, StoredColumns, StoredRecord, VideoDetail, VideoRecord } from '../types/index.js';

export function item(externalId: string, title = `Title ${externalId}`): CatalogItem {
  return { externalId, title, tags: ['drama'], totalEpisodes: 2 };
}

export function detail(title: string, mediaList = ['https://media.test/1.m3u8', 'https://media.test/2.m3u8']): VideoDetail {
  return {
    title,
    mediaList,
    coverUrl: 'https://media.test/cover.jpg',
    description: 'A description',
    downloadUrl: '',
    freeEpisodes: 1,
  };
}

/** Catalog that issues `token-1`, `token-2`... and can expire the session on chosen pages. */
export class FakeCatalog implements CatalogAdapter {
  pages = new Map<number, CatalogItem[]>();
  details = new Map<string, VideoDetail | null>();
  detailErrors = new Map<string, SyncError>();
  /** Pages whose first request finds the session expired. */
  expireOnPage = new Set<number>();
  /** Ids whose first detail request finds the session expired. */
  expireOnDetail = new Set<string>();
  /** Every token is rejected, even fresh ones. */
  alwaysExpired = false;
  loginFails = false;

  logins = 0;
  listCalls: number[] = [];
  detailCalls: string[] = [];
  private installed: string | undefined;
  private valid: string | undefined;

  useToken(token: string | undefined): void {
    this.installed = token;
  }

  /** Makes `token` acceptable without a login, as if left over from an earlier run. */
  acceptToken(token: string): void {
    this.valid = token;
  }

  async authenticate(): Promise<AdapterResult<string>> {
    if (this.loginFails) {
      return fatal(new SyncError(ErrorCode.AUTH_ERROR, 'Login failed: bad password'));
    }
    this.logins++;
    this.valid = `token-${this.logins}`;
    return ok(this.valid);
  }

  async listPage(pageNumber: number): Promise<AdapterResult<CatalogItem[]>> {
    this.listCalls.push(pageNumber);
    if (this.expireOnPage.delete(pageNumber)) {
      this.valid = undefined;
    }
    if (!this.sessionValid()) {
      return tokenExpired('token expired');
    }
    return ok(this.pages.get(pageNumber) ?? []);
  }

  async fetchDetail(externalId: string): Promise<AdapterResult<VideoDetail | null>> {
    this.detailCalls.push(externalId);
    if (this.expireOnDetail.delete(externalId)) {
      this.valid = undefined;
    }
    if (!this.sessionValid()) {
      return tokenExpired('token expired');
    }
    const error = this.detailErrors.get(externalId);
    if (error) {
      return fatal(error);
    }
    return ok(this.details.get(externalId) ?? null);
  }

  private sessionValid(): boolean {
    return !this.alwaysExpired && this.installed !== undefined && this.installed === this.valid;
  }
}

/** The row `record` would be stored as, with fixed time and hit values. */
export function storedColumns(record: VideoRecord): StoredColumns {
  const values = toInsertValues(record, new Date('2026-03-01T00:00:00Z'), 1000);
  return Object.fromEntries(INSERT_COLUMNS.map((column, index) => [column, values[index]]));
}

export class FakeRecords implements RecordStore {
  rows = new Map<string, VideoRecord>();
  insertFails = new Set<string>();
  existsFails = new Set<string>();
  fetchFails = false;
  /** Ids `fetchMany` pretends not to find. */
  hidden = new Set<string>();
  fetchCalls: string[][] = [];

  async exists(externalId: string): Promise<boolean> {
    if (this.existsFails.has(externalId)) {
      throw new SyncError(ErrorCode.PERSISTENCE_ERROR, `Existence check failed for ${externalId}: connection lost`, true);
    }
    return this.rows.has(externalId);
  }

  async insert(record: VideoRecord): Promise<boolean> {
    if (this.insertFails.has(record.externalId)) return false;
    this.rows.set(record.externalId, record);
    return true;
  }

  async fetchMany(externalIds: Iterable<string>): Promise<StoredRecord[]> {
    const ids = [...externalIds];
    this.fetchCalls.push(ids);
    if (this.fetchFails) {
      throw new SyncError(ErrorCode.PERSISTENCE_ERROR, 'Batch fetch failed: connection lost', true);
    }
    const found: StoredRecord[] = [];
    for (const id of ids) {
      const row = this.rows.get(id);
      if (row && !this.hidden.has(id)) found.push({ ...row, columns: storedColumns(row) });
    }
    return found;
  }

  async close(): Promise<void> {}
}

export class FakeMirror implements RecordMirror {
  readonly storeName = 'fake';
  failing = new Set<string>();
  mirrored: MirrorSource[] = [];

  async mirror(record: MirrorSource): Promise<boolean> {
    this.mirrored.push(record);
    return !this.failing.has(record.externalId);
  }
}

export class FakeDistributor implements DistributionAdapter {
  /** Ids each domain answers as rejected. */
  rejects = new Map<string, Set<string>>();
  /** Domains that cannot be reached. */
  down = new Set<string>();
  cleanFails = new Set<string>();
  pushes: Array<{ domain: string; ids: string[] }> = [];
  /** Column sets sent with each push, in push order. */
  payloads: StoredColumns[][] = [];
  cleaned: string[] = [];

  constructor(readonly domains: string[]) {}

  async push(batch: StoredRecord[], domain: string): Promise<AdapterResult<Set<string>>> {
    const ids = batch.map((record) => record.externalId);
    this.pushes.push({ domain, ids });
    this.payloads.push(batch.map((record) => record.columns));
    if (this.down.has(domain)) {
      return fatal(new SyncError(ErrorCode.TRANSPORT_ERROR, `Push to ${domain} failed: connect ECONNREFUSED`, true));
    }
    const rejected = this.rejects.get(domain) ?? new Set<string>();
    return ok(new Set(ids.filter((id) => rejected.has(id))));
  }

  async cleanup(domain: string): Promise<boolean> {
    this.cleaned.push(domain);
    return !this.cleanFails.has(domain);
  }
}
