// src/core/records/mysql.ts
import { createPool, type Pool, type ResultSetHeader, type RowDataPacket } from 'mysql2/promise';
import { ErrorCode, SyncError, describeError } from '../errors.js';
import { logger } from '../logger.js';
import { DB_POOL_CONNECTIONS, VOD_DEFAULTS } from '../config/constants.js';
import type { AppConfig } from '../config/env.js';
import type { StoredColumns, StoredRecord, VideoRecord } from '../types/index.js';
import type { RecordStore } from './types.js';

export interface VodRow extends RowDataPacket {
  vod_douban_id: string | number;
  vod_name: string | null;
  vod_pic: string | null;
  vod_play_url: string | null;
  vod_content: string | null;
  vod_total: number | null;
  vod_trysee: number | null;
  vod_class: string | null;
  vod_down_url: string | null;
}

export const INSERT_COLUMNS = [
  'type_id', 'type_id_1', 'vod_name', 'vod_sub', 'vod_blurb', 'vod_content',
  'vod_total', 'vod_pic', 'vod_pic_thumb', 'vod_pic_slide', 'vod_lang', 'vod_year',
  'vod_class', 'vod_play_from', 'vod_play_url', 'vod_time', 'vod_time_add',
  'vod_down_url', 'vod_letter', 'vod_color', 'vod_pic_screenshot',
  'vod_actor', 'vod_writer', 'vod_behind', 'vod_remarks', 'vod_pubdate',
  'vod_serial', 'vod_status', 'vod_tag', 'vod_douban_id', 'vod_points',
  'vod_points_play', 'vod_points_down', 'vod_trysee', 'vod_hits',
] as const;

const PLAY_URL_SEPARATOR = '#';

export function randomHits(): number {
  const { minHits, maxHits } = VOD_DEFAULTS;
  return minHits + Math.floor(Math.random() * (maxHits - minHits + 1));
}

/** Column values for one new row, in {@link INSERT_COLUMNS} order. */
export function toInsertValues(
  record: VideoRecord,
  now: Date = new Date(),
  hits: number = randomHits()
): Array<string | number> {
  const year = now.getFullYear();
  const timestamp = Math.floor(now.getTime() / 1000);
  const videoClass = record.tags.join(',').slice(0, VOD_DEFAULTS.classLength);
  const { title, coverUrl, description } = record;

  return [
    VOD_DEFAULTS.typeId,
    VOD_DEFAULTS.typeId1,
    title,
    title,
    description.slice(0, VOD_DEFAULTS.blurbLength),
    description,
    record.totalEpisodes,
    coverUrl,
    coverUrl,
    coverUrl,
    VOD_DEFAULTS.lang,
    year,
    videoClass,
    VOD_DEFAULTS.playFrom,
    record.mediaList.join(PLAY_URL_SEPARATOR),
    timestamp,
    timestamp,
    record.downloadUrl,
    title.slice(0, 1),
    '',
    '',
    '',
    '',
    '',
    '',
    year,
    '',
    VOD_DEFAULTS.status,
    videoClass.slice(0, VOD_DEFAULTS.tagLength),
    record.externalId,
    VOD_DEFAULTS.points,
    VOD_DEFAULTS.points,
    VOD_DEFAULTS.points,
    record.freeEpisodes,
    hits,
  ];
}

function columnValue(value: unknown): string | number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number') return value;
  if (value instanceof Date) return value.toISOString();
  if (Buffer.isBuffer(value)) return value.toString('utf8');
  return String(value);
}

/** Every column of `row` as a JSON-safe value. */
export function toStoredColumns(row: VodRow): StoredColumns {
  const columns: StoredColumns = {};
  for (const [name, value] of Object.entries(row)) {
    columns[name] = columnValue(value);
  }
  return columns;
}

export function fromRow(row: VodRow): StoredRecord {
  const split = (value: string | null, separator: string) =>
    value ? value.split(separator).filter((part) => part.length > 0) : [];

  return {
    externalId: String(row.vod_douban_id),
    title: row.vod_name ?? '',
    coverUrl: row.vod_pic ?? '',
    mediaList: split(row.vod_play_url, PLAY_URL_SEPARATOR),
    description: row.vod_content ?? '',
    totalEpisodes: row.vod_total ?? 0,
    freeEpisodes: row.vod_trysee ?? 0,
    tags: split(row.vod_class, ','),
    downloadUrl: row.vod_down_url ?? '',
    columns: toStoredColumns(row),
  };
}

/** Video rows in a MacCMS-style table, keyed by `vod_douban_id`. */
export class MysqlRecordStore implements RecordStore {
  constructor(private readonly pool: Pool, private readonly table: string) {}

  static fromConfig(database: AppConfig['database']): MysqlRecordStore {
    const pool = createPool({
      host: database.host,
      port: database.port,
      user: database.user,
      password: database.password,
      database: database.database,
      charset: database.charset,
      connectionLimit: DB_POOL_CONNECTIONS,
      enableKeepAlive: true,
    });
    return new MysqlRecordStore(pool, database.table);
  }

  async exists(externalId: string): Promise<boolean> {
    try {
      const [rows] = await this.pool.query<RowDataPacket[]>(
        'SELECT vod_id FROM ?? WHERE vod_douban_id = ? LIMIT 1',
        [this.table, externalId]
      );
      return rows.length > 0;
    } catch (error) {
      throw new SyncError(
        ErrorCode.PERSISTENCE_ERROR,
        `Existence check failed for ${externalId}: ${describeError(error)}`,
        true
      );
    }
  }

  async insert(record: VideoRecord): Promise<boolean> {
    const placeholders = INSERT_COLUMNS.map(() => '?').join(', ');
    const sql = `INSERT INTO ?? (${INSERT_COLUMNS.join(', ')}) VALUES (${placeholders})`;

    try {
      await this.pool.query<ResultSetHeader>(sql, [this.table, ...toInsertValues(record)]);
      logger.info('records', `Inserted '${record.title}' (${record.externalId})`);
      return true;
    } catch (error) {
      logger.error('records', `Insert failed for '${record.title}' (${record.externalId}): ${describeError(error)}`);
      return false;
    }
  }

  async fetchMany(externalIds: Iterable<string>): Promise<StoredRecord[]> {
    const ids = [...new Set(externalIds)];
    if (ids.length === 0) {
      return [];
    }

    try {
      const [rows] = await this.pool.query<VodRow[]>(
        'SELECT * FROM ?? WHERE vod_douban_id IN (?)',
        [this.table, ids]
      );
      logger.debug('records', `Fetched ${rows.length}/${ids.length} records`);
      return rows.map(fromRow);
    } catch (error) {
      throw new SyncError(
        ErrorCode.PERSISTENCE_ERROR,
        `Batch fetch of ${ids.length} records failed: ${describeError(error)}`,
        true
      );
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
