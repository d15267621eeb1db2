// src/core/config/constants.ts
export const APP_NAME = 'vod-sync';
export const CHECKPOINT_FILENAME = 'state.json';

export const DEFAULT_PAGE_SIZE = 20;
export const DEFAULT_KEY_PREFIX = 'video_data';
export const DEFAULT_USER_AGENT = 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

// Throttling between units of work, in milliseconds
export const DEFAULT_ITEM_DELAY_MS = 500;
export const DEFAULT_PAGE_DELAY_MS = 1000;
export const DEFAULT_REMEDIATION_DELAY_MS = 1000;

export const MAX_CREDENTIAL_REFRESHES = 3;
export const UPLOAD_REMEDIATION_ATTEMPTS = 2;

export const HTTP_RETRY = {
  maxRetries: 3,
  minTimeoutMs: 1000,
  timeoutFactor: 2,
  statusCodes: [429, 500, 502, 503, 504],
  methods: ['GET', 'POST'],
} as const;

export const HTTP_POOL_CONNECTIONS = 20;
export const DB_POOL_CONNECTIONS = 10;

export const CATALOG_CODE_OK = 0;
export const CATALOG_CODE_TOKEN_EXPIRED = 402;

export const PLAYLIST_FILENAME = 'origin.m3u8';
export const PLAYLIST_CONTENT_TYPE = 'application/vnd.apple.mpegurl';
export const COVER_FILENAME = 'cover.jpg';
export const DEFAULT_COVER_CONTENT_TYPE = 'image/jpeg';

/** Fixed column values for rows written to the MacCMS video table. */
export const VOD_DEFAULTS = {
  typeId: 16,
  typeId1: 2,
  lang: 'English',
  playFrom: 'dplayer',
  points: 9.99,
  status: 1,
  blurbLength: 250,
  classLength: 255,
  tagLength: 99,
  minHits: 100000,
  maxHits: 300000,
} as const;
