// src/core/config/env.ts
import { z } from 'zod';
import { ErrorCode, SyncError } from '../errors.js';
import type { CatalogCredentials, MirrorTarget } from '../types/index.js';
import { resolveCheckpointPath } from './app-dirs.js';
import {
  DEFAULT_ITEM_DELAY_MS,
  DEFAULT_KEY_PREFIX,
  DEFAULT_PAGE_DELAY_MS,
  DEFAULT_PAGE_SIZE,
  DEFAULT_REMEDIATION_DELAY_MS,
  DEFAULT_USER_AGENT,
} from './constants.js';

const flag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const millis = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);

// `KEY=` in a .env file means unset
const blankAsUnset = (value: unknown) => (typeof value === 'string' && value.trim() === '' ? undefined : value);

/**
 * Environment schema. Every variable the CLI reads is declared here; code
 * elsewhere receives the parsed {@link AppConfig} instead of touching
 * process.env.
 */
export const EnvSchema = z.object({
  // ─── Catalog API ─────────────────────────────────────────────
  CATALOG_BASE_URL: z.string().url({ message: 'CATALOG_BASE_URL must be a valid URL' }),
  CATALOG_LOGIN_PATH: z.string().default('/api/login'),
  CATALOG_LIST_PATH: z.string().default('/api/video/list'),
  CATALOG_DETAIL_PATH: z.string().default('/api/video/detail'),
  CATALOG_PAGE_SIZE: z.coerce.number().int().positive().default(DEFAULT_PAGE_SIZE),
  CATALOG_USERNAME: z.string().min(1, 'CATALOG_USERNAME is required'),
  CATALOG_PASSWORD: z.string().min(1, 'CATALOG_PASSWORD is required'),
  CATALOG_DOMAIN: z.string().default(''),
  CATALOG_TOKEN_HEADER: z.string().min(1).default('x-session-token'),
  CATALOG_REFERER: z.string().default(''),
  CATALOG_ORIGIN: z.string().default(''),
  CATALOG_USER_AGENT: z.string().default(DEFAULT_USER_AGENT),
  CATALOG_CONNECT_TIMEOUT_MS: millis(30_000),
  CATALOG_READ_TIMEOUT_MS: millis(300_000),

  // ─── MySQL record store ──────────────────────────────────────
  MYSQL_HOST: z.string().default('localhost'),
  MYSQL_PORT: z.coerce.number().int().positive().default(3306),
  MYSQL_USER: z.string().default('root'),
  MYSQL_PASSWORD: z.string().default(''),
  MYSQL_DATABASE: z.string().min(1, 'MYSQL_DATABASE is required'),
  MYSQL_CHARSET: z.string().default('utf8mb4'),
  VOD_TABLE: z
    .string()
    .regex(/^[A-Za-z0-9_]+$/, 'VOD_TABLE must be a plain table name')
    .default('mac_vod'),

  // ─── Object stores (checked when the store is built) ─────────
  S3_ACCESS_KEY_ID: z.string().optional(),
  S3_SECRET_ACCESS_KEY: z.string().optional(),
  S3_REGION: z.string().optional(),
  S3_BUCKET: z.string().optional(),
  OSS_ACCESS_KEY_ID: z.string().optional(),
  OSS_SECRET_ACCESS_KEY: z.string().optional(),
  OSS_REGION: z.string().optional(),
  OSS_BUCKET: z.string().optional(),
  OSS_ENDPOINT: z.preprocess(blankAsUnset, z.string().url({ message: 'OSS_ENDPOINT must be a valid URL' }).optional()),
  OBJECT_READ_TIMEOUT_MS: millis(300_000),

  // ─── Mirroring ───────────────────────────────────────────────
  STORAGE_KEY_SECRET: z.string().min(1, 'STORAGE_KEY_SECRET is required'),
  STORAGE_KEY_PREFIX: z.string().min(1).default(DEFAULT_KEY_PREFIX),
  MIRROR_TARGET: z.enum(['oss', 's3']).default('oss'),
  SKIP_EXISTING_OBJECTS: flag.default('true'),

  // ─── Downstream sites ────────────────────────────────────────
  SITE_DOMAINS: z.string().default(''),
  SITE_API_TOKEN: z.string().default(''),
  SITE_SYNC_PATH: z.string().default('/api/sync'),
  SITE_CLEAN_PATH: z.string().default('/api/clean'),
  SITE_TIMEOUT_MS: millis(30_000),

  // ─── Runtime ─────────────────────────────────────────────────
  CHECKPOINT_PATH: z.string().optional(),
  ITEM_DELAY_MS: millis(DEFAULT_ITEM_DELAY_MS),
  PAGE_DELAY_MS: millis(DEFAULT_PAGE_DELAY_MS),
  REMEDIATION_DELAY_MS: millis(DEFAULT_REMEDIATION_DELAY_MS),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_DIR: z.preprocess(blankAsUnset, z.string().optional()),
});

export type Env = z.infer<typeof EnvSchema>;

export interface ObjectStoreConfig {
  accessKeyId: string;
  secretAccessKey: string;
  region: string;
  bucket: string;
  endpoint?: string;
}

export interface AppConfig {
  catalog: {
    baseUrl: string;
    loginPath: string;
    listPath: string;
    detailPath: string;
    pageSize: number;
    credentials: CatalogCredentials;
    tokenHeader: string;
    referer: string;
    origin: string;
    userAgent: string;
    connectTimeoutMs: number;
    readTimeoutMs: number;
  };
  database: {
    host: string;
    port: number;
    user: string;
    password: string;
    database: string;
    charset: string;
    table: string;
  };
  objectStores: Partial<Record<MirrorTarget, ObjectStoreConfig>>;
  objectReadTimeoutMs: number;
  mirror: {
    keySecret: string;
    keyPrefix: string;
    target: MirrorTarget;
    skipExisting: boolean;
  };
  sites: {
    domains: string[];
    apiToken: string;
    syncPath: string;
    cleanPath: string;
    timeoutMs: number;
  };
  checkpointPath: string;
  delays: {
    itemMs: number;
    pageMs: number;
    remediationMs: number;
  };
  logLevel: Env['LOG_LEVEL'];
  /** Hourly log files go under this directory when set. */
  logDir?: string;
}

export function parseDomains(value: string): string[] {
  return value
    .split(',')
    .map((domain) => domain.trim())
    .filter((domain) => domain.length > 0);
}

function objectStoreConfig(
  accessKeyId: string | undefined,
  secretAccessKey: string | undefined,
  region: string | undefined,
  bucket: string | undefined,
  endpoint?: string
): ObjectStoreConfig | undefined {
  if (!accessKeyId || !secretAccessKey || !region || !bucket) {
    return undefined;
  }
  return {
    accessKeyId: accessKeyId.trim(),
    secretAccessKey: secretAccessKey.trim(),
    region: region.trim(),
    bucket: bucket.trim(),
    endpoint,
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new SyncError(
      ErrorCode.CONFIG_INVALID,
      `Invalid configuration: ${issues}`,
      false,
      'Check the variables in your .env file'
    );
  }

  const e = parsed.data;
  const objectStores: AppConfig['objectStores'] = {};
  const s3 = objectStoreConfig(e.S3_ACCESS_KEY_ID, e.S3_SECRET_ACCESS_KEY, e.S3_REGION, e.S3_BUCKET);
  if (s3) objectStores.s3 = s3;
  const oss = objectStoreConfig(
    e.OSS_ACCESS_KEY_ID,
    e.OSS_SECRET_ACCESS_KEY,
    e.OSS_REGION,
    e.OSS_BUCKET,
    e.OSS_ENDPOINT
  );
  if (oss) objectStores.oss = oss;

  return {
    catalog: {
      baseUrl: e.CATALOG_BASE_URL,
      loginPath: e.CATALOG_LOGIN_PATH,
      listPath: e.CATALOG_LIST_PATH,
      detailPath: e.CATALOG_DETAIL_PATH,
      pageSize: e.CATALOG_PAGE_SIZE,
      credentials: {
        username: e.CATALOG_USERNAME,
        password: e.CATALOG_PASSWORD,
        domain: e.CATALOG_DOMAIN,
      },
      tokenHeader: e.CATALOG_TOKEN_HEADER,
      referer: e.CATALOG_REFERER,
      origin: e.CATALOG_ORIGIN,
      userAgent: e.CATALOG_USER_AGENT,
      connectTimeoutMs: e.CATALOG_CONNECT_TIMEOUT_MS,
      readTimeoutMs: e.CATALOG_READ_TIMEOUT_MS,
    },
    database: {
      host: e.MYSQL_HOST,
      port: e.MYSQL_PORT,
      user: e.MYSQL_USER,
      password: e.MYSQL_PASSWORD,
      database: e.MYSQL_DATABASE,
      charset: e.MYSQL_CHARSET,
      table: e.VOD_TABLE,
    },
    objectStores,
    objectReadTimeoutMs: e.OBJECT_READ_TIMEOUT_MS,
    mirror: {
      keySecret: e.STORAGE_KEY_SECRET,
      keyPrefix: e.STORAGE_KEY_PREFIX,
      target: e.MIRROR_TARGET,
      skipExisting: e.SKIP_EXISTING_OBJECTS,
    },
    sites: {
      domains: parseDomains(e.SITE_DOMAINS),
      apiToken: e.SITE_API_TOKEN,
      syncPath: e.SITE_SYNC_PATH,
      cleanPath: e.SITE_CLEAN_PATH,
      timeoutMs: e.SITE_TIMEOUT_MS,
    },
    checkpointPath: resolveCheckpointPath(e.CHECKPOINT_PATH, env),
    delays: {
      itemMs: e.ITEM_DELAY_MS,
      pageMs: e.PAGE_DELAY_MS,
      remediationMs: e.REMEDIATION_DELAY_MS,
    },
    logLevel: e.LOG_LEVEL,
    logDir: e.LOG_DIR,
  };
}

export function requireObjectStore(config: AppConfig, target: MirrorTarget): ObjectStoreConfig {
  const store = config.objectStores[target];
  if (!store) {
    const prefix = target.toUpperCase();
    throw new SyncError(
      ErrorCode.CONFIG_INVALID,
      `Object store "${target}" is not configured`,
      false,
      `Set ${prefix}_ACCESS_KEY_ID, ${prefix}_SECRET_ACCESS_KEY, ${prefix}_REGION and ${prefix}_BUCKET`
    );
  }
  if (target === 'oss' && !store.endpoint) {
    throw new SyncError(ErrorCode.CONFIG_INVALID, 'OSS_ENDPOINT is required for the oss store', false);
  }
  return store;
}

const KeyEnvSchema = EnvSchema.pick({ STORAGE_KEY_SECRET: true, STORAGE_KEY_PREFIX: true });

/** Just the content-addressing settings, for commands that touch nothing else. */
export function loadKeyConfig(
  env: NodeJS.ProcessEnv = process.env
): Pick<AppConfig['mirror'], 'keySecret' | 'keyPrefix'> {
  const parsed = KeyEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new SyncError(
      ErrorCode.CONFIG_INVALID,
      `Invalid configuration: ${parsed.error.issues.map((issue) => issue.message).join('; ')}`,
      false,
      'Set STORAGE_KEY_SECRET to the secret the keys were derived with'
    );
  }
  return { keySecret: parsed.data.STORAGE_KEY_SECRET, keyPrefix: parsed.data.STORAGE_KEY_PREFIX };
}
