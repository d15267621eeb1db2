// src/core/catalog/client.ts
import { fetch, type Dispatcher } from 'undici';
import type { z } from 'zod';
import {
  ErrorCode,
  SyncError,
  describeError,
  fatal,
  ok,
  tokenExpired,
  type AdapterResult,
} from '../errors.js';
import { logger, maskToken } from '../logger.js';
import { CATALOG_CODE_OK, CATALOG_CODE_TOKEN_EXPIRED } from '../config/constants.js';
import type { CatalogCredentials, CatalogItem, VideoDetail } from '../types/index.js';
import type { CatalogAdapter } from './types.js';
import {
  DetailDataSchema,
  EnvelopeSchema,
  ListDataSchema,
  LoginDataSchema,
  toCatalogItem,
  toVideoDetail,
} from './schemas.js';

export interface CatalogClientOptions {
  baseUrl: string;
  loginPath: string;
  listPath: string;
  detailPath: string;
  credentials: CatalogCredentials;
  tokenHeader: string;
  referer?: string;
  origin?: string;
  userAgent?: string;
  dispatcher?: Dispatcher;
}

type Envelope = z.infer<typeof EnvelopeSchema>;

export class HttpCatalogClient implements CatalogAdapter {
  private token: string | undefined;

  constructor(private readonly options: CatalogClientOptions) {}

  useToken(token: string | undefined): void {
    this.token = token;
    if (token) {
      logger.debug('catalog', `Using session token ${maskToken(token)}`);
    }
  }

  async authenticate(): Promise<AdapterResult<string>> {
    logger.info('catalog', 'Logging in for a new session token');
    const { username, password, domain } = this.options.credentials;

    const envelope = await this.post(this.options.loginPath, {
      user_name: username,
      password,
      domain,
    }, false);
    if (envelope.kind !== 'ok') {
      return this.authFailure(envelope.kind === 'fatal' ? envelope.error.message : envelope.message);
    }

    const { code, msg, data } = envelope.value;
    const login = LoginDataSchema.safeParse(data);
    if (code !== CATALOG_CODE_OK || !login.success) {
      return this.authFailure(msg ?? `login returned code ${code}`);
    }

    logger.info('catalog', 'Login succeeded');
    return ok(login.data.token);
  }

  async listPage(pageNumber: number, pageSize: number): Promise<AdapterResult<CatalogItem[]>> {
    if (!this.token) {
      return tokenExpired('No session token');
    }

    logger.info('catalog', `Requesting page ${pageNumber}`);
    const envelope = await this.post(this.options.listPath, {
      page: pageNumber,
      page_size: pageSize,
    });
    if (envelope.kind !== 'ok') return envelope;

    const { code, msg, data } = envelope.value;
    if (code === CATALOG_CODE_TOKEN_EXPIRED) {
      logger.warn('catalog', 'Session token expired');
      return tokenExpired(msg ?? 'Session token expired');
    }
    if (code !== CATALOG_CODE_OK) {
      return this.transportFailure(`List page ${pageNumber} failed: ${msg ?? `code ${code}`}`);
    }

    const parsed = ListDataSchema.safeParse(data);
    if (!parsed.success) {
      return this.transportFailure(`Malformed list payload for page ${pageNumber}: ${parsed.error.message}`);
    }

    const totalPages = Math.ceil(parsed.data.total / pageSize);
    logger.info('catalog', `Page ${pageNumber}: ${parsed.data.list.length} items (total ${parsed.data.total}, ${totalPages} pages)`);
    return ok(parsed.data.list.map(toCatalogItem));
  }

  async fetchDetail(externalId: string): Promise<AdapterResult<VideoDetail | null>> {
    if (!this.token) {
      return tokenExpired('No session token');
    }

    logger.debug('catalog', `Fetching detail for ${externalId}`);
    const envelope = await this.post(this.options.detailPath, {
      id: externalId,
      lang_code: 'en',
    });
    if (envelope.kind !== 'ok') return envelope;

    const { code, msg, data } = envelope.value;
    if (code === CATALOG_CODE_TOKEN_EXPIRED) {
      logger.warn('catalog', 'Session token expired');
      return tokenExpired(msg ?? 'Session token expired');
    }
    if (code !== CATALOG_CODE_OK) {
      return this.transportFailure(`Detail for ${externalId} failed: ${msg ?? `code ${code}`}`);
    }

    const parsed = DetailDataSchema.safeParse(data ?? {});
    if (!parsed.success) {
      return this.transportFailure(`Malformed detail payload for ${externalId}: ${parsed.error.message}`);
    }

    const [first] = parsed.data.list;
    return ok(first ? toVideoDetail(first) : null);
  }

  private headers(withToken: boolean): Record<string, string> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.options.userAgent) headers['User-Agent'] = this.options.userAgent;
    if (this.options.referer) headers['Referer'] = this.options.referer;
    if (this.options.origin) headers['Origin'] = this.options.origin;
    if (withToken && this.token) headers[this.options.tokenHeader] = this.token;
    return headers;
  }

  private async post(
    path: string,
    payload: Record<string, unknown>,
    withToken: boolean = true
  ): Promise<AdapterResult<Envelope>> {
    const url = `${this.options.baseUrl}${path}`;
    try {
      const response = await fetch(url, {
        method: 'POST',
        headers: this.headers(withToken),
        body: JSON.stringify(payload),
        dispatcher: this.options.dispatcher,
      });
      if (!response.ok) {
        await response.body?.cancel();
        return this.transportFailure(`POST ${path} returned HTTP ${response.status}`);
      }

      const parsed = EnvelopeSchema.safeParse(await response.json());
      if (!parsed.success) {
        return this.transportFailure(`POST ${path} returned an unexpected body`);
      }
      return ok(parsed.data);
    } catch (error) {
      return this.transportFailure(`POST ${path} failed: ${describeError(error)}`);
    }
  }

  private transportFailure<T>(message: string): AdapterResult<T> {
    logger.error('catalog', message);
    return fatal(new SyncError(ErrorCode.TRANSPORT_ERROR, message, true));
  }

  private authFailure(message: string): AdapterResult<string> {
    logger.error('catalog', `Login failed: ${message}`);
    return fatal(new SyncError(
      ErrorCode.AUTH_ERROR,
      `Login failed: ${message}`,
      false,
      'Check CATALOG_USERNAME, CATALOG_PASSWORD and CATALOG_DOMAIN'
    ));
  }
}
