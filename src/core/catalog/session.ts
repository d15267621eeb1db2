// src/core/catalog/session.ts
import { ErrorCode, SyncError, fatal, type AdapterResult } from '../errors.js';
import { logger, maskToken } from '../logger.js';
import type { CatalogAdapter } from './types.js';

export type TokenListener = (token: string) => Promise<void>;

/**
 * Owns the catalog session token for one run.
 *
 * The token lives here rather than in the client so that whoever drives the
 * run can see it, persist it, and decide how many refreshes a call may spend.
 */
export class CatalogSession {
  token: string | undefined;

  constructor(
    private readonly catalog: CatalogAdapter,
    token: string | undefined,
    private readonly onRefresh?: TokenListener
  ) {
    this.token = token;
    catalog.useToken(token);
    if (token) {
      logger.info('catalog', `Reusing cached session token ${maskToken(token)}`);
    }
  }

  /** Logs in again and installs the new token. */
  async refresh(): Promise<AdapterResult<string>> {
    const result = await this.catalog.authenticate();
    if (result.kind === 'ok') {
      this.token = result.value;
      this.catalog.useToken(result.value);
      if (this.onRefresh) {
        await this.onRefresh(result.value);
      }
    }
    return result;
  }

  /**
   * Runs `operation`, refreshing the session and retrying the same call
   * whenever it reports an expired token. After `maxAttempts` calls that all
   * came back expired the result is an auth error.
   */
  async call<T>(
    operation: () => Promise<AdapterResult<T>>,
    maxAttempts: number
  ): Promise<AdapterResult<T>> {
    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const result = await operation();

      switch (result.kind) {
        case 'ok':
        case 'fatal':
          return result;
        case 'retryable': {
          if (attempt === maxAttempts) {
            logger.error('catalog', `${result.message}; no attempts left (${attempt}/${maxAttempts})`);
            break;
          }
          logger.warn('catalog', `${result.message}; refreshing session (attempt ${attempt}/${maxAttempts})`);
          const refreshed = await this.refresh();
          if (refreshed.kind !== 'ok') {
            return refreshed.kind === 'fatal'
              ? fatal(refreshed.error)
              : fatal(new SyncError(ErrorCode.AUTH_ERROR, refreshed.message));
          }
          break;
        }
      }
    }

    return fatal(new SyncError(
      ErrorCode.AUTH_ERROR,
      `Session still expired after ${maxAttempts} attempts`,
      false,
      'The catalog keeps rejecting fresh tokens; check the account'
    ));
  }
}
