// src/core/distribution/site.ts
import { fetch, type Dispatcher } from 'undici';
import { z } from 'zod';
import { ErrorCode, SyncError, describeError, fatal, ok, type AdapterResult } from '../errors.js';
import { joinUrl } from '../http.js';
import { logger } from '../logger.js';
import { DEFAULT_USER_AGENT } from '../config/constants.js';
import type { StoredRecord } from '../types/index.js';
import type { DistributionAdapter } from './types.js';

const RejectedIdsSchema = z.array(z.union([z.string(), z.number()]).transform(String)).nullable();

export interface SiteDistributorOptions {
  domains: string[];
  apiToken: string;
  syncPath: string;
  cleanPath: string;
  dispatcher?: Dispatcher;
}

/** Pushes record batches to downstream site mirrors over their sync API. */
export class SiteDistributor implements DistributionAdapter {
  readonly domains: string[];

  constructor(private readonly options: SiteDistributorOptions) {
    this.domains = [...options.domains];
  }

  async push(batch: StoredRecord[], domain: string): Promise<AdapterResult<Set<string>>> {
    const url = joinUrl(domain, this.options.syncPath);
    logger.info('site', `Pushing ${batch.length} records to ${domain}`);

    try {
      const response = await fetch(url, {
        method: 'POST',
        headers: this.headers(),
        body: JSON.stringify({ videos_data: JSON.stringify(batch.map((record) => record.columns)) }),
        dispatcher: this.options.dispatcher,
      });
      if (!response.ok) {
        await response.body?.cancel();
        return this.transportFailure(domain, `HTTP ${response.status}`);
      }

      const parsed = RejectedIdsSchema.safeParse(await response.json());
      if (!parsed.success) {
        const message = `Push to ${domain} failed: response is not a list of ids`;
        logger.error('site', message);
        return fatal(new SyncError(ErrorCode.DISTRIBUTION_ERROR, message, false, undefined, { domain }));
      }

      const rejected = new Set(parsed.data ?? []);
      if (rejected.size > 0) {
        logger.warn('site', `${domain} rejected ${rejected.size} of ${batch.length} records`);
      } else {
        logger.info('site', `${domain} accepted ${batch.length} records`);
      }
      return ok(rejected);
    } catch (error) {
      return this.transportFailure(domain, describeError(error));
    }
  }

  async cleanup(domain: string): Promise<boolean> {
    const url = joinUrl(domain, this.options.cleanPath);
    logger.info('site', `Cleaning ${domain}`);

    try {
      const response = await fetch(url, {
        method: 'POST',
        headers: this.headers(),
        body: JSON.stringify({}),
        dispatcher: this.options.dispatcher,
      });
      await response.body?.cancel();
      if (response.status === 200) {
        logger.info('site', `${domain} cleaned`);
        return true;
      }
      logger.error('site', `${domain} clean returned HTTP ${response.status}`);
      return false;
    } catch (error) {
      logger.error('site', `${domain} clean failed: ${describeError(error)}`);
      return false;
    }
  }

  private headers(): Record<string, string> {
    return {
      'User-Agent': DEFAULT_USER_AGENT,
      'Content-Type': 'application/json',
      Authorization: `Bearer ${this.options.apiToken}`,
    };
  }

  private transportFailure(domain: string, detail: string): AdapterResult<Set<string>> {
    const message = `Push to ${domain} failed: ${detail}`;
    logger.error('site', message);
    return fatal(new SyncError(ErrorCode.TRANSPORT_ERROR, message, true, undefined, { domain }));
  }
}
