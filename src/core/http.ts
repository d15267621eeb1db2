// src/core/http.ts
import { Agent, RetryAgent, type Dispatcher } from 'undici';
import { HTTP_POOL_CONNECTIONS, HTTP_RETRY } from './config/constants.js';

export interface DispatcherOptions {
  connections?: number;
  connectTimeoutMs: number;
  readTimeoutMs: number;
}

/**
 * Pooled dispatcher that retries transient failures with exponential backoff
 * (1s, 2s, 4s) on the status codes listed in HTTP_RETRY.
 */
export function createDispatcher(options: DispatcherOptions): Dispatcher {
  const agent = new Agent({
    connections: options.connections ?? HTTP_POOL_CONNECTIONS,
    connect: { timeout: options.connectTimeoutMs },
    headersTimeout: options.readTimeoutMs,
    bodyTimeout: options.readTimeoutMs,
  });

  return new RetryAgent(agent, {
    maxRetries: HTTP_RETRY.maxRetries,
    minTimeout: HTTP_RETRY.minTimeoutMs,
    timeoutFactor: HTTP_RETRY.timeoutFactor,
    statusCodes: [...HTTP_RETRY.statusCodes],
    methods: [...HTTP_RETRY.methods],
  });
}

export function joinUrl(base: string, path: string): string {
  return new URL(path, base).toString();
}

export function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise(resolve => setTimeout(resolve, ms));
}
