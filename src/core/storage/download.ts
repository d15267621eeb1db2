// src/core/storage/download.ts
import { fetch, type Dispatcher } from 'undici';
import { DEFAULT_USER_AGENT } from '../config/constants.js';

export interface Downloaded {
  bytes: Uint8Array;
  contentType: string | null;
}

export class MediaDownloader {
  constructor(private readonly dispatcher?: Dispatcher) {}

  async bytes(url: string): Promise<Downloaded> {
    const response = await this.get(url);
    const buffer = await response.arrayBuffer();
    return {
      bytes: new Uint8Array(buffer),
      contentType: response.headers.get('content-type'),
    };
  }

  async text(url: string): Promise<string> {
    const response = await this.get(url);
    return response.text();
  }

  private async get(url: string) {
    const response = await fetch(url, {
      headers: { 'User-Agent': DEFAULT_USER_AGENT },
      dispatcher: this.dispatcher,
    });
    if (!response.ok) {
      await response.body?.cancel();
      throw new Error(`GET ${url} returned HTTP ${response.status}`);
    }
    return response;
  }
}
