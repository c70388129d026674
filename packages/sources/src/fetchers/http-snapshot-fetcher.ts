/**
 * HTTP Snapshot Fetcher
 *
 * Downloads a CSV, Excel or JSON snapshot over HTTP. The marker check uses
 * one of the configured marker strategies.
 */

import type { ISnapshotFetcher, Marker, RawRow } from '@snapdelta/core';
import { readRows } from '../readers/index.js';
import type { ReadOptions, SourceFormat } from '../readers/index.js';
import { httpRequest } from './http-client.js';
import type { FetchFn } from './http-client.js';
import { resolveMarker } from './marker-strategies.js';
import type { MarkerStrategy } from './marker-strategies.js';

export interface HttpSnapshotFetcherConfig extends ReadOptions {
  /** Snapshot download URL */
  url: string;
  format: SourceFormat;
  marker: MarkerStrategy;
  /** Extra request headers (e.g. User-Agent) */
  headers?: Record<string, string>;
  /** Timeout per request in milliseconds (default: 30000) */
  timeoutMs?: number;
}

export interface HttpSnapshotFetcherDeps {
  fetch?: FetchFn;
  now?: () => Date;
}

export class HttpSnapshotFetcher implements ISnapshotFetcher {
  readonly description: string;
  private readonly fetchFn: FetchFn;
  private readonly now: () => Date;

  constructor(
    private readonly config: HttpSnapshotFetcherConfig,
    deps: HttpSnapshotFetcherDeps = {}
  ) {
    this.description = config.url;
    this.fetchFn = deps.fetch ?? ((input, init) => fetch(input, init));
    this.now = deps.now ?? (() => new Date());
  }

  async fetchMarker(): Promise<Marker> {
    return resolveMarker(this.config.marker, {
      url: this.config.url,
      headers: this.config.headers,
      timeoutMs: this.timeoutMs,
      encoding: this.config.encoding ?? 'utf-8',
      fetch: this.fetchFn,
      now: this.now,
    });
  }

  async fetchSnapshot(_marker: Marker): Promise<RawRow[]> {
    const { body } = await httpRequest(this.config.url, {
      headers: this.config.headers,
      timeoutMs: this.timeoutMs,
      fetch: this.fetchFn,
    });
    return readRows(this.config.format, body, this.config);
  }

  private get timeoutMs(): number {
    return this.config.timeoutMs ?? 30_000;
  }
}
