/**
 * File Snapshot Fetcher
 *
 * Reads a snapshot from a local file. The marker is derived from the file's
 * modification time and size, so an untouched file is never re-read.
 */

import { promises as fs } from 'fs';
import type { ISnapshotFetcher, Marker, RawRow } from '@snapdelta/core';
import { SnapdeltaError } from '@snapdelta/core';
import { readRows } from '../readers/index.js';
import type { ReadOptions, SourceFormat } from '../readers/index.js';

export interface FileSnapshotFetcherConfig extends ReadOptions {
  /** Path to the source file */
  filePath: string;
  format: SourceFormat;
}

export class FileSnapshotFetcher implements ISnapshotFetcher {
  readonly description: string;

  constructor(private readonly config: FileSnapshotFetcherConfig) {
    this.description = `file:${config.filePath}`;
  }

  async fetchMarker(): Promise<Marker> {
    try {
      const stats = await fs.stat(this.config.filePath);
      return {
        token: `${stats.mtime.toISOString()}:${stats.size}`,
        observedAt: stats.mtime,
      };
    } catch (err) {
      throw this.toFetchError(err);
    }
  }

  async fetchSnapshot(_marker: Marker): Promise<RawRow[]> {
    let content: Buffer;
    try {
      content = await fs.readFile(this.config.filePath);
    } catch (err) {
      throw this.toFetchError(err);
    }
    return readRows(this.config.format, content, this.config);
  }

  private toFetchError(err: unknown): SnapdeltaError {
    const code = typeof err === 'object' && err !== null && 'code' in err ? err.code : undefined;
    if (code === 'ENOENT') {
      return new SnapdeltaError({
        code: 'FETCH_FAILED',
        message: `File not found: ${this.config.filePath}`,
        suggestion: 'Check that the file path is correct and the file exists.',
        cause: err instanceof Error ? err : undefined,
      });
    }
    return new SnapdeltaError({
      code: code === 'EBUSY' || code === 'EAGAIN' ? 'FETCH_TRANSIENT' : 'FETCH_FAILED',
      message: `Failed to read ${this.config.filePath}: ${err instanceof Error ? err.message : String(err)}`,
      cause: err instanceof Error ? err : undefined,
    });
  }
}
