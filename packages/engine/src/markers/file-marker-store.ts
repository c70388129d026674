/**
 * File Marker Store
 *
 * One JSON file per dataset holding the last processed marker.
 * Writes go to a temporary file that is renamed over the slot, so a crash
 * leaves either the old or the new marker.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { z } from 'zod';
import type { IMarkerStore, Marker } from '@snapdelta/core';
import { SnapdeltaError } from '@snapdelta/core';

const storedMarkerSchema = z.object({
  token: z.string(),
  observedAt: z.string().datetime(),
});

export class FileMarkerStore implements IMarkerStore {
  constructor(private readonly baseDir: string = './.snapdelta/markers') {}

  private getFilePath(dataset: string): string {
    const sanitized = dataset.replace(/[^a-zA-Z0-9_-]/g, '_');
    return path.join(this.baseDir, `${sanitized}.marker.json`);
  }

  async get(dataset: string): Promise<Marker | undefined> {
    const filePath = this.getFilePath(dataset);

    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (err) {
      if (typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT') {
        return undefined;
      }
      throw new SnapdeltaError({
        code: 'STORE_READ_FAILED',
        message: `Failed to read marker file: ${filePath}`,
        dataset,
        cause: err instanceof Error ? err : undefined,
      });
    }

    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch (err) {
      throw new SnapdeltaError({
        code: 'STORE_READ_FAILED',
        message: `Marker file is not valid JSON: ${filePath}`,
        dataset,
        suggestion: 'Delete the marker file to force a full refresh on the next cycle.',
        cause: err instanceof Error ? err : undefined,
      });
    }

    const parsed = storedMarkerSchema.safeParse(json);
    if (!parsed.success) {
      throw new SnapdeltaError({
        code: 'STORE_READ_FAILED',
        message: `Marker file has an unexpected shape: ${filePath}`,
        dataset,
        suggestion: 'Delete the marker file to force a full refresh on the next cycle.',
        context: { issues: parsed.error.issues },
      });
    }

    return { token: parsed.data.token, observedAt: new Date(parsed.data.observedAt) };
  }

  async set(dataset: string, marker: Marker): Promise<void> {
    const filePath = this.getFilePath(dataset);
    const tempPath = `${filePath}.${process.pid}.tmp`;
    const content = JSON.stringify(
      { token: marker.token, observedAt: marker.observedAt.toISOString() },
      null,
      2
    );

    try {
      await fs.mkdir(this.baseDir, { recursive: true, mode: 0o700 });
      await fs.writeFile(tempPath, content, { encoding: 'utf-8', mode: 0o600 });
      await fs.rename(tempPath, filePath);
    } catch (err) {
      throw new SnapdeltaError({
        code: 'STORE_WRITE_FAILED',
        message: `Failed to save marker for ${dataset}`,
        dataset,
        cause: err instanceof Error ? err : undefined,
      });
    }
  }

  async close(): Promise<void> {
    // Nothing held open
  }
}
