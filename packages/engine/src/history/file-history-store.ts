/**
 * File History Store
 *
 * Append-only history on the local filesystem.
 * Format: {baseDir}/{dataset}.ndjson, one JSON line per appended batch:
 *   {"batchId":"…","recordedAt":"…","records":[…]}
 *
 * A batch is durable once its line is complete. A trailing line cut short by
 * a crash fails to parse and is skipped on read, so a batch is either fully
 * visible or not at all.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { randomUUID } from 'crypto';
import { z } from 'zod';
import type {
  AppendResult,
  ChangeRecord,
  EntityKey,
  IHistoryStore,
  TimeRange,
} from '@snapdelta/core';
import { SnapdeltaError, encodeKey } from '@snapdelta/core';
import {
  collapseRows,
  filterRange,
  fromStored,
  latestByKey,
  storedRecordSchema,
  toStored,
} from './records.js';

const batchLineSchema = z.object({
  batchId: z.string(),
  recordedAt: z.string(),
  records: z.array(storedRecordSchema),
});

function parseLine(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch {
    return undefined;
  }
}

function isNotFound(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

export class FileHistoryStore implements IHistoryStore {
  private static writeQueue = new Map<string, Promise<void>>();

  constructor(private readonly baseDir: string = './.snapdelta/history') {}

  /**
   * Get the file path for a dataset
   */
  private getFilePath(dataset: string): string {
    const sanitized = dataset.replace(/[^a-zA-Z0-9_-]/g, '_');
    return path.join(this.baseDir, `${sanitized}.ndjson`);
  }

  async append(dataset: string, changes: readonly ChangeRecord[]): Promise<AppendResult> {
    if (changes.length === 0) {
      return { written: 0 };
    }

    const filePath = this.getFilePath(dataset);
    const line = JSON.stringify({
      batchId: randomUUID(),
      recordedAt: new Date().toISOString(),
      records: changes.map(toStored),
    });

    try {
      await fs.mkdir(this.baseDir, { recursive: true, mode: 0o700 });
      await this.enqueueWrite(filePath, async () => {
        // Start on a fresh line if the previous write was cut short
        const prefix = (await this.endsWithNewline(filePath)) ? '' : '\n';
        await fs.appendFile(filePath, `${prefix}${line}\n`, { encoding: 'utf-8', mode: 0o600 });
      });
    } catch (err) {
      throw new SnapdeltaError({
        code: 'STORE_WRITE_FAILED',
        message: `Failed to append ${changes.length} change row(s)`,
        dataset,
        suggestion: `Check that ${this.baseDir} is writable and the disk is not full.`,
        cause: err instanceof Error ? err : undefined,
      });
    }

    return { written: changes.length };
  }

  async latest(dataset: string, key: EntityKey): Promise<ChangeRecord | undefined> {
    const rows = await this.history(dataset, key);
    return rows[rows.length - 1];
  }

  async latestAll(dataset: string): Promise<Map<string, ChangeRecord>> {
    return latestByKey(await this.readRows(dataset));
  }

  async history(dataset: string, key: EntityKey, range?: TimeRange): Promise<ChangeRecord[]> {
    const encoded = encodeKey(key);
    const rows = await this.readRows(dataset);
    return filterRange(
      rows.filter((row) => encodeKey(row.key) === encoded),
      range
    );
  }

  async scan(dataset: string, range?: TimeRange): Promise<ChangeRecord[]> {
    return filterRange(await this.readRows(dataset), range);
  }

  async close(): Promise<void> {
    // Let queued writes settle; their callers already received any failure
    await Promise.allSettled(Array.from(FileHistoryStore.writeQueue.values()));
  }

  /**
   * Read every complete batch of a dataset, collapsed and sorted ascending
   */
  private async readRows(dataset: string): Promise<ChangeRecord[]> {
    const filePath = this.getFilePath(dataset);

    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (err) {
      if (isNotFound(err)) return [];
      throw new SnapdeltaError({
        code: 'STORE_READ_FAILED',
        message: `Failed to read history file: ${filePath}`,
        dataset,
        cause: err instanceof Error ? err : undefined,
      });
    }

    const rows: ChangeRecord[] = [];
    for (const line of content.split('\n')) {
      if (line.trim() === '') continue;
      const parsed = batchLineSchema.safeParse(parseLine(line));
      // Incomplete batch
      if (!parsed.success) continue;
      rows.push(...parsed.data.records.map(fromStored));
    }

    return collapseRows(rows);
  }

  private async endsWithNewline(filePath: string): Promise<boolean> {
    const handle = await fs.open(filePath, 'r').catch((err: unknown) => {
      if (isNotFound(err)) return undefined;
      throw err;
    });
    if (!handle) return true;

    try {
      const { size } = await handle.stat();
      if (size === 0) return true;
      const buffer = Buffer.alloc(1);
      await handle.read(buffer, 0, 1, size - 1);
      return buffer[0] === 0x0a;
    } finally {
      await handle.close();
    }
  }

  private enqueueWrite(filePath: string, op: () => Promise<void>): Promise<void> {
    const previous = FileHistoryStore.writeQueue.get(filePath) ?? Promise.resolve();
    const next = previous.then(op, op);

    let wrapped: Promise<void>;
    wrapped = next.finally(() => {
      if (FileHistoryStore.writeQueue.get(filePath) === wrapped) {
        FileHistoryStore.writeQueue.delete(filePath);
      }
    });

    FileHistoryStore.writeQueue.set(filePath, wrapped);
    return wrapped;
  }
}
