/**
 * In-memory history store for dry runs and tests
 */

import type {
  AppendResult,
  ChangeRecord,
  EntityKey,
  IHistoryStore,
  TimeRange,
} from '@snapdelta/core';
import { encodeKey } from '@snapdelta/core';
import { collapseRows, filterRange, latestByKey } from './records.js';

export class MemoryHistoryStore implements IHistoryStore {
  private readonly datasets = new Map<string, readonly ChangeRecord[]>();

  async append(dataset: string, changes: readonly ChangeRecord[]): Promise<AppendResult> {
    if (changes.length === 0) {
      return { written: 0 };
    }
    const copies = changes.map((change) => ({
      ...change,
      key: [...change.key],
      values: { ...change.values },
    }));
    // Replace the array in one step so readers never see half a batch
    this.datasets.set(dataset, collapseRows([...this.rows(dataset), ...copies]));
    return { written: changes.length };
  }

  async latest(dataset: string, key: EntityKey): Promise<ChangeRecord | undefined> {
    return latestByKey(this.rows(dataset)).get(encodeKey(key));
  }

  async latestAll(dataset: string): Promise<Map<string, ChangeRecord>> {
    return latestByKey(this.rows(dataset));
  }

  async history(dataset: string, key: EntityKey, range?: TimeRange): Promise<ChangeRecord[]> {
    const encoded = encodeKey(key);
    return filterRange(
      this.rows(dataset).filter((row) => encodeKey(row.key) === encoded),
      range
    );
  }

  async scan(dataset: string, range?: TimeRange): Promise<ChangeRecord[]> {
    return filterRange(this.rows(dataset), range);
  }

  async close(): Promise<void> {
    this.datasets.clear();
  }

  private rows(dataset: string): readonly ChangeRecord[] {
    return this.datasets.get(dataset) ?? [];
  }
}
