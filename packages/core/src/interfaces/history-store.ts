/**
 * History Store Interface
 *
 * Append-only record of change rows. Current truth for a key is always the
 * row with the greatest observedAt; nothing is updated in place.
 */

import type { ChangeRecord, EntityKey, TimeRange } from '../types/index.js';

export interface AppendResult {
  /** Rows in the batch */
  written: number;
}

export interface IHistoryStore {
  /**
   * Append one cycle's change rows atomically: all rows become durable or none.
   * Re-appending a row with the same (key, observedAt) replaces it logically.
   */
  append(dataset: string, changes: readonly ChangeRecord[]): Promise<AppendResult>;

  /** Row with the greatest observedAt for the key */
  latest(dataset: string, key: EntityKey): Promise<ChangeRecord | undefined>;

  /** Latest row for every key of the dataset, keyed by encoded key */
  latestAll(dataset: string): Promise<Map<string, ChangeRecord>>;

  /** Rows for one key in ascending observedAt order */
  history(dataset: string, key: EntityKey, range?: TimeRange): Promise<ChangeRecord[]>;

  /** Rows for the whole dataset in ascending observedAt order */
  scan(dataset: string, range?: TimeRange): Promise<ChangeRecord[]>;

  close(): Promise<void>;
}
