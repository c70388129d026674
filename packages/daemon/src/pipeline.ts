/**
 * Dataset Pipeline
 *
 * The data path of one cycle: normalize the fetched rows, diff them against
 * the stored baseline, append the changes and build outbound events.
 * Sequencing, timeouts and failure handling belong to the scheduler.
 */

import type {
  AppendResult,
  ChangeRecord,
  DatasetSchema,
  IHistoryStore,
  OutboundEvent,
  RawRow,
} from '@snapdelta/core';
import {
  NotificationDispatcher,
  activeBaseline,
  diffSnapshot,
  normalizeSnapshot,
} from '@snapdelta/engine';
import type { DiffResult, NormalizeResult, NotifyConfig } from '@snapdelta/engine';

export interface ProcessedSnapshot {
  observedAt: Date;
  normalized: NormalizeResult;
  /** Latest stored row per encoded key, read before this cycle's append */
  previous: Map<string, ChangeRecord>;
  diff: DiffResult;
}

export class DatasetPipeline {
  private readonly dispatcher: NotificationDispatcher | null;

  constructor(
    readonly schema: DatasetSchema,
    private readonly history: IHistoryStore,
    notify?: NotifyConfig
  ) {
    this.dispatcher = notify ? new NotificationDispatcher(schema.dataset, notify) : null;
  }

  get dataset(): string {
    return this.schema.dataset;
  }

  /**
   * @throws SnapdeltaError SCHEMA_MISMATCH / EMPTY_SNAPSHOT from the normalizer,
   *   or a store error from the baseline read
   */
  async process(rows: readonly RawRow[], observedAt: Date): Promise<ProcessedSnapshot> {
    const normalized = normalizeSnapshot(rows, this.schema, observedAt);
    const previous = await this.history.latestAll(this.dataset);
    const diff = diffSnapshot(normalized.records, activeBaseline(previous), this.schema, observedAt);
    return { observedAt, normalized, previous, diff };
  }

  async persist(processed: ProcessedSnapshot): Promise<AppendResult> {
    return this.history.append(this.dataset, processed.diff.changes);
  }

  events(processed: ProcessedSnapshot): OutboundEvent[] {
    if (!this.dispatcher) return [];
    return this.dispatcher.notify(processed.diff.changes, processed.previous);
  }
}
