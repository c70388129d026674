import type { SchedulerState } from './scheduler/dataset-scheduler.js';

export type DatasetErrorSummary = {
  name?: string;
  message: string;
  code?: string;
  at: string;
};

export type DatasetHealth = {
  dataset: string;
  state: SchedulerState;
  attempt: number;
  lastSuccessAt?: string;
  lastChangeCount?: number;
  lastError?: DatasetErrorSummary;
};

/**
 * Per-dataset status served by the health endpoint
 */
export class DatasetHealthRegistry {
  private readonly byDataset = new Map<string, DatasetHealth>();

  private getOrCreate(dataset: string): DatasetHealth {
    const existing = this.byDataset.get(dataset);
    if (existing) return existing;
    const created: DatasetHealth = { dataset, state: 'idle', attempt: 0 };
    this.byDataset.set(dataset, created);
    return created;
  }

  recordState(dataset: string, state: SchedulerState, attempt: number): void {
    const entry = this.getOrCreate(dataset);
    entry.state = state;
    entry.attempt = attempt;
  }

  recordSuccess(dataset: string, at: Date, changeCount: number): void {
    const entry = this.getOrCreate(dataset);
    entry.lastSuccessAt = at.toISOString();
    entry.lastChangeCount = changeCount;
  }

  recordError(dataset: string, err: unknown, at: Date): void {
    const entry = this.getOrCreate(dataset);
    const error = err instanceof Error ? err : new Error(String(err));
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    entry.lastError = {
      name: error.name,
      message: error.message,
      code,
      at: at.toISOString(),
    };
  }

  get(dataset: string): DatasetHealth | null {
    const entry = this.byDataset.get(dataset);
    return entry ? { ...entry } : null;
  }

  list(): DatasetHealth[] {
    return Array.from(this.byDataset.values())
      .map((entry) => ({ ...entry }))
      .sort((a, b) => a.dataset.localeCompare(b.dataset));
  }
}
