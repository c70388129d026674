/**
 * Dataset Registry
 *
 * Holds one scheduler per configured dataset.
 */

import { SnapdeltaError } from '@snapdelta/core';
import type { DatasetScheduler } from './scheduler/dataset-scheduler.js';

export class DatasetRegistry {
  private schedulers = new Map<string, DatasetScheduler>();

  /**
   * Register a dataset scheduler
   */
  register(scheduler: DatasetScheduler): void {
    const id = scheduler.dataset;

    if (this.schedulers.has(id)) {
      throw new SnapdeltaError({
        code: 'CONFIGURATION_ERROR',
        message: `Dataset '${id}' is already registered`,
        dataset: id,
        suggestion: 'Use a unique id for each dataset.',
      });
    }

    this.schedulers.set(id, scheduler);
  }

  get(id: string): DatasetScheduler | undefined {
    return this.schedulers.get(id);
  }

  /**
   * Get a scheduler by dataset id, throw if not found
   */
  getOrThrow(id: string): DatasetScheduler {
    const scheduler = this.schedulers.get(id);

    if (!scheduler) {
      throw new SnapdeltaError({
        code: 'CONFIGURATION_ERROR',
        message: `Dataset '${id}' not found`,
        suggestion: `Available datasets: ${this.listIds().join(', ') || 'none'}`,
      });
    }

    return scheduler;
  }

  listIds(): string[] {
    return Array.from(this.schedulers.keys());
  }

  list(): DatasetScheduler[] {
    return Array.from(this.schedulers.values());
  }
}
