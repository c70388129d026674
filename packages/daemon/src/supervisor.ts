/**
 * Supervisor
 *
 * Runs every registered dataset loop concurrently under one AbortController.
 * A loop that stops with an error is logged and does not affect the others.
 */

import type { DatasetRegistry } from './dataset-registry.js';
import type { Logger } from './logger.js';

export class Supervisor {
  private readonly controller = new AbortController();

  constructor(
    private readonly registry: DatasetRegistry,
    private readonly logger: Logger
  ) {}

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /**
   * Start all loops; resolves when every loop has stopped
   */
  async run(): Promise<void> {
    const schedulers = this.registry.list();
    this.logger.info('Supervisor starting', { datasets: this.registry.listIds() });

    await Promise.all(
      schedulers.map((scheduler) =>
        scheduler.start(this.controller.signal).catch((error: unknown) => {
          this.logger.error('Dataset loop stopped unexpectedly', {
            dataset: scheduler.dataset,
            error,
          });
        })
      )
    );

    this.logger.info('Supervisor stopped');
  }

  stop(reason = 'stop requested'): void {
    if (this.controller.signal.aborted) return;
    this.logger.info('Stopping dataset loops', { reason });
    this.controller.abort();
  }
}
