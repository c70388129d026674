/**
 * Dataset Scheduler
 *
 * Change-gate loop for one dataset. Each cycle asks the fetcher for the
 * source marker and only fetches, diffs and persists when the marker differs
 * from the last successfully processed one. Failures back off exponentially
 * with jitter; schema breakage waits for the next regular run.
 *
 *   idle -> checking_marker -> skipping -> idle
 *                           -> fetching -> processing -> persisting -> notifying -> idle
 *   any failure -> backoff -> checking_marker
 */

import type {
  AlertSeverity,
  IEventDelivery,
  IMarkerStore,
  ISnapshotFetcher,
  Marker,
  OutboundEvent,
} from '@snapdelta/core';
import { SnapdeltaError, isSchemaError, wrapError } from '@snapdelta/core';
import type { DiffResult, RowDrop } from '@snapdelta/engine';
import { DEFAULT_BACKOFF, computeBackoffDelay, sleep as abortableSleep } from '../backoff.js';
import type { BackoffPolicy } from '../backoff.js';
import type { DatasetHealthRegistry } from '../dataset-health.js';
import type { Logger } from '../logger.js';
import { metrics as defaultMetrics } from '../metrics.js';
import type { Metrics } from '../metrics.js';
import type { DatasetPipeline } from '../pipeline.js';
import { delayUntilNextRun } from '../schedule.js';
import type { Schedule } from '../schedule.js';
import { timeoutError, withTimeout } from '../timeout.js';

export type SchedulerState =
  | 'idle'
  | 'checking_marker'
  | 'skipping'
  | 'fetching'
  | 'processing'
  | 'persisting'
  | 'notifying'
  | 'backoff';

export interface SchedulerTimeouts {
  /** Marker check (default: 30000ms) */
  markerMs?: number;
  /** Snapshot fetch (default: 120000ms) */
  fetchMs?: number;
  /** Each event delivery (default: 10000ms) */
  deliveryMs?: number;
}

export interface SchedulerBackoff extends Partial<BackoffPolicy> {
  /** Consecutive failures before an operator alert (default: 5) */
  escalateAfter?: number;
}

export interface DatasetSchedulerOptions {
  pipeline: DatasetPipeline;
  fetcher: ISnapshotFetcher;
  markers: IMarkerStore;
  delivery?: IEventDelivery;
  schedule: Schedule;
  backoff?: SchedulerBackoff;
  timeouts?: SchedulerTimeouts;
  logger: Logger;
  metrics?: Metrics;
  health?: DatasetHealthRegistry;
  onTransition?: (from: SchedulerState, to: SchedulerState) => void;
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
  random?: () => number;
  now?: () => Date;
}

export type CycleOutcome =
  | { kind: 'skipped'; marker: Marker; delayMs: number }
  | {
      kind: 'processed';
      marker: Marker;
      diff: DiffResult;
      dropped: RowDrop[];
      events: OutboundEvent[];
      delivered: number;
      delayMs: number;
    }
  | { kind: 'schema_error'; error: SnapdeltaError; delayMs: number }
  | { kind: 'failed'; error: SnapdeltaError; delayMs: number };

const DEFAULT_TIMEOUTS: Required<SchedulerTimeouts> = {
  markerMs: 30_000,
  fetchMs: 120_000,
  deliveryMs: 10_000,
};

const DEFAULT_ESCALATE_AFTER = 5;
const DROP_SAMPLE_SIZE = 5;

export class DatasetScheduler {
  private currentState: SchedulerState = 'idle';
  private currentAttempt = 0;
  private running = false;
  private escalated = false;
  private schemaAlerted = false;

  private readonly policy: BackoffPolicy;
  private readonly escalateAfter: number;
  private readonly timeouts: Required<SchedulerTimeouts>;
  private readonly logger: Logger;
  private readonly metrics: Metrics;
  private readonly sleep: (ms: number, signal: AbortSignal) => Promise<void>;
  private readonly random: () => number;
  private readonly now: () => Date;

  constructor(private readonly options: DatasetSchedulerOptions) {
    this.policy = {
      baseDelayMs: options.backoff?.baseDelayMs ?? DEFAULT_BACKOFF.baseDelayMs,
      maxDelayMs: options.backoff?.maxDelayMs ?? DEFAULT_BACKOFF.maxDelayMs,
    };
    this.escalateAfter = options.backoff?.escalateAfter ?? DEFAULT_ESCALATE_AFTER;
    this.timeouts = { ...DEFAULT_TIMEOUTS, ...options.timeouts };
    this.logger = options.logger.child({ dataset: options.pipeline.dataset });
    this.metrics = options.metrics ?? defaultMetrics;
    this.sleep = options.sleep ?? abortableSleep;
    this.random = options.random ?? Math.random;
    this.now = options.now ?? (() => new Date());
  }

  get dataset(): string {
    return this.options.pipeline.dataset;
  }

  get state(): SchedulerState {
    return this.currentState;
  }

  /** Consecutive failed cycles since the last success */
  get attempt(): number {
    return this.currentAttempt;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Run cycles until the signal aborts. Resolves once the loop has stopped.
   * @throws SnapdeltaError INVALID_OPTIONS when the loop is already running
   */
  async start(signal: AbortSignal): Promise<void> {
    if (this.running) {
      throw new SnapdeltaError({
        code: 'INVALID_OPTIONS',
        message: `Scheduler for ${this.dataset} is already running`,
        dataset: this.dataset,
      });
    }

    this.running = true;
    this.logger.info('Scheduler started', { source: this.options.fetcher.description });
    try {
      while (!signal.aborted) {
        const outcome = await this.runCycle();
        if (signal.aborted) break;
        await this.sleep(outcome.delayMs, signal);
        if (this.currentState === 'skipping') this.transition('idle');
      }
    } finally {
      this.running = false;
      this.transition('idle');
      this.logger.info('Scheduler stopped');
    }
  }

  /**
   * Run a single cycle from the marker check to the end of notification.
   * Never throws; the outcome carries the error and the delay before the
   * next cycle.
   */
  async runCycle(): Promise<CycleOutcome> {
    const startedAt = Date.now();
    try {
      return await this.executeCycle();
    } catch (err) {
      const error = wrapError(err, this.dataset);
      return isSchemaError(error)
        ? await this.handleSchemaError(error)
        : await this.handleFailure(error);
    } finally {
      this.metrics.observeCycleDuration(this.dataset, Date.now() - startedAt);
    }
  }

  private async executeCycle(): Promise<CycleOutcome> {
    const { pipeline, fetcher, markers } = this.options;

    this.transition('checking_marker');
    const marker = await withTimeout(fetcher.fetchMarker(), this.timeouts.markerMs, () =>
      timeoutError('Marker check', this.timeouts.markerMs, this.dataset)
    );
    const stored = await markers.get(this.dataset);

    if (stored && stored.token === marker.token) {
      this.transition('skipping');
      this.logger.debug('Marker unchanged, skipping cycle', { marker: marker.token });
      this.metrics.incCycle(this.dataset, 'skipped');
      this.resetFailures();
      return { kind: 'skipped', marker, delayMs: this.nextRunDelay() };
    }

    this.transition('fetching');
    this.logger.info('Marker changed, fetching snapshot', {
      marker: marker.token,
      previous: stored?.token,
    });
    const rows = await withTimeout(fetcher.fetchSnapshot(marker), this.timeouts.fetchMs, () =>
      timeoutError('Snapshot fetch', this.timeouts.fetchMs, this.dataset)
    );

    this.transition('processing');
    const processed = await pipeline.process(rows, marker.observedAt);
    this.reportDrops(processed.normalized.dropped, processed.normalized.duplicateKeys);

    this.transition('persisting');
    const { diff } = processed;
    await pipeline.persist(processed);

    this.transition('notifying');
    const events = pipeline.events(processed);
    const delivered = await this.deliverAll(events);

    await markers.set(this.dataset, marker);

    const at = this.now();
    this.logger.info('Cycle complete', {
      marker: marker.token,
      rows: rows.length,
      new: diff.newSet.length,
      changed: diff.changedSet.length,
      dropped: diff.droppedSet.length,
      events: events.length,
      delivered,
    });
    this.metrics.incCycle(this.dataset, diff.changes.length > 0 ? 'changed' : 'unchanged');
    this.metrics.incChanges(this.dataset, 'new', diff.newSet.length);
    this.metrics.incChanges(this.dataset, 'changed', diff.changedSet.length);
    this.metrics.incChanges(this.dataset, 'dropped', diff.droppedSet.length);
    this.metrics.setLastSuccess(this.dataset, at);
    this.options.health?.recordSuccess(this.dataset, at, diff.changes.length);
    this.resetFailures();

    const delayMs = this.nextRunDelay();
    this.transition('idle');
    return {
      kind: 'processed',
      marker,
      diff,
      dropped: processed.normalized.dropped,
      events,
      delivered,
      delayMs,
    };
  }

  private async handleSchemaError(error: SnapdeltaError): Promise<CycleOutcome> {
    this.options.health?.recordError(this.dataset, error, this.now());
    this.metrics.incCycle(this.dataset, 'schema_error');
    this.logger.error('Snapshot rejected; marker not advanced', { error });

    if (!this.schemaAlerted) {
      this.schemaAlerted = true;
      await this.raiseAlert('critical', error.code, error.toActionableMessage());
    }

    const delayMs = this.nextRunDelay();
    this.transition('idle');
    return { kind: 'schema_error', error, delayMs };
  }

  private async handleFailure(error: SnapdeltaError): Promise<CycleOutcome> {
    this.options.health?.recordError(this.dataset, error, this.now());
    this.metrics.incCycle(this.dataset, 'failed');

    const delayMs = computeBackoffDelay(this.currentAttempt, this.policy, this.random);
    this.currentAttempt++;
    this.metrics.setBackoffAttempt(this.dataset, this.currentAttempt);
    this.transition('backoff');

    if (this.currentAttempt >= this.escalateAfter) {
      this.logger.error('Cycle failed repeatedly', {
        attempt: this.currentAttempt,
        retryInMs: Math.round(delayMs),
        error,
      });
      if (!this.escalated) {
        this.escalated = true;
        await this.raiseAlert(
          'warning',
          error.code,
          `${this.currentAttempt} consecutive failures. Last: ${error.toActionableMessage()}`
        );
      }
    } else {
      this.logger.warn('Cycle failed, backing off', {
        attempt: this.currentAttempt,
        retryInMs: Math.round(delayMs),
        error,
      });
    }

    return { kind: 'failed', error, delayMs };
  }

  private async deliverAll(events: readonly OutboundEvent[]): Promise<number> {
    const { delivery } = this.options;
    if (!delivery || events.length === 0) return 0;

    let delivered = 0;
    for (const event of events) {
      try {
        await withTimeout(delivery.deliver(event), this.timeouts.deliveryMs, () =>
          timeoutError('Event delivery', this.timeouts.deliveryMs, this.dataset)
        );
        delivered++;
        this.metrics.incDelivery(this.dataset, 'success');
      } catch (err) {
        this.metrics.incDelivery(this.dataset, 'error');
        this.logger.warn('Event delivery failed; event dropped', {
          subject: event.subject,
          changeKind: event.changeKind,
          error: wrapError(err, this.dataset, 'DELIVERY_FAILED'),
        });
      }
    }
    return delivered;
  }

  private async raiseAlert(severity: AlertSeverity, code: string, message: string): Promise<void> {
    const { delivery } = this.options;
    if (!delivery?.alert) return;
    try {
      await withTimeout(
        delivery.alert({
          dataset: this.dataset,
          severity,
          code,
          message,
          at: this.now(),
        }),
        this.timeouts.deliveryMs,
        () => timeoutError('Operator alert', this.timeouts.deliveryMs, this.dataset)
      );
    } catch (err) {
      this.logger.warn('Operator alert failed', { error: wrapError(err, this.dataset, 'DELIVERY_FAILED') });
    }
  }

  private reportDrops(dropped: readonly RowDrop[], duplicateKeys: number): void {
    if (dropped.length > 0) {
      this.metrics.incRowsDropped(this.dataset, dropped.length);
      this.logger.warn('Rows dropped during normalization', {
        count: dropped.length,
        sample: dropped.slice(0, DROP_SAMPLE_SIZE),
      });
    }
    if (duplicateKeys > 0) {
      this.logger.warn('Duplicate keys in snapshot; last row kept', { count: duplicateKeys });
    }
  }

  private resetFailures(): void {
    if (this.currentAttempt > 0) {
      this.logger.info('Recovered after failures', { attempts: this.currentAttempt });
    }
    this.currentAttempt = 0;
    this.escalated = false;
    this.schemaAlerted = false;
    this.metrics.setBackoffAttempt(this.dataset, 0);
  }

  private nextRunDelay(): number {
    return delayUntilNextRun(this.options.schedule, this.now());
  }

  private transition(to: SchedulerState): void {
    const from = this.currentState;
    if (from === to) return;
    this.currentState = to;
    this.logger.debug('State transition', { from, to });
    this.options.health?.recordState(this.dataset, to, this.currentAttempt);
    this.options.onTransition?.(from, to);
  }
}
