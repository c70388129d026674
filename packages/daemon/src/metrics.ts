import type { ChangeKind } from '@snapdelta/core';

export type CycleOutcomeLabel = 'changed' | 'unchanged' | 'skipped' | 'failed' | 'schema_error';
export type DeliveryOutcome = 'success' | 'error';

type MetricKey = string;

function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n');
}

function labelsToKey(labels: Record<string, string>): string {
  const parts = Object.entries(labels)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([k, v]) => `${k}="${escapeLabelValue(v)}"`);
  return parts.length ? `{${parts.join(',')}}` : '';
}

const COUNTERS: ReadonlyArray<[name: string, help: string]> = [
  ['snapdelta_cycles_total', 'Completed scheduler cycles by outcome'],
  ['snapdelta_changes_total', 'Change records persisted by kind'],
  ['snapdelta_rows_dropped_total', 'Raw rows discarded during normalization'],
  ['snapdelta_deliveries_total', 'Event deliveries by outcome'],
];

const GAUGES: ReadonlyArray<[name: string, help: string]> = [
  ['snapdelta_backoff_attempt', 'Current consecutive failure count per dataset'],
  ['snapdelta_last_success_timestamp_seconds', 'Unix time of the last successful cycle'],
];

export class Metrics {
  private readonly startedAt = Date.now();
  private readonly counters = new Map<MetricKey, number>();
  private readonly gauges = new Map<MetricKey, number>();

  private readonly cycleMsSumByDataset = new Map<string, number>();
  private readonly cycleMsCountByDataset = new Map<string, number>();

  private inc(name: string, labels: Record<string, string>, by = 1): void {
    const key = `${name}${labelsToKey(labels)}`;
    this.counters.set(key, (this.counters.get(key) ?? 0) + by);
  }

  incCycle(dataset: string, outcome: CycleOutcomeLabel): void {
    this.inc('snapdelta_cycles_total', { dataset, outcome });
  }

  incChanges(dataset: string, kind: ChangeKind, count: number): void {
    if (count <= 0) return;
    this.inc('snapdelta_changes_total', { dataset, kind }, count);
  }

  incRowsDropped(dataset: string, count: number): void {
    if (count <= 0) return;
    this.inc('snapdelta_rows_dropped_total', { dataset }, count);
  }

  incDelivery(dataset: string, outcome: DeliveryOutcome): void {
    this.inc('snapdelta_deliveries_total', { dataset, outcome });
  }

  setBackoffAttempt(dataset: string, attempt: number): void {
    this.gauges.set(`snapdelta_backoff_attempt${labelsToKey({ dataset })}`, attempt);
  }

  setLastSuccess(dataset: string, at: Date): void {
    this.gauges.set(
      `snapdelta_last_success_timestamp_seconds${labelsToKey({ dataset })}`,
      at.getTime() / 1000
    );
  }

  observeCycleDuration(dataset: string, durationMs: number): void {
    this.cycleMsSumByDataset.set(dataset, (this.cycleMsSumByDataset.get(dataset) ?? 0) + durationMs);
    this.cycleMsCountByDataset.set(dataset, (this.cycleMsCountByDataset.get(dataset) ?? 0) + 1);
  }

  /** Current value of a counter or gauge, by full series name */
  value(series: string): number | undefined {
    return this.counters.get(series) ?? this.gauges.get(series);
  }

  render(): string {
    const lines: string[] = [];
    const sortedCounters = Array.from(this.counters.entries()).sort(([a], [b]) =>
      a.localeCompare(b)
    );
    const sortedGauges = Array.from(this.gauges.entries()).sort(([a], [b]) => a.localeCompare(b));

    lines.push('# HELP snapdelta_uptime_seconds Process uptime in seconds');
    lines.push('# TYPE snapdelta_uptime_seconds gauge');
    lines.push(`snapdelta_uptime_seconds ${(Date.now() - this.startedAt) / 1000}`);

    for (const [name, help] of COUNTERS) {
      lines.push(`# HELP ${name} ${help}`);
      lines.push(`# TYPE ${name} counter`);
      for (const [key, value] of sortedCounters.filter(([k]) => k.startsWith(`${name}{`))) {
        lines.push(`${key} ${value}`);
      }
    }

    for (const [name, help] of GAUGES) {
      lines.push(`# HELP ${name} ${help}`);
      lines.push(`# TYPE ${name} gauge`);
      for (const [key, value] of sortedGauges.filter(([k]) => k.startsWith(`${name}{`))) {
        lines.push(`${key} ${value}`);
      }
    }

    lines.push('# HELP snapdelta_cycle_duration_ms Scheduler cycle duration in milliseconds');
    lines.push('# TYPE snapdelta_cycle_duration_ms summary');
    for (const dataset of Array.from(this.cycleMsSumByDataset.keys()).sort()) {
      const sum = this.cycleMsSumByDataset.get(dataset) ?? 0;
      const count = this.cycleMsCountByDataset.get(dataset) ?? 0;
      lines.push(`snapdelta_cycle_duration_ms_sum${labelsToKey({ dataset })} ${sum}`);
      lines.push(`snapdelta_cycle_duration_ms_count${labelsToKey({ dataset })} ${count}`);
    }

    return `${lines.join('\n')}\n`;
  }
}

export const metrics = new Metrics();
