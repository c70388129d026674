/**
 * Notification Dispatcher
 *
 * Filters a cycle's change records to the tracked keys and turns each match
 * into an OutboundEvent carrying the new value and its signed delta. Delivery
 * is left to an IEventDelivery.
 */

import type {
  ChangeKind,
  ChangeRecord,
  EntityRecord,
  FieldValue,
  OutboundEvent,
} from '@snapdelta/core';
import { encodeKey, formatKey } from '@snapdelta/core';
import { TrackedKeyMatcher } from './tracked-keys.js';
import type { MatchMode } from './tracked-keys.js';

export interface NotifyConfig {
  /** Allow-list; "*" tracks every key, an empty list tracks none */
  trackedKeys: string[];
  match?: MatchMode;
  /** Field whose value labels the subject (default: key parts joined by " / ") */
  labelField?: string;
  /** Field reported as the new value */
  valueField: string;
  /** Change kinds to report (default: all) */
  kinds?: ChangeKind[];
}

const ALL_KINDS: readonly ChangeKind[] = ['new', 'changed', 'dropped'];

export class NotificationDispatcher {
  private readonly matcher: TrackedKeyMatcher;
  private readonly kinds: ReadonlySet<ChangeKind>;

  constructor(
    private readonly dataset: string,
    private readonly config: NotifyConfig
  ) {
    this.matcher = new TrackedKeyMatcher(config.trackedKeys, config.match ?? 'exact');
    this.kinds = new Set(config.kinds ?? ALL_KINDS);
  }

  /**
   * Build events for tracked changes.
   *
   * @param changes - Change records of this cycle
   * @param previous - Latest row per encoded key read before this cycle's append
   */
  notify(
    changes: readonly ChangeRecord[],
    previous: ReadonlyMap<string, EntityRecord>
  ): OutboundEvent[] {
    const events: OutboundEvent[] = [];

    for (const change of changes) {
      if (!this.kinds.has(change.changeKind)) continue;

      const subject = this.subjectOf(change);
      if (!this.matcher.matches([subject, ...change.key])) continue;

      const value = change.values[this.config.valueField] ?? null;
      const prior = previous.get(encodeKey(change.key));

      events.push({
        dataset: this.dataset,
        subject,
        key: change.key,
        value,
        delta: signedDelta(value, prior?.values[this.config.valueField]),
        changeKind: change.changeKind,
        observedAt: change.observedAt,
        record: change,
      });
    }

    return events;
  }

  private subjectOf(record: EntityRecord): string {
    if (this.config.labelField) {
      const label = record.values[this.config.labelField];
      if (label !== null && label !== undefined && String(label).trim() !== '') {
        return String(label).trim();
      }
    }
    return formatKey(record.key);
  }
}

function signedDelta(value: FieldValue, prior: FieldValue | undefined): number | null {
  if (typeof value !== 'number' || typeof prior !== 'number') return null;
  return value - prior;
}
