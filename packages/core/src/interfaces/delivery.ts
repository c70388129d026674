/**
 * Delivery Interface
 *
 * Receives structured change events and renders/transmits them. The core
 * does not know how or where events are displayed.
 */

import type { ChangeKind, ChangeRecord, EntityKey } from '../types/index.js';

export interface OutboundEvent {
  dataset: string;
  /** Human-readable subject label */
  subject: string;
  key: EntityKey;
  /** New value of the reported field (the absence value for dropped keys) */
  value: number | string | null;
  /** Signed difference against the previous value, null without a numeric prior */
  delta: number | null;
  changeKind: ChangeKind;
  observedAt: Date;
  record: ChangeRecord;
}

export type AlertSeverity = 'warning' | 'critical';

/** Operator-visible condition (schema breakage, escalating backoff) */
export interface OperatorAlert {
  dataset: string;
  severity: AlertSeverity;
  code: string;
  message: string;
  at: Date;
}

export interface IEventDelivery {
  deliver(event: OutboundEvent): Promise<void>;
  alert?(alert: OperatorAlert): Promise<void>;
}
