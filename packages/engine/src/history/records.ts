/**
 * Shared helpers for history stores
 *
 * Serialization of change records and the read-side rules every store
 * follows: one row per (key, observedAt) with the last write winning,
 * ascending observedAt order, latest = greatest observedAt.
 */

import { z } from 'zod';
import type { ChangeRecord, FieldValue, TimeRange } from '@snapdelta/core';
import { encodeKey, inRange } from '@snapdelta/core';

export const storedRecordSchema = z.object({
  key: z.array(z.string()).min(1),
  values: z.record(z.union([z.number(), z.string(), z.null()])),
  observedAt: z.string().datetime(),
  changeKind: z.enum(['new', 'changed', 'dropped']),
});

export type StoredRecord = z.infer<typeof storedRecordSchema>;

export function toStored(record: ChangeRecord): StoredRecord {
  return {
    key: [...record.key],
    values: { ...record.values },
    observedAt: record.observedAt.toISOString(),
    changeKind: record.changeKind,
  };
}

export function fromStored(stored: StoredRecord): ChangeRecord {
  const values: Record<string, FieldValue> = { ...stored.values };
  return {
    key: stored.key,
    values,
    observedAt: new Date(stored.observedAt),
    changeKind: stored.changeKind,
  };
}

function rowIdentity(record: ChangeRecord): string {
  return `${encodeKey(record.key)}@${record.observedAt.getTime()}`;
}

/**
 * Collapse rows written in append order: a later write for the same
 * (key, observedAt) replaces the earlier one. Result is sorted by
 * ascending observedAt, ties kept in write order.
 */
export function collapseRows(rows: readonly ChangeRecord[]): ChangeRecord[] {
  const byIdentity = new Map<string, ChangeRecord>();
  for (const row of rows) {
    byIdentity.set(rowIdentity(row), row);
  }
  return Array.from(byIdentity.values()).sort(
    (a, b) => a.observedAt.getTime() - b.observedAt.getTime()
  );
}

export function filterRange(rows: readonly ChangeRecord[], range?: TimeRange): ChangeRecord[] {
  return rows.filter((row) => inRange(row.observedAt, range));
}

/**
 * Latest row per encoded key from collapsed, ascending rows
 */
export function latestByKey(rows: readonly ChangeRecord[]): Map<string, ChangeRecord> {
  const latest = new Map<string, ChangeRecord>();
  for (const row of rows) {
    const key = encodeKey(row.key);
    const existing = latest.get(key);
    if (!existing || row.observedAt.getTime() >= existing.observedAt.getTime()) {
      latest.set(key, row);
    }
  }
  return latest;
}
