/**
 * Diff Engine
 *
 * Compares a normalized snapshot against the latest known value per key and
 * produces disjoint new / changed / dropped change sets.
 */

import type {
  ChangeRecord,
  DatasetSchema,
  EntityRecord,
  FieldValue,
} from '@snapdelta/core';
import { DEFAULT_ABSENCE_VALUE, encodeKey, isNumericKind } from '@snapdelta/core';
import { ValueComparator } from './value-comparator.js';

export interface DiffResult {
  newSet: ChangeRecord[];
  changedSet: ChangeRecord[];
  droppedSet: ChangeRecord[];
  /** newSet, changedSet and droppedSet concatenated in that order */
  changes: ChangeRecord[];
}

/**
 * Build the comparison baseline from the store's latest row per key.
 *
 * Keys whose latest row is a dropped tombstone are already recorded as
 * absent, so they are left out: a reappearance is reported as new and a
 * continued absence produces nothing.
 */
export function activeBaseline(
  latest: ReadonlyMap<string, ChangeRecord>
): Map<string, ChangeRecord> {
  const baseline = new Map<string, ChangeRecord>();
  for (const [key, record] of latest) {
    if (record.changeKind !== 'dropped') {
      baseline.set(key, record);
    }
  }
  return baseline;
}

function absenceValues(
  previous: EntityRecord,
  schema: DatasetSchema
): Record<string, FieldValue> {
  const absence = schema.absenceValue ?? DEFAULT_ABSENCE_VALUE;
  const values: Record<string, FieldValue> = { ...previous.values };
  for (const field of schema.fields) {
    if (isNumericKind(field.kind)) {
      values[field.name] = absence;
    }
  }
  return values;
}

/**
 * Diff a snapshot against the last known records.
 *
 * @param snapshot - Normalized records of this cycle
 * @param lastKnown - Latest record per encoded key, tombstones excluded
 * @param schema - Dataset schema (tolerance, drop policy, absence value)
 * @param observedAt - Marker time of this cycle, used for dropped rows
 */
export function diffSnapshot(
  snapshot: readonly EntityRecord[],
  lastKnown: ReadonlyMap<string, EntityRecord>,
  schema: DatasetSchema,
  observedAt: Date
): DiffResult {
  const comparator = new ValueComparator(schema);

  // Last write wins; position of the first occurrence is kept
  const current = new Map<string, EntityRecord>();
  for (const record of snapshot) {
    current.set(encodeKey(record.key), record);
  }

  const newSet: ChangeRecord[] = [];
  const changedSet: ChangeRecord[] = [];
  const droppedSet: ChangeRecord[] = [];

  for (const [key, record] of current) {
    const previous = lastKnown.get(key);

    if (!previous) {
      newSet.push({ ...record, changeKind: 'new' });
      continue;
    }

    if (comparator.changedFields(previous.values, record.values).length > 0) {
      changedSet.push({ ...record, changeKind: 'changed' });
    }
  }

  if ((schema.dropPolicy ?? 'record-absence') === 'record-absence') {
    for (const [key, previous] of lastKnown) {
      if (current.has(key)) continue;
      droppedSet.push({
        key: previous.key,
        values: absenceValues(previous, schema),
        observedAt,
        changeKind: 'dropped',
      });
    }
  }

  return {
    newSet,
    changedSet,
    droppedSet,
    changes: [...newSet, ...changedSet, ...droppedSet],
  };
}
