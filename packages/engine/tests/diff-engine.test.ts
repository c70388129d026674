import { describe, expect, it } from 'vitest';
import type { DatasetSchema, EntityRecord } from '@snapdelta/core';
import { encodeKey } from '@snapdelta/core';
import { activeBaseline, diffSnapshot } from '../src/diff/diff-engine.js';
import { MemoryHistoryStore } from '../src/history/memory-history-store.js';

const schema: DatasetSchema = {
  dataset: 'positions',
  keyFields: ['id'],
  fields: [
    { name: 'id', kind: 'string', required: true },
    { name: 'value', kind: 'number', required: true },
    { name: 'holder', kind: 'string', required: false },
  ],
};

const t0 = new Date('2024-03-01T00:00:00.000Z');
const t1 = new Date('2024-03-02T00:00:00.000Z');
const t2 = new Date('2024-03-03T00:00:00.000Z');

function entity(id: string, value: number, at: Date, holder: string | null = null): EntityRecord {
  return { key: [id], values: { id, value, holder }, observedAt: at };
}

function baseline(...records: EntityRecord[]): Map<string, EntityRecord> {
  return new Map(records.map((record) => [encodeKey(record.key), record]));
}

describe('diffSnapshot', () => {
  it('reports every key as new against an empty baseline', async () => {
    const store = new MemoryHistoryStore();
    const diff = diffSnapshot([entity('A', 5, t1), entity('B', 2, t1)], new Map(), schema, t1);

    expect(diff.newSet.map((r) => r.key)).toEqual([['A'], ['B']]);
    expect(diff.changedSet).toEqual([]);
    expect(diff.droppedSet).toEqual([]);

    await store.append('positions', diff.changes);
    expect(await store.scan('positions')).toHaveLength(2);
  });

  it('leaves unchanged keys out', () => {
    const diff = diffSnapshot(
      [entity('A', 5, t1), entity('B', 2, t1)],
      baseline(entity('A', 5, t0)),
      schema,
      t1
    );

    expect(diff.newSet.map((r) => r.key)).toEqual([['B']]);
    expect(diff.changedSet).toEqual([]);
    expect(diff.droppedSet).toEqual([]);
  });

  it('emits the full new record for a changed key', async () => {
    const store = new MemoryHistoryStore();
    await store.append('positions', [{ ...entity('A', 5, t0), changeKind: 'new' }]);

    const lastKnown = activeBaseline(await store.latestAll('positions'));
    const diff = diffSnapshot([entity('A', 6.2, t1, 'Fund One')], lastKnown, schema, t1);

    expect(diff.changedSet).toEqual([
      {
        key: ['A'],
        values: { id: 'A', value: 6.2, holder: 'Fund One' },
        observedAt: t1,
        changeKind: 'changed',
      },
    ]);

    await store.append('positions', diff.changes);
    const history = await store.history('positions', ['A']);
    expect(history.map((r) => [r.values.value, r.observedAt])).toEqual([
      [5, t0],
      [6.2, t1],
    ]);
  });

  it('records an absence row for a vanished key', () => {
    const diff = diffSnapshot(
      [entity('A', 5, t1)],
      baseline(entity('A', 5, t0), entity('B', 2, t0, 'Fund Two')),
      schema,
      t1
    );

    expect(diff.newSet).toEqual([]);
    expect(diff.changedSet).toEqual([]);
    expect(diff.droppedSet).toEqual([
      {
        key: ['B'],
        values: { id: 'B', value: 0, holder: 'Fund Two' },
        observedAt: t1,
        changeKind: 'dropped',
      },
    ]);
  });

  it('uses the configured absence value', () => {
    const diff = diffSnapshot(
      [],
      baseline(entity('B', 2, t0)),
      { ...schema, absenceValue: -1 },
      t1
    );

    expect(diff.droppedSet[0]?.values.value).toBe(-1);
  });

  it('emits nothing for vanished keys under the ignore policy', () => {
    const diff = diffSnapshot(
      [entity('A', 5, t1)],
      baseline(entity('A', 5, t0), entity('B', 2, t0)),
      { ...schema, dropPolicy: 'ignore' },
      t1
    );

    expect(diff.changes).toEqual([]);
  });

  it('treats numeric differences within tolerance as equal', () => {
    const lastKnown = baseline(entity('A', 0.5, t0));

    expect(diffSnapshot([entity('A', 0.5000001, t1)], lastKnown, schema, t1).changes).toEqual([]);
    expect(
      diffSnapshot([entity('A', 0.504, t1)], lastKnown, { ...schema, tolerance: 0.01 }, t1).changes
    ).toEqual([]);
    expect(diffSnapshot([entity('A', 0.51, t1)], lastKnown, schema, t1).changedSet).toHaveLength(1);
  });

  it('compares text after trimming and honours caseFold', () => {
    const lastKnown = baseline(entity('A', 5, t0, 'Fund One'));

    expect(diffSnapshot([entity('A', 5, t1, ' Fund One ')], lastKnown, schema, t1).changes).toEqual([]);
    expect(diffSnapshot([entity('A', 5, t1, 'FUND ONE')], lastKnown, schema, t1).changedSet).toHaveLength(1);

    const folded: DatasetSchema = {
      ...schema,
      fields: schema.fields.map((field) =>
        field.name === 'holder' ? { ...field, caseFold: true } : field
      ),
    };
    expect(diffSnapshot([entity('A', 5, t1, 'FUND ONE')], lastKnown, folded, t1).changes).toEqual([]);
  });

  it('treats null as equal only to null', () => {
    const lastKnown = baseline(entity('A', 5, t0, null));

    expect(diffSnapshot([entity('A', 5, t1, null)], lastKnown, schema, t1).changes).toEqual([]);
    expect(diffSnapshot([entity('A', 5, t1, '')], lastKnown, schema, t1).changedSet).toHaveLength(1);
  });

  it('deduplicates the snapshot with the last occurrence winning', () => {
    const diff = diffSnapshot([entity('A', 1, t1), entity('A', 3, t1)], new Map(), schema, t1);

    expect(diff.newSet).toHaveLength(1);
    expect(diff.newSet[0]?.values.value).toBe(3);
  });

  it('places every key in at most one set', () => {
    const diff = diffSnapshot(
      [entity('A', 5, t1), entity('B', 3, t1), entity('D', 1, t1)],
      baseline(entity('A', 5, t0), entity('B', 2, t0), entity('C', 7, t0)),
      schema,
      t1
    );

    const keys = diff.changes.map((record) => encodeKey(record.key));
    expect(new Set(keys).size).toBe(keys.length);
    expect(diff.changes.map((record) => [record.key[0], record.changeKind])).toEqual([
      ['D', 'new'],
      ['B', 'changed'],
      ['C', 'dropped'],
    ]);
  });

  it('is empty when the same snapshot is diffed against the updated baseline', async () => {
    const store = new MemoryHistoryStore();
    await store.append('positions', [
      { ...entity('A', 5, t0), changeKind: 'new' },
      { ...entity('B', 2, t0), changeKind: 'new' },
    ]);
    const snapshot = [entity('A', 6, t1), entity('C', 1, t1)];

    const first = diffSnapshot(snapshot, activeBaseline(await store.latestAll('positions')), schema, t1);
    expect(first.changes).toHaveLength(3);
    await store.append('positions', first.changes);

    const second = diffSnapshot(snapshot, activeBaseline(await store.latestAll('positions')), schema, t2);
    expect(second.newSet).toEqual([]);
    expect(second.changedSet).toEqual([]);
    expect(second.droppedSet).toEqual([]);
  });

  it('reports a key that reappears after a tombstone as new', async () => {
    const store = new MemoryHistoryStore();
    await store.append('positions', [{ ...entity('B', 2, t0), changeKind: 'new' }]);
    await store.append('positions', diffSnapshot([], activeBaseline(await store.latestAll('positions')), { ...schema, allowEmpty: true }, t1).changes);

    const latest = await store.latest('positions', ['B']);
    expect(latest?.changeKind).toBe('dropped');

    const diff = diffSnapshot([entity('B', 2.5, t2)], activeBaseline(await store.latestAll('positions')), schema, t2);
    expect(diff.newSet.map((r) => r.key)).toEqual([['B']]);
    expect(diff.droppedSet).toEqual([]);
  });
});
