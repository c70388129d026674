import { afterEach, describe, expect, it } from 'vitest';
import { appendFileSync, mkdtempSync, readdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { ChangeKind, ChangeRecord } from '@snapdelta/core';
import { FileHistoryStore } from '../src/history/file-history-store.js';
import { MemoryHistoryStore } from '../src/history/memory-history-store.js';
import { FileMarkerStore } from '../src/markers/file-marker-store.js';

const t0 = new Date('2024-03-01T00:00:00.000Z');
const t1 = new Date('2024-03-02T00:00:00.000Z');
const t2 = new Date('2024-03-03T00:00:00.000Z');

function change(id: string, value: number, at: Date, changeKind: ChangeKind = 'new'): ChangeRecord {
  return { key: [id], values: { id, value }, observedAt: at, changeKind };
}

describe('FileHistoryStore', () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  function createStore(): FileHistoryStore {
    dir = mkdtempSync(join(tmpdir(), 'snapdelta-history-'));
    return new FileHistoryStore(dir);
  }

  it('appends one line per batch and reads rows back', async () => {
    const store = createStore();

    const result = await store.append('positions', [change('A', 5, t0), change('B', 2, t0)]);
    expect(result).toEqual({ written: 2 });
    await store.append('positions', [change('A', 6, t1, 'changed')]);

    const content = readFileSync(join(dir ?? '', 'positions.ndjson'), 'utf-8');
    expect(content.trim().split('\n')).toHaveLength(2);

    const latest = await store.latest('positions', ['A']);
    expect(latest).toEqual(change('A', 6, t1, 'changed'));
    expect((await store.history('positions', ['A'])).map((r) => r.observedAt)).toEqual([t0, t1]);
  });

  it('skips the write for an empty batch', async () => {
    const store = createStore();
    expect(await store.append('positions', [])).toEqual({ written: 0 });
    expect(readdirSync(dir ?? '')).toEqual([]);
  });

  it('returns history in ascending order regardless of append order', async () => {
    const store = createStore();
    await store.append('positions', [change('A', 7, t2, 'changed')]);
    await store.append('positions', [change('A', 5, t0)]);

    const history = await store.history('positions', ['A']);
    expect(history.map((r) => r.observedAt)).toEqual([t0, t2]);
    expect((await store.latest('positions', ['A']))?.values.value).toBe(7);
  });

  it('does not duplicate rows when a batch is appended twice', async () => {
    const store = createStore();
    const batch = [change('A', 5, t0), change('B', 2, t0)];
    await store.append('positions', batch);
    await store.append('positions', batch);

    expect(await store.scan('positions')).toHaveLength(2);
  });

  it('ignores a truncated trailing batch and keeps appending after it', async () => {
    const store = createStore();
    await store.append('positions', [change('A', 5, t0)]);
    appendFileSync(join(dir ?? '', 'positions.ndjson'), '{"batchId":"cut","records":[{"key":["B"');

    expect((await store.scan('positions')).map((r) => r.key)).toEqual([['A']]);

    await store.append('positions', [change('C', 1, t1)]);
    expect((await store.scan('positions')).map((r) => r.key)).toEqual([['A'], ['C']]);
  });

  it('filters by inclusive time range', async () => {
    const store = createStore();
    await store.append('positions', [change('A', 5, t0)]);
    await store.append('positions', [change('A', 6, t1, 'changed')]);
    await store.append('positions', [change('A', 7, t2, 'changed')]);

    const rows = await store.history('positions', ['A'], { since: t1, until: t2 });
    expect(rows.map((r) => r.values.value)).toEqual([6, 7]);
  });

  it('keeps datasets apart', async () => {
    const store = createStore();
    await store.append('positions', [change('A', 5, t0)]);
    await store.append('holders', [change('A', 9, t0)]);

    const latest = await store.latestAll('holders');
    expect(Array.from(latest.values()).map((r) => r.values.value)).toEqual([9]);
    expect(await store.scan('rankings')).toEqual([]);
  });

  it('serializes concurrent appends to the same file', async () => {
    const store = createStore();
    await Promise.all([
      store.append('positions', [change('A', 1, t0)]),
      store.append('positions', [change('B', 2, t0)]),
      store.append('positions', [change('C', 3, t0)]),
    ]);

    const content = readFileSync(join(dir ?? '', 'positions.ndjson'), 'utf-8');
    expect(content.trim().split('\n')).toHaveLength(3);
    expect(await store.scan('positions')).toHaveLength(3);
  });
});

describe('MemoryHistoryStore', () => {
  it('returns the max-observedAt row as latest', async () => {
    const store = new MemoryHistoryStore();
    await store.append('positions', [change('A', 6, t1, 'changed')]);
    await store.append('positions', [change('A', 5, t0)]);

    expect((await store.latest('positions', ['A']))?.values.value).toBe(6);
  });

  it('replaces a row written again for the same key and time', async () => {
    const store = new MemoryHistoryStore();
    await store.append('positions', [change('A', 5, t0)]);
    await store.append('positions', [change('A', 8, t0)]);

    const history = await store.history('positions', ['A']);
    expect(history.map((r) => r.values.value)).toEqual([8]);
  });
});

describe('FileMarkerStore', () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('returns undefined before the first save', async () => {
    dir = mkdtempSync(join(tmpdir(), 'snapdelta-markers-'));
    const store = new FileMarkerStore(dir);
    expect(await store.get('positions')).toBeUndefined();
  });

  it('persists the marker across store instances', async () => {
    dir = mkdtempSync(join(tmpdir(), 'snapdelta-markers-'));
    await new FileMarkerStore(dir).set('positions', { token: 'etag-1', observedAt: t1 });
    await new FileMarkerStore(dir).set('positions', { token: 'etag-2', observedAt: t2 });

    expect(await new FileMarkerStore(dir).get('positions')).toEqual({ token: 'etag-2', observedAt: t2 });
    expect(readdirSync(dir)).toEqual(['positions.marker.json']);
  });

  it('reports a corrupt marker file', async () => {
    dir = mkdtempSync(join(tmpdir(), 'snapdelta-markers-'));
    writeFileSync(join(dir, 'positions.marker.json'), '{"token":');

    await expect(new FileMarkerStore(dir).get('positions')).rejects.toMatchObject({
      code: 'STORE_READ_FAILED',
    });
  });
});
