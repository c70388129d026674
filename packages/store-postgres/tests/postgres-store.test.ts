import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { EventEmitter } from 'node:events';
import type { ChangeRecord } from '@snapdelta/core';
import { SnapdeltaError } from '@snapdelta/core';

interface RecordedQuery {
  via: 'pool' | 'client';
  sql: string;
  params?: unknown[];
}

const queries: RecordedQuery[] = [];
const releases: unknown[] = [];
let poolRows: Record<string, unknown>[] = [];
let failInsert: Error | undefined;
let failConnect: Error | undefined;
const pools: EventEmitter[] = [];

vi.mock('pg', async () => {
  const { EventEmitter } = await import('node:events');
  class MockClient {
    query = vi.fn(async (sql: string, params?: unknown[]) => {
      queries.push({ via: 'client', sql, params });
      if (failInsert && sql.includes('INSERT')) throw failInsert;
      return { rows: [], rowCount: 0 };
    });
    release = vi.fn((err?: unknown) => {
      releases.push(err);
    });
  }
  class MockPool extends EventEmitter {
    constructor() {
      super();
      pools.push(this);
    }
    connect = vi.fn(async () => {
      if (failConnect) throw failConnect;
      return new MockClient();
    });
    query = vi.fn(async (sql: string, params?: unknown[]) => {
      queries.push({ via: 'pool', sql, params });
      if (failConnect) throw failConnect;
      if (sql.startsWith('CREATE')) return { rows: [], rowCount: 0 };
      return { rows: poolRows, rowCount: poolRows.length };
    });
    end = vi.fn(async () => {});
  }
  return { default: { Pool: MockPool }, Pool: MockPool };
});

// Imports after mocks
import { PostgresClient } from '../src/client.js';
import { PostgresHistoryStore } from '../src/history-store.js';
import { PostgresMarkerStore } from '../src/marker-store.js';

const t0 = new Date('2024-03-01T00:00:00.000Z');
const t1 = new Date('2024-03-02T00:00:00.000Z');

function change(id: string, value: number, at: Date): ChangeRecord {
  return { key: [id], values: { id, value }, observedAt: at, changeKind: 'new' };
}

function connectionRefused(): Error {
  return Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:5432'), { code: 'ECONNREFUSED' });
}

describe('PostgresHistoryStore', () => {
  beforeEach(() => {
    queries.length = 0;
    releases.length = 0;
    poolRows = [];
    failInsert = undefined;
    failConnect = undefined;
  });

  it('writes a batch inside one transaction with upsert on the key and time', async () => {
    const store = new PostgresHistoryStore(new PostgresClient({}));
    const result = await store.append('positions', [change('A', 5, t0), change('B', 2, t0)]);

    expect(result).toEqual({ written: 2 });
    expect(queries[0]?.via).toBe('pool');
    expect(queries[0]?.sql).toContain('CREATE TABLE IF NOT EXISTS "public"."snapdelta_history_positions"');

    const transaction = queries.filter((q) => q.via === 'client').map((q) => q.sql.trim().split(/\s+/)[0]);
    expect(transaction).toEqual(['BEGIN', 'INSERT', 'COMMIT']);

    const insert = queries.find((q) => q.sql.includes('INSERT'));
    expect(insert?.sql).toContain('ON CONFLICT (entity_key, observed_at) DO UPDATE');
    expect(insert?.params).toEqual([
      '["A"]', '["A"]', '{"id":"A","value":5}', 'new', t0,
      '["B"]', '["B"]', '{"id":"B","value":2}', 'new', t0,
    ]);
    expect(releases).toEqual([undefined]);
  });

  it('splits large batches into several statements of one transaction', async () => {
    const store = new PostgresHistoryStore(new PostgresClient({}), { chunkSize: 2 });
    await store.append('positions', [change('A', 1, t0), change('B', 2, t0), change('C', 3, t0)]);

    const transaction = queries.filter((q) => q.via === 'client').map((q) => q.sql.trim().split(/\s+/)[0]);
    expect(transaction).toEqual(['BEGIN', 'INSERT', 'INSERT', 'COMMIT']);
  });

  it('rolls the batch back when a statement fails', async () => {
    failInsert = new Error('value too long');
    const store = new PostgresHistoryStore(new PostgresClient({}));

    const error = await store.append('positions', [change('A', 5, t0)]).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(SnapdeltaError);
    expect(error).toMatchObject({ code: 'STORE_WRITE_FAILED', dataset: 'positions' });
    const transaction = queries.filter((q) => q.via === 'client').map((q) => q.sql.trim().split(/\s+/)[0]);
    expect(transaction).toEqual(['BEGIN', 'INSERT', 'ROLLBACK']);
  });

  it('reports an unreachable server as transient', async () => {
    failConnect = connectionRefused();
    const store = new PostgresHistoryStore(new PostgresClient({}));

    await expect(store.latestAll('positions')).rejects.toMatchObject({
      code: 'STORE_UNAVAILABLE',
      dataset: 'positions',
    });
  });

  it('reads the latest row per key with DISTINCT ON', async () => {
    poolRows = [
      { key_parts: ['A'], field_values: { id: 'A', value: 6 }, change_kind: 'changed', observed_at: t1 },
      { key_parts: ['B'], field_values: { id: 'B', value: 0 }, change_kind: 'dropped', observed_at: t1 },
    ];
    const store = new PostgresHistoryStore(new PostgresClient({}));

    const latest = await store.latestAll('positions');

    expect(queries.at(-1)?.sql).toContain('SELECT DISTINCT ON (entity_key)');
    expect(Array.from(latest.keys())).toEqual(['["A"]', '["B"]']);
    expect(latest.get('["B"]')).toEqual({
      key: ['B'],
      values: { id: 'B', value: 0 },
      observedAt: t1,
      changeKind: 'dropped',
    });
  });

  it('passes range bounds as parameters', async () => {
    const store = new PostgresHistoryStore(new PostgresClient({}));
    await store.history('positions', ['A'], { since: t0 });

    expect(queries.at(-1)?.params).toEqual(['["A"]', t0, null]);
    expect(queries.at(-1)?.sql).toContain('ORDER BY observed_at ASC');
  });

  it('rejects rows of unexpected shape', async () => {
    poolRows = [{ key_parts: 'A', field_values: {}, change_kind: 'new', observed_at: t0 }];
    const store = new PostgresHistoryStore(new PostgresClient({}));

    await expect(store.scan('positions')).rejects.toMatchObject({ code: 'STORE_READ_FAILED' });
  });

  it('rejects dataset names that are not SQL identifiers', async () => {
    const store = new PostgresHistoryStore(new PostgresClient({}));

    await expect(store.scan('positions; DROP TABLE x')).rejects.toMatchObject({
      code: 'INVALID_OPTIONS',
    });
    expect(queries).toHaveLength(0);
  });
});

describe('PostgresMarkerStore', () => {
  beforeEach(() => {
    queries.length = 0;
    poolRows = [];
    failConnect = undefined;
  });

  it('returns undefined when no marker was saved', async () => {
    const store = new PostgresMarkerStore(new PostgresClient({}));
    expect(await store.get('positions')).toBeUndefined();
  });

  it('upserts the marker and reads it back', async () => {
    const store = new PostgresMarkerStore(new PostgresClient({}));
    await store.set('positions', { token: 'etag-1', observedAt: t1 });

    const upsert = queries.at(-1);
    expect(upsert?.sql).toContain('ON CONFLICT (dataset) DO UPDATE');
    expect(upsert?.params).toEqual(['positions', 'etag-1', t1]);

    poolRows = [{ token: 'etag-1', observed_at: t1 }];
    expect(await store.get('positions')).toEqual({ token: 'etag-1', observedAt: t1 });
  });
});

describe('PostgresClient', () => {
  beforeEach(() => {
    queries.length = 0;
    poolRows = [];
    failConnect = undefined;
  });

  it('survives an idle connection being terminated and keeps serving queries', async () => {
    const onPoolError = vi.fn();
    const client = new PostgresClient({ onPoolError });
    const pool = pools.at(-1);
    const terminated = new Error('terminating connection due to administrator command');

    expect(pool?.listenerCount('error')).toBe(1);
    expect(() => pool?.emit('error', terminated)).not.toThrow();
    expect(onPoolError).toHaveBeenCalledWith(terminated);

    await expect(client.query('SELECT 1')).resolves.toEqual({ rows: [], rowCount: 0 });
  });

  it('ignores pool errors when no callback is configured', () => {
    new PostgresClient({});
    const pool = pools.at(-1);

    expect(() => pool?.emit('error', new Error('connection lost'))).not.toThrow();
  });
});
