import { afterEach, describe, expect, it } from 'vitest';
import { mkdtempSync, rmSync, utimesSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { FileSnapshotFetcher } from '../src/fetchers/file-snapshot-fetcher.js';
import { HttpSnapshotFetcher } from '../src/fetchers/http-snapshot-fetcher.js';
import type { FetchFn } from '../src/fetchers/http-client.js';
import { parseMarkerDate } from '../src/fetchers/marker-strategies.js';

interface FakeCall {
  url: string;
  method: string;
}

function fakeFetch(respond: (url: string, method: string) => Response): { fetch: FetchFn; calls: FakeCall[] } {
  const calls: FakeCall[] = [];
  const fetch: FetchFn = async (url, init) => {
    const method = init?.method ?? 'GET';
    calls.push({ url, method });
    return respond(url, method);
  };
  return { fetch, calls };
}

const CSV = 'id,rank\nA,1\nB,2\n';

describe('FileSnapshotFetcher', () => {
  let dir = '';

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = '';
  });

  it('derives the marker from modification time and size', async () => {
    dir = mkdtempSync(join(tmpdir(), 'snapdelta-sources-'));
    const filePath = join(dir, 'ranks.csv');
    writeFileSync(filePath, CSV);
    const mtime = new Date('2024-03-01T10:00:00.000Z');
    utimesSync(filePath, mtime, mtime);

    const fetcher = new FileSnapshotFetcher({ filePath, format: 'csv' });
    const marker = await fetcher.fetchMarker();

    expect(marker).toEqual({ token: `2024-03-01T10:00:00.000Z:${CSV.length}`, observedAt: mtime });
    expect(await fetcher.fetchMarker()).toEqual(marker);

    const later = new Date('2024-03-02T10:00:00.000Z');
    utimesSync(filePath, later, later);
    expect((await fetcher.fetchMarker()).token).not.toBe(marker.token);
  });

  it('reads rows with the configured format', async () => {
    dir = mkdtempSync(join(tmpdir(), 'snapdelta-sources-'));
    const filePath = join(dir, 'ranks.json');
    writeFileSync(filePath, JSON.stringify({ items: [{ id: 'A', rank: 1 }] }));

    const fetcher = new FileSnapshotFetcher({ filePath, format: 'json', json: { recordsPath: 'items' } });
    const rows = await fetcher.fetchSnapshot(await fetcher.fetchMarker());

    expect(rows).toEqual([{ id: 'A', rank: 1 }]);
  });

  it('reports a missing file as a permanent failure', async () => {
    const fetcher = new FileSnapshotFetcher({ filePath: join(tmpdir(), 'snapdelta-missing.csv'), format: 'csv' });
    await expect(fetcher.fetchMarker()).rejects.toMatchObject({ code: 'FETCH_FAILED' });
  });
});

describe('HttpSnapshotFetcher', () => {
  it('uses ETag from a HEAD request as the marker', async () => {
    const { fetch, calls } = fakeFetch(
      () =>
        new Response(null, {
          status: 200,
          headers: { etag: '"v7"', 'last-modified': 'Fri, 01 Mar 2024 10:00:00 GMT' },
        })
    );
    const fetcher = new HttpSnapshotFetcher(
      { url: 'https://example.test/ranks.csv', format: 'csv', marker: { type: 'http-header' } },
      { fetch }
    );

    expect(await fetcher.fetchMarker()).toEqual({
      token: '"v7"',
      observedAt: new Date('2024-03-01T10:00:00.000Z'),
    });
    expect(calls).toEqual([{ url: 'https://example.test/ranks.csv', method: 'HEAD' }]);
  });

  it('extracts a page-pattern marker and parses its date', async () => {
    const { fetch } = fakeFetch(() => new Response('<p>List updated: 01.03.2024 09:30</p>'));
    const fetcher = new HttpSnapshotFetcher(
      {
        url: 'https://example.test/positions.xlsx',
        format: 'excel',
        marker: {
          type: 'page-pattern',
          url: 'https://example.test/positions',
          pattern: 'List updated:\\s*([0-9.]+ [0-9:]+)',
        },
      },
      { fetch }
    );

    expect(await fetcher.fetchMarker()).toEqual({
      token: '01.03.2024 09:30',
      observedAt: new Date('2024-03-01T09:30:00.000Z'),
    });
  });

  it('reports a page without the marker as a schema mismatch', async () => {
    const { fetch } = fakeFetch(() => new Response('<p>redesigned page</p>'));
    const fetcher = new HttpSnapshotFetcher(
      {
        url: 'https://example.test/positions.xlsx',
        format: 'excel',
        marker: { type: 'page-pattern', pattern: 'List updated: (\\S+)' },
      },
      { fetch }
    );

    await expect(fetcher.fetchMarker()).rejects.toMatchObject({ code: 'SCHEMA_MISMATCH' });
  });

  it('floors the clock to the bucket for time-bucket markers', async () => {
    const { fetch, calls } = fakeFetch(() => new Response(CSV));
    const fetcher = new HttpSnapshotFetcher(
      { url: 'https://example.test/ranks.csv', format: 'csv', marker: { type: 'time-bucket', bucketMs: 3_600_000 } },
      { fetch, now: () => new Date('2024-03-01T10:42:13.000Z') }
    );

    expect(await fetcher.fetchMarker()).toEqual({
      token: '2024-03-01T10:00:00.000Z',
      observedAt: new Date('2024-03-01T10:00:00.000Z'),
    });
    expect(calls).toEqual([]);
  });

  it('downloads and parses the snapshot', async () => {
    const { fetch } = fakeFetch(() => new Response(CSV));
    const fetcher = new HttpSnapshotFetcher(
      { url: 'https://example.test/ranks.csv', format: 'csv', marker: { type: 'http-header' } },
      { fetch }
    );

    const rows = await fetcher.fetchSnapshot({ token: 'x', observedAt: new Date() });
    expect(rows).toEqual([
      { id: 'A', rank: '1' },
      { id: 'B', rank: '2' },
    ]);
  });

  it('maps server errors to transient and client errors to permanent codes', async () => {
    const statuses = [503, 429, 404];
    const codes: unknown[] = [];
    for (const status of statuses) {
      const { fetch } = fakeFetch(() => new Response('', { status }));
      const fetcher = new HttpSnapshotFetcher(
        { url: 'https://example.test/ranks.csv', format: 'csv', marker: { type: 'http-header' } },
        { fetch }
      );
      codes.push(await fetcher.fetchSnapshot({ token: 'x', observedAt: new Date() }).catch((err: unknown) => err));
    }

    expect(codes.map((err) => (err instanceof Error && 'code' in err ? err.code : undefined))).toEqual([
      'FETCH_TRANSIENT',
      'FETCH_TRANSIENT',
      'FETCH_FAILED',
    ]);
  });

  it('maps network failures to a transient code', async () => {
    const fetch: FetchFn = async () => {
      throw new TypeError('fetch failed');
    };
    const fetcher = new HttpSnapshotFetcher(
      { url: 'https://example.test/ranks.csv', format: 'csv', marker: { type: 'http-header' } },
      { fetch }
    );

    await expect(fetcher.fetchMarker()).rejects.toMatchObject({ code: 'FETCH_TRANSIENT' });
  });

  it('times out a stuck request', async () => {
    const fetch: FetchFn = (_url, init) =>
      new Promise((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => {
          reject(Object.assign(new Error('This operation was aborted'), { name: 'AbortError' }));
        });
      });
    const fetcher = new HttpSnapshotFetcher(
      { url: 'https://example.test/ranks.csv', format: 'csv', marker: { type: 'http-header' }, timeoutMs: 20 },
      { fetch }
    );

    await expect(fetcher.fetchSnapshot({ token: 'x', observedAt: new Date() })).rejects.toMatchObject({
      code: 'TIMEOUT',
      message: 'GET https://example.test/ranks.csv timed out after 20ms',
    });
  });
});

describe('parseMarkerDate', () => {
  it('parses day-first and RFC dates', () => {
    expect(parseMarkerDate('01.03.2024')).toEqual(new Date('2024-03-01T00:00:00.000Z'));
    expect(parseMarkerDate('Fri, 01 Mar 2024 10:00:00 GMT')).toEqual(new Date('2024-03-01T10:00:00.000Z'));
    expect(parseMarkerDate('v7')).toBeUndefined();
  });
});
