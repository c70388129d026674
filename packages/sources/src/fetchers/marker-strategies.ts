/**
 * Marker strategies for HTTP sources
 *
 * - http-header: HEAD request, ETag or Last-Modified
 * - page-pattern: first capture group of a regex on a page ("Updated: 01.03.2024")
 * - time-bucket: wall clock floored to a bucket, for sources without a marker
 */

import type { Marker } from '@snapdelta/core';
import { SnapdeltaError } from '@snapdelta/core';
import { httpRequest } from './http-client.js';
import type { FetchFn } from './http-client.js';

export type MarkerStrategy =
  | { type: 'http-header'; url?: string }
  | { type: 'page-pattern'; url?: string; pattern: string; flags?: string }
  | { type: 'time-bucket'; bucketMs: number };

export interface MarkerContext {
  /** Snapshot URL, used when the strategy names none */
  url: string;
  headers?: Record<string, string>;
  timeoutMs: number;
  encoding: BufferEncoding;
  fetch: FetchFn;
  now: () => Date;
}

/**
 * Parse a marker text as a date: ISO and RFC 1123 strings, or
 * DD.MM.YYYY with an optional HH:MM[:SS] time (read as UTC)
 */
export function parseMarkerDate(text: string): Date | undefined {
  const trimmed = text.trim();

  const dmy = /^(\d{1,2})[./](\d{1,2})[./](\d{4})(?:[ T,]+(\d{1,2}):(\d{2})(?::(\d{2}))?)?$/.exec(trimmed);
  if (dmy) {
    const [, day, month, year, hour, minute, second] = dmy;
    const date = new Date(
      Date.UTC(Number(year), Number(month) - 1, Number(day), Number(hour ?? 0), Number(minute ?? 0), Number(second ?? 0))
    );
    return Number.isNaN(date.getTime()) ? undefined : date;
  }

  if (!/\d{4}/.test(trimmed)) return undefined;
  const date = new Date(trimmed);
  return Number.isNaN(date.getTime()) ? undefined : date;
}

async function headerMarker(strategy: { url?: string }, context: MarkerContext): Promise<Marker> {
  const url = strategy.url ?? context.url;
  const { headers } = await httpRequest(url, {
    method: 'HEAD',
    headers: context.headers,
    timeoutMs: context.timeoutMs,
    fetch: context.fetch,
  });

  const etag = headers.get('etag');
  const lastModified = headers.get('last-modified');
  const token = etag ?? lastModified;
  if (!token) {
    throw new SnapdeltaError({
      code: 'FETCH_FAILED',
      message: `${url} reports neither ETag nor Last-Modified`,
      suggestion: 'Use the page-pattern or time-bucket marker strategy for this source.',
    });
  }

  const modifiedAt = lastModified ? parseMarkerDate(lastModified) : undefined;
  return { token, observedAt: modifiedAt ?? context.now() };
}

async function pageMarker(
  strategy: { url?: string; pattern: string; flags?: string },
  context: MarkerContext
): Promise<Marker> {
  const url = strategy.url ?? context.url;
  const { body } = await httpRequest(url, {
    headers: context.headers,
    timeoutMs: context.timeoutMs,
    fetch: context.fetch,
  });

  const match = new RegExp(strategy.pattern, strategy.flags).exec(body.toString(context.encoding));
  const token = (match?.[1] ?? match?.[0])?.trim();
  if (!token) {
    throw new SnapdeltaError({
      code: 'SCHEMA_MISMATCH',
      message: `Marker pattern /${strategy.pattern}/ did not match ${url}`,
      suggestion: 'The page layout may have changed; update the marker pattern.',
    });
  }

  return { token, observedAt: parseMarkerDate(token) ?? context.now() };
}

function bucketMarker(strategy: { bucketMs: number }, context: MarkerContext): Marker {
  const now = context.now().getTime();
  const bucketStart = new Date(Math.floor(now / strategy.bucketMs) * strategy.bucketMs);
  return { token: bucketStart.toISOString(), observedAt: bucketStart };
}

export async function resolveMarker(strategy: MarkerStrategy, context: MarkerContext): Promise<Marker> {
  switch (strategy.type) {
    case 'http-header':
      return headerMarker(strategy, context);
    case 'page-pattern':
      return pageMarker(strategy, context);
    case 'time-bucket':
      return bucketMarker(strategy, context);
  }
}
