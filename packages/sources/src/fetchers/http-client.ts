/**
 * Minimal HTTP helper for fetchers: per-request timeout and status mapping.
 */

import { SnapdeltaError } from '@snapdelta/core';

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpRequestOptions {
  method?: 'GET' | 'HEAD';
  headers?: Record<string, string>;
  timeoutMs: number;
  fetch: FetchFn;
}

export interface HttpResult {
  status: number;
  headers: Headers;
  body: Buffer;
}

/** Statuses worth retrying: request timeout, rate limit, server errors */
export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

/**
 * Issue a request and read its body under one timeout
 */
export async function httpRequest(url: string, options: HttpRequestOptions): Promise<HttpResult> {
  const method = options.method ?? 'GET';
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), options.timeoutMs);

  let response: Response;
  let body: Buffer;
  try {
    response = await options.fetch(url, {
      method,
      headers: options.headers,
      signal: controller.signal,
    });
    body = method === 'HEAD' ? Buffer.alloc(0) : Buffer.from(await response.arrayBuffer());
  } catch (err) {
    if (err instanceof Error && err.name === 'AbortError') {
      throw new SnapdeltaError({
        code: 'TIMEOUT',
        message: `${method} ${url} timed out after ${options.timeoutMs}ms`,
        suggestion: 'Increase the fetch timeout or check network connectivity.',
      });
    }

    throw new SnapdeltaError({
      code: 'FETCH_TRANSIENT',
      message: `${method} ${url} failed: ${err instanceof Error ? err.message : String(err)}`,
      cause: err instanceof Error ? err : undefined,
    });
  } finally {
    clearTimeout(timeout);
  }

  if (!response.ok) {
    const transient = isTransientStatus(response.status);
    throw new SnapdeltaError({
      code: transient ? 'FETCH_TRANSIENT' : 'FETCH_FAILED',
      message: `${method} ${url} returned HTTP ${response.status}`,
      suggestion: transient ? undefined : 'Check the source URL; the resource may have moved.',
      context: { status: response.status },
    });
  }

  return { status: response.status, headers: response.headers, body };
}
