export interface BackoffPolicy {
  /** Delay before the first retry, before jitter (default: 1000ms) */
  baseDelayMs: number;
  /** Upper bound of the un-jittered delay (default: 300000ms) */
  maxDelayMs: number;
}

export const DEFAULT_BACKOFF: BackoffPolicy = {
  baseDelayMs: 1_000,
  maxDelayMs: 300_000,
};

/**
 * Un-jittered delay for a retry attempt: min(maxDelay, baseDelay * 2^attempt)
 */
export function backoffCeiling(attempt: number, policy: BackoffPolicy): number {
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** Math.max(0, attempt));
}

/**
 * Jittered backoff delay in [ceiling / 2, ceiling).
 *
 * @param random - Source of uniform values in [0, 1)
 */
export function computeBackoffDelay(
  attempt: number,
  policy: BackoffPolicy,
  random: () => number = Math.random
): number {
  const jitter = 0.5 + 0.5 * random();
  return backoffCeiling(attempt, policy) * jitter;
}

/**
 * Sleep that resolves early when the signal aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, ms));

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
