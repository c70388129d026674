import { SnapdeltaError } from '@snapdelta/core';

export function timeoutError(operation: string, timeoutMs: number, dataset?: string): SnapdeltaError {
  return new SnapdeltaError({
    code: 'TIMEOUT',
    message: `${operation} timed out after ${timeoutMs}ms`,
    dataset,
    suggestion: 'Check that the source is reachable, or raise the timeout for this dataset.',
  });
}

/**
 * Race a promise against a timer. The underlying operation is not
 * cancelled; its result is ignored once the timer fires.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number | undefined,
  makeTimeoutError: () => Error = () => timeoutError('Operation', timeoutMs ?? 0)
): Promise<T> {
  if (!timeoutMs) return promise;
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) return promise;

  let timeout: NodeJS.Timeout | null = null;
  const timeoutPromise = new Promise<T>((_resolve, reject) => {
    timeout = setTimeout(() => reject(makeTimeoutError()), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    if (timeout) clearTimeout(timeout);
  }
}
