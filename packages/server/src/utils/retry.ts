import { setTimeout as sleep } from 'node:timers/promises';
import { BaseError, RetryPolicy } from '@docqa/core';

export interface RetryOptions {
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  signal?: AbortSignal;
}

export function isRetryable(error: unknown): boolean {
  return error instanceof BaseError && error.retryable;
}

/**
 * Run `task`, retrying up to `policy.attempts` more times with exponential
 * backoff (`baseDelayMs`, then twice that, ...).
 */
export async function withRetry<T>(
  task: () => Promise<T>,
  policy: RetryPolicy,
  { shouldRetry = isRetryable, onRetry, signal }: RetryOptions = {}
): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    signal?.throwIfAborted();
    try {
      return await task();
    } catch (error) {
      if (attempt >= policy.attempts || !shouldRetry(error)) {
        throw error;
      }
      const delayMs = policy.baseDelayMs * 2 ** attempt;
      onRetry?.(error, attempt + 1, delayMs);
      if (delayMs > 0) {
        await sleep(delayMs, undefined, { signal });
      }
    }
  }
}
