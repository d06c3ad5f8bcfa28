import { isRetryable } from '@/utils/errors.ts';
import { sleep as defaultSleep } from '@/utils/sleep.ts';
import type { Sleep } from '@/utils/sleep.ts';

export type RetryOptions = {
  /** Total number of attempts, including the first one. */
  maxAttempts: number;
  delayMs: number;
  sleep?: Sleep;
  signal?: AbortSignal;
  shouldRetry?: (err: unknown) => boolean;
  onRetry?: (attempt: number, err: unknown) => void;
};

export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: unknown; attempts: number };

/**
 * Runs `task` until it resolves or the attempts run out. A fixed delay
 * separates attempts; nothing is awaited after the final one.
 */
export const withRetry = async <T>(
  task: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<RetryOutcome<T>> => {
  const sleep = options.sleep ?? defaultSleep;
  const shouldRetry = options.shouldRetry ?? isRetryable;
  const maxAttempts = Math.max(1, options.maxAttempts);

  let attempt = 0;
  for (;;) {
    attempt++;
    try {
      return { ok: true, value: await task(attempt), attempts: attempt };
    } catch (err) {
      if (attempt >= maxAttempts || !shouldRetry(err)) {
        return { ok: false, error: err, attempts: attempt };
      }
      options.onRetry?.(attempt, err);
      await sleep(options.delayMs, options.signal);
    }
  }
};
