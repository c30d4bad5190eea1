import type { RetryPolicy } from '../config/ledgerPolicy';

export function sleep(ms: number) {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

export function computeDelay(attempt: number, retry: RetryPolicy, random: () => number = Math.random) {
  const exponential = Math.min(retry.baseDelayMs * 2 ** attempt, retry.maxDelayMs);
  const jitter = random() * retry.jitterMs;
  return exponential + jitter;
}

export type RetryHooks = {
  shouldRetry: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
};

/**
 * Runs `fn` up to `retry.retries + 1` times. Only errors accepted by `shouldRetry` are retried;
 * the last error is rethrown once attempts run out.
 */
export async function withRetry<T>(fn: () => Promise<T>, retry: RetryPolicy, hooks: RetryHooks): Promise<T> {
  for (let attempt = 0; ; attempt += 1) {
    try {
      return await fn();
    } catch (err) {
      if (attempt >= retry.retries || !hooks.shouldRetry(err)) {
        throw err;
      }
      const delay = computeDelay(attempt, retry);
      hooks.onRetry?.(err, attempt + 1, delay);
      await sleep(delay);
    }
  }
}
