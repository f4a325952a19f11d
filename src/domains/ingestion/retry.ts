// ──────────────────────────────────────────
// Ingestion: retry with exponential backoff
// ──────────────────────────────────────────

import { UpstreamError, errorMessage } from '../../shared/errors';

export interface RetryPolicy {
  maxAttempts: number;
  backoffMs: number;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/** Delay before attempt n+1: backoffMs * 2^(n-1). */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return policy.backoffMs * 2 ** (attempt - 1);
}

/** Transport failures, 429 and 5xx. A 4xx will not succeed on retry. */
export function isRetryable(err: unknown): boolean {
  if (!(err instanceof UpstreamError)) return false;
  return err.status === null || err.status === 429 || err.status >= 500;
}

/**
 * Retries retryable upstream failures; anything else (validation, client
 * errors, programming errors) is rethrown on the first failure.
 */
export async function withRetry<T>(label: string, policy: RetryPolicy, fn: () => Promise<T>): Promise<T> {
  const sleep = policy.sleep ?? defaultSleep;
  let attempt = 1;

  for (;;) {
    try {
      return await fn();
    } catch (err) {
      if (!isRetryable(err) || attempt >= policy.maxAttempts) throw err;
      const delay = backoffDelay(policy, attempt);
      console.warn(`[Retry] ${label} attempt ${attempt} failed (${errorMessage(err)}), retrying in ${delay}ms`);
      await sleep(delay);
      attempt++;
    }
  }
}
