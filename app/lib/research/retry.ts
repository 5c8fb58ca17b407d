/**
 * retry.ts
 *
 * Bounded retry with exponential backoff for transient source failures.
 */

import { isTransient } from "../errors";

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
}

export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: unknown; attempts: number };

export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return policy.baseDelayMs * 2 ** (attempt - 1);
}

/**
 * Only TransientSourceError is retried; anything else fails at once.
 * Waits baseDelay * 2^(attempt-1) between attempts.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  sleep: (ms: number) => Promise<void>,
): Promise<RetryOutcome<T>> {
  const maxAttempts = Math.max(1, policy.maxAttempts);
  for (let attempt = 1; ; attempt++) {
    try {
      return { ok: true, value: await operation(attempt), attempts: attempt };
    } catch (error) {
      if (!isTransient(error) || attempt >= maxAttempts) {
        return { ok: false, error, attempts: attempt };
      }
      await sleep(backoffDelay(policy, attempt));
    }
  }
}
