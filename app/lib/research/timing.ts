/**
 * timing.ts
 *
 * Clock abstraction shared by rate limiters, backoff and batch delays,
 * so tests can run them without real waits.
 */

import { TransientSourceError } from "../errors";

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => (ms > 0 ? delay(ms) : Promise.resolve()),
};

/**
 * Runs `operation` with an AbortSignal that fires after `ms`. The returned
 * promise rejects with a timeout TransientSourceError at that point,
 * whether or not the operation honours the signal.
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  ms: number,
  source: string,
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new TransientSourceError(source, "timeout", `timed out after ${ms}ms`));
    }, ms);
  });

  try {
    return await Promise.race([operation(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
