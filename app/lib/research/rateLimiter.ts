/**
 * rateLimiter.ts
 *
 * Per-source token bucket with a concurrency cap. Every call to a source,
 * retries included, holds one token and one slot.
 */

import pLimit from "p-limit";
import type { RateLimitOptions } from "./types";
import { systemClock, type Clock } from "./timing";

export type Release = () => void;

export class RateLimiter {
  private tokens: number;
  private lastRefill: number;
  private inFlight = 0;
  private readonly slotWaiters: Array<() => void> = [];
  // Bucket and counters are only touched under this mutex
  private readonly mutex = pLimit(1);

  constructor(
    private readonly options: RateLimitOptions,
    private readonly clock: Clock = systemClock,
  ) {
    if (options.requests <= 0 || options.intervalMs <= 0 || options.maxConcurrent <= 0) {
      throw new RangeError("RateLimiter options must be positive");
    }
    this.tokens = options.requests;
    this.lastRefill = clock.now();
  }

  get active(): number {
    return this.inFlight;
  }

  private refill(): void {
    const now = this.clock.now();
    const elapsed = now - this.lastRefill;
    if (elapsed <= 0) return;
    const rate = this.options.requests / this.options.intervalMs;
    this.tokens = Math.min(this.options.requests, this.tokens + elapsed * rate);
    this.lastRefill = now;
  }

  /**
   * Resolves once a slot and a token are available. Callers must invoke
   * the returned release exactly once; extra calls are ignored.
   */
  acquire(): Promise<Release> {
    return this.mutex(async () => {
      while (this.inFlight >= this.options.maxConcurrent) {
        await new Promise<void>((resolve) => this.slotWaiters.push(resolve));
      }

      this.refill();
      if (this.tokens < 1) {
        const waitMs = Math.ceil(
          ((1 - this.tokens) * this.options.intervalMs) / this.options.requests,
        );
        await this.clock.sleep(waitMs);
        this.refill();
        this.tokens = Math.max(this.tokens, 1);
      }

      this.tokens -= 1;
      this.inFlight += 1;

      let released = false;
      return () => {
        if (released) return;
        released = true;
        this.inFlight -= 1;
        this.slotWaiters.shift()?.();
      };
    });
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await task();
    } finally {
      release();
    }
  }
}
