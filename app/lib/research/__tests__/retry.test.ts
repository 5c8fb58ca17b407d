import { describe, it, expect, vi } from "vitest";
import { SourceError, TransientSourceError } from "../../errors";
import { fakeClock } from "../../__tests__/helpers";
import { backoffDelay, withRetry } from "../retry";
import { withTimeout } from "../timing";

const policy = { maxAttempts: 3, baseDelayMs: 100 };

describe("withRetry", () => {
  it("backs off exponentially between transient failures", async () => {
    const clock = fakeClock();
    const operation = vi
      .fn<[number], Promise<string>>()
      .mockRejectedValueOnce(new TransientSourceError("lastfm", "server", "503"))
      .mockRejectedValueOnce(new TransientSourceError("lastfm", "timeout", "slow"))
      .mockResolvedValueOnce("ok");

    const outcome = await withRetry(operation, policy, clock.sleep);

    expect(outcome).toEqual({ ok: true, value: "ok", attempts: 3 });
    expect(clock.sleeps).toEqual([100, 200]);
  });

  it("gives up after maxAttempts", async () => {
    const clock = fakeClock();
    const error = new TransientSourceError("lastfm", "network", "down");
    const operation = vi.fn(async () => {
      throw error;
    });

    const outcome = await withRetry(operation, policy, clock.sleep);

    expect(outcome).toEqual({ ok: false, error, attempts: 3 });
    expect(operation).toHaveBeenCalledTimes(3);
  });

  it("does not retry non-transient failures", async () => {
    const clock = fakeClock();
    const outcome = await withRetry(
      async () => {
        throw new SourceError("lastfm", "bad request");
      },
      policy,
      clock.sleep,
    );

    expect(outcome.ok).toBe(false);
    expect(outcome.attempts).toBe(1);
    expect(clock.sleeps).toEqual([]);
  });

  it("computes base * 2^(attempt - 1)", () => {
    expect([1, 2, 3].map((n) => backoffDelay({ maxAttempts: 3, baseDelayMs: 500 }, n))).toEqual([
      500, 1000, 2000,
    ]);
  });
});

describe("withTimeout", () => {
  it("rejects with a timeout and aborts the signal", async () => {
    const seen: { signal: AbortSignal | null } = { signal: null };
    const never = (signal: AbortSignal) => {
      seen.signal = signal;
      return new Promise<string>(() => undefined);
    };

    await expect(withTimeout(never, 5, "slow")).rejects.toMatchObject({
      name: "TransientSourceError",
      kind: "timeout",
      source: "slow",
    });
    expect(seen.signal?.aborted).toBe(true);
  });

  it("returns the result when in time", async () => {
    await expect(withTimeout(async () => 42, 1000, "fast")).resolves.toBe(42);
  });
});
