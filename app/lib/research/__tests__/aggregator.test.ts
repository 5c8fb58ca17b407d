import { describe, it, expect, beforeEach, vi } from "vitest";
import { SourceError, TransientSourceError } from "../../errors";
import {
  fakeClock,
  makeTrack,
  scriptedSource,
  silentLogger,
} from "../../__tests__/helpers";
import { createResearchAggregator } from "../aggregator";
import { clearCache } from "../cache";
import type { ResearchSource, SourceLookup, SourceSettings } from "../types";

const settings = (overrides: Partial<SourceSettings> = {}): SourceSettings => ({
  weight: 1,
  priorConfidence: 0.5,
  timeoutMs: 1000,
  rateLimit: { requests: 100, intervalMs: 1000, maxConcurrent: 4 },
  ...overrides,
});

const retry = { maxAttempts: 3, baseDelayMs: 100 };
const track = makeTrack({ id: "t1", artist: "Artist A", title: "Song" });

function aggregator(sources: Array<{ source: ResearchSource; settings: SourceSettings }>) {
  return createResearchAggregator({
    sources,
    retry,
    clock: fakeClock(),
    logger: silentLogger,
  });
}

describe("createResearchAggregator", () => {
  beforeEach(() => {
    clearCache();
  });

  it("returns one entry per source in priority order", async () => {
    const lastfm = scriptedSource("lastfm", {
      "artist a|song": { tags: ["house", "House", " deep house "], confidence: 0.8, raw: { id: 1 } },
    });
    const musicbrainz = scriptedSource("musicbrainz", {});

    const result = await aggregator([
      { source: lastfm, settings: settings({ weight: 1 }) },
      { source: musicbrainz, settings: settings({ weight: 0.8 }) },
    ]).research(track);

    expect(result.trackId).toBe("t1");
    expect(result.query).toEqual({ artist: "Artist A", title: "Song" });
    expect(result.entries).toEqual([
      {
        source: "lastfm",
        status: "found",
        tags: ["house", "deep house"],
        confidence: 0.8,
        weight: 1,
        priority: 0,
        raw: { id: 1 },
        attempts: 1,
      },
      {
        source: "musicbrainz",
        status: "not_found",
        tags: [],
        confidence: 0,
        weight: 0.8,
        priority: 1,
        raw: {},
        attempts: 1,
      },
    ]);
    expect(Object.isFrozen(result.entries)).toBe(true);
    expect(Object.isFrozen(result.entries[0].tags)).toBe(true);
  });

  it("falls back to the source prior when it reports no confidence", async () => {
    const source = scriptedSource("lastfm", {
      "artist a|song": { tags: ["techno"], confidence: null, raw: {} },
    });

    const result = await aggregator([
      { source, settings: settings({ priorConfidence: 0.65 }) },
    ]).research(track);

    expect(result.entries[0].confidence).toBe(0.65);
  });

  it("records a source that exhausts its retries as failed", async () => {
    const flaky = scriptedSource("lastfm", {
      "artist a|song": new TransientSourceError("lastfm", "timeout", "timed out"),
    });
    const steady = scriptedSource("musicbrainz", {
      "artist a|song": { tags: ["techno"], confidence: 0.9, raw: {} },
    });

    const result = await aggregator([
      { source: flaky, settings: settings() },
      { source: steady, settings: settings() },
    ]).research(track);

    expect(flaky.lookup).toHaveBeenCalledTimes(3);
    expect(result.entries[0]).toMatchObject({
      source: "lastfm",
      status: "failed",
      tags: [],
      attempts: 3,
      error: "[lastfm] timed out",
    });
    expect(result.entries[1]).toMatchObject({ status: "found", tags: ["techno"] });
  });

  it("does not retry non-transient failures", async () => {
    const broken = scriptedSource("lastfm", {
      "artist a|song": new SourceError("lastfm", "error 10: Invalid API key"),
    });

    const result = await aggregator([{ source: broken, settings: settings() }]).research(track);

    expect(broken.lookup).toHaveBeenCalledTimes(1);
    expect(result.entries[0]).toMatchObject({ status: "failed", attempts: 1 });
  });

  it("takes a rate-limit token for every attempt", async () => {
    const clock = fakeClock();
    const flaky = scriptedSource("lastfm", {
      "artist a|song": new TransientSourceError("lastfm", "server", "503"),
    });

    await createResearchAggregator({
      sources: [
        {
          source: flaky,
          settings: settings({ rateLimit: { requests: 1, intervalMs: 1000, maxConcurrent: 1 } }),
        },
      ],
      retry,
      clock,
      logger: silentLogger,
    }).research(track);

    // Three attempts at one per second span two seconds
    expect(clock.now()).toBeGreaterThanOrEqual(2000);
  });

  it("serves repeated queries from the cache", async () => {
    const source = scriptedSource("lastfm", {
      "artist a|song": { tags: ["house"], confidence: 0.7, raw: {} },
    });
    const research = aggregator([{ source, settings: settings() }]);

    await research.research(track);
    const again = await research.researchQuery({ artist: "ARTIST A", title: "song" }, "t2");

    expect(source.lookup).toHaveBeenCalledTimes(1);
    expect(again.trackId).toBe("t2");
    expect(again.entries[0]).toMatchObject({ status: "found", tags: ["house"], attempts: 0 });
  });

  it("keeps a timed-out call's slot until the call settles", async () => {
    const hung: { finish: (value: SourceLookup | null) => void } = { finish: () => undefined };
    let calls = 0;
    const source = {
      name: "musicbrainz",
      lookup: vi.fn(async (): Promise<SourceLookup | null> => {
        calls += 1;
        if (calls > 1) return null;
        return new Promise<SourceLookup | null>((resolve) => {
          hung.finish = resolve;
        });
      }),
    } satisfies ResearchSource;
    const research = createResearchAggregator({
      sources: [
        {
          source,
          settings: settings({
            timeoutMs: 10,
            rateLimit: { requests: 100, intervalMs: 1000, maxConcurrent: 1 },
          }),
        },
      ],
      retry: { maxAttempts: 1, baseDelayMs: 0 },
      clock: fakeClock(),
      logger: silentLogger,
    });

    const first = await research.research(makeTrack({ id: "a", artist: "Artist A", title: "One" }));
    expect(first.entries[0].status).toBe("failed");

    const second = research.research(makeTrack({ id: "b", artist: "Artist B", title: "Two" }));
    await new Promise((resolve) => setTimeout(resolve, 30));
    expect(source.lookup).toHaveBeenCalledTimes(1);

    hung.finish(null);
    expect((await second).entries[0].status).toBe("not_found");
    expect(source.lookup).toHaveBeenCalledTimes(2);
  });

  it("expires cached lookups by the injected clock", async () => {
    const clock = fakeClock();
    const source = scriptedSource("lastfm", {
      "artist a|song": { tags: ["house"], confidence: 0.8, raw: {} },
    });
    const research = createResearchAggregator({
      sources: [{ source, settings: settings() }],
      retry,
      clock,
      logger: silentLogger,
    });

    await research.research(track);
    await research.research(track);
    expect(source.lookup).toHaveBeenCalledTimes(1);

    await clock.sleep(3_600_001);
    await research.research(track);
    expect(source.lookup).toHaveBeenCalledTimes(2);
  });
});
