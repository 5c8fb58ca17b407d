/**
 * aggregator.ts
 *
 * Queries every configured source in priority order and merges what comes
 * back into one frozen ResearchResult. A failing source becomes a
 * "failed" entry; it never fails the track.
 */

import { errorMessage } from "../errors";
import { createLogger, type Logger } from "../logger";
import type { ResearchQuery, Track } from "../types";
import { cacheKeyLookup, getCached, setCached } from "./cache";
import { isRecord } from "./guards";
import { RateLimiter } from "./rateLimiter";
import { withRetry, type RetryPolicy } from "./retry";
import { systemClock, withTimeout, type Clock } from "./timing";
import type {
  ConfiguredSource,
  ResearchResult,
  ResearchSource,
  SourceEvidence,
  SourceLookup,
} from "./types";

export interface ResearchAggregator {
  readonly sourceNames: readonly string[];
  research(track: Track): Promise<ResearchResult>;
  researchQuery(query: ResearchQuery, trackId: string): Promise<ResearchResult>;
}

export interface AggregatorOptions {
  sources: readonly ConfiguredSource[];
  retry: RetryPolicy;
  clock?: Clock;
  logger?: Logger;
  useCache?: boolean;
}

interface CachedLookup {
  status: "found" | "not_found";
  tags: string[];
  confidence: number;
  raw: Record<string, unknown>;
}

function isCachedLookup(value: unknown): value is CachedLookup {
  return (
    isRecord(value) &&
    (value.status === "found" || value.status === "not_found") &&
    Array.isArray(value.tags) &&
    typeof value.confidence === "number" &&
    isRecord(value.raw)
  );
}

function dedupeTags(tags: readonly string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const tag of tags) {
    const trimmed = tag.trim();
    const key = trimmed.toLowerCase();
    if (!trimmed || seen.has(key)) continue;
    seen.add(key);
    out.push(trimmed);
  }
  return out;
}

const clamp01 = (n: number) => Math.min(1, Math.max(0, n));

/**
 * One source call under its limiter and timeout. The slot is held until
 * the call itself settles, even past the timeout, so a source that ignores
 * the abort signal still counts against its concurrency cap.
 */
async function callSource(
  limiter: RateLimiter,
  source: ResearchSource,
  query: ResearchQuery,
  timeoutMs: number,
): Promise<SourceLookup | null> {
  const release = await limiter.acquire();
  return withTimeout(
    (signal) => {
      let call: Promise<SourceLookup | null>;
      try {
        call = source.lookup(query, signal);
      } catch (error) {
        release();
        throw error;
      }
      call.then(release, release);
      return call;
    },
    timeoutMs,
    source.name,
  );
}

export function createResearchAggregator(options: AggregatorOptions): ResearchAggregator {
  const clock = options.clock ?? systemClock;
  const log = options.logger ?? createLogger("research");
  const useCache = options.useCache ?? true;

  const registered = options.sources.map((configured, priority) => ({
    ...configured,
    priority,
    limiter: new RateLimiter(configured.settings.rateLimit, clock),
  }));

  async function querySource(
    entry: (typeof registered)[number],
    query: ResearchQuery,
  ): Promise<SourceEvidence> {
    const { source, settings, priority, limiter } = entry;
    const base = { source: source.name, weight: settings.weight, priority };
    const key = cacheKeyLookup(source.name, query);

    if (useCache) {
      const cached = await getCached(key, isCachedLookup, clock.now());
      if (cached) return { ...base, ...cached, attempts: 0 };
    }

    const outcome = await withRetry(
      () => callSource(limiter, source, query, settings.timeoutMs),
      options.retry,
      (ms) => clock.sleep(ms),
    );

    if (!outcome.ok) {
      log.warn(
        `${source.name} failed after ${outcome.attempts} attempt(s): ${errorMessage(outcome.error)}`,
      );
      return {
        ...base,
        status: "failed",
        tags: [],
        confidence: 0,
        raw: {},
        attempts: outcome.attempts,
        error: errorMessage(outcome.error),
      };
    }

    const lookup: CachedLookup = outcome.value
      ? {
          status: "found",
          tags: dedupeTags(outcome.value.tags),
          confidence: clamp01(outcome.value.confidence ?? settings.priorConfidence),
          raw: outcome.value.raw,
        }
      : { status: "not_found", tags: [], confidence: 0, raw: {} };

    if (useCache) await setCached(key, lookup, clock.now());
    log.debug(`${source.name}: ${lookup.status} (${lookup.tags.length} tags)`);
    return { ...base, ...lookup, attempts: outcome.attempts };
  }

  async function researchQuery(query: ResearchQuery, trackId: string): Promise<ResearchResult> {
    const entries: SourceEvidence[] = [];
    // Sources run one after another, in priority order
    for (const entry of registered) {
      const evidence = await querySource(entry, query);
      entries.push(
        Object.freeze({
          ...evidence,
          tags: Object.freeze([...evidence.tags]),
          raw: Object.freeze({ ...evidence.raw }),
        }),
      );
    }
    return Object.freeze({
      trackId,
      query: Object.freeze({ ...query }),
      entries: Object.freeze(entries),
    });
  }

  return {
    sourceNames: registered.map((r) => r.source.name),
    research: (track) => researchQuery({ artist: track.artist, title: track.title }, track.id),
    researchQuery,
  };
}
