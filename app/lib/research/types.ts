/**
 * types.ts
 *
 * Research-side shapes: what a source returns, and the merged,
 * per-track ResearchResult every later stage reads.
 */

import type { ResearchQuery } from "../types";

export type EvidenceStatus = "found" | "not_found" | "failed";

export interface SourceEvidence {
  source: string;
  status: EvidenceStatus;
  tags: readonly string[];
  confidence: number; // 0-1; 0 unless found
  weight: number;
  priority: number; // 0 = consulted first
  raw: Readonly<Record<string, unknown>>;
  attempts: number;
  error?: string;
}

export interface ResearchResult {
  trackId: string;
  query: ResearchQuery;
  entries: readonly SourceEvidence[];
}

/**
 * What a source hands back for one lookup. `confidence` is null when the
 * source reports none, in which case its prior is used.
 */
export interface SourceLookup {
  tags: string[];
  confidence: number | null;
  raw: Record<string, unknown>;
}

export interface ResearchSource {
  readonly name: string;
  /**
   * Resolve to null when the source has no match. Throw
   * TransientSourceError for anything worth retrying.
   */
  lookup(query: ResearchQuery, signal: AbortSignal): Promise<SourceLookup | null>;
}

export interface RateLimitOptions {
  requests: number;
  intervalMs: number;
  maxConcurrent: number;
}

export interface SourceSettings {
  weight: number;
  priorConfidence: number;
  timeoutMs: number;
  rateLimit: RateLimitOptions;
}

export interface ConfiguredSource {
  source: ResearchSource;
  settings: SourceSettings;
}

export function allSourcesFailed(result: ResearchResult): boolean {
  return result.entries.length > 0 && result.entries.every((e) => e.status === "failed");
}
