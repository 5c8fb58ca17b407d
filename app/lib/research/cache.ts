/**
 * cache.ts
 *
 * In-memory TTL cache for source lookups, so a remix's original (often
 * shared by several remixes) is only researched once per run.
 */

import { normalize } from "../normalize";
import type { ResearchQuery } from "../types";

interface CacheEntry<T> {
  data: T;
  timestamp: number;
}

// Metadata does not change within a run
const CACHE_TTL_MS = 3600000; // 1 hour
const cache = new Map<string, CacheEntry<unknown>>();

/**
 * Clear all cached entries.
 *
 * NOTE: Used by tests to avoid cross-test contamination,
 * since the cache is module-scoped.
 */
export function clearCache(): void {
  cache.clear();
}

/**
 * Key on source plus the cleaned artist and title
 */
export function cacheKeyLookup(source: string, query: ResearchQuery): string {
  return [source, normalize(query.artist), normalize(query.title)].join("::");
}

/**
 * Get cached result if available and not expired at `now`
 */
export async function getCached<T>(
  key: string,
  isValid: (value: unknown) => value is T,
  now = Date.now(),
): Promise<T | null> {
  const entry = cache.get(key);
  if (!entry) return null;

  const age = now - entry.timestamp;
  if (age <= CACHE_TTL_MS && isValid(entry.data)) {
    return entry.data;
  }

  // Expired - remove from cache
  cache.delete(key);
  return null;
}

/**
 * Store result in cache
 */
export async function setCached<T>(key: string, data: T, now = Date.now()): Promise<void> {
  cache.set(key, {
    data,
    timestamp: now,
  });
}
