/**
 * textualChannel.ts
 *
 * textual(g) = Σ [g ∈ genres(s)] · weight_s · confidence_s / Σ weight_s
 * where s ranges over sources whose tags map to at least one genre.
 */

import type { ResearchResult } from "../research/types";
import { resolveGenres } from "./mapping";
import type { TaxonomyGenre } from "./taxonomy";

export interface TextualScore {
  score: number;
  sources: string[]; // corroborating sources, priority order
  bestPriority: number;
}

export function scoreTextual(research: ResearchResult): Map<TaxonomyGenre, TextualScore> {
  const mapped = research.entries
    .filter((entry) => entry.status === "found")
    .map((entry) => ({ entry, genres: resolveGenres(entry.tags) }))
    .filter(({ genres }) => genres.length > 0);

  const totalWeight = mapped.reduce((sum, { entry }) => sum + entry.weight, 0);
  const scores = new Map<TaxonomyGenre, TextualScore>();
  if (totalWeight <= 0) return scores;

  // Entries are already in priority order
  for (const { entry, genres } of mapped) {
    for (const genre of genres) {
      const current = scores.get(genre) ?? {
        score: 0,
        sources: [],
        bestPriority: entry.priority,
      };
      current.score += (entry.weight * entry.confidence) / totalWeight;
      current.sources.push(entry.source);
      current.bestPriority = Math.min(current.bestPriority, entry.priority);
      scores.set(genre, current);
    }
  }
  return scores;
}
