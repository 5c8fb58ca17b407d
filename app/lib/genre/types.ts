/**
 * types.ts
 *
 * Classifier output types.
 */

import type { Genre } from "./taxonomy";

/**
 * Weighted contribution of each evidence channel to a candidate's
 * confidence. The three values sum to `confidence`.
 */
export interface EvidenceBreakdown {
  textual: number;
  acoustic: number;
  original: number; // resolved remix original, 0 otherwise
}

export interface GenreCandidate {
  genre: Genre;
  confidence: number; // 0-1, evidential strength, not a probability
  evidence: EvidenceBreakdown;
  sources: string[]; // corroborating research sources, priority order
}

/**
 * Fusion weights. `text` and `acoustic` are renormalized to sum to 1
 * when acoustic data exists; `original` is only used for resolved remixes.
 */
export interface FusionWeights {
  text: number;
  acoustic: number;
  original: number;
}

export const DEFAULT_WEIGHTS: FusionWeights = {
  text: 0.6,
  acoustic: 0.4,
  original: 0.2,
};
