/**
 * classifyGenre.ts
 *
 * Fuses the textual channel, the acoustic channel and (for resolved
 * remixes) the original recording's genre into ranked candidates.
 */

import type { ResearchResult } from "../research/types";
import type { RemixStatus } from "../remix/types";
import type { AcousticFeatures } from "../types";
import { scoreAcoustic } from "./acousticChannel";
import { scoreTextual } from "./textualChannel";
import { GENRES, UNKNOWN_GENRE } from "./taxonomy";
import { DEFAULT_WEIGHTS, type FusionWeights, type GenreCandidate } from "./types";

export const UNKNOWN_CANDIDATE: GenreCandidate = Object.freeze({
  genre: UNKNOWN_GENRE,
  confidence: 0,
  evidence: Object.freeze({ textual: 0, acoustic: 0, original: 0 }),
  sources: [],
});

export interface ClassifyInput {
  research: ResearchResult;
  remix: RemixStatus;
  acoustic: AcousticFeatures | null;
  weights?: FusionWeights;
}

const round = (n: number) => Math.round(n * 1e6) / 1e6;
const clamp01 = (n: number) => Math.min(1, Math.max(0, n));

/**
 * Effective channel weights for one track
 */
export function effectiveWeights(
  weights: FusionWeights,
  hasAcoustic: boolean,
  hasOriginal: boolean,
): FusionWeights {
  let text = 1;
  let acoustic = 0;
  if (hasAcoustic) {
    const sum = weights.text + weights.acoustic;
    text = sum > 0 ? weights.text / sum : 0.5;
    acoustic = sum > 0 ? weights.acoustic / sum : 0.5;
  }
  if (!hasOriginal) return { text, acoustic, original: 0 };

  const original = clamp01(weights.original);
  return { text: text * (1 - original), acoustic: acoustic * (1 - original), original };
}

interface Ranked {
  candidate: GenreCandidate;
  bestPriority: number;
}

/**
 * Confidence descending, then earliest corroborating source (sourceless
 * last), then label.
 */
function compareRanked(a: Ranked, b: Ranked): number {
  if (b.candidate.confidence !== a.candidate.confidence) {
    return b.candidate.confidence - a.candidate.confidence;
  }
  if (a.bestPriority !== b.bestPriority) return a.bestPriority - b.bestPriority;
  return a.candidate.genre.localeCompare(b.candidate.genre);
}

export function classifyGenre({
  research,
  remix,
  acoustic,
  weights = DEFAULT_WEIGHTS,
}: ClassifyInput): GenreCandidate[] {
  const textual = scoreTextual(research);
  const acousticScores = scoreAcoustic(acoustic);
  const originalTop =
    remix.kind === "REMIX_RESOLVED" && remix.originalTop.genre !== UNKNOWN_GENRE
      ? remix.originalTop
      : null;

  const w = effectiveWeights(weights, acousticScores !== null, originalTop !== null);

  const ranked: Ranked[] = [];
  for (const genre of GENRES) {
    const text = textual.get(genre);
    const evidence = {
      textual: round(w.text * (text?.score ?? 0)),
      acoustic: round(w.acoustic * (acousticScores?.get(genre) ?? 0)),
      original: round(
        originalTop && originalTop.genre === genre ? w.original * originalTop.confidence : 0,
      ),
    };
    const confidence = round(clamp01(evidence.textual + evidence.acoustic + evidence.original));
    if (confidence <= 0) continue;

    ranked.push({
      candidate: { genre, confidence, evidence, sources: text ? [...text.sources] : [] },
      bestPriority: text?.bestPriority ?? Number.POSITIVE_INFINITY,
    });
  }

  if (ranked.length === 0) return [UNKNOWN_CANDIDATE];
  return ranked.sort(compareRanked).map((r) => r.candidate);
}

/**
 * Textual-only ranking, used for a remix's original recording
 */
export function rankByTextualEvidence(research: ResearchResult): GenreCandidate[] {
  return classifyGenre({
    research,
    remix: { kind: "NOT_REMIX" },
    acoustic: null,
  });
}

export function isOwnEvidencePresent(
  research: ResearchResult,
  acoustic: AcousticFeatures | null,
): boolean {
  return scoreTextual(research).size > 0 || scoreAcoustic(acoustic) !== null;
}

