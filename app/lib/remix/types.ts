/**
 * types.ts
 *
 * Remix detection result. UNRESOLVED is a distinct outcome and is never
 * folded into NOT_REMIX.
 */

import type { GenreCandidate } from "../genre/types";
import type { ResearchResult } from "../research/types";
import type { ResearchQuery } from "../types";

export type RemixIndicatorKind = "keyword" | "version-marker" | "co-credit";

export interface RemixIndicator {
  kind: RemixIndicatorKind;
  field: "title" | "artist";
  match: string;
}

export type RemixStatus =
  | { kind: "NOT_REMIX" }
  | {
      kind: "REMIX_RESOLVED";
      indicators: RemixIndicator[];
      original: ResearchQuery;
      originalResearch: ResearchResult;
      originalTop: GenreCandidate;
    }
  | {
      kind: "REMIX_UNRESOLVED";
      indicators: RemixIndicator[];
      original: ResearchQuery;
    };

export type RemixKind = RemixStatus["kind"];

export function isRemix(status: RemixStatus): boolean {
  return status.kind !== "NOT_REMIX";
}
