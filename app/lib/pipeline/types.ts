/**
 * types.ts
 *
 * Per-track states, decisions and run reports.
 */

import type { TaxonomyGenre } from "../genre/taxonomy";
import type { GenreCandidate } from "../genre/types";
import type { PlaylistMatch } from "../playlists/types";
import type { RemixKind } from "../remix/types";

export const TRACK_STATES = [
  "PENDING",
  "RESEARCHED",
  "REMIX_CHECKED",
  "CLASSIFIED",
  "MATCHED",
  "DECIDED",
  "ACCEPTED",
  "REJECTED",
  "DEFERRED",
] as const;

export type TrackState = (typeof TRACK_STATES)[number];

export type TerminalState = Extract<TrackState, "ACCEPTED" | "REJECTED" | "DEFERRED">;

export type RejectReason =
  | "NO_EVIDENCE"
  | "REMIX_CONFLICT"
  | "INCONSISTENT_TAXONOMY"
  | "PIPELINE_ERROR";

export type DeferReason = "LOW_CONFIDENCE" | "NO_PLAYLIST_MATCH" | "CANCELLED";

export type DecisionReason = RejectReason | DeferReason;

export type Decision =
  | { outcome: "ACCEPT"; playlistId: string; genre: TaxonomyGenre; confidence: number }
  | { outcome: "REJECT"; reason: RejectReason; detail?: string }
  | { outcome: "DEFER"; reason: DeferReason; detail?: string };

export type RunMode = "analyze" | "dry-run" | "execute";

export interface WriteAction {
  kind: "update-genre" | "add-to-playlist";
  trackId: string;
  value: string; // genre label or playlist id
  performed: boolean;
}

export interface TrackReport {
  trackId: string;
  title: string;
  artist: string;
  currentGenre: string | null;
  state: TerminalState;
  history: TrackState[];
  decision: Decision;
  remix: RemixKind | null;
  candidates: GenreCandidate[];
  match: PlaylistMatch | null;
  suggestions: string[];
  writes: WriteAction[];
}
