/**
 * summary.ts
 *
 * Run statistics and the read-only collection analysis behind
 * `--mode analyze`.
 */

import { resolveGenre } from "../genre/mapping";
import type { TaxonomyGenre } from "../genre/taxonomy";
import {
  analyzePlaylistConsistency,
  type PlaylistConsistencyReport,
} from "../playlists/consistency";
import type { PlaylistTaxonomy } from "../playlists/types";
import type { Track } from "../types";
import type { DecisionReason, TrackReport } from "./types";

export interface RunSummary {
  total: number;
  accepted: number;
  deferred: number;
  rejected: number;
  reasons: Partial<Record<DecisionReason, number>>;
  genreDistribution: Partial<Record<TaxonomyGenre, number>>;
  remixes: { totalRemixes: number; resolvedRemixes: number; acceptedRemixes: number };
  successRate: number; // (accepted + deferred) / total
  writesPerformed: number;
}

export function summarizeRun(reports: readonly TrackReport[]): RunSummary {
  const summary: RunSummary = {
    total: reports.length,
    accepted: 0,
    deferred: 0,
    rejected: 0,
    reasons: {},
    genreDistribution: {},
    remixes: { totalRemixes: 0, resolvedRemixes: 0, acceptedRemixes: 0 },
    successRate: 0,
    writesPerformed: 0,
  };

  for (const report of reports) {
    const { decision } = report;
    const isRemix = report.remix === "REMIX_RESOLVED" || report.remix === "REMIX_UNRESOLVED";
    if (isRemix) summary.remixes.totalRemixes += 1;
    if (report.remix === "REMIX_RESOLVED") summary.remixes.resolvedRemixes += 1;
    summary.writesPerformed += report.writes.filter((w) => w.performed).length;

    if (decision.outcome === "ACCEPT") {
      summary.accepted += 1;
      summary.genreDistribution[decision.genre] =
        (summary.genreDistribution[decision.genre] ?? 0) + 1;
      if (isRemix) summary.remixes.acceptedRemixes += 1;
      continue;
    }

    if (decision.outcome === "DEFER") summary.deferred += 1;
    else summary.rejected += 1;
    summary.reasons[decision.reason] = (summary.reasons[decision.reason] ?? 0) + 1;
  }

  if (summary.total > 0) {
    summary.successRate = (summary.accepted + summary.deferred) / summary.total;
  }
  return summary;
}

export interface CollectionAnalysis {
  totalTracks: number;
  totalPlaylists: number;
  tracksWithoutGenre: number;
  genreDistribution: Record<string, number>; // current tags, resolved where possible
  playlists: PlaylistConsistencyReport;
  recommendations: string[];
}

export function analyzeCollection(
  tracks: readonly Track[],
  taxonomy: PlaylistTaxonomy,
): CollectionAnalysis {
  const genreDistribution: Record<string, number> = {};
  let tracksWithoutGenre = 0;

  for (const track of tracks) {
    const raw = track.genre?.trim();
    if (!raw) {
      tracksWithoutGenre += 1;
      continue;
    }
    const label = resolveGenre(raw) ?? raw;
    genreDistribution[label] = (genreDistribution[label] ?? 0) + 1;
  }

  const playlists = analyzePlaylistConsistency(taxonomy);
  const recommendations = [...playlists.recommendations];
  if (tracksWithoutGenre > 0) {
    recommendations.push(`${tracksWithoutGenre} track(s) have no genre; run in dry-run mode to classify them`);
  }

  return {
    totalTracks: tracks.length,
    totalPlaylists: taxonomy.length,
    tracksWithoutGenre,
    genreDistribution,
    playlists,
    recommendations,
  };
}
