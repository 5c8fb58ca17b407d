/**
 * processTrack.ts
 *
 * Runs one track through research, remix detection, classification and
 * matching, and applies the threshold policy.
 */

import type { AcousticExtractor } from "../acoustic";
import { errorMessage, InconsistentTaxonomy, LibraryUnavailable, NoEvidence } from "../errors";
import { classifyGenre, isOwnEvidencePresent } from "../genre/classifyGenre";
import { UNKNOWN_GENRE } from "../genre/taxonomy";
import type { FusionWeights, GenreCandidate } from "../genre/types";
import type { Logger } from "../logger";
import { suggestPlaylists } from "../playlists/consistency";
import { matchPlaylist } from "../playlists/matchPlaylist";
import type { PlaylistMatch, PlaylistTaxonomy } from "../playlists/types";
import { detectRemix } from "../remix/detectRemix";
import type { RemixStatus } from "../remix/types";
import type { ResearchAggregator } from "../research/aggregator";
import { allSourcesFailed } from "../research/types";
import type { Track } from "../types";
import { isTerminal, TrackLifecycle } from "./stateMachine";
import type { Decision, TrackReport } from "./types";

export interface TrackPipelineDeps {
  research: ResearchAggregator;
  acoustic: AcousticExtractor;
  taxonomy: PlaylistTaxonomy;
  threshold: number;
  weights: FusionWeights;
  remixKeywords: readonly string[];
  logger: Logger;
}

/**
 * Steps 3, 5-7 of the threshold policy, once a candidate exists.
 * Monotone in `threshold`: raising it never turns a DEFER into an ACCEPT.
 */
export function decideOutcome(
  top: GenreCandidate,
  match: PlaylistMatch,
  threshold: number,
): Decision {
  if (top.genre === UNKNOWN_GENRE) {
    return { outcome: "REJECT", reason: "NO_EVIDENCE" };
  }
  if (top.confidence < threshold) {
    return {
      outcome: "DEFER",
      reason: "LOW_CONFIDENCE",
      detail: `${top.genre} at ${top.confidence} < ${threshold}`,
    };
  }
  if (!match.playlist) {
    return { outcome: "DEFER", reason: "NO_PLAYLIST_MATCH", detail: top.genre };
  }
  return {
    outcome: "ACCEPT",
    playlistId: match.playlist.id,
    genre: top.genre,
    confidence: top.confidence,
  };
}

function terminalFor(decision: Decision) {
  switch (decision.outcome) {
    case "ACCEPT":
      return "ACCEPTED" as const;
    case "REJECT":
      return "REJECTED" as const;
    case "DEFER":
      return "DEFERRED" as const;
  }
}

export function cancelledReport(track: Track): TrackReport {
  const lifecycle = new TrackLifecycle(track.id);
  lifecycle.transition("DEFERRED");
  return {
    trackId: track.id,
    title: track.title,
    artist: track.artist,
    currentGenre: track.genre,
    state: "DEFERRED",
    history: lifecycle.history,
    decision: { outcome: "DEFER", reason: "CANCELLED" },
    remix: null,
    candidates: [],
    match: null,
    suggestions: [],
    writes: [],
  };
}

export async function processTrack(track: Track, deps: TrackPipelineDeps): Promise<TrackReport> {
  const lifecycle = new TrackLifecycle(track.id);
  let remix: RemixStatus | null = null;
  let candidates: GenreCandidate[] = [];
  let match: PlaylistMatch | null = null;
  let suggestions: string[] = [];

  const report = (decision: Decision, state = terminalFor(decision)): TrackReport => ({
    trackId: track.id,
    title: track.title,
    artist: track.artist,
    currentGenre: track.genre,
    state,
    history: lifecycle.history,
    decision,
    remix: remix?.kind ?? null,
    candidates,
    match,
    suggestions,
    writes: [],
  });

  const settle = (decision: Decision) => {
    lifecycle.settle(terminalFor(decision));
    return report(decision);
  };

  try {
    const research = await deps.research.research(track);
    const acoustic = await deps.acoustic.extract(track.filePath);
    lifecycle.transition("RESEARCHED");

    if (allSourcesFailed(research) && acoustic === null) {
      throw new NoEvidence(track.id, "every source failed");
    }

    remix = await detectRemix(track, {
      researchQuery: (query, trackId) => deps.research.researchQuery(query, trackId),
      keywords: deps.remixKeywords,
    });
    lifecycle.transition("REMIX_CHECKED");

    if (remix.kind === "REMIX_UNRESOLVED" && !isOwnEvidencePresent(research, acoustic)) {
      return settle({ outcome: "REJECT", reason: "REMIX_CONFLICT" });
    }

    candidates = classifyGenre({ research, remix, acoustic, weights: deps.weights });
    lifecycle.transition("CLASSIFIED");

    const [top] = candidates;
    if (top.genre === UNKNOWN_GENRE) throw new NoEvidence(track.id);

    try {
      match = matchPlaylist(top, remix, deps.taxonomy, track.playlistIds);
    } catch (error) {
      if (!(error instanceof InconsistentTaxonomy)) throw error;
      deps.logger.warn(`${track.id}: ${error.message}`);
      return settle({ outcome: "REJECT", reason: "INCONSISTENT_TAXONOMY", detail: error.message });
    }
    lifecycle.transition("MATCHED");

    const decision = decideOutcome(top, match, deps.threshold);
    if (decision.outcome === "DEFER" && decision.reason === "NO_PLAYLIST_MATCH") {
      suggestions = suggestPlaylists(top.genre, deps.taxonomy);
    }
    return settle(decision);
  } catch (error) {
    if (error instanceof LibraryUnavailable) throw error;
    if (error instanceof NoEvidence) {
      return settle(
        error.detail
          ? { outcome: "REJECT", reason: "NO_EVIDENCE", detail: error.detail }
          : { outcome: "REJECT", reason: "NO_EVIDENCE" },
      );
    }

    deps.logger.error(`${track.id} failed in ${lifecycle.state}: ${errorMessage(error)}`);
    if (!isTerminal(lifecycle.state)) lifecycle.transition("REJECTED");
    return report(
      { outcome: "REJECT", reason: "PIPELINE_ERROR", detail: errorMessage(error) },
      "REJECTED",
    );
  }
}
