/**
 * orchestrator.ts
 *
 * Runs the whole library through the pipeline in batches, applies the
 * resulting writes in execute mode, and reports every decision.
 */

import pLimit from "p-limit";
import type { AcousticExtractor } from "../acoustic";
import type { FusionWeights } from "../genre/types";
import type { LibraryClient } from "../lexicon";
import { LibraryUnavailable } from "../errors";
import { createLogger, type Logger } from "../logger";
import { normalize } from "../normalize";
import { buildTaxonomy } from "../playlists/taxonomy";
import type { PlaylistTaxonomy } from "../playlists/types";
import type { ResearchAggregator } from "../research/aggregator";
import { delay } from "../research/timing";
import type { Track } from "../types";
import { cancelledReport, processTrack } from "./processTrack";
import { analyzeCollection, summarizeRun, type CollectionAnalysis, type RunSummary } from "./summary";
import type { TrackReport, WriteAction } from "./types";

export interface RunSettings {
  batchSize: number;
  batchDelayMs: number;
  concurrency: number;
  threshold: number;
  weights: FusionWeights;
  remixKeywords: readonly string[];
}

export interface OrchestratorDeps {
  library: LibraryClient;
  research: ResearchAggregator;
  acoustic: AcousticExtractor;
  settings: RunSettings;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

export interface RunOptions {
  mode: "dry-run" | "execute";
  signal?: AbortSignal;
  limit?: number;
}

export interface RunReport {
  mode: "dry-run" | "execute";
  startedAt: string;
  finishedAt: string;
  cancelled: boolean;
  taxonomySize: number;
  tracks: TrackReport[];
  summary: RunSummary;
}

function chunk<T>(items: readonly T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) batches.push(items.slice(i, i + size));
  return batches;
}

/**
 * Writes an accepted decision implies. Only genre changes and missing
 * memberships are written.
 */
export function plannedWrites(track: Track, report: TrackReport): WriteAction[] {
  const { decision } = report;
  if (decision.outcome !== "ACCEPT") return [];

  const writes: WriteAction[] = [];
  if (normalize(track.genre) !== normalize(decision.genre)) {
    writes.push({ kind: "update-genre", trackId: track.id, value: decision.genre, performed: false });
  }
  if (!track.playlistIds.has(decision.playlistId)) {
    writes.push({
      kind: "add-to-playlist",
      trackId: track.id,
      value: decision.playlistId,
      performed: false,
    });
  }
  return writes;
}

/**
 * Set by the first write the library refuses. Tasks still in flight
 * check it before each write, so nothing is written once the run aborts.
 */
interface WriteGate {
  failure: LibraryUnavailable | null;
}

async function applyWrites(
  writes: WriteAction[],
  mode: RunOptions["mode"],
  library: LibraryClient,
  gate: WriteGate,
  log: Logger,
): Promise<WriteAction[]> {
  const applied: WriteAction[] = [];
  for (const write of writes) {
    if (mode === "dry-run") {
      log.info(`[dry-run] would ${write.kind} ${write.trackId} -> ${write.value}`);
      applied.push(write);
      continue;
    }
    if (gate.failure) {
      applied.push(write);
      continue;
    }
    if (write.kind === "update-genre") {
      await library.updateTrackGenre(write.trackId, write.value);
    } else {
      await library.addToPlaylist(write.trackId, write.value);
    }
    applied.push({ ...write, performed: true });
  }
  return applied;
}

async function loadSnapshot(
  library: LibraryClient,
  limit?: number,
): Promise<{ taxonomy: PlaylistTaxonomy; tracks: Track[] }> {
  // Fails fast with LibraryUnavailable before any track is touched
  await library.ping();
  const taxonomy = buildTaxonomy(await library.listPlaylists());
  const tracks = await library.listTracks();
  return { taxonomy, tracks: limit !== undefined ? tracks.slice(0, limit) : tracks };
}

export async function runPipeline(deps: OrchestratorDeps, options: RunOptions): Promise<RunReport> {
  const log = deps.logger ?? createLogger("pipeline");
  const sleep = deps.sleep ?? delay;
  const { settings } = deps;
  const startedAt = new Date().toISOString();

  const { taxonomy, tracks } = await loadSnapshot(deps.library, options.limit);
  log.info(`${tracks.length} tracks, ${taxonomy.length} playlists, mode ${options.mode}`);

  const trackDeps = {
    research: deps.research,
    acoustic: deps.acoustic,
    taxonomy,
    threshold: settings.threshold,
    weights: settings.weights,
    remixKeywords: settings.remixKeywords,
    logger: log,
  };

  const reports: TrackReport[] = [];
  const batches = chunk(tracks, Math.max(1, settings.batchSize));
  let cancelled = false;
  const gate: WriteGate = { failure: null };

  for (const [index, batch] of batches.entries()) {
    if (index > 0 && settings.batchDelayMs > 0) await sleep(settings.batchDelayMs);

    if (options.signal?.aborted) {
      cancelled = true;
      for (const rest of batches.slice(index)) reports.push(...rest.map(cancelledReport));
      log.warn(`cancelled; ${tracks.length - index * settings.batchSize} track(s) not started`);
      break;
    }

    log.info(`batch ${index + 1}/${batches.length} (${batch.length} tracks)`);
    const limit = pLimit(Math.max(1, settings.concurrency));
    const settled = await Promise.allSettled(
      batch.map((track) =>
        limit(async () => {
          try {
            const report = await processTrack(track, trackDeps);
            const writes = await applyWrites(
              plannedWrites(track, report),
              options.mode,
              deps.library,
              gate,
              log,
            );
            return { ...report, writes };
          } catch (error) {
            if (error instanceof LibraryUnavailable && !gate.failure) gate.failure = error;
            throw error;
          }
        }),
      ),
    );

    // Every task of the batch has settled before the run aborts
    if (gate.failure) throw gate.failure;
    const batchReports: TrackReport[] = [];
    for (const outcome of settled) {
      if (outcome.status === "rejected") throw outcome.reason;
      batchReports.push(outcome.value);
    }
    reports.push(...batchReports);
  }

  return {
    mode: options.mode,
    startedAt,
    finishedAt: new Date().toISOString(),
    cancelled,
    taxonomySize: taxonomy.length,
    tracks: reports,
    summary: summarizeRun(reports),
  };
}

export async function analyzeLibrary(library: LibraryClient): Promise<CollectionAnalysis> {
  const { taxonomy, tracks } = await loadSnapshot(library);
  return analyzeCollection(tracks, taxonomy);
}
