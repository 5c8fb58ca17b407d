/**
 * runs.ts
 *
 * Run history in logs/runs.jsonl: one record per line, oldest first,
 * capped to the most recent runs. Only decisions are kept, not evidence.
 */

import { mkdir, readFile, rename, writeFile } from "fs/promises";
import { dirname, join } from "path";
import type { RunReport } from "../pipeline/orchestrator";
import type { TrackReport } from "../pipeline/types";

export const RUNS_LOG = join(process.cwd(), "logs", "runs.jsonl");
export const MAX_RUNS = 20;

export interface RunRecord {
  timestamp: string;
  mode: RunReport["mode"];
  cancelled: boolean;
  summary: RunReport["summary"];
  decisions: Array<
    Pick<TrackReport, "trackId" | "artist" | "title" | "state" | "decision" | "remix" | "writes">
  >;
}

export function toRunRecord(report: RunReport): RunRecord {
  return {
    timestamp: report.finishedAt,
    mode: report.mode,
    cancelled: report.cancelled,
    summary: report.summary,
    decisions: report.tracks.map((t) => ({
      trackId: t.trackId,
      artist: t.artist,
      title: t.title,
      state: t.state,
      decision: t.decision,
      remix: t.remix,
      writes: t.writes,
    })),
  };
}

function isMissingFile(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}

/**
 * Serialized records of earlier runs. No log yet means no history.
 */
export async function readRunLines(filePath = RUNS_LOG): Promise<string[]> {
  try {
    const raw = await readFile(filePath, "utf8");
    return raw
      .split("\n")
      .map((line) => line.trim())
      .filter(Boolean);
  } catch (error) {
    if (isMissingFile(error)) return [];
    throw error;
  }
}

export async function logRunReport(
  report: RunReport,
  filePath = RUNS_LOG,
  maxRuns = MAX_RUNS,
): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });

  const earlier = await readRunLines(filePath);
  const kept = earlier.slice(Math.max(0, earlier.length - (maxRuns - 1)));
  const lines = [...kept, JSON.stringify(toRunRecord(report))];

  // Replaced with one rename so readers never see a half-written history
  const staging = `${filePath}.tmp`;
  await writeFile(staging, lines.join("\n") + "\n");
  await rename(staging, filePath);
}
