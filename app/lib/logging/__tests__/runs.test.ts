import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import type { RunReport } from "../../pipeline/orchestrator";
import { summarizeRun } from "../../pipeline/summary";
import { logRunReport, readRunLines } from "../runs";

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "genre-runs-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

function runReport(finishedAt: string): RunReport {
  return {
    mode: "dry-run",
    startedAt: "2024-01-01T00:00:00.000Z",
    finishedAt,
    cancelled: false,
    taxonomySize: 1,
    tracks: [
      {
        trackId: "t1",
        title: "Song",
        artist: "Artist",
        currentGenre: null,
        state: "REJECTED",
        history: ["PENDING", "REJECTED"],
        decision: { outcome: "REJECT", reason: "NO_EVIDENCE" },
        remix: "NOT_REMIX",
        candidates: [],
        match: null,
        suggestions: [],
        writes: [],
      },
    ],
    summary: summarizeRun([]),
  };
}

function timestampOf(line: string): unknown {
  const record: unknown = JSON.parse(line);
  return typeof record === "object" && record !== null && "timestamp" in record
    ? record.timestamp
    : undefined;
}

describe("readRunLines", () => {
  it("reads a missing log as an empty history", async () => {
    expect(await readRunLines(join(dir, "absent.jsonl"))).toEqual([]);
  });
});

describe("logRunReport", () => {
  it("stores the summary and each decision on one line", async () => {
    const filePath = join(dir, "nested", "runs.jsonl");

    await logRunReport(runReport("2024-01-01T00:01:00.000Z"), filePath);

    const [line] = await readRunLines(filePath);
    expect(JSON.parse(line)).toEqual({
      timestamp: "2024-01-01T00:01:00.000Z",
      mode: "dry-run",
      cancelled: false,
      summary: summarizeRun([]),
      decisions: [
        {
          trackId: "t1",
          artist: "Artist",
          title: "Song",
          state: "REJECTED",
          decision: { outcome: "REJECT", reason: "NO_EVIDENCE" },
          remix: "NOT_REMIX",
          writes: [],
        },
      ],
    });
  });

  it("keeps only the most recent runs", async () => {
    const filePath = join(dir, "runs.jsonl");
    for (const minute of ["01", "02", "03", "04"]) {
      await logRunReport(runReport(`2024-01-01T00:${minute}:00.000Z`), filePath, 3);
    }

    const lines = await readRunLines(filePath);
    expect(lines.map(timestampOf)).toEqual([
      "2024-01-01T00:02:00.000Z",
      "2024-01-01T00:03:00.000Z",
      "2024-01-01T00:04:00.000Z",
    ]);
  });
});
