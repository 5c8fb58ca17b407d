#!/usr/bin/env tsx
/**
 * cli.ts
 *
 * npm run organize -- [--mode analyze|dry-run|execute] [--threshold n] [--limit n]
 */

import { parseArgs } from "node:util";
import { loadConfig, loadEnvFile } from "@/lib/config";
import { ConfigError, errorMessage, LibraryUnavailable } from "@/lib/errors";
import { logRunReport } from "@/lib/logging/runs";
import { createLogger, setLogLevel } from "@/lib/logger";
import { createPipeline } from "@/lib/pipeline/createPipeline";
import { analyzeLibrary, runPipeline } from "@/lib/pipeline/orchestrator";
import type { RunMode } from "@/lib/pipeline/types";

const log = createLogger("cli");

function parseMode(values: { mode?: string; analyze?: boolean; "dry-run"?: boolean }): RunMode {
  if (values.analyze) return "analyze";
  if (values["dry-run"]) return "dry-run";
  const mode = values.mode ?? "dry-run";
  if (mode === "analyze" || mode === "dry-run" || mode === "execute") return mode;
  throw new ConfigError([`--mode must be analyze, dry-run or execute (got "${mode}")`]);
}

function parsePositive(name: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigError([`--${name} must be a non-negative number (got "${raw}")`]);
  }
  return value;
}

async function main(): Promise<number> {
  const { values } = parseArgs({
    options: {
      mode: { type: "string" },
      analyze: { type: "boolean" },
      "dry-run": { type: "boolean" },
      threshold: { type: "string" },
      limit: { type: "string" },
    },
  });

  loadEnvFile();
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const mode = parseMode(values);
  const threshold = parsePositive("threshold", values.threshold);
  if (threshold !== undefined) {
    if (threshold > 1) throw new ConfigError(["--threshold must be <= 1"]);
    config.threshold = threshold;
  }
  const limit = parsePositive("limit", values.limit);

  const deps = createPipeline(config);

  if (mode === "analyze") {
    const analysis = await analyzeLibrary(deps.library);
    console.log(JSON.stringify(analysis, null, 2));
    return 0;
  }

  const controller = new AbortController();
  process.once("SIGINT", () => {
    log.warn("stopping after the current batch...");
    controller.abort();
  });

  const report = await runPipeline(deps, { mode, limit, signal: controller.signal });

  try {
    await logRunReport(report);
  } catch (error) {
    log.warn(`could not write run log: ${errorMessage(error)}`);
  }

  const { summary } = report;
  console.log(
    `\n${mode}: ${summary.total} tracks, ${summary.accepted} accepted, ` +
      `${summary.deferred} deferred, ${summary.rejected} rejected` +
      (report.cancelled ? " (cancelled)" : ""),
  );
  console.log(JSON.stringify(summary, null, 2));
  return 0;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    if (error instanceof ConfigError || error instanceof LibraryUnavailable) {
      log.error(error.message);
    } else {
      log.error("unexpected failure", error);
    }
    process.exitCode = 1;
  },
);
