/**
 * config.ts
 *
 * Reads pipeline configuration from the environment. Every problem is
 * collected and reported at once through ConfigError.
 */

import { existsSync } from "fs";
import { ConfigError } from "./errors";
import type { FusionWeights } from "./genre/types";
import { isLogLevel, type LogLevel } from "./logger";
import { DEFAULT_REMIX_KEYWORDS } from "./remix/detectRemix";

export interface PipelineConfig {
  lexicon: { baseUrl: string; version: string };
  lastfm: { apiKey: string | null; ratePerSec: number };
  musicbrainz: { appName: string; appVersion: string; contact: string; ratePerSec: number };
  acoustic: { baseUrl: string | null };
  batchSize: number;
  batchDelayMs: number;
  concurrency: number;
  maxRetries: number;
  retryDelayMs: number;
  sourceTimeoutMs: number;
  threshold: number;
  weights: FusionWeights;
  remixKeywords: string[];
  logLevel: LogLevel;
}

type Env = Record<string, string | undefined>;

/**
 * Loads a .env file into process.env when one exists. Returns whether it did.
 */
export function loadEnvFile(path = ".env"): boolean {
  if (!existsSync(path)) return false;
  process.loadEnvFile(path);
  return true;
}

export function loadConfig(env: Env = process.env): PipelineConfig {
  const problems: string[] = [];

  const text = (name: string, fallback: string): string => {
    const value = env[name]?.trim();
    return value ? value : fallback;
  };

  const optional = (name: string): string | null => env[name]?.trim() || null;

  const number = (
    name: string,
    fallback: number,
    check: { min?: number; max?: number; integer?: boolean; positive?: boolean } = {},
  ): number => {
    const raw = env[name]?.trim();
    if (!raw) return fallback;
    const value = Number(raw);
    if (!Number.isFinite(value)) {
      problems.push(`${name} must be a number (got "${raw}")`);
      return fallback;
    }
    if (check.integer && !Number.isInteger(value)) problems.push(`${name} must be an integer`);
    if (check.positive && value <= 0) problems.push(`${name} must be > 0`);
    if (check.min !== undefined && value < check.min) problems.push(`${name} must be >= ${check.min}`);
    if (check.max !== undefined && value > check.max) problems.push(`${name} must be <= ${check.max}`);
    return value;
  };

  const unit = { min: 0, max: 1 };

  const logLevel = text("LOG_LEVEL", "info").toLowerCase();
  if (!isLogLevel(logLevel)) problems.push(`LOG_LEVEL must be debug, info, warn or error`);

  const keywordsRaw = optional("REMIX_KEYWORDS");
  const remixKeywords = keywordsRaw
    ? keywordsRaw.split(",").map((k) => k.trim()).filter(Boolean)
    : [...DEFAULT_REMIX_KEYWORDS];
  if (remixKeywords.length === 0) problems.push("REMIX_KEYWORDS must name at least one keyword");

  const config: PipelineConfig = {
    lexicon: {
      baseUrl: text("LEXICON_API_URL", "http://localhost:48624"),
      version: text("LEXICON_API_VERSION", "v1"),
    },
    lastfm: {
      apiKey: optional("LASTFM_API_KEY"),
      ratePerSec: number("LASTFM_RATE_PER_SEC", 5, { positive: true }),
    },
    musicbrainz: {
      appName: text("MUSICBRAINZ_APP_NAME", "genre-resolver"),
      appVersion: text("MUSICBRAINZ_APP_VERSION", "0.1.0"),
      contact: env.MUSICBRAINZ_CONTACT?.trim() ?? "",
      ratePerSec: number("MUSICBRAINZ_RATE_PER_SEC", 1, { positive: true }),
    },
    acoustic: { baseUrl: optional("ACOUSTIC_API_URL") },
    batchSize: number("BATCH_SIZE", 50, { integer: true, positive: true }),
    batchDelayMs: number("BATCH_DELAY_MS", 1000, { min: 0 }),
    concurrency: number("CONCURRENCY", 4, { integer: true, positive: true }),
    maxRetries: number("MAX_RETRIES", 3, { integer: true, positive: true }),
    retryDelayMs: number("RETRY_DELAY_MS", 500, { min: 0 }),
    sourceTimeoutMs: number("SOURCE_TIMEOUT_MS", 10000, { positive: true }),
    threshold: number("CONFIDENCE_THRESHOLD", 0.7, unit),
    weights: {
      text: number("TEXT_WEIGHT", 0.6, unit),
      acoustic: number("ACOUSTIC_WEIGHT", 0.4, unit),
      original: number("ORIGINAL_WEIGHT", 0.2, unit),
    },
    remixKeywords,
    logLevel: isLogLevel(logLevel) ? logLevel : "info",
  };

  if (config.weights.text + config.weights.acoustic <= 0) {
    problems.push("TEXT_WEIGHT and ACOUSTIC_WEIGHT cannot both be 0");
  }

  if (problems.length > 0) throw new ConfigError(problems);
  return config;
}
