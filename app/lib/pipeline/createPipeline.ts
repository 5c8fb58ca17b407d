/**
 * createPipeline.ts
 *
 * Wires configured collaborators (library, sources, extractor) for a run.
 */

import { createHttpAcousticExtractor, nullAcousticExtractor } from "@/lib/acoustic";
import type { PipelineConfig } from "@/lib/config";
import { LexiconClient } from "@/lib/lexicon";
import { configureMusicBrainz, createMusicBrainzSource } from "@/lib/musicbrainz";
import { createResearchAggregator } from "@/lib/research/aggregator";
import { createLastFmSource } from "@/lib/research/lastfm";
import type { ConfiguredSource } from "@/lib/research/types";
import type { OrchestratorDeps } from "./orchestrator";

export function configuredSources(config: PipelineConfig): ConfiguredSource[] {
  const sources: ConfiguredSource[] = [];

  if (config.lastfm.apiKey) {
    sources.push({
      source: createLastFmSource(config.lastfm.apiKey),
      settings: {
        weight: 1.0,
        priorConfidence: 0.6,
        timeoutMs: config.sourceTimeoutMs,
        rateLimit: { requests: config.lastfm.ratePerSec, intervalMs: 1000, maxConcurrent: 4 },
      },
    });
  }

  configureMusicBrainz({
    appName: config.musicbrainz.appName,
    appVersion: config.musicbrainz.appVersion,
    appContactInfo: config.musicbrainz.contact,
  });
  sources.push({
    source: createMusicBrainzSource(),
    settings: {
      weight: 0.8,
      priorConfidence: 0.5,
      timeoutMs: config.sourceTimeoutMs,
      rateLimit: { requests: config.musicbrainz.ratePerSec, intervalMs: 1000, maxConcurrent: 1 },
    },
  });

  return sources;
}

export function createPipeline(config: PipelineConfig): OrchestratorDeps {
  const retry = { maxAttempts: config.maxRetries, baseDelayMs: config.retryDelayMs };
  return {
    library: new LexiconClient({
      baseUrl: config.lexicon.baseUrl,
      version: config.lexicon.version,
    }),
    research: createResearchAggregator({ sources: configuredSources(config), retry }),
    acoustic: config.acoustic.baseUrl
      ? createHttpAcousticExtractor({
          baseUrl: config.acoustic.baseUrl,
          timeoutMs: config.sourceTimeoutMs,
          retry,
        })
      : nullAcousticExtractor,
    settings: {
      batchSize: config.batchSize,
      batchDelayMs: config.batchDelayMs,
      concurrency: config.concurrency,
      threshold: config.threshold,
      weights: config.weights,
      remixKeywords: config.remixKeywords,
    },
  };
}
