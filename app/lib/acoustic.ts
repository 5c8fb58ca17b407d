/**
 * acoustic.ts
 *
 * Acoustic feature extraction through an HTTP analysis service.
 * An unsupported or missing file is a normal null outcome; transient
 * failures are retried, then also treated as null.
 */

import { errorMessage, SourceError, TransientSourceError } from "./errors";
import { createLogger } from "./logger";
import { isRecord, readNumber } from "./research/guards";
import { withRetry, type RetryPolicy } from "./research/retry";
import { systemClock, withTimeout, type Clock } from "./research/timing";
import type { AcousticFeatures } from "./types";

const SOURCE = "acoustic";
const UNSUPPORTED = new Set([404, 415, 422]);

const log = createLogger("acoustic");

export interface AcousticExtractor {
  extract(filePath: string | null): Promise<AcousticFeatures | null>;
}

export const nullAcousticExtractor: AcousticExtractor = {
  extract: async () => null,
};

export interface HttpAcousticOptions {
  baseUrl: string;
  timeoutMs: number;
  retry: RetryPolicy;
  clock?: Clock;
}

export function readFeatures(body: unknown): AcousticFeatures | null {
  if (!isRecord(body)) return null;
  const source = isRecord(body.features) ? body.features : body;
  const features: Record<string, number> = {};
  for (const [name, value] of Object.entries(source)) {
    const n = readNumber(value);
    if (n !== null) features[name] = n;
  }
  return Object.keys(features).length > 0 ? features : null;
}

async function requestFeatures(
  url: string,
  filePath: string,
  signal: AbortSignal,
): Promise<AcousticFeatures | null> {
  let res: Response;
  try {
    res = await fetch(url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ path: filePath }),
      signal,
    });
  } catch (error) {
    throw new TransientSourceError(SOURCE, "network", "extract request failed", { cause: error });
  }

  if (UNSUPPORTED.has(res.status)) return null;
  if (res.status === 429) throw new TransientSourceError(SOURCE, "rate-limit", "extract returned 429");
  if (res.status >= 500) {
    throw new TransientSourceError(SOURCE, "server", `extract returned ${res.status}`);
  }
  if (!res.ok) throw new SourceError(SOURCE, `extract returned ${res.status}`);

  try {
    return readFeatures(await res.json());
  } catch (error) {
    throw new SourceError(SOURCE, "extract returned invalid JSON", { cause: error });
  }
}

export function createHttpAcousticExtractor(options: HttpAcousticOptions): AcousticExtractor {
  const clock = options.clock ?? systemClock;
  const url = `${options.baseUrl.replace(/\/+$/, "")}/extract`;

  return {
    async extract(filePath) {
      if (!filePath) return null;

      const outcome = await withRetry(
        () => withTimeout((signal) => requestFeatures(url, filePath, signal), options.timeoutMs, SOURCE),
        options.retry,
        (ms) => clock.sleep(ms),
      );
      if (outcome.ok) return outcome.value;

      log.warn(`no features for ${filePath}: ${errorMessage(outcome.error)}`);
      return null;
    },
  };
}
