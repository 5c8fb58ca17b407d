// lib/musicbrainz.ts
import { MusicBrainzApi } from "musicbrainz-api";
import { SourceError, TransientSourceError } from "./errors";
import {
  cleanArtistForSearch,
  cleanTitleForSearch,
  tokenSimilarity,
} from "./normalize";
import { asArray, isRecord, readNumber, readString } from "./research/guards";
import type { ResearchSource, SourceLookup } from "./research/types";
import type { ResearchQuery } from "./types";

const SOURCE = "musicbrainz";
const SEARCH_LIMIT = 5;
const MIN_MATCH_SCORE = 0.6;

export interface MusicBrainzAppInfo {
  appName: string;
  appVersion: string;
  appContactInfo: string;
}

let appInfo: MusicBrainzAppInfo = {
  appName: "genre-resolver",
  appVersion: "0.1.0",
  appContactInfo: "",
};
let cachedClient: MusicBrainzApi | null = null;

export function configureMusicBrainz(info: MusicBrainzAppInfo): void {
  appInfo = info;
  cachedClient = null;
}

export function getMBClient(): MusicBrainzApi {
  if (cachedClient) return cachedClient;

  cachedClient = new MusicBrainzApi({ ...appInfo });

  return cachedClient;
}

export interface RecordingCandidate {
  id: string;
  title: string;
  artist: string;
  score: number | null;
  tags: string[];
}

// Helper: turn artist-credit array into a human string
export function formatArtistCredit(recording: Record<string, unknown>): string {
  return asArray(recording["artist-credit"])
    .map((entry) => {
      if (typeof entry === "string") return entry; // join phrase
      if (!isRecord(entry)) return "";
      const artist = isRecord(entry.artist) ? readString(entry.artist.name) : null;
      const name = readString(entry.name) ?? artist ?? "";
      return `${name}${readString(entry.joinphrase) ?? ""}`;
    })
    .join("");
}

export function readRecordings(result: unknown): RecordingCandidate[] {
  if (!isRecord(result)) return [];
  const out: RecordingCandidate[] = [];
  for (const rec of asArray(result.recordings)) {
    if (!isRecord(rec)) continue;
    const tags = asArray(rec.tags)
      .map((tag) => (isRecord(tag) ? readString(tag.name) : null))
      .filter((name): name is string => !!name);
    out.push({
      id: readString(rec.id) ?? "",
      title: readString(rec.title) ?? "",
      artist: formatArtistCredit(rec),
      score: readNumber(rec.score) ?? readNumber(rec["ext:score"]),
      tags,
    });
  }
  return out;
}

/**
 * Best recording by 0.4 * title similarity + 0.6 * artist similarity;
 * null unless it clears MIN_MATCH_SCORE.
 */
export function findBestMatch(
  title: string,
  artist: string,
  recordings: RecordingCandidate[],
): { recording: RecordingCandidate; match: number } | null {
  let best: { recording: RecordingCandidate; match: number } | null = null;
  for (const recording of recordings) {
    const match =
      0.4 * tokenSimilarity(title, recording.title) +
      0.6 * tokenSimilarity(artist, recording.artist);
    if (!best || match > best.match) best = { recording, match };
  }
  return best && best.match > MIN_MATCH_SCORE ? best : null;
}

function escapeLucene(value: string): string {
  return value.replace(/["\\]/g, "\\$&");
}

/**
 * musicbrainz-api surfaces HTTP failures as plain errors; sort them into
 * retryable and final.
 */
export function classifyMusicBrainzError(error: unknown): Error {
  const message = error instanceof Error ? error.message : String(error);
  if (/\b(429|503)\b/.test(message) || /rate limit/i.test(message)) {
    return new TransientSourceError(SOURCE, "rate-limit", message, { cause: error });
  }
  if (/\b5\d\d\b/.test(message)) {
    return new TransientSourceError(SOURCE, "server", message, { cause: error });
  }
  if (/ECONNRESET|ETIMEDOUT|ENOTFOUND|EAI_AGAIN|fetch failed|network/i.test(message)) {
    return new TransientSourceError(SOURCE, "network", message, { cause: error });
  }
  return new SourceError(SOURCE, message, { cause: error });
}

export function createMusicBrainzSource(): ResearchSource {
  return {
    name: SOURCE,
    async lookup(query: ResearchQuery): Promise<SourceLookup | null> {
      const title = cleanTitleForSearch(query.title);
      const artist = cleanArtistForSearch(query.artist);
      const mbQuery = `recording:"${escapeLucene(title)}" AND artist:"${escapeLucene(artist)}"`;

      let result: unknown;
      try {
        result = await getMBClient().search("recording", {
          query: mbQuery,
          limit: SEARCH_LIMIT,
        });
      } catch (error) {
        throw classifyMusicBrainzError(error);
      }

      const best = findBestMatch(title, artist, readRecordings(result));
      if (!best) return null;

      const { recording, match } = best;
      return {
        tags: recording.tags,
        confidence:
          recording.score === null ? null : Math.min(1, Math.max(0, recording.score / 100)),
        raw: {
          id: recording.id,
          title: recording.title,
          artist: recording.artist,
          score: recording.score,
          match: Math.round(match * 1000) / 1000,
        },
      };
    },
  };
}
