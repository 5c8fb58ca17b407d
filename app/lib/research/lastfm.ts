/**
 * lastfm.ts
 *
 * Last.fm research source: track.getInfo tags, falling back to the
 * artist's top tags when the track carries none.
 */

import { SourceError, TransientSourceError } from "../errors";
import { cleanArtistForSearch, cleanTitleForSearch } from "../normalize";
import type { ResearchQuery } from "../types";
import { asArray, isRecord, readNumber, readString } from "./guards";
import type { ResearchSource, SourceLookup } from "./types";

const LASTFM_API = "https://ws.audioscrobbler.com/2.0/";
const SOURCE = "lastfm";
const MAX_TAGS = 10;

// 8 operation failed, 11 service offline, 16 temporary error, 29 rate limit
const TRANSIENT_ERROR_CODES = new Set([8, 11, 16, 29]);
const NOT_FOUND_CODE = 6;

interface LastFmTag {
  name: string;
  count: number | null;
}

type LastFmResponse = { kind: "ok"; body: Record<string, unknown> } | { kind: "not_found" };

async function callLastFm(
  apiKey: string,
  params: Record<string, string>,
  signal: AbortSignal,
): Promise<LastFmResponse> {
  const url = new URL(LASTFM_API);
  for (const [key, value] of Object.entries(params)) url.searchParams.set(key, value);
  url.searchParams.set("api_key", apiKey);
  url.searchParams.set("format", "json");

  let res: Response;
  try {
    res = await fetch(url, { signal, headers: { Accept: "application/json" } });
  } catch (error) {
    throw new TransientSourceError(SOURCE, "network", `${params.method} request failed`, {
      cause: error,
    });
  }

  if (res.status === 429) {
    throw new TransientSourceError(SOURCE, "rate-limit", `${params.method} returned 429`);
  }
  if (res.status >= 500) {
    throw new TransientSourceError(SOURCE, "server", `${params.method} returned ${res.status}`);
  }

  let body: unknown;
  try {
    body = await res.json();
  } catch (error) {
    throw new SourceError(SOURCE, `${params.method} returned invalid JSON`, { cause: error });
  }
  if (!isRecord(body)) {
    throw new SourceError(SOURCE, `${params.method} returned an unexpected payload`);
  }

  const code = readNumber(body.error);
  if (code !== null) {
    const message = readString(body.message) ?? "unknown error";
    if (code === NOT_FOUND_CODE) return { kind: "not_found" };
    if (TRANSIENT_ERROR_CODES.has(code)) {
      throw new TransientSourceError(
        SOURCE,
        code === 29 ? "rate-limit" : "server",
        `error ${code}: ${message}`,
      );
    }
    throw new SourceError(SOURCE, `error ${code}: ${message}`);
  }
  if (!res.ok) {
    throw new SourceError(SOURCE, `${params.method} returned ${res.status}`);
  }
  return { kind: "ok", body };
}

/**
 * Reads `{ toptags: { tag: [...] } }`; Last.fm sends a bare object
 * instead of an array when there is a single tag.
 */
export function readTopTags(container: unknown): LastFmTag[] {
  if (!isRecord(container)) return [];
  const toptags = container.toptags;
  if (!isRecord(toptags)) return [];

  const tags: LastFmTag[] = [];
  for (const item of asArray(toptags.tag)) {
    if (!isRecord(item)) continue;
    const name = readString(item.name)?.trim();
    if (!name) continue;
    tags.push({ name, count: readNumber(item.count) });
  }
  return tags
    .sort((a, b) => (b.count ?? 0) - (a.count ?? 0))
    .slice(0, MAX_TAGS);
}

function toLookup(tags: LastFmTag[], raw: Record<string, unknown>): SourceLookup {
  const counts = tags.map((t) => t.count).filter((c): c is number => c !== null);
  const confidence =
    counts.length > 0 ? Math.min(1, Math.max(0, Math.max(...counts) / 100)) : null;
  return { tags: tags.map((t) => t.name), confidence, raw };
}

export function createLastFmSource(apiKey: string): ResearchSource {
  return {
    name: SOURCE,
    async lookup(query: ResearchQuery, signal: AbortSignal): Promise<SourceLookup | null> {
      const artist = cleanArtistForSearch(query.artist);
      const track = cleanTitleForSearch(query.title);

      const info = await callLastFm(
        apiKey,
        { method: "track.getInfo", artist, track, autocorrect: "1" },
        signal,
      );
      if (info.kind === "ok" && isRecord(info.body.track)) {
        const trackInfo = info.body.track;
        const tags = readTopTags(trackInfo);
        if (tags.length > 0) {
          return toLookup(tags, {
            scope: "track",
            name: readString(trackInfo.name),
            playcount: readNumber(trackInfo.playcount),
          });
        }
      }

      const artistTags = await callLastFm(
        apiKey,
        { method: "artist.getTopTags", artist, autocorrect: "1" },
        signal,
      );
      if (artistTags.kind === "not_found") return null;

      const tags = readTopTags(artistTags.body);
      if (tags.length === 0) return null;
      return toLookup(tags, { scope: "artist", name: artist });
    },
  };
}
