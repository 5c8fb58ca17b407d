/**
 * detectRemix.ts
 *
 * Finds remix indicators in a track's title and artist, and when present
 * researches the original recording to learn its genre.
 *
 * Research tags never make a track a remix; only the track's own
 * metadata does.
 */

import { rankByTextualEvidence } from "../genre/classifyGenre";
import { UNKNOWN_GENRE } from "../genre/taxonomy";
import { normalize, normalizedTokens } from "../normalize";
import type { ResearchResult } from "../research/types";
import type { ResearchQuery, Track } from "../types";
import { hasCoCredit, splitArtistCredit, stripTitleCoCredit } from "./artistCredit";
import type { RemixIndicator, RemixStatus } from "./types";

export const DEFAULT_REMIX_KEYWORDS = [
  "remix",
  "edit",
  "vip",
  "rework",
  "bootleg",
  "flip",
  "refix",
  "mashup",
] as const;

// Version markers naming the original itself
const ORIGINAL_MARKERS = new Set(["original mix", "original", "original version"]);

const BRACKETED = /[([]([^)\]]*)[)\]]/g;

export interface RemixDetectorDeps {
  researchQuery(query: ResearchQuery, trackId: string): Promise<ResearchResult>;
  keywords?: readonly string[];
}

function keywordSet(keywords: readonly string[]): Set<string> {
  return new Set(keywords.map((k) => normalize(k)).filter(Boolean));
}

function isVersionMarker(segment: string): boolean {
  const canonical = normalize(segment);
  return canonical.endsWith("mix") && !ORIGINAL_MARKERS.has(canonical);
}

function segmentIndicatesRemix(segment: string, keywords: Set<string>): boolean {
  if (isVersionMarker(segment)) return true;
  for (const token of normalizedTokens(segment)) {
    if (keywords.has(token)) return true;
  }
  return false;
}

function carriesRemixMarker(text: string, words: Set<string>): boolean {
  for (const [, segment] of text.matchAll(BRACKETED)) {
    if (segmentIndicatesRemix(segment, words)) return true;
  }
  const suffix = text.lastIndexOf(" - ");
  return suffix > 0 && segmentIndicatesRemix(text.slice(suffix + 3), words);
}

/**
 * Indicators from the title and artist, deduplicated per field
 */
export function findRemixIndicators(
  track: Pick<Track, "title" | "artist">,
  keywords: readonly string[] = DEFAULT_REMIX_KEYWORDS,
): RemixIndicator[] {
  const words = keywordSet(keywords);
  const indicators: RemixIndicator[] = [];
  const seen = new Set<string>();
  const add = (indicator: RemixIndicator) => {
    const key = `${indicator.kind}:${indicator.field}:${indicator.match}`;
    if (seen.has(key)) return;
    seen.add(key);
    indicators.push(indicator);
  };

  for (const field of ["title", "artist"] as const) {
    for (const token of normalizedTokens(track[field])) {
      if (words.has(token)) add({ kind: "keyword", field, match: token });
    }
    if (hasCoCredit(track[field])) {
      add({ kind: "co-credit", field, match: "co-credit" });
    }
  }

  for (const [, segment] of track.title.matchAll(BRACKETED)) {
    const hasKeyword = [...normalizedTokens(segment)].some((token) => words.has(token));
    if (!hasKeyword && isVersionMarker(segment)) {
      add({ kind: "version-marker", field: "title", match: normalize(segment) });
    }
  }

  return indicators;
}

/**
 * The query for the original recording: remix bracket segments, a remix
 * dash suffix and co-credits removed; artist reduced to its primary name.
 */
export function stripRemixMarkers(
  track: Pick<Track, "title" | "artist">,
  keywords: readonly string[] = DEFAULT_REMIX_KEYWORDS,
): ResearchQuery {
  const words = keywordSet(keywords);
  let title = track.title;
  let artist = track.artist.trim();

  // "Artist A - Song (Remix)" carried entirely in the title. When the
  // track is credited to someone else (the remixer), the head still names
  // the original artist as long as the rest carries a remix marker.
  const dash = title.indexOf(" - ");
  if (dash > 0) {
    const head = title.slice(0, dash).trim();
    const rest = title.slice(dash + 3);
    if (!artist || normalize(head) === normalize(artist)) {
      artist = artist || head;
      title = rest;
    } else if (carriesRemixMarker(rest, words)) {
      artist = head;
      title = rest;
    }
  }

  title = title.replace(BRACKETED, (whole: string, segment: string) =>
    segmentIndicatesRemix(segment, words) || hasCoCredit(` ${segment}`) ? " " : whole,
  );

  // " - Artist B Remix"
  const suffix = title.lastIndexOf(" - ");
  if (suffix > 0 && segmentIndicatesRemix(title.slice(suffix + 3), words)) {
    title = title.slice(0, suffix);
  }

  title = stripTitleCoCredit(title).replace(/\s+/g, " ").trim();

  return {
    artist: splitArtistCredit(artist).primary,
    title: title || track.title.trim(),
  };
}

export async function detectRemix(
  track: Track,
  deps: RemixDetectorDeps,
): Promise<RemixStatus> {
  const keywords = deps.keywords ?? DEFAULT_REMIX_KEYWORDS;
  const indicators = findRemixIndicators(track, keywords);
  if (indicators.length === 0) return { kind: "NOT_REMIX" };

  const original = stripRemixMarkers(track, keywords);
  const unchanged =
    normalize(original.title) === normalize(track.title) &&
    normalize(original.artist) === normalize(track.artist);
  if (unchanged) return { kind: "REMIX_UNRESOLVED", indicators, original };

  // Source failures come back as "failed" entries, so this never throws
  const originalResearch = await deps.researchQuery(original, track.id);

  const [originalTop] = rankByTextualEvidence(originalResearch);
  if (!originalTop || originalTop.genre === UNKNOWN_GENRE) {
    return { kind: "REMIX_UNRESOLVED", indicators, original };
  }

  return {
    kind: "REMIX_RESOLVED",
    indicators,
    original,
    originalResearch,
    originalTop,
  };
}
