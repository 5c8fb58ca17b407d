/**
 * Shared builders and in-process stand-ins for the pipeline tests.
 */

import { vi } from "vitest";
import { LibraryUnavailable } from "../errors";
import type { LibraryClient } from "../lexicon";
import type { Logger } from "../logger";
import type { Clock } from "../research/timing";
import type {
  ResearchResult,
  ResearchSource,
  SourceEvidence,
  SourceLookup,
} from "../research/types";
import type { LibraryPlaylist, ResearchQuery, Track } from "../types";

export function makeTrack(overrides: Partial<Track> & { id: string }): Track {
  return {
    title: "Untitled",
    artist: "Nobody",
    album: null,
    genre: null,
    filePath: null,
    playlistIds: new Set(),
    ...overrides,
  };
}

export function makePlaylist(
  overrides: Partial<LibraryPlaylist> & { id: string; name: string },
): LibraryPlaylist {
  return { genre: null, trackCount: 0, ...overrides };
}

export function found(
  source: string,
  tags: string[],
  confidence: number,
  extra: Partial<SourceEvidence> = {},
): SourceEvidence {
  return {
    source,
    status: "found",
    tags,
    confidence,
    weight: 1,
    priority: 0,
    raw: {},
    attempts: 1,
    ...extra,
  };
}

export function failed(source: string, extra: Partial<SourceEvidence> = {}): SourceEvidence {
  return {
    source,
    status: "failed",
    tags: [],
    confidence: 0,
    weight: 1,
    priority: 0,
    raw: {},
    attempts: 3,
    error: "timed out",
    ...extra,
  };
}

export function makeResearch(
  entries: SourceEvidence[],
  query: ResearchQuery = { artist: "Artist", title: "Title" },
  trackId = "t1",
): ResearchResult {
  return { trackId, query, entries };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

/**
 * Virtual time: sleep advances the clock instantly
 */
export function fakeClock(start = 0): Clock & { sleeps: number[] } {
  let now = start;
  const sleeps: number[] = [];
  return {
    sleeps,
    now: () => now,
    sleep: async (ms: number) => {
      sleeps.push(ms);
      now += ms;
    },
  };
}

/**
 * A research source answering from a script keyed by "artist|title"
 * (lowercased); unknown keys resolve to null.
 */
export function scriptedSource(
  name: string,
  script: Record<string, SourceLookup | Error>,
) {
  const lookup = vi.fn(async (query: ResearchQuery): Promise<SourceLookup | null> => {
    const hit = script[`${query.artist}|${query.title}`.toLowerCase()];
    if (hit instanceof Error) throw hit;
    return hit ?? null;
  });
  return { name, lookup } satisfies ResearchSource;
}

/**
 * In-memory LibraryClient recording every write
 */
export class InMemoryLibrary implements LibraryClient {
  readonly genreUpdates: Array<{ trackId: string; genre: string }> = [];
  readonly playlistAdds: Array<{ trackId: string; playlistId: string }> = [];
  available = true;

  constructor(
    private readonly tracks: Track[],
    private readonly playlists: LibraryPlaylist[],
  ) {}

  private check(): void {
    if (!this.available) throw new LibraryUnavailable("library offline");
  }

  async ping(): Promise<void> {
    this.check();
  }

  async listTracks(): Promise<Track[]> {
    this.check();
    return [...this.tracks];
  }

  async listPlaylists(): Promise<LibraryPlaylist[]> {
    this.check();
    return [...this.playlists];
  }

  async updateTrackGenre(trackId: string, genre: string): Promise<void> {
    this.check();
    this.genreUpdates.push({ trackId, genre });
  }

  async addToPlaylist(trackId: string, playlistId: string): Promise<void> {
    this.check();
    this.playlistAdds.push({ trackId, playlistId });
  }
}
