/**
 * lexicon.ts
 *
 * Library access over the Lexicon DJ local HTTP API. Every failure,
 * whether network, HTTP status or malformed payload, surfaces as
 * LibraryUnavailable.
 */

import { errorMessage, LibraryUnavailable } from "./errors";
import { asArray, isRecord, readNumber, readString } from "./research/guards";
import type { LibraryPlaylist, Track } from "./types";

export interface LibraryClient {
  ping(): Promise<void>;
  listTracks(): Promise<Track[]>;
  listPlaylists(): Promise<LibraryPlaylist[]>;
  updateTrackGenre(trackId: string, genre: string): Promise<void>;
  addToPlaylist(trackId: string, playlistId: string): Promise<void>;
}

export interface LexiconClientOptions {
  baseUrl: string;
  version: string;
  pageSize?: number;
  timeoutMs?: number;
}

function readId(value: unknown): string | null {
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return readString(value);
}

/**
 * Lists come back either bare or wrapped as `{ <key>: [...] }`
 */
function readList(body: unknown, key: string): unknown[] {
  if (Array.isArray(body)) return body;
  if (isRecord(body)) return asArray(body[key]);
  return [];
}

export function parseTrack(value: unknown, playlistIds: ReadonlySet<string>): Track | null {
  if (!isRecord(value)) return null;
  const id = readId(value.id);
  if (!id) return null;
  return {
    id,
    title: readString(value.title) ?? "",
    artist: readString(value.artist) ?? "",
    album: readString(value.album),
    genre: readString(value.genre) || null,
    filePath: readString(value.filePath),
    playlistIds,
    bpm: readNumber(value.bpm),
    year: readNumber(value.year),
    durationSec: readNumber(value.duration),
  };
}

export function parsePlaylist(value: unknown): LibraryPlaylist | null {
  if (!isRecord(value)) return null;
  const id = readId(value.id);
  const name = readString(value.name);
  if (id === null || name === null) return null;
  return {
    id,
    name,
    genre: readString(value.genre) || null,
    trackCount: readNumber(value.trackCount) ?? asArray(value.trackIds).length,
    description: readString(value.description),
    remixOnly: value.remixOnly === true,
    originalOnly: value.originalOnly === true,
  };
}

export class LexiconClient implements LibraryClient {
  private readonly root: string;
  private readonly pageSize: number;
  private readonly timeoutMs: number;

  constructor(options: LexiconClientOptions) {
    this.root = `${options.baseUrl.replace(/\/+$/, "")}/${options.version}`;
    this.pageSize = options.pageSize ?? 500;
    this.timeoutMs = options.timeoutMs ?? 30000;
  }

  private async request(method: string, path: string, body?: unknown): Promise<unknown> {
    const label = `${method} ${path}`;
    let res: Response;
    try {
      res = await fetch(`${this.root}${path}`, {
        method,
        headers: { "Content-Type": "application/json", Accept: "application/json" },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new LibraryUnavailable(`${label} failed: ${errorMessage(error)}`, null, {
        cause: error,
      });
    }

    if (!res.ok) {
      throw new LibraryUnavailable(`${label} returned ${res.status}`, res.status);
    }

    const text = await res.text();
    if (!text) return null;
    try {
      return JSON.parse(text);
    } catch (error) {
      throw new LibraryUnavailable(`${label} returned invalid JSON`, res.status, {
        cause: error,
      });
    }
  }

  async ping(): Promise<void> {
    await this.request("GET", "/status");
  }

  async listPlaylists(): Promise<LibraryPlaylist[]> {
    const body = await this.request("GET", "/playlists");
    return readList(body, "playlists")
      .map(parsePlaylist)
      .filter((p): p is LibraryPlaylist => p !== null);
  }

  private async playlistTrackIds(playlistId: string): Promise<string[]> {
    const body = await this.request("GET", `/playlists/${encodeURIComponent(playlistId)}/tracks`);
    return readList(body, "tracks")
      .map((t) => (isRecord(t) ? readId(t.id) : readId(t)))
      .filter((id): id is string => id !== null);
  }

  /**
   * All tracks, paginated, with memberships derived from playlist listings
   */
  async listTracks(): Promise<Track[]> {
    const memberships = new Map<string, Set<string>>();
    for (const playlist of await this.listPlaylists()) {
      for (const trackId of await this.playlistTrackIds(playlist.id)) {
        const set = memberships.get(trackId) ?? new Set<string>();
        set.add(playlist.id);
        memberships.set(trackId, set);
      }
    }

    const tracks: Track[] = [];
    for (let offset = 0; ; offset += this.pageSize) {
      const body = await this.request("GET", `/tracks?limit=${this.pageSize}&offset=${offset}`);
      const page = readList(body, "tracks");
      for (const raw of page) {
        const id = isRecord(raw) ? readId(raw.id) : null;
        const track = parseTrack(raw, memberships.get(id ?? "") ?? new Set());
        if (track) tracks.push(track);
      }
      if (page.length < this.pageSize) break;
    }
    return tracks;
  }

  async updateTrackGenre(trackId: string, genre: string): Promise<void> {
    await this.request("PUT", `/tracks/${encodeURIComponent(trackId)}`, { genre });
  }

  async addToPlaylist(trackId: string, playlistId: string): Promise<void> {
    await this.request("POST", `/playlists/${encodeURIComponent(playlistId)}/tracks`, { trackId });
  }
}
