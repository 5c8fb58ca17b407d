import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { LibraryUnavailable } from "../errors";
import { LexiconClient } from "../lexicon";

const BASE = "http://localhost:48624/v1";

const mockFetch = vi.fn<[string, RequestInit?], Promise<Response>>();

function routes(table: Record<string, unknown>) {
  mockFetch.mockImplementation(async (url) => {
    const path = url.replace(BASE, "");
    if (!(path in table)) return new Response("not found", { status: 404 });
    return new Response(JSON.stringify(table[path]), { status: 200 });
  });
}

const client = () => new LexiconClient({ baseUrl: "http://localhost:48624/", version: "v1" });

describe("LexiconClient", () => {
  beforeEach(() => {
    mockFetch.mockReset();
    vi.stubGlobal("fetch", mockFetch);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("pings the status endpoint", async () => {
    routes({ "/status": { ok: true } });

    await expect(client().ping()).resolves.toBeUndefined();
    expect(mockFetch.mock.calls[0][0]).toBe(`${BASE}/status`);
  });

  it("lists playlists", async () => {
    routes({
      "/playlists": {
        playlists: [
          { id: 1, name: "House", genre: "House", trackCount: 3 },
          { id: "p2", name: "Techno Remixes", genre: "" },
          { name: "no id" },
        ],
      },
    });

    expect(await client().listPlaylists()).toEqual([
      {
        id: "1",
        name: "House",
        genre: "House",
        trackCount: 3,
        description: null,
        remixOnly: false,
        originalOnly: false,
      },
      {
        id: "p2",
        name: "Techno Remixes",
        genre: null,
        trackCount: 0,
        description: null,
        remixOnly: false,
        originalOnly: false,
      },
    ]);
  });

  it("derives memberships from playlist listings", async () => {
    routes({
      "/playlists": { playlists: [{ id: "p1", name: "House" }] },
      "/playlists/p1/tracks": { tracks: [{ id: "t1" }] },
      "/tracks?limit=500&offset=0": {
        tracks: [
          { id: "t1", title: "Song", artist: "Artist A", genre: "", filePath: "/music/song.mp3", bpm: 124 },
          { id: "t2", title: "Other", artist: "Artist B", genre: "Techno" },
        ],
      },
    });

    const tracks = await client().listTracks();

    expect(tracks.map((t) => t.id)).toEqual(["t1", "t2"]);
    expect([...tracks[0].playlistIds]).toEqual(["p1"]);
    expect(tracks[0]).toMatchObject({ genre: null, filePath: "/music/song.mp3", bpm: 124 });
    expect(tracks[1].playlistIds.size).toBe(0);
    expect(tracks[1].genre).toBe("Techno");
  });

  it("writes genre updates and playlist additions", async () => {
    mockFetch.mockImplementation(async () => new Response("", { status: 200 }));

    await client().updateTrackGenre("t1", "House");
    await client().addToPlaylist("t1", "p1");

    expect(mockFetch.mock.calls[0][0]).toBe(`${BASE}/tracks/t1`);
    expect(mockFetch.mock.calls[0][1]).toMatchObject({ method: "PUT", body: '{"genre":"House"}' });
    expect(mockFetch.mock.calls[1][0]).toBe(`${BASE}/playlists/p1/tracks`);
    expect(mockFetch.mock.calls[1][1]).toMatchObject({ method: "POST", body: '{"trackId":"t1"}' });
  });

  it("turns every failure into LibraryUnavailable", async () => {
    mockFetch.mockResolvedValueOnce(new Response("boom", { status: 500 }));
    await expect(client().listPlaylists()).rejects.toMatchObject({
      name: "LibraryUnavailable",
      status: 500,
    });

    mockFetch.mockRejectedValueOnce(new TypeError("fetch failed"));
    await expect(client().ping()).rejects.toBeInstanceOf(LibraryUnavailable);

    mockFetch.mockResolvedValueOnce(new Response("{not json", { status: 200 }));
    await expect(client().listPlaylists()).rejects.toBeInstanceOf(LibraryUnavailable);
  });
});
