import { describe, it, expect, vi } from "vitest";
import { failed, found, makeResearch, makeTrack } from "../../__tests__/helpers";
import type { ResearchResult } from "../../research/types";
import type { ResearchQuery } from "../../types";
import { splitArtistCredit } from "../artistCredit";
import { detectRemix, findRemixIndicators, stripRemixMarkers } from "../detectRemix";

function researchReturning(result: (query: ResearchQuery) => ResearchResult) {
  return vi.fn(async (query: ResearchQuery, _trackId: string) => result(query));
}

describe("findRemixIndicators", () => {
  it("finds keywords in the title", () => {
    expect(findRemixIndicators({ title: "Song (Artist B Remix)", artist: "Artist A" })).toEqual([
      { kind: "keyword", field: "title", match: "remix" },
    ]);
    expect(findRemixIndicators({ title: "Song - VIP", artist: "Artist A" })).toEqual([
      { kind: "keyword", field: "title", match: "vip" },
    ]);
  });

  it("finds bracketed version markers ending in mix", () => {
    expect(findRemixIndicators({ title: "Song [Dub Mix]", artist: "Artist A" })).toEqual([
      { kind: "version-marker", field: "title", match: "dub mix" },
    ]);
  });

  it("does not treat the original mix as a remix", () => {
    expect(findRemixIndicators({ title: "Song (Original Mix)", artist: "Artist A" })).toEqual([]);
  });

  it("finds co-credits in the artist", () => {
    expect(findRemixIndicators({ title: "Song", artist: "Artist A vs. Artist B" })).toEqual([
      { kind: "co-credit", field: "artist", match: "co-credit" },
    ]);
  });

  it("honours a custom keyword list", () => {
    const track = { title: "Song (Club Dub)", artist: "Artist A" };
    expect(findRemixIndicators(track)).toEqual([]);
    expect(findRemixIndicators(track, ["dub"])).toEqual([
      { kind: "keyword", field: "title", match: "dub" },
    ]);
  });

  it("does not match keywords inside words", () => {
    expect(findRemixIndicators({ title: "Credit Flipside", artist: "Editors" })).toEqual([]);
  });
});

describe("stripRemixMarkers", () => {
  it("removes the remix segment and an embedded artist prefix", () => {
    expect(
      stripRemixMarkers({ title: "Artist A - Song (Artist B Remix)", artist: "Artist A" }),
    ).toEqual({ artist: "Artist A", title: "Song" });
  });

  it("takes the original artist from the title when the remixer is credited", () => {
    expect(
      stripRemixMarkers({ title: "Artist A - Song (Artist B Remix)", artist: "Artist B" }),
    ).toEqual({ artist: "Artist A", title: "Song" });
    expect(
      stripRemixMarkers({ title: "Artist A - Song - Artist B Remix", artist: "Artist B" }),
    ).toEqual({ artist: "Artist A", title: "Song" });
  });

  it("removes dash suffixes and co-credits", () => {
    expect(
      stripRemixMarkers({ title: "Song feat. Singer - Artist B Remix", artist: "Artist A ft. Singer" }),
    ).toEqual({ artist: "Artist A", title: "Song" });
  });

  it("keeps brackets that are not remix markers", () => {
    expect(stripRemixMarkers({ title: "Song (Live) [Extended Mix]", artist: "Artist A" })).toEqual({
      artist: "Artist A",
      title: "Song (Live)",
    });
  });
});

describe("splitArtistCredit", () => {
  it("keeps ampersand names whole", () => {
    expect(splitArtistCredit("Above & Beyond feat. Singer")).toEqual({
      primary: "Above & Beyond",
      featured: ["Singer"],
    });
  });
});

describe("detectRemix", () => {
  it("is NOT_REMIX without indicators, whatever the tags say", async () => {
    const researchQuery = researchReturning(() => makeResearch([found("lastfm", ["remix"], 0.1)]));

    const status = await detectRemix(makeTrack({ id: "t1", title: "Song", artist: "Artist A" }), {
      researchQuery,
    });

    expect(status).toEqual({ kind: "NOT_REMIX" });
    expect(researchQuery).not.toHaveBeenCalled();
  });

  it("resolves the original's genre through a second query", async () => {
    const researchQuery = researchReturning((query) =>
      makeResearch([found("lastfm", ["techno"], 0.8)], query),
    );
    const track = makeTrack({
      id: "t1",
      title: "Artist A - Song (Artist B Remix)",
      artist: "Artist A",
    });

    const status = await detectRemix(track, { researchQuery });

    expect(researchQuery).toHaveBeenCalledWith({ artist: "Artist A", title: "Song" }, "t1");
    expect(status.kind).toBe("REMIX_RESOLVED");
    if (status.kind !== "REMIX_RESOLVED") return;
    expect(status.originalTop).toMatchObject({ genre: "Techno", confidence: 0.8 });
    expect(status.indicators).toEqual([{ kind: "keyword", field: "title", match: "remix" }]);
  });

  it("resolves a remix credited to its remixer", async () => {
    const researchQuery = researchReturning((query) =>
      query.artist === "Artist A" && query.title === "Song"
        ? makeResearch([found("lastfm", ["house"], 0.9)], query)
        : makeResearch([], query),
    );
    const track = makeTrack({
      id: "t1",
      title: "Artist A - Song (Artist B Remix)",
      artist: "Artist B",
    });

    const status = await detectRemix(track, { researchQuery });

    expect(researchQuery).toHaveBeenCalledWith({ artist: "Artist A", title: "Song" }, "t1");
    expect(status.kind).toBe("REMIX_RESOLVED");
    if (status.kind !== "REMIX_RESOLVED") return;
    expect(status.originalTop.genre).toBe("House");
  });

  it("is UNRESOLVED when the original maps to no genre", async () => {
    const researchQuery = researchReturning((query) =>
      makeResearch([found("lastfm", ["seen live"], 0.9), failed("musicbrainz")], query),
    );

    const status = await detectRemix(
      makeTrack({ id: "t1", title: "Song (VIP)", artist: "Artist A" }),
      { researchQuery },
    );

    expect(status).toEqual({
      kind: "REMIX_UNRESOLVED",
      indicators: [{ kind: "keyword", field: "title", match: "vip" }],
      original: { artist: "Artist A", title: "Song" },
    });
  });

  it("is UNRESOLVED without a second query when nothing can be stripped", async () => {
    const researchQuery = researchReturning(() => makeResearch([]));

    const status = await detectRemix(makeTrack({ id: "t1", title: "Remix", artist: "DJ" }), {
      researchQuery,
    });

    expect(status.kind).toBe("REMIX_UNRESOLVED");
    expect(researchQuery).not.toHaveBeenCalled();
  });
});
