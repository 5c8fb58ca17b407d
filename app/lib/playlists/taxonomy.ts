/**
 * taxonomy.ts
 *
 * Builds the frozen playlist taxonomy snapshot a run matches against.
 * A playlist's genre comes from its declared genre, else from its name.
 */

import { resolveGenre } from "../genre/mapping";
import { GENRES, type TaxonomyGenre } from "../genre/taxonomy";
import { normalize, normalizedTokens } from "../normalize";
import type { LibraryPlaylist } from "../types";
import type { PlaylistTaxonomy, RemixPolicy, TaxonomyPlaylist } from "./types";

const REMIX_NAME_TOKENS = new Set([
  "remix",
  "remixes",
  "edits",
  "reworks",
  "bootlegs",
  "flips",
  "vips",
]);
const ORIGINAL_NAME_TOKENS = new Set(["original", "originals"]);

// Longest label first so "Deep House" wins over "House"
const NAME_LABELS: ReadonlyArray<{ label: string; genre: TaxonomyGenre }> = GENRES.map(
  (genre) => ({ label: normalize(genre), genre }),
).sort((a, b) => b.label.length - a.label.length);

/**
 * "Deep House Remixes" -> Deep House, "Techno Bangers" -> Techno
 */
export function genreFromName(name: string): TaxonomyGenre | null {
  const whole = resolveGenre(name);
  if (whole) return whole;

  const padded = ` ${normalize(name)} `;
  const hit = NAME_LABELS.find(({ label }) => padded.includes(` ${label} `));
  return hit?.genre ?? null;
}

export function remixPolicyOf(playlist: LibraryPlaylist): RemixPolicy {
  if (playlist.remixOnly) return "remix-only";
  if (playlist.originalOnly) return "original-only";

  const tokens = normalizedTokens(playlist.name);
  if ([...tokens].some((t) => REMIX_NAME_TOKENS.has(t))) return "remix-only";
  if ([...tokens].some((t) => ORIGINAL_NAME_TOKENS.has(t))) return "original-only";
  return "any";
}

export function buildTaxonomy(playlists: readonly LibraryPlaylist[]): PlaylistTaxonomy {
  const entries = playlists.map(
    (playlist): TaxonomyPlaylist =>
      Object.freeze({
        id: playlist.id,
        name: playlist.name,
        genre: resolveGenre(playlist.genre) ?? genreFromName(playlist.name),
        rawGenre: playlist.genre,
        remixPolicy: remixPolicyOf(playlist),
      }),
  );
  return Object.freeze(entries);
}
