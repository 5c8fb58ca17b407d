/**
 * consistency.ts
 *
 * Collection-level checks on the playlist taxonomy, and playlist
 * suggestions for genres with nowhere to go.
 */

import type { TaxonomyGenre } from "../genre/taxonomy";
import { normalize } from "../normalize";
import type { PlaylistTaxonomy } from "./types";

export const COMMON_GENRES: readonly TaxonomyGenre[] = [
  "House",
  "Techno",
  "Trance",
  "Dubstep",
  "Drum & Bass",
  "Ambient",
];

export interface PlaylistConsistencyReport {
  genreDistribution: Partial<Record<TaxonomyGenre, number>>;
  unresolvedPlaylists: string[];
  nameMismatches: Array<{ playlist: string; genre: TaxonomyGenre }>;
  missingGenres: TaxonomyGenre[];
  recommendations: string[];
}

export function analyzePlaylistConsistency(taxonomy: PlaylistTaxonomy): PlaylistConsistencyReport {
  const genreDistribution: Partial<Record<TaxonomyGenre, number>> = {};
  const unresolvedPlaylists: string[] = [];
  const nameMismatches: Array<{ playlist: string; genre: TaxonomyGenre }> = [];

  for (const playlist of taxonomy) {
    if (!playlist.genre) {
      unresolvedPlaylists.push(playlist.name);
      continue;
    }
    genreDistribution[playlist.genre] = (genreDistribution[playlist.genre] ?? 0) + 1;
    if (!` ${normalize(playlist.name)} `.includes(` ${normalize(playlist.genre)} `)) {
      nameMismatches.push({ playlist: playlist.name, genre: playlist.genre });
    }
  }

  const missingGenres = COMMON_GENRES.filter((g) => !genreDistribution[g]);

  const recommendations: string[] = [];
  if (missingGenres.length > 0) {
    recommendations.push(`Consider creating playlists for: ${missingGenres.join(", ")}`);
  }
  if (unresolvedPlaylists.length > 0) {
    recommendations.push(`${unresolvedPlaylists.length} playlist(s) have no recognizable genre`);
  }
  if (nameMismatches.length > 0) {
    recommendations.push(
      `${nameMismatches.length} playlist(s) declare a genre their name does not mention`,
    );
  }

  return { genreDistribution, unresolvedPlaylists, nameMismatches, missingGenres, recommendations };
}

/**
 * Names of playlists worth creating for a genre that found no match
 */
export function suggestPlaylists(
  genre: TaxonomyGenre,
  taxonomy: PlaylistTaxonomy,
): string[] {
  const ofGenre = taxonomy.filter((p) => p.genre === genre);
  const suggestions: string[] = [];
  if (ofGenre.length === 0) suggestions.push(genre);
  if (!ofGenre.some((p) => p.remixPolicy === "remix-only")) suggestions.push(`${genre} Remixes`);
  return suggestions;
}

