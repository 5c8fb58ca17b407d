/**
 * types.ts
 *
 * Taxonomy snapshot and matcher output.
 */

import type { TaxonomyGenre } from "../genre/taxonomy";

export type RemixPolicy = "remix-only" | "original-only" | "any";

export interface TaxonomyPlaylist {
  id: string;
  name: string;
  genre: TaxonomyGenre | null;
  rawGenre: string | null;
  remixPolicy: RemixPolicy;
}

export type PlaylistTaxonomy = readonly TaxonomyPlaylist[];

export type MatchKind = "exact" | "similar" | "none";

export interface MembershipConflict {
  playlistId: string;
  playlistName: string;
  genre: TaxonomyGenre;
}

export interface PlaylistMatch {
  kind: MatchKind;
  playlist: TaxonomyPlaylist | null;
  similarity: number; // 1 for exact, table score for similar, 0 for none
  conflicts: MembershipConflict[];
}
