/**
 * matchPlaylist.ts
 *
 * Chooses the playlist for a classified track: exact genre first (with
 * remix specificity), then the most similar genre, then nothing.
 */

import { InconsistentTaxonomy } from "../errors";
import { genreSimilarity } from "../genre/mapping";
import { isDifferentFamily, UNKNOWN_GENRE, type TaxonomyGenre } from "../genre/taxonomy";
import type { GenreCandidate } from "../genre/types";
import { isRemix, type RemixStatus } from "../remix/types";
import type {
  MembershipConflict,
  PlaylistMatch,
  PlaylistTaxonomy,
  RemixPolicy,
  TaxonomyPlaylist,
} from "./types";

export const MIN_SIMILARITY = 0.5;

const NO_MATCH: PlaylistMatch = Object.freeze({
  kind: "none",
  playlist: null,
  similarity: 0,
  conflicts: [],
});

/**
 * Preference of each remix policy for a track; undefined = ineligible.
 * Remix-only playlists never take originals and vice versa.
 */
function policyRank(policy: RemixPolicy, remix: boolean): number | undefined {
  if (remix) return { "remix-only": 0, any: 1, "original-only": undefined }[policy];
  return { "original-only": 0, any: 1, "remix-only": undefined }[policy];
}

function assertConsistent(chosen: TaxonomyPlaylist, taxonomy: PlaylistTaxonomy): void {
  if (!chosen.id.trim()) {
    throw new InconsistentTaxonomy(`Playlist "${chosen.name}" has an empty id`, chosen.id);
  }
  const clash = taxonomy.find((p) => p.id === chosen.id && p.genre !== chosen.genre);
  if (clash) {
    throw new InconsistentTaxonomy(
      `Playlist id ${chosen.id} is declared as both ${chosen.genre ?? "no genre"} and ${clash.genre ?? "no genre"}`,
      chosen.id,
    );
  }
}

export function findConflicts(
  genre: TaxonomyGenre,
  memberships: ReadonlySet<string>,
  taxonomy: PlaylistTaxonomy,
): MembershipConflict[] {
  const conflicts: MembershipConflict[] = [];
  for (const playlist of taxonomy) {
    if (!memberships.has(playlist.id) || !playlist.genre) continue;
    if (isDifferentFamily(genre, playlist.genre)) {
      conflicts.push({ playlistId: playlist.id, playlistName: playlist.name, genre: playlist.genre });
    }
  }
  return conflicts;
}

export function matchPlaylist(
  top: GenreCandidate,
  remixStatus: RemixStatus,
  taxonomy: PlaylistTaxonomy,
  memberships: ReadonlySet<string>,
): PlaylistMatch {
  if (top.genre === UNKNOWN_GENRE) return NO_MATCH;
  const genre = top.genre;
  const remix = isRemix(remixStatus);

  let best: { playlist: TaxonomyPlaylist; similarity: number; rank: number } | null = null;
  for (const playlist of taxonomy) {
    if (!playlist.genre) continue;
    const rank = policyRank(playlist.remixPolicy, remix);
    if (rank === undefined) continue;

    // A neighbour from a clearly different family is never a fallback
    if (playlist.genre !== genre && isDifferentFamily(genre, playlist.genre)) continue;
    const similarity = genreSimilarity(genre, playlist.genre);
    if (similarity < MIN_SIMILARITY) continue;

    // Earlier taxonomy entries win ties
    if (
      !best ||
      similarity > best.similarity ||
      (similarity === best.similarity && rank < best.rank)
    ) {
      best = { playlist, similarity, rank };
    }
  }

  if (!best) return NO_MATCH;

  assertConsistent(best.playlist, taxonomy);
  return {
    kind: best.similarity === 1 && best.playlist.genre === genre ? "exact" : "similar",
    playlist: best.playlist,
    similarity: best.similarity,
    conflicts: findConflicts(genre, memberships, taxonomy),
  };
}
