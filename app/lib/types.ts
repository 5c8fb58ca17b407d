/**
 * types.ts
 *
 * Library-level shapes shared by every stage of the pipeline.
 * Tracks and playlists are owned by the library; the pipeline only
 * ever holds read-only snapshots of them.
 */

export interface Track {
  id: string;
  title: string;
  artist: string;
  album: string | null;
  genre: string | null; // Current genre tag, possibly empty
  filePath: string | null;
  playlistIds: ReadonlySet<string>;
  bpm?: number | null;
  year?: number | null;
  durationSec?: number | null;
}

/**
 * Playlist as the library returns it, before taxonomy resolution.
 */
export interface LibraryPlaylist {
  id: string;
  name: string;
  genre: string | null;
  trackCount: number;
  description?: string | null;
  remixOnly?: boolean;
  originalOnly?: boolean;
}

/**
 * Spectral/timbral summary of a track's audio, keyed by feature name
 * (tempo, spectralCentroid, zeroCrossingRate, ...).
 */
export type AcousticFeatures = Readonly<Record<string, number>>;

/**
 * Artist/title pair sent to research sources
 */
export interface ResearchQuery {
  artist: string;
  title: string;
}
