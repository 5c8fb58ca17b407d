/**
 * mapping.ts
 *
 * Maps free-form tags and playlist labels onto the taxonomy, and exposes
 * the genre-similarity table used for nearest-genre playlist matching.
 */

import { normalize } from "../normalize";
import synonymsData from "./data/synonyms.json";
import similarityData from "./data/similarity.json";
import { GENRES, isTaxonomyGenre, type TaxonomyGenre } from "./taxonomy";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function loadSynonyms(raw: unknown): Map<string, TaxonomyGenre> {
  const table = new Map<string, TaxonomyGenre>();

  // Every label matches itself
  for (const genre of GENRES) {
    table.set(normalize(genre), genre);
  }

  if (!isRecord(raw)) throw new Error("synonyms.json must be an object");
  for (const [tag, genre] of Object.entries(raw)) {
    if (typeof genre !== "string" || !isTaxonomyGenre(genre)) {
      throw new Error(`synonyms.json: "${tag}" maps to unknown genre`);
    }
    table.set(normalize(tag), genre);
  }
  return table;
}

function loadSimilarity(
  raw: unknown,
): Map<TaxonomyGenre, ReadonlyArray<{ genre: TaxonomyGenre; score: number }>> {
  if (!isRecord(raw)) throw new Error("similarity.json must be an object");

  const table = new Map<
    TaxonomyGenre,
    ReadonlyArray<{ genre: TaxonomyGenre; score: number }>
  >();
  for (const [from, neighbours] of Object.entries(raw)) {
    if (!isTaxonomyGenre(from) || !isRecord(neighbours)) {
      throw new Error(`similarity.json: bad entry "${from}"`);
    }
    const list: Array<{ genre: TaxonomyGenre; score: number }> = [];
    for (const [to, score] of Object.entries(neighbours)) {
      if (!isTaxonomyGenre(to) || typeof score !== "number") {
        throw new Error(`similarity.json: bad neighbour "${from}" -> "${to}"`);
      }
      list.push({ genre: to, score });
    }
    table.set(
      from,
      list.sort((a, b) => b.score - a.score),
    );
  }
  return table;
}

const SYNONYMS = loadSynonyms(synonymsData);
const SIMILARITY = loadSimilarity(similarityData);

/**
 * Resolve a tag or label ("dnb", "Tech House", "Drum & Bass") to a
 * taxonomy genre, or null when it carries no genre meaning.
 */
export function resolveGenre(label: string | null | undefined): TaxonomyGenre | null {
  const key = normalize(label);
  if (!key) return null;
  return SYNONYMS.get(key) ?? null;
}

/**
 * Resolve every tag of a source, deduplicated, in first-seen order
 */
export function resolveGenres(tags: readonly string[]): TaxonomyGenre[] {
  const seen = new Set<TaxonomyGenre>();
  for (const tag of tags) {
    const genre = resolveGenre(tag);
    if (genre) seen.add(genre);
  }
  return [...seen];
}

/**
 * Similarity of two genres in [0,1]; 1 for the same genre,
 * 0 when the table has no entry.
 */
export function genreSimilarity(from: TaxonomyGenre, to: TaxonomyGenre): number {
  if (from === to) return 1;
  return SIMILARITY.get(from)?.find((n) => n.genre === to)?.score ?? 0;
}

/**
 * Neighbours of a genre, most similar first
 */
export function similarGenres(
  genre: TaxonomyGenre,
): ReadonlyArray<{ genre: TaxonomyGenre; score: number }> {
  return SIMILARITY.get(genre) ?? [];
}
