/**
 * taxonomy.ts
 *
 * The fixed genre taxonomy recognized by the classifier and the matcher,
 * plus the family grouping used for membership-consistency checks.
 */

export const GENRES = [
  "House",
  "Deep House",
  "Techno",
  "Trance",
  "Progressive Trance",
  "Dubstep",
  "Drum & Bass",
  "Breakbeat",
  "Ambient",
  "Downtempo",
  "Progressive",
  "Future Bass",
  "Trap",
  "Electronic",
  "Experimental",
] as const;

export type TaxonomyGenre = (typeof GENRES)[number];

export const UNKNOWN_GENRE = "Unknown";

export type Genre = TaxonomyGenre | typeof UNKNOWN_GENRE;

const GENRE_SET: ReadonlySet<string> = new Set(GENRES);

export function isTaxonomyGenre(value: string): value is TaxonomyGenre {
  return GENRE_SET.has(value);
}

export type GenreFamily = "house" | "techno" | "trance" | "bass" | "chill" | "general";

/**
 * Family membership. Progressive sits in both house and trance.
 * "general" genres are compatible with every family.
 */
const GENRE_FAMILIES: Record<TaxonomyGenre, readonly GenreFamily[]> = {
  House: ["house"],
  "Deep House": ["house"],
  Techno: ["techno"],
  Trance: ["trance"],
  "Progressive Trance": ["trance"],
  Dubstep: ["bass"],
  "Drum & Bass": ["bass"],
  Breakbeat: ["bass"],
  Ambient: ["chill"],
  Downtempo: ["chill"],
  Progressive: ["house", "trance"],
  "Future Bass": ["bass"],
  Trap: ["bass"],
  Electronic: ["general"],
  Experimental: ["general"],
};

export function familiesOf(genre: TaxonomyGenre): readonly GenreFamily[] {
  return GENRE_FAMILIES[genre];
}

/**
 * True when two genres belong to clearly different families:
 * no shared family and neither is a general genre.
 */
export function isDifferentFamily(a: TaxonomyGenre, b: TaxonomyGenre): boolean {
  const fa = familiesOf(a);
  const fb = familiesOf(b);
  if (fa.includes("general") || fb.includes("general")) return false;
  return !fa.some((family) => fb.includes(family));
}
