/**
 * normalize.ts
 *
 * Canonical strings for comparing titles, artists and tags across sources.
 * `normalize` is pure and total, and normalize(normalize(x)) === normalize(x).
 */

/**
 * Alias phrases, matched over whole tokens. No replacement contains a key,
 * so a second pass never rewrites anything.
 */
const ALIASES: ReadonlyArray<readonly [string, string]> = [
  ["drum & bass", "drum and bass"],
  ["drum n bass", "drum and bass"],
  ["d & b", "drum and bass"],
  ["drum&bass", "drum and bass"],
  ["drumnbass", "drum and bass"],
  ["d&b", "drum and bass"],
  ["dnb", "drum and bass"],
  ["hip-hop", "hip hop"],
  ["hiphop", "hip hop"],
  ["deephouse", "deep house"],
  ["electronica", "electronic"],
  ["featuring", "feat"],
  ["ft", "feat"],
  ["versus", "vs"],
  ["rmx", "remix"],
  ["prog", "progressive"],
];

const ALIAS_TOKENS: ReadonlyArray<{ key: string[]; value: string[] }> = ALIASES
  .map(([key, value]) => ({ key: key.split(" "), value: value.split(" ") }))
  // Longest phrase first so "drum & bass" wins over any shorter key
  .sort((a, b) => b.key.length - a.key.length);

function substituteAliases(tokens: string[]): string[] {
  const out: string[] = [];
  let i = 0;
  while (i < tokens.length) {
    const hit = ALIAS_TOKENS.find(({ key }) =>
      key.every((part, offset) => tokens[i + offset] === part),
    );
    if (hit) {
      out.push(...hit.value);
      i += hit.key.length;
    } else {
      out.push(tokens[i]);
      i += 1;
    }
  }
  return out;
}

/**
 * Canonicalize a metadata string: lowercase, fold diacritics, keep only
 * letters, digits, "&" and "-", collapse whitespace, resolve aliases.
 */
export function normalize(text: string | null | undefined): string {
  if (typeof text !== "string" || text.length === 0) return "";

  // Compatibility forms can decompose to uppercase (U+210C -> "H"),
  // hence lowercasing on both sides of the decomposition
  const folded = text
    .normalize("NFKD")
    .toLowerCase()
    .normalize("NFKD")
    .replace(/\p{M}+/gu, "")
    .replace(/[^\p{L}\p{N}\s&-]/gu, " ");

  const tokens = folded
    .split(/\s+/)
    .filter((token) => token.length > 0 && !/^-+$/.test(token));

  return substituteAliases(tokens).join(" ");
}

/**
 * Normalized word set, used by similarity scoring
 */
export function normalizedTokens(text: string | null | undefined): Set<string> {
  const canonical = normalize(text);
  return new Set(canonical ? canonical.split(" ") : []);
}

/**
 * Jaccard similarity of the normalized word sets of two strings
 */
export function tokenSimilarity(a: string, b: string): number {
  const wordsA = normalizedTokens(a);
  const wordsB = normalizedTokens(b);
  if (wordsA.size === 0 || wordsB.size === 0) return 0;

  let intersection = 0;
  for (const word of wordsA) {
    if (wordsB.has(word)) intersection += 1;
  }
  const union = wordsA.size + wordsB.size - intersection;
  return union === 0 ? 0 : intersection / union;
}

/**
 * Clean a track title before sending it to a search API.
 * Drops file extensions, leading track numbers and trailing bare numbers.
 */
export function cleanTitleForSearch(title: string): string {
  const lowered = title.toLowerCase().trim();
  const cleaned = lowered
    .replace(/\.(mp3|wav|flac|aac|m4a|aiff)$/, "")
    .replace(/^\d+\s*[-.]?\s*/, "")
    .replace(/\s*[-.]?\s*\d+\s*$/, "")
    .trim();

  // Titles that are only a number ("1999") would otherwise vanish
  return cleaned || lowered;
}

/**
 * Clean an artist name before sending it to a search API.
 * Drops a leading article.
 */
export function cleanArtistForSearch(artist: string): string {
  return artist
    .toLowerCase()
    .trim()
    .replace(/^(the|a|an)\s+/, "")
    .trim();
}
