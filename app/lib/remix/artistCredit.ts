/**
 * artistCredit.ts
 *
 * Splits co-credited artist strings ("A feat. B", "A vs. B") into the
 * primary artist and the rest.
 */

export interface ArtistCredit {
  primary: string;
  featured: string[];
}

// " feat. ", " ft ", " featuring ", " vs. ", " versus "
const CO_CREDIT = /\s+(?:feat\.?|ft\.?|featuring|vs\.?|versus)\s+/i;

/**
 * @example
 * splitArtistCredit("Artist A feat. Singer")
 * // { primary: "Artist A", featured: ["Singer"] }
 */
export function splitArtistCredit(raw: string): ArtistCredit {
  const parts = raw.split(CO_CREDIT).map((p) => p.trim()).filter(Boolean);
  if (parts.length === 0) return { primary: raw.trim(), featured: [] };
  return { primary: parts[0], featured: parts.slice(1) };
}

export function hasCoCredit(raw: string): boolean {
  return CO_CREDIT.test(raw);
}

/**
 * Drops a trailing "feat. X" from a title
 */
export function stripTitleCoCredit(title: string): string {
  const match = CO_CREDIT.exec(title);
  return match ? title.slice(0, match.index).trim() : title.trim();
}
