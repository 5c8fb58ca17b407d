/**
 * acousticChannel.ts
 *
 * Scores each taxonomy genre by the distance between a track's acoustic
 * features and the genre's reference centroid.
 */

import type { AcousticFeatures } from "../types";
import centroidData from "./data/centroids.json";
import { GENRES, isTaxonomyGenre, type TaxonomyGenre } from "./taxonomy";

type FeatureVector = Readonly<Record<string, number>>;

interface CentroidTable {
  scales: FeatureVector;
  centroids: ReadonlyMap<TaxonomyGenre, FeatureVector>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toVector(value: unknown, label: string): FeatureVector {
  if (!isRecord(value)) throw new Error(`centroids.json: ${label} must be an object`);
  const vector: Record<string, number> = {};
  for (const [feature, n] of Object.entries(value)) {
    if (typeof n !== "number" || !Number.isFinite(n)) {
      throw new Error(`centroids.json: ${label}.${feature} must be a number`);
    }
    vector[feature] = n;
  }
  return vector;
}

function loadCentroids(raw: unknown): CentroidTable {
  if (!isRecord(raw)) throw new Error("centroids.json must be an object");
  const scales = toVector(raw.scales, "scales");
  for (const [feature, scale] of Object.entries(scales)) {
    if (scale <= 0) throw new Error(`centroids.json: scale of ${feature} must be > 0`);
  }

  if (!isRecord(raw.centroids)) throw new Error("centroids.json: missing centroids");
  const centroids = new Map<TaxonomyGenre, FeatureVector>();
  for (const [genre, vector] of Object.entries(raw.centroids)) {
    if (!isTaxonomyGenre(genre)) throw new Error(`centroids.json: unknown genre "${genre}"`);
    centroids.set(genre, toVector(vector, genre));
  }
  return { scales, centroids };
}

const TABLE = loadCentroids(centroidData);

/**
 * acoustic(g) = 1 - sqrt(mean(min(1, |x - c| / scale)^2)) over the features
 * the track, the centroid and the scale table all share.
 *
 * Returns null when the features share nothing with the table.
 */
export function scoreAcoustic(
  features: AcousticFeatures | null,
): Map<TaxonomyGenre, number> | null {
  if (!features) return null;

  const usable = Object.keys(features).filter(
    (name) => name in TABLE.scales && Number.isFinite(features[name]),
  );
  if (usable.length === 0) return null;

  const scores = new Map<TaxonomyGenre, number>();
  for (const genre of GENRES) {
    const centroid = TABLE.centroids.get(genre);
    if (!centroid) continue;

    const shared = usable.filter((name) => name in centroid);
    if (shared.length === 0) continue;

    let sum = 0;
    for (const name of shared) {
      const diff = Math.min(1, Math.abs(features[name] - centroid[name]) / TABLE.scales[name]);
      sum += diff * diff;
    }
    scores.set(genre, 1 - Math.sqrt(sum / shared.length));
  }
  return scores.size > 0 ? scores : null;
}
