import {
  cosineSimilarity,
  dotProduct,
  euclideanDistance,
} from "@utils/vector";

import type { DistanceMetric } from "./ports";

function clamp01(value: number): number {
  if (Number.isNaN(value)) {
    return 0;
  }
  return Math.max(0, Math.min(1, value));
}

/**
 * Maps a raw store distance to a relevance in [0, 1].
 *
 * - cosine: pgvector `<=>` returns 1 - cos, so relevance = 1 - d.
 * - euclidean: `<->` is unbounded, relevance = 1 / (1 + d).
 * - dot-product: `<#>` returns the negated inner product; for unit vectors
 *   the inner product lies in [-1, 1] and is rescaled to (1 + ip) / 2.
 */
export function distanceToRelevance(
  metric: DistanceMetric,
  distance: number
): number {
  switch (metric) {
    case "cosine":
      return clamp01(1 - distance);
    case "euclidean":
      return clamp01(1 / (1 + Math.max(0, distance)));
    case "dot-product":
      return clamp01((1 - distance) / 2);
  }
}

/**
 * Raw distance between two vectors with pgvector's operator semantics
 * (`<=>`, `<->`, `<#>`). Lower is closer; rank on this, since the dot-product
 * relevance saturates for vectors that are not unit length.
 */
export function distanceBetween(
  metric: DistanceMetric,
  a: number[],
  b: number[]
): number {
  switch (metric) {
    case "cosine":
      return 1 - cosineSimilarity(a, b);
    case "euclidean":
      return euclideanDistance(a, b);
    case "dot-product":
      return -dotProduct(a, b);
  }
}

/** Relevance of two raw vectors, consistent with distanceToRelevance. */
export function relevanceBetween(
  metric: DistanceMetric,
  a: number[],
  b: number[]
): number {
  if (metric === "cosine") {
    return clamp01(cosineSimilarity(a, b));
  }
  return distanceToRelevance(metric, distanceBetween(metric, a, b));
}

export function byRelevanceDesc<T extends { relevance: number }>(
  a: T,
  b: T
): number {
  return b.relevance - a.relevance;
}
