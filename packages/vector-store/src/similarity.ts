import type { DistanceMetric } from "@papertrail/types";

export function cosineSimilarity(a: number[], b: number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

export function euclideanDistance(a: number[], b: number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const d = (a[i] ?? 0) - (b[i] ?? 0);
    sum += d * d;
  }
  return Math.sqrt(sum);
}

/**
 * Similarity score in [0, 1], higher is closer.
 * cosine: (cos + 1) / 2; l2: 1 / (1 + distance).
 */
export function similarityScore(metric: DistanceMetric, a: number[], b: number[]): number {
  return metric === "cosine"
    ? toScore("cosine", cosineSimilarity(a, b))
    : toScore("l2", euclideanDistance(a, b));
}

/** Convert a raw cosine similarity or L2 distance into the score range. */
export function toScore(metric: DistanceMetric, raw: number): number {
  return metric === "cosine" ? (raw + 1) / 2 : 1 / (1 + raw);
}
