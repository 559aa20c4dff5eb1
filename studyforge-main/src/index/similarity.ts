import type { DistanceMetric } from "../config/engine-config.js";
import { DimensionMismatchError } from "../shared/errors.js";
import type { EmbeddingVector } from "../chunking/types.js";

/** Cosine similarity in [-1, 1]. Zero-magnitude vectors score 0. */
export function cosineSimilarity(a: EmbeddingVector, b: EmbeddingVector): number {
  if (a.length !== b.length) {
    throw new DimensionMismatchError(a.length, b.length);
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const left = a[i] ?? 0;
    const right = b[i] ?? 0;
    dot += left * right;
    normA += left * left;
    normB += right * right;
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }

  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

export function euclideanDistance(a: EmbeddingVector, b: EmbeddingVector): number {
  if (a.length !== b.length) {
    throw new DimensionMismatchError(a.length, b.length);
  }

  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const diff = (a[i] ?? 0) - (b[i] ?? 0);
    sum += diff * diff;
  }
  return Math.sqrt(sum);
}

/** Distance under `metric`: smaller is closer. Cosine distance is 1 - similarity. */
export function distance(metric: DistanceMetric, a: EmbeddingVector, b: EmbeddingVector): number {
  return metric === "cosine" ? 1 - cosineSimilarity(a, b) : euclideanDistance(a, b);
}

/** Maps a distance back to a similarity score, higher is closer. */
export function distanceToScore(metric: DistanceMetric, value: number): number {
  return metric === "cosine" ? 1 - value : 1 / (1 + value);
}
