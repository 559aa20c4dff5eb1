import type { DistanceMetric } from "../config/engine-config.js";
import type { EmbeddedChunk } from "../chunking/types.js";
import type { Locator } from "../sources/types.js";

export interface SearchHit {
  chunk: EmbeddedChunk;
  distance: number;
  /** Similarity derived from the distance; higher is closer. */
  score: number;
}

export interface SearchOptions {
  /** Only these chunk ids are candidates. */
  restrictTo?: ReadonlySet<string>;
}

export interface IndexedChunkRecord {
  id: string;
  text: string;
  locator: Locator;
  sessionId: string;
  embedding: number[];
}

export interface IndexSnapshot {
  metric: DistanceMetric;
  dimensions: number | null;
  model: string | null;
  chunks: IndexedChunkRecord[];
}
