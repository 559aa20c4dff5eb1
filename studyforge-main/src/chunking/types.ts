import type { Locator } from "../sources/types.js";

export type EmbeddingVector = readonly number[];

export interface Chunk {
  /** Content address of (sourceId, position, text). */
  readonly id: string;
  readonly text: string;
  readonly locator: Locator;
  /** Persistence partition. */
  readonly sessionId: string;
  readonly embedding?: EmbeddingVector;
}

export interface EmbeddedChunk extends Chunk {
  readonly embedding: EmbeddingVector;
}

export function isEmbedded(chunk: Chunk): chunk is EmbeddedChunk {
  return Array.isArray(chunk.embedding) && chunk.embedding.length > 0;
}

/** Embeddings are write-once: a chunk that already carries one is returned unchanged. */
export function withEmbedding(chunk: Chunk, embedding: EmbeddingVector): EmbeddedChunk {
  if (isEmbedded(chunk)) return chunk;
  return Object.freeze({ ...chunk, embedding: Object.freeze([...embedding]) });
}
