import type { DistanceMetric } from "../config/engine-config.js";
import type { EmbeddedChunk, EmbeddingVector } from "../chunking/types.js";
import { logIndexInsert, logIndexSearch } from "../shared/engine-logger.js";
import { DimensionMismatchError, IndexEmptyError } from "../shared/errors.js";
import { ReadWriteLock } from "../shared/rw-lock.js";
import { distance, distanceToScore } from "./similarity.js";
import type { IndexSnapshot, SearchHit, SearchOptions } from "./types.js";

export interface VectorIndexOptions {
  metric?: DistanceMetric;
  /** Embedding model the vectors come from, recorded in snapshots. */
  model?: string;
}

/**
 * Exact k-nearest-neighbour index over embedded chunks, keyed by chunk id.
 *
 * `add` runs under the write side of a single-writer/multi-reader lock and
 * `search` under the read side, so a search never sees a half-applied batch.
 */
export class VectorIndex {
  readonly metric: DistanceMetric;
  readonly model: string | null;
  private readonly entries = new Map<string, EmbeddedChunk>();
  private readonly lock = new ReadWriteLock();
  private dims: number | null = null;

  constructor(options?: VectorIndexOptions) {
    this.metric = options?.metric ?? "cosine";
    this.model = options?.model ?? null;
  }

  static fromSnapshot(snapshot: IndexSnapshot): VectorIndex {
    const index = new VectorIndex({ metric: snapshot.metric, model: snapshot.model ?? undefined });
    index.dims = snapshot.dimensions;
    for (const record of snapshot.chunks) {
      index.insert(Object.freeze({
        id: record.id,
        text: record.text,
        locator: record.locator,
        sessionId: record.sessionId,
        embedding: Object.freeze([...record.embedding]),
      }));
    }
    return index;
  }

  get size(): number {
    return this.entries.size;
  }

  get dimensions(): number | null {
    return this.dims;
  }

  has(chunkId: string): boolean {
    return this.entries.has(chunkId);
  }

  get(chunkId: string): EmbeddedChunk | undefined {
    return this.entries.get(chunkId);
  }

  /** Indexed chunks ordered by id. */
  chunks(): EmbeddedChunk[] {
    return [...this.entries.values()].sort((a, b) => compareIds(a.id, b.id));
  }

  /**
   * Inserts embedded chunks. Ids already present are skipped. The whole call
   * is validated before anything is inserted. Returns the number inserted.
   */
  async add(chunks: readonly EmbeddedChunk[]): Promise<number> {
    return this.lock.write(() => {
      let expected = this.dims;
      for (const chunk of chunks) {
        if (chunk.embedding.length === 0) {
          throw new Error(`Chunk ${chunk.id} has no embedding`);
        }
        if (expected === null) {
          expected = chunk.embedding.length;
        }
        if (chunk.embedding.length !== expected) {
          throw new DimensionMismatchError(expected, chunk.embedding.length);
        }
      }

      let inserted = 0;
      for (const chunk of chunks) {
        if (this.insert(chunk)) inserted++;
      }
      logIndexInsert(inserted, chunks.length - inserted, this.entries.size);
      return inserted;
    });
  }

  /**
   * The `k` closest chunks to `vector`, closest first. Ties go to the lower
   * chunk id. Throws IndexEmptyError when nothing has been inserted.
   */
  async search(vector: EmbeddingVector, k: number, options?: SearchOptions): Promise<SearchHit[]> {
    return this.lock.read(() => {
      if (this.entries.size === 0) {
        throw new IndexEmptyError();
      }
      if (this.dims !== null && vector.length !== this.dims) {
        throw new DimensionMismatchError(this.dims, vector.length);
      }

      const limit = Math.max(0, Math.floor(k));
      const hits: SearchHit[] = [];
      const candidates = options?.restrictTo
        ? [...options.restrictTo].flatMap((id) => {
          const chunk = this.entries.get(id);
          return chunk ? [chunk] : [];
        })
        : [...this.entries.values()];

      for (const chunk of candidates) {
        const d = distance(this.metric, vector, chunk.embedding);
        hits.push({ chunk, distance: d, score: distanceToScore(this.metric, d) });
      }

      hits.sort((a, b) => {
        if (a.distance !== b.distance) {
          return a.distance - b.distance;
        }
        return compareIds(a.chunk.id, b.chunk.id);
      });

      const top = hits.slice(0, limit);
      logIndexSearch(limit, options?.restrictTo ? options.restrictTo.size : null, top.length);
      return top;
    });
  }

  /** Plain-data copy for persistence, ordered by chunk id. */
  snapshot(): IndexSnapshot {
    return {
      metric: this.metric,
      dimensions: this.dims,
      model: this.model,
      chunks: this.chunks().map((chunk) => ({
        id: chunk.id,
        text: chunk.text,
        locator: chunk.locator,
        sessionId: chunk.sessionId,
        embedding: [...chunk.embedding],
      })),
    };
  }

  private insert(chunk: EmbeddedChunk): boolean {
    if (this.entries.has(chunk.id)) {
      return false;
    }
    if (this.dims === null) {
      this.dims = chunk.embedding.length;
    }
    this.entries.set(chunk.id, chunk);
    return true;
  }
}

export function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
