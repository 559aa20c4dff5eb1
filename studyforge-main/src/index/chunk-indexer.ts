import type { Chunk, EmbeddedChunk } from "../chunking/types.js";
import { isEmbedded, withEmbedding } from "../chunking/types.js";
import type { EmbeddingProvider } from "../embedding/types.js";
import { mapWithConcurrency } from "../shared/async-pool.js";
import {
  logEmbedBatchFailed,
  logEmbedDone,
  logEmbedRetry,
  logEmbedStart,
} from "../shared/engine-logger.js";
import { EmbeddingError, errorMessage } from "../shared/errors.js";
import { callWithRetry } from "../shared/timeout.js";
import type { VectorIndex } from "./vector-index.js";

export interface ChunkIndexerOptions {
  embedder: EmbeddingProvider;
  index: VectorIndex;
  batchSize?: number;
  timeoutMs?: number;
  /** Retries per failed batch. */
  maxRetries?: number;
  concurrency?: number;
}

export interface EmbedAndIndexOptions {
  signal?: AbortSignal;
}

export interface EmbedSummary {
  /** Chunks handed in. */
  requested: number;
  /** Chunks whose id was already in the index; nothing was computed for them. */
  alreadyIndexed: number;
  /** Chunks that got a new embedding during this call. */
  embedded: number;
  /** New index entries. */
  inserted: number;
  failures: EmbeddingError[];
  failedChunkIds: string[];
}

const DEFAULT_BATCH_SIZE = 32;
const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_CONCURRENCY = 4;

type BatchOutcome =
  | { ok: true; chunks: EmbeddedChunk[]; embedded: number }
  | { ok: false; error: EmbeddingError };

export class ChunkIndexer {
  private readonly embedder: EmbeddingProvider;
  private readonly index: VectorIndex;
  private readonly batchSize: number;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly concurrency: number;

  constructor(options: ChunkIndexerOptions) {
    this.embedder = options.embedder;
    this.index = options.index;
    this.batchSize = Math.max(1, Math.floor(options.batchSize ?? DEFAULT_BATCH_SIZE));
    this.timeoutMs = Math.max(1, options.timeoutMs ?? DEFAULT_TIMEOUT_MS);
    this.maxRetries = Math.max(0, Math.min(1, Math.floor(options.maxRetries ?? 1)));
    this.concurrency = Math.max(1, Math.floor(options.concurrency ?? DEFAULT_CONCURRENCY));
  }

  /**
   * Embeds every chunk not yet in the index and inserts it. A batch whose
   * model call fails is retried once; if it fails again its chunks are
   * reported in the summary and the remaining batches carry on. Each batch
   * is inserted as soon as it succeeds, so aborting leaves only whole
   * batches behind.
   */
  async embedAndIndex(chunks: readonly Chunk[], options?: EmbedAndIndexOptions): Promise<EmbedSummary> {
    const pending: Chunk[] = [];
    const queued = new Set<string>();
    let alreadyIndexed = 0;

    for (const chunk of chunks) {
      if (this.index.has(chunk.id) || queued.has(chunk.id)) {
        alreadyIndexed++;
        continue;
      }
      queued.add(chunk.id);
      pending.push(chunk);
    }

    const batches = toBatches(pending, this.batchSize);
    logEmbedStart(pending.length, alreadyIndexed, batches.length);

    const summary: EmbedSummary = {
      requested: chunks.length,
      alreadyIndexed,
      embedded: 0,
      inserted: 0,
      failures: [],
      failedChunkIds: [],
    };

    try {
      await mapWithConcurrency(batches, this.concurrency, async (batch, batchIndex) => {
        const outcome = await this.embedBatch(batch, batchIndex, options?.signal);
        if (!outcome.ok) {
          summary.failures.push(outcome.error);
          summary.failedChunkIds.push(...outcome.error.chunkIds);
          return;
        }
        summary.embedded += outcome.embedded;
        try {
          summary.inserted += await this.index.add(outcome.chunks);
        } catch (err) {
          const chunkIds = batch.map((chunk) => chunk.id);
          logEmbedBatchFailed(batchIndex, batch.length, errorMessage(err));
          summary.failures.push(new EmbeddingError(
            `Embedding batch ${batchIndex} could not be indexed: ${errorMessage(err)}`,
            batchIndex,
            chunkIds,
            1,
            { cause: err },
          ));
          summary.failedChunkIds.push(...chunkIds);
        }
      }, options?.signal);
    } finally {
      summary.failures.sort((a, b) => a.batchIndex - b.batchIndex);
      logEmbedDone(summary.inserted, summary.failedChunkIds.length, options?.signal?.aborted ?? false);
    }

    return summary;
  }

  private async embedBatch(batch: Chunk[], batchIndex: number, signal?: AbortSignal): Promise<BatchOutcome> {
    const missing = batch.filter((chunk) => !isEmbedded(chunk));
    if (missing.length === 0) {
      return { ok: true, chunks: batch.filter(isEmbedded), embedded: 0 };
    }

    const attempts = this.maxRetries + 1;
    let vectors: number[][];
    try {
      vectors = await callWithRetry(async (callSignal) => {
        const rows = await this.embedder.embedBatch(missing.map((chunk) => chunk.text), callSignal);
        validateVectors(rows, missing.length, this.index.dimensions ?? this.embedder.dimensions);
        return rows;
      }, {
        timeoutMs: this.timeoutMs,
        maxRetries: this.maxRetries,
        signal,
        onRetry: (err) => logEmbedRetry(batchIndex, errorMessage(err)),
      });
    } catch (err) {
      if (signal?.aborted) {
        throw err;
      }
      logEmbedBatchFailed(batchIndex, batch.length, errorMessage(err));
      return {
        ok: false,
        error: new EmbeddingError(
          `Embedding batch ${batchIndex} failed after ${attempts} attempt(s): ${errorMessage(err)}`,
          batchIndex,
          batch.map((chunk) => chunk.id),
          attempts,
          { cause: err },
        ),
      };
    }

    const byId = new Map<string, EmbeddedChunk>();
    missing.forEach((chunk, i) => {
      const vector = vectors[i];
      if (vector) byId.set(chunk.id, withEmbedding(chunk, vector));
    });

    const embedded = batch.flatMap((chunk) => {
      if (isEmbedded(chunk)) return [chunk];
      const done = byId.get(chunk.id);
      return done ? [done] : [];
    });
    return { ok: true, chunks: embedded, embedded: missing.length };
  }
}

function toBatches<T>(items: readonly T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

function validateVectors(vectors: readonly number[][], expectedCount: number, expectedDims: number | null | undefined): void {
  if (vectors.length !== expectedCount) {
    throw new Error(`Embedder returned ${vectors.length} vectors for ${expectedCount} texts`);
  }

  const dims = expectedDims ?? vectors[0]?.length ?? 0;
  for (const vector of vectors) {
    if (vector.length === 0 || vector.length !== dims) {
      throw new Error(`Embedder returned a ${vector.length}-dimension vector, expected ${dims}`);
    }
    if (!vector.every((value) => Number.isFinite(value))) {
      throw new Error("Embedder returned a non-finite vector component");
    }
  }
}
