import type { Chunk } from "../chunking/types.js";
import { chunkRecords } from "../chunking/chunker.js";
import { CitationRegistry } from "../citations/citation-registry.js";
import type { EngineConfig } from "../config/engine-config.js";
import { assertCoverageGate, evaluateCoverageGate, scoreCoverage } from "../coverage/coverage-scorer.js";
import type { CoverageGate, CoverageGateOptions } from "../coverage/coverage-scorer.js";
import type { CoverageRecord } from "../coverage/types.js";
import { createEmbeddingProvider } from "../embedding/provider.js";
import type { EmbeddingProvider } from "../embedding/types.js";
import { ChunkIndexer } from "../index/chunk-indexer.js";
import type { EmbedAndIndexOptions, EmbedSummary } from "../index/chunk-indexer.js";
import { IndexStore } from "../index/index-store.js";
import { VectorIndex } from "../index/vector-index.js";
import { buildQaReport } from "../qa/qa-report.js";
import type { QaReport, QaReportInput } from "../qa/qa-report.js";
import { Retriever } from "../retrieval/retriever.js";
import type {
  RetrievalRequest,
  RetrievalResult,
  RetrieveAllOptions,
  RetrieveAllResult,
  RetrieveOptions,
} from "../retrieval/types.js";
import { ConfigError } from "../shared/errors.js";
import { setLogLevel } from "../shared/log-level.js";
import type { SourceRecord } from "../sources/types.js";
import { TopicMapper } from "../topics/topic-mapper.js";
import { TopicVectorCache } from "../topics/topic-vectors.js";
import type { Topic, TopicAssignment } from "../topics/types.js";

export interface StudyEngineOptions {
  config: EngineConfig;
  /** Defaults to the provider named in `config.embedding`. */
  embedder?: EmbeddingProvider;
  /** Defaults to a store under `config.index.dataDir`. Pass null to keep the index in memory only. */
  store?: IndexStore | null;
}

export interface MapTopicsOptions {
  signal?: AbortSignal;
}

/**
 * Wires chunking, the shared vector index, topic mapping, retrieval,
 * coverage and citations around one embedder and one persisted index.
 */
export class StudyEngine {
  readonly config: EngineConfig;
  readonly embedder: EmbeddingProvider;
  readonly index: VectorIndex;
  readonly store: IndexStore | null;
  private readonly indexer: ChunkIndexer;
  private readonly mapper: TopicMapper;
  private readonly retriever: Retriever;
  private currentAssignments: readonly TopicAssignment[] = [];

  private constructor(config: EngineConfig, embedder: EmbeddingProvider, index: VectorIndex, store: IndexStore | null) {
    this.config = config;
    this.embedder = embedder;
    this.index = index;
    this.store = store;

    const vectors = new TopicVectorCache(embedder, {
      timeoutMs: config.embedding.timeoutMs,
      maxRetries: config.embedding.maxRetries,
    });
    this.indexer = new ChunkIndexer({
      embedder,
      index,
      batchSize: config.embedding.batchSize,
      timeoutMs: config.embedding.timeoutMs,
      maxRetries: config.embedding.maxRetries,
      concurrency: config.embedding.concurrency,
    });
    this.mapper = new TopicMapper({
      vectors,
      threshold: config.topics.assignmentThreshold,
      keywordBonus: config.topics.keywordBonus,
    });
    this.retriever = new Retriever({
      index,
      vectors,
      duplicateThreshold: config.retrieval.duplicateThreshold,
      fallbackCandidates: config.retrieval.fallbackCandidates,
      budgetUnit: config.retrieval.budgetUnit,
      concurrency: config.retrieval.concurrency,
    });
  }

  /**
   * Loads the persisted index, or starts an empty one. Throws ConfigError
   * when the persisted vectors came from another model or metric, and
   * IndexCorruptionError when they cannot be read back.
   */
  static async open(options: StudyEngineOptions): Promise<StudyEngine> {
    const { config } = options;
    setLogLevel(config.logging.level);

    const embedder = options.embedder ?? createEmbeddingProvider(config);
    const store = options.store === undefined ? new IndexStore({ dataDir: config.index.dataDir }) : options.store;

    const loaded = store ? await store.load() : null;
    if (loaded) {
      if (loaded.model !== null && loaded.model !== embedder.model) {
        throw new ConfigError(
          `Persisted index was built with model '${loaded.model}', but the embedder is '${embedder.model}'`,
          "embedding.model",
        );
      }
      if (loaded.metric !== config.index.metric) {
        throw new ConfigError(
          `Persisted index uses metric '${loaded.metric}', config says '${config.index.metric}'`,
          "index.metric",
        );
      }
    }

    await embedder.start?.();
    const index = loaded ?? new VectorIndex({ metric: config.index.metric, model: embedder.model });
    return new StudyEngine(config, embedder, index, store);
  }

  get assignments(): readonly TopicAssignment[] {
    return this.currentAssignments;
  }

  chunk(records: readonly SourceRecord[]): Chunk[] {
    return chunkRecords(records, { maxChunkChars: this.config.chunking.maxChunkChars });
  }

  /** Embeds and inserts new chunks, then persists whatever made it in, even after an abort. */
  async embedAndIndex(chunks: readonly Chunk[], options?: EmbedAndIndexOptions): Promise<EmbedSummary> {
    const sizeBefore = this.index.size;
    try {
      return await this.indexer.embedAndIndex(chunks, options);
    } finally {
      if (this.store && this.index.size !== sizeBefore) {
        await this.store.save(this.index);
      }
    }
  }

  /**
   * Recomputes the full assignment set. Chunks already in the index are
   * scored with their stored vectors. The result replaces the set the
   * retriever searches.
   */
  async mapTopics(chunks: readonly Chunk[], topics: readonly Topic[], options?: MapTopicsOptions): Promise<TopicAssignment[]> {
    const resolved = chunks.map((chunk) => this.index.get(chunk.id) ?? chunk);
    const assignments = await this.mapper.map(resolved, topics, options?.signal);
    this.currentAssignments = assignments;
    this.retriever.setAssignments(assignments);
    return assignments;
  }

  /** Coverage over the given assignments, or the last mapping pass when omitted. */
  scoreCoverage(topics: readonly Topic[], assignments?: readonly TopicAssignment[]): CoverageRecord[] {
    return scoreCoverage(topics, assignments ?? this.currentAssignments, this.index.chunks(), this.config.coverage);
  }

  evaluateCoverageGate(records: readonly CoverageRecord[], options?: CoverageGateOptions): CoverageGate {
    return evaluateCoverageGate(records, options);
  }

  assertCoverageGate(records: readonly CoverageRecord[], options?: CoverageGateOptions): CoverageGate {
    return assertCoverageGate(records, options);
  }

  retrieve(topic: Topic, budget: number, options?: RetrieveOptions): Promise<RetrievalResult> {
    return this.retriever.retrieve(topic, budget, options);
  }

  retrieveAll(requests: readonly RetrievalRequest[], options?: RetrieveAllOptions): Promise<RetrieveAllResult> {
    return this.retriever.retrieveAll(requests, options);
  }

  startCitationRun(): CitationRegistry {
    return new CitationRegistry();
  }

  qaReport(input: QaReportInput): QaReport {
    return buildQaReport(input);
  }

  async close(): Promise<void> {
    await this.embedder.stop?.();
  }
}
