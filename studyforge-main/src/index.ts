export { StudyEngine } from "./engine/study-engine.js";
export type { MapTopicsOptions, StudyEngineOptions } from "./engine/study-engine.js";

export {
  DEFAULT_CONFIG_PATH,
  DEFAULT_ENGINE_CONFIG,
  buildEngineConfig,
  loadEngineConfig,
} from "./config/engine-config.js";
export type { DistanceMetric, EmbeddingProviderKind, EngineConfig } from "./config/engine-config.js";

export {
  createLocator,
  formatLocator,
  locatorKey,
  locatorMarker,
  locatorsEqual,
  question,
  slide,
  timeRange,
} from "./sources/locator.js";
export { secondsToTimecode } from "./sources/timecode.js";
export type { Locator, Position, SourceKind, SourceRecord } from "./sources/types.js";

export { chunkId, chunkRecords } from "./chunking/chunker.js";
export type { Chunk, EmbeddedChunk, EmbeddingVector } from "./chunking/types.js";

export { LocalTextEmbedder } from "./embedding/local-embedder.js";
export { OpenAIEmbedder } from "./embedding/openai-embedder.js";
export { createEmbeddingProvider } from "./embedding/provider.js";
export type { EmbeddingProvider } from "./embedding/types.js";

export { ChunkIndexer } from "./index/chunk-indexer.js";
export type { EmbedSummary } from "./index/chunk-indexer.js";
export { IndexStore } from "./index/index-store.js";
export { VectorIndex } from "./index/vector-index.js";
export type { SearchHit } from "./index/types.js";

export { loadTopicsFile, normalizeTopics } from "./topics/topic-config.js";
export { TopicMapper } from "./topics/topic-mapper.js";
export { TopicVectorCache, topicQueryText } from "./topics/topic-vectors.js";
export type { TopicVectorCacheOptions } from "./topics/topic-vectors.js";
export type { Topic, TopicAssignment } from "./topics/types.js";

export { Retriever } from "./retrieval/retriever.js";
export type {
  BudgetStop,
  BudgetTooSmall,
  RetrievalMode,
  RetrievalRequest,
  RetrievalResult,
  RetrieveAllResult,
  RetrievedChunk,
} from "./retrieval/types.js";

export { CitationRegistry } from "./citations/citation-registry.js";
export type { Citation, CitationExportRecord, UncitedContentViolation } from "./citations/types.js";

export { assertCoverageGate, evaluateCoverageGate, scoreCoverage } from "./coverage/coverage-scorer.js";
export type { CoverageGate } from "./coverage/coverage-scorer.js";
export {
  findCoverageGaps,
  renderCoverageSummary,
  summarizeCoverage,
  toCoverageCsv,
  writeCoverageReport,
} from "./coverage/coverage-report.js";
export type { CoverageRecord, CoverageStats, CoverageStatus } from "./coverage/types.js";

export { buildQaReport, checkCitationMarkers, checkKeywordRecall } from "./qa/qa-report.js";
export type { QaReport } from "./qa/qa-report.js";

export {
  CitationError,
  ConfigError,
  DimensionMismatchError,
  EmbeddingError,
  EngineError,
  IndexCorruptionError,
  IndexEmptyError,
  LocatorError,
  MissingRequiredTopicCoverageError,
} from "./shared/errors.js";
export type { MissingRequiredTopicCoverage } from "./shared/errors.js";
export { setLogLevel } from "./shared/log-level.js";
export type { LogLevel } from "./shared/log-level.js";
