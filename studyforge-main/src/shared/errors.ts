export type EngineErrorCode =
  | "EMBEDDING_FAILED"
  | "INDEX_EMPTY"
  | "INDEX_CORRUPT"
  | "DIMENSION_MISMATCH"
  | "MISSING_REQUIRED_COVERAGE"
  | "INVALID_CONFIG"
  | "INVALID_LOCATOR"
  | "INVALID_CITATION";

export class EngineError extends Error {
  constructor(
    message: string,
    public code: EngineErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "EngineError";
  }
}

/** A batch failed after its retry. Fatal for `chunkIds` only. */
export class EmbeddingError extends EngineError {
  constructor(
    message: string,
    public batchIndex: number,
    public chunkIds: string[],
    public attempts: number,
    options?: { cause?: unknown },
  ) {
    super(message, "EMBEDDING_FAILED", options);
    this.name = "EmbeddingError";
  }
}

export class IndexEmptyError extends EngineError {
  constructor() {
    super("Cannot search an index that holds zero vectors", "INDEX_EMPTY");
    this.name = "IndexEmptyError";
  }
}

export class IndexCorruptionError extends EngineError {
  constructor(
    message: string,
    public filePath: string,
    options?: { cause?: unknown },
  ) {
    super(message, "INDEX_CORRUPT", options);
    this.name = "IndexCorruptionError";
  }
}

export class DimensionMismatchError extends EngineError {
  constructor(
    public expected: number,
    public actual: number,
  ) {
    super(`Vector dimension mismatch: expected ${expected}, got ${actual}`, "DIMENSION_MISMATCH");
    this.name = "DimensionMismatchError";
  }
}

export class ConfigError extends EngineError {
  constructor(
    message: string,
    public field: string,
  ) {
    super(message, "INVALID_CONFIG");
    this.name = "ConfigError";
  }
}

export class LocatorError extends EngineError {
  constructor(message: string) {
    super(message, "INVALID_LOCATOR");
    this.name = "LocatorError";
  }
}

export class CitationError extends EngineError {
  constructor(message: string) {
    super(message, "INVALID_CITATION");
    this.name = "CitationError";
  }
}

export interface MissingRequiredTopicCoverage {
  kind: "missing_required_topic";
  topicId: string;
  topicName: string;
  coverageScore: number;
}

export class MissingRequiredTopicCoverageError extends EngineError {
  constructor(public missing: MissingRequiredTopicCoverage[]) {
    super(
      `Required topics without coverage: ${missing.map((entry) => entry.topicId).join(", ")}`,
      "MISSING_REQUIRED_COVERAGE",
    );
    this.name = "MissingRequiredTopicCoverageError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
