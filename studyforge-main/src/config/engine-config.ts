import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { ConfigError } from "../shared/errors.js";
import { readTextFile } from "../shared/io.js";
import type { LogLevel } from "../shared/log-level.js";
import type { BudgetUnit } from "../shared/text-length.js";

// ── Types ──────────────────────────────────────────────────────────

export type EmbeddingProviderKind = "local" | "openai";
export type DistanceMetric = "cosine" | "l2";

export interface ChunkingConfig {
  maxChunkChars: number;
}

export interface EmbeddingConfig {
  provider: EmbeddingProviderKind;
  model: string;
  dimensions: number;
  batchSize: number;
  timeoutMs: number;
  maxRetries: number;
  concurrency: number;
}

export interface IndexConfig {
  metric: DistanceMetric;
  dataDir: string;
}

export interface TopicMappingConfig {
  assignmentThreshold: number;
  keywordBonus: number;
}

export interface RetrievalConfig {
  duplicateThreshold: number;
  fallbackCandidates: number;
  budgetUnit: BudgetUnit;
  concurrency: number;
}

export interface CoverageConfig {
  chunkWeight: number;
  keywordWeight: number;
  saturationChunkCount: number;
  coveredThreshold: number;
  partialThreshold: number;
}

export interface LoggingConfig {
  level: LogLevel;
}

export interface EngineConfig {
  readonly chunking: Readonly<ChunkingConfig>;
  readonly embedding: Readonly<EmbeddingConfig>;
  readonly index: Readonly<IndexConfig>;
  readonly topics: Readonly<TopicMappingConfig>;
  readonly retrieval: Readonly<RetrievalConfig>;
  readonly coverage: Readonly<CoverageConfig>;
  readonly logging: Readonly<LoggingConfig>;
}

// ── Defaults ───────────────────────────────────────────────────────

const thisDir = dirname(fileURLToPath(import.meta.url));
const projectRoot = resolve(thisDir, "..", "..");

export const DEFAULT_CONFIG_PATH = resolve(projectRoot, "context", "engine-config.json");

export const DEFAULT_ENGINE_CONFIG = deepFreeze<EngineConfig>({
  chunking: { maxChunkChars: 500 },
  embedding: {
    provider: "local",
    model: "text-embedding-3-small",
    dimensions: 384,
    batchSize: 32,
    timeoutMs: 30_000,
    maxRetries: 1,
    concurrency: 4,
  },
  index: { metric: "cosine", dataDir: resolve(projectRoot, "data", "index") },
  topics: { assignmentThreshold: 0.3, keywordBonus: 0.2 },
  retrieval: { duplicateThreshold: 0.8, fallbackCandidates: 50, budgetUnit: "chars", concurrency: 4 },
  coverage: {
    chunkWeight: 0.5,
    keywordWeight: 0.5,
    saturationChunkCount: 3,
    coveredThreshold: 0.7,
    partialThreshold: 0.35,
  },
  logging: { level: "info" },
});

// ── Loading ────────────────────────────────────────────────────────

export interface LoadEngineConfigOptions {
  /**
   * JSON file to read. Defaults to context/engine-config.json. A missing file
   * yields the defaults; a file that is not valid JSON throws ConfigError.
   */
  filePath?: string;
  env?: NodeJS.ProcessEnv;
}

export async function loadEngineConfig(options?: LoadEngineConfigOptions): Promise<EngineConfig> {
  const filePath = options?.filePath ?? DEFAULT_CONFIG_PATH;
  const raw = await readTextFile(filePath, filePath);
  const fromFile = raw === undefined ? {} : parseConfigJson(raw, filePath);
  return buildEngineConfig(fromFile, options?.env ?? process.env, dirname(filePath));
}

function parseConfigJson(raw: string, filePath: string): unknown {
  try {
    return JSON.parse(raw) as unknown;
  } catch {
    throw new ConfigError(`Engine config has invalid JSON: ${filePath}`, "(root)");
  }
}

/**
 * Merges a raw (parsed JSON) config over the defaults, applies STUDYFORGE_*
 * env overrides, validates every field, and freezes the result.
 * Relative `index.dataDir` values resolve against `baseDir`.
 */
export function buildEngineConfig(raw: unknown, env: NodeJS.ProcessEnv = {}, baseDir = process.cwd()): EngineConfig {
  if (!isPlainObject(raw)) {
    throw new ConfigError("Engine config must be a JSON object", "(root)");
  }

  const d = DEFAULT_ENGINE_CONFIG;
  const chunking = section(raw, "chunking");
  const embedding = section(raw, "embedding");
  const index = section(raw, "index");
  const topics = section(raw, "topics");
  const retrieval = section(raw, "retrieval");
  const coverage = section(raw, "coverage");
  const logging = section(raw, "logging");

  const dataDirRaw = env["STUDYFORGE_DATA_DIR"] ?? stringField(index, "index.dataDir", d.index.dataDir);

  const config: EngineConfig = {
    chunking: {
      maxChunkChars: intField(envNumber(env, "STUDYFORGE_MAX_CHUNK_CHARS") ?? chunking["maxChunkChars"], "chunking.maxChunkChars", d.chunking.maxChunkChars, 20),
    },
    embedding: {
      provider: enumField(env["STUDYFORGE_EMBEDDING_PROVIDER"] ?? embedding["provider"], "embedding.provider", ["local", "openai"], d.embedding.provider),
      model: env["STUDYFORGE_EMBEDDING_MODEL"]?.trim() || stringField(embedding, "embedding.model", d.embedding.model),
      dimensions: intField(embedding["dimensions"], "embedding.dimensions", d.embedding.dimensions, 1),
      batchSize: intField(embedding["batchSize"], "embedding.batchSize", d.embedding.batchSize, 1),
      timeoutMs: intField(embedding["timeoutMs"], "embedding.timeoutMs", d.embedding.timeoutMs, 1),
      maxRetries: intField(embedding["maxRetries"], "embedding.maxRetries", d.embedding.maxRetries, 0, 1),
      concurrency: intField(embedding["concurrency"], "embedding.concurrency", d.embedding.concurrency, 1),
    },
    index: {
      metric: enumField(env["STUDYFORGE_METRIC"] ?? index["metric"], "index.metric", ["cosine", "l2"], d.index.metric),
      dataDir: resolve(baseDir, dataDirRaw),
    },
    topics: {
      assignmentThreshold: unitField(topics["assignmentThreshold"], "topics.assignmentThreshold", d.topics.assignmentThreshold),
      keywordBonus: unitField(topics["keywordBonus"], "topics.keywordBonus", d.topics.keywordBonus),
    },
    retrieval: {
      duplicateThreshold: unitField(retrieval["duplicateThreshold"], "retrieval.duplicateThreshold", d.retrieval.duplicateThreshold),
      fallbackCandidates: intField(retrieval["fallbackCandidates"], "retrieval.fallbackCandidates", d.retrieval.fallbackCandidates, 1),
      budgetUnit: enumField(retrieval["budgetUnit"], "retrieval.budgetUnit", ["chars", "tokens"], d.retrieval.budgetUnit),
      concurrency: intField(retrieval["concurrency"], "retrieval.concurrency", d.retrieval.concurrency, 1),
    },
    coverage: {
      chunkWeight: unitField(coverage["chunkWeight"], "coverage.chunkWeight", d.coverage.chunkWeight),
      keywordWeight: unitField(coverage["keywordWeight"], "coverage.keywordWeight", d.coverage.keywordWeight),
      saturationChunkCount: intField(coverage["saturationChunkCount"], "coverage.saturationChunkCount", d.coverage.saturationChunkCount, 1),
      coveredThreshold: unitField(coverage["coveredThreshold"], "coverage.coveredThreshold", d.coverage.coveredThreshold),
      partialThreshold: unitField(coverage["partialThreshold"], "coverage.partialThreshold", d.coverage.partialThreshold),
    },
    logging: {
      level: enumField(env["STUDYFORGE_LOG_LEVEL"] ?? logging["level"], "logging.level", ["debug", "info", "warn", "error", "silent"], d.logging.level),
    },
  };

  if (config.coverage.partialThreshold > config.coverage.coveredThreshold) {
    throw new ConfigError(
      "coverage.partialThreshold must not exceed coverage.coveredThreshold",
      "coverage.partialThreshold",
    );
  }
  if (config.coverage.chunkWeight + config.coverage.keywordWeight <= 0) {
    throw new ConfigError("coverage weights must not both be zero", "coverage.chunkWeight");
  }

  return deepFreeze(config);
}

// ── Field parsing helpers ──────────────────────────────────────────

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, name: string): Record<string, unknown> {
  const value = raw[name];
  if (value === undefined) return {};
  if (!isPlainObject(value)) {
    throw new ConfigError(`Config section '${name}' must be an object`, name);
  }
  return value;
}

function envNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim().length === 0) return undefined;
  const parsed = Number(raw);
  if (Number.isNaN(parsed)) {
    throw new ConfigError(`Environment variable ${name} must be a number, got: ${raw}`, name);
  }
  return parsed;
}

function intField(value: unknown, field: string, fallback: number, min: number, max = Number.MAX_SAFE_INTEGER): number {
  if (value === undefined) return fallback;
  if (typeof value !== "number" || !Number.isInteger(value) || value < min || value > max) {
    throw new ConfigError(`${field} must be an integer in [${min}, ${max}], got: ${JSON.stringify(value)}`, field);
  }
  return value;
}

function unitField(value: unknown, field: string, fallback: number): number {
  if (value === undefined) return fallback;
  if (typeof value !== "number" || !Number.isFinite(value) || value < 0 || value > 1) {
    throw new ConfigError(`${field} must be a number in [0, 1], got: ${JSON.stringify(value)}`, field);
  }
  return value;
}

function stringField(sectionValue: Record<string, unknown>, field: string, fallback: string): string {
  const key = field.slice(field.indexOf(".") + 1);
  const value = sectionValue[key];
  if (value === undefined) return fallback;
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new ConfigError(`${field} must be a non-empty string`, field);
  }
  return value.trim();
}

function enumField<T extends string>(value: unknown, field: string, allowed: readonly T[], fallback: T): T {
  if (value === undefined) return fallback;
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new ConfigError(`${field} must be one of ${allowed.join(", ")}, got: ${JSON.stringify(value)}`, field);
  }
  return match;
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object") {
    for (const entry of Object.values(value)) {
      deepFreeze(entry);
    }
    Object.freeze(value);
  }
  return value;
}
