import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join, resolve } from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { DEFAULT_ENGINE_CONFIG, buildEngineConfig, loadEngineConfig } from "../../src/config/engine-config.js";
import { ConfigError } from "../../src/shared/errors.js";

describe("buildEngineConfig", () => {
  it("returns the defaults for an empty object", () => {
    const config = buildEngineConfig({});
    expect(config).toEqual(DEFAULT_ENGINE_CONFIG);
    expect(config.topics.assignmentThreshold).toBe(0.3);
    expect(config.retrieval).toEqual({ duplicateThreshold: 0.8, fallbackCandidates: 50, budgetUnit: "chars", concurrency: 4 });
  });

  it("merges file values and resolves the data dir against the base dir", () => {
    const config = buildEngineConfig(
      { index: { metric: "l2", dataDir: "store" }, retrieval: { budgetUnit: "tokens" } },
      {},
      "/srv/studyforge",
    );
    expect(config.index).toEqual({ metric: "l2", dataDir: resolve("/srv/studyforge", "store") });
    expect(config.retrieval.budgetUnit).toBe("tokens");
    expect(config.retrieval.duplicateThreshold).toBe(0.8);
  });

  it("lets STUDYFORGE_* variables override the file", () => {
    const config = buildEngineConfig(
      { chunking: { maxChunkChars: 300 }, embedding: { model: "from-file" } },
      {
        STUDYFORGE_MAX_CHUNK_CHARS: "800",
        STUDYFORGE_EMBEDDING_PROVIDER: "openai",
        STUDYFORGE_EMBEDDING_MODEL: "text-embedding-3-large",
        STUDYFORGE_METRIC: "l2",
        STUDYFORGE_DATA_DIR: "cache/index",
        STUDYFORGE_LOG_LEVEL: "debug",
      },
      "/srv/studyforge",
    );

    expect(config.chunking.maxChunkChars).toBe(800);
    expect(config.embedding.provider).toBe("openai");
    expect(config.embedding.model).toBe("text-embedding-3-large");
    expect(config.index.metric).toBe("l2");
    expect(config.index.dataDir).toBe(resolve("/srv/studyforge", "cache/index"));
    expect(config.logging.level).toBe("debug");
  });

  it("freezes the result", () => {
    const config = buildEngineConfig({});
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.coverage)).toBe(true);
  });

  it("names the field that fails validation", () => {
    const failure = (raw: unknown, env: NodeJS.ProcessEnv = {}): ConfigError | null => {
      try {
        buildEngineConfig(raw, env);
        return null;
      } catch (err) {
        return err instanceof ConfigError ? err : null;
      }
    };

    expect(failure([])?.field).toBe("(root)");
    expect(failure({ retrieval: { duplicateThreshold: 1.5 } })?.field).toBe("retrieval.duplicateThreshold");
    expect(failure({ embedding: { maxRetries: 2 } })?.field).toBe("embedding.maxRetries");
    expect(failure({ embedding: { provider: "cohere" } })?.field).toBe("embedding.provider");
    expect(failure({ chunking: { maxChunkChars: 5 } })?.field).toBe("chunking.maxChunkChars");
    expect(failure({ coverage: "high" })?.field).toBe("coverage");
    expect(failure({ coverage: { partialThreshold: 0.8 } })?.field).toBe("coverage.partialThreshold");
    expect(failure({ coverage: { chunkWeight: 0, keywordWeight: 0 } })?.field).toBe("coverage.chunkWeight");
    expect(failure({}, { STUDYFORGE_MAX_CHUNK_CHARS: "lots" })?.field).toBe("STUDYFORGE_MAX_CHUNK_CHARS");
  });
});

describe("loadEngineConfig", () => {
  const dirs: string[] = [];

  afterEach(() => {
    for (const dir of dirs.splice(0, dirs.length)) {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it("reads a JSON file and resolves paths beside it", async () => {
    const root = mkdtempSync(join(tmpdir(), "studyforge-config-"));
    dirs.push(root);
    const filePath = join(root, "engine-config.json");
    writeFileSync(filePath, JSON.stringify({ index: { dataDir: "index" }, coverage: { saturationChunkCount: 5 } }), "utf-8");

    const config = await loadEngineConfig({ filePath, env: {} });

    expect(config.index.dataDir).toBe(join(root, "index"));
    expect(config.coverage.saturationChunkCount).toBe(5);
  });

  it("falls back to defaults when the file is missing", async () => {
    const root = mkdtempSync(join(tmpdir(), "studyforge-config-"));
    dirs.push(root);

    const config = await loadEngineConfig({ filePath: join(root, "absent.json"), env: {} });
    expect(config.embedding).toEqual(DEFAULT_ENGINE_CONFIG.embedding);
  });

  it("rejects a config file that is not valid JSON", async () => {
    const root = mkdtempSync(join(tmpdir(), "studyforge-config-"));
    dirs.push(root);
    const filePath = join(root, "engine-config.json");
    writeFileSync(filePath, "{ \"index\": ", "utf-8");

    await expect(loadEngineConfig({ filePath, env: {} })).rejects.toBeInstanceOf(ConfigError);
    await expect(loadEngineConfig({ filePath, env: {} })).rejects.toThrow(`Engine config has invalid JSON: ${filePath}`);
  });

  it("loads the shipped default config file", async () => {
    const config = await loadEngineConfig({ env: {} });
    expect(config.embedding.provider).toBe("local");
    expect(config.chunking.maxChunkChars).toBe(500);
  });
});
