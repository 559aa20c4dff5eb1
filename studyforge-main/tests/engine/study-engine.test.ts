import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { buildEngineConfig } from "../../src/config/engine-config.js";
import type { EngineConfig } from "../../src/config/engine-config.js";
import type { EmbeddingProvider } from "../../src/embedding/types.js";
import { StudyEngine } from "../../src/engine/study-engine.js";
import { IndexStore } from "../../src/index/index-store.js";
import { ConfigError } from "../../src/shared/errors.js";
import { createLocator, slide } from "../../src/sources/locator.js";
import type { SourceRecord } from "../../src/sources/types.js";
import { normalizeTopics } from "../../src/topics/topic-config.js";
import type { Topic } from "../../src/topics/types.js";

// Axes: complexity, sorting, search.
class AxisEmbedder implements EmbeddingProvider {
  readonly dimensions = 3;
  calls = 0;
  started = false;
  stopped = false;

  constructor(readonly model = "axis-3") {}

  start(): void {
    this.started = true;
  }

  stop(): void {
    this.stopped = true;
  }

  async embedBatch(texts: readonly string[]): Promise<number[][]> {
    this.calls++;
    return texts.map((text) => {
      const lower = text.toLowerCase();
      return [
        lower.includes("big-o") || lower.includes("o(") ? 1 : 0,
        lower.includes("sorting") ? 1 : 0,
        lower.includes("search") ? 1 : 0,
      ];
    });
  }
}

const deck = createLocator("slide", "slides05", slide(4));
const RECORDS: SourceRecord[] = [
  { locator: deck, text: "Big-O notation defines growth rate." },
  { locator: deck, text: "O(n log n) is typical for sorting." },
  { locator: deck, text: "Binary search is O(log n)." },
];

const QUICKSORT_RECORDS: SourceRecord[] = [
  { locator: createLocator("slide", "slides06", slide(1)), text: "Quicksort is a sorting method built on partitions." },
];

function bigOTopic(): Topic {
  const [topic] = normalizeTopics([{ id: "big_o", name: "Big-O", keywords: ["Big-O", "sorting"], required: true }]);
  if (!topic) throw new Error("expected a topic");
  return topic;
}

describe("StudyEngine", () => {
  const dirs: string[] = [];

  afterEach(() => {
    for (const dir of dirs.splice(0, dirs.length)) {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  function configFor(): EngineConfig {
    const root = mkdtempSync(join(tmpdir(), "studyforge-engine-"));
    dirs.push(root);
    return buildEngineConfig({ index: { dataDir: "index" }, logging: { level: "silent" } }, {}, root);
  }

  it("maps, scores and retrieves the Big-O slide scenario", async () => {
    const embedder = new AxisEmbedder();
    const engine = await StudyEngine.open({ config: configFor(), embedder });
    const topic = bigOTopic();

    const chunks = engine.chunk(RECORDS);
    const summary = await engine.embedAndIndex(chunks);
    const assignments = await engine.mapTopics(chunks, [topic]);
    const [coverage] = engine.scoreCoverage([topic]);

    expect(embedder.started).toBe(true);
    expect(summary).toMatchObject({ requested: 3, inserted: 3, failedChunkIds: [] });
    expect(assignments).toHaveLength(3);
    expect(coverage).toMatchObject({ matchedChunkCount: 3, keywordHitRatio: 1, status: "covered" });
    expect(engine.evaluateCoverageGate(coverage ? [coverage] : []).passed).toBe(true);

    const result = await engine.retrieve(topic, 1000);
    expect(result.mode).toBe("assigned");
    expect(result.items.map((item) => item.chunk.text)).toEqual([
      "O(n log n) is typical for sorting.",
      "Big-O notation defines growth rate.",
      "Binary search is O(log n).",
    ]);

    const registry = engine.startCitationRun();
    const citations = registry.citeAll(result.items.map((item) => item.chunk));
    expect(citations).toHaveLength(1);
    expect(registry.formatInline(citations)).toBe("[slide 4]");
  });

  it("assigns all three Big-O slide chunks with the default local embedder", async () => {
    const config = configFor();
    const engine = await StudyEngine.open({ config });
    const topic = bigOTopic();

    const chunks = engine.chunk(RECORDS);
    await engine.embedAndIndex(chunks);
    const assignments = await engine.mapTopics(chunks, [topic]);
    const [coverage] = engine.scoreCoverage([topic]);

    expect(config.embedding.provider).toBe("local");
    expect(engine.embedder.model).toBe("local-hash-384");
    expect(assignments.map((assignment) => assignment.chunkId)).toEqual(chunks.map((chunk) => chunk.id).sort());
    expect(coverage).toMatchObject({ matchedChunkCount: 3, keywordHitRatio: 1, status: "covered" });
    await engine.close();
  });

  it("signals a budget too small for any chunk", async () => {
    const engine = await StudyEngine.open({ config: configFor(), embedder: new AxisEmbedder() });
    const topic = bigOTopic();
    const chunks = engine.chunk(RECORDS);
    await engine.embedAndIndex(chunks);
    await engine.mapTopics(chunks, [topic]);

    const result = await engine.retrieve(topic, 5);

    expect(result.items).toEqual([]);
    expect(result.budgetTooSmall).toMatchObject({ topicId: "big_o", budget: 5, smallestRequired: 26 });
  });

  it("persists the index and skips already indexed chunks on the next run", async () => {
    const config = configFor();
    const first = await StudyEngine.open({ config, embedder: new AxisEmbedder() });
    await first.embedAndIndex(first.chunk(RECORDS));
    expect(new IndexStore({ dataDir: config.index.dataDir }).exists()).toBe(true);

    const query = [1, 1, 0];
    const before = await first.index.search(query, 3);

    const embedder = new AxisEmbedder();
    const second = await StudyEngine.open({ config, embedder });
    const summary = await second.embedAndIndex(second.chunk(RECORDS));
    const after = await second.index.search(query, 3);

    expect(second.index.size).toBe(3);
    expect(summary).toMatchObject({ requested: 3, alreadyIndexed: 3, embedded: 0, inserted: 0 });
    expect(embedder.calls).toBe(0);
    expect(after.map((hit) => [hit.chunk.id, hit.distance])).toEqual(before.map((hit) => [hit.chunk.id, hit.distance]));
    expect(after[0]?.chunk.text).toBe("O(n log n) is typical for sorting.");
  });

  it("saves concurrent embedding runs without losing either", async () => {
    const config = configFor();
    const engine = await StudyEngine.open({ config, embedder: new AxisEmbedder() });

    const outcomes = await Promise.allSettled([
      engine.embedAndIndex(engine.chunk(RECORDS)),
      engine.embedAndIndex(engine.chunk(QUICKSORT_RECORDS)),
    ]);

    expect(outcomes.map((outcome) => outcome.status)).toEqual(["fulfilled", "fulfilled"]);
    const reloaded = await new IndexStore({ dataDir: config.index.dataDir }).load();
    expect(reloaded?.size).toBe(4);
    expect(reloaded?.chunks().map((chunk) => chunk.sessionId).sort()).toEqual(["slides05", "slides05", "slides05", "slides06"]);
  });

  it("refuses a persisted index built by another model", async () => {
    const config = configFor();
    const first = await StudyEngine.open({ config, embedder: new AxisEmbedder() });
    await first.embedAndIndex(first.chunk(RECORDS));

    await expect(StudyEngine.open({ config, embedder: new AxisEmbedder("other-model") })).rejects.toBeInstanceOf(ConfigError);
  });

  it("keeps the index in memory when no store is given", async () => {
    const config = configFor();
    const engine = await StudyEngine.open({ config, embedder: new AxisEmbedder(), store: null });
    await engine.embedAndIndex(engine.chunk(RECORDS));

    expect(engine.index.size).toBe(3);
    expect(new IndexStore({ dataDir: config.index.dataDir }).exists()).toBe(false);
  });

  it("writes nothing when embedding is aborted up front", async () => {
    const config = configFor();
    const engine = await StudyEngine.open({ config, embedder: new AxisEmbedder() });
    const controller = new AbortController();
    controller.abort();

    await expect(engine.embedAndIndex(engine.chunk(RECORDS), { signal: controller.signal })).rejects.toThrow();
    expect(new IndexStore({ dataDir: config.index.dataDir }).exists()).toBe(false);
  });

  it("falls back to full-index retrieval before any mapping", async () => {
    const engine = await StudyEngine.open({ config: configFor(), embedder: new AxisEmbedder() });
    await engine.embedAndIndex(engine.chunk(RECORDS));

    const { results, failures } = await engine.retrieveAll([{ topic: bigOTopic(), budget: 1000 }]);

    expect(failures).toEqual([]);
    expect(results[0]?.mode).toBe("fallback");
    expect(results[0]?.items).toHaveLength(3);
  });

  it("builds a QA report and stops the embedder on close", async () => {
    const embedder = new AxisEmbedder();
    const engine = await StudyEngine.open({ config: configFor(), embedder });
    const topic = bigOTopic();
    const chunks = engine.chunk(RECORDS);
    await engine.embedAndIndex(chunks);
    await engine.mapTopics(chunks, [topic]);

    const registry = engine.startCitationRun();
    registry.attach("big-o-summary", [registry.cite(chunks[0] ?? { locator: deck })]);
    const report = engine.qaReport({
      coverage: engine.scoreCoverage([topic]),
      registry,
      topics: [topic],
      content: new Map([["big_o", "Big-O bounds sorting cost [slide 4]."]]),
    });

    expect(report.passed).toBe(true);
    expect(report.markers.slide).toBe(1);
    expect(report.keywordRecall[0]?.percent).toBe(100);

    await engine.close();
    expect(embedder.stopped).toBe(true);
  });
});
