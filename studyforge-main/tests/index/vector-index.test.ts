import { describe, expect, it } from "vitest";
import type { EmbeddedChunk } from "../../src/chunking/types.js";
import { VectorIndex } from "../../src/index/vector-index.js";
import { DimensionMismatchError, IndexEmptyError } from "../../src/shared/errors.js";
import { createLocator, slide } from "../../src/sources/locator.js";

function embedded(id: string, embedding: number[], sessionId = "lecture01"): EmbeddedChunk {
  return {
    id,
    text: `text of ${id}`,
    locator: createLocator("slide", sessionId, slide(1)),
    sessionId,
    embedding,
  };
}

describe("VectorIndex", () => {
  it("refuses to search before anything is inserted", async () => {
    await expect(new VectorIndex().search([1, 0], 3)).rejects.toBeInstanceOf(IndexEmptyError);
  });

  it("treats repeated inserts of the same id as no-ops", async () => {
    const index = new VectorIndex();
    expect(await index.add([embedded("a", [1, 0]), embedded("b", [0, 1])])).toBe(2);
    expect(await index.add([embedded("a", [1, 0]), embedded("c", [1, 1])])).toBe(1);
    expect(index.size).toBe(3);
    expect(index.dimensions).toBe(2);
  });

  it("validates a whole batch before inserting any of it", async () => {
    const index = new VectorIndex();
    await index.add([embedded("a", [1, 0])]);

    await expect(index.add([embedded("b", [0, 1]), embedded("c", [1, 0, 0])])).rejects.toBeInstanceOf(DimensionMismatchError);
    expect(index.has("b")).toBe(false);
    expect(index.size).toBe(1);
  });

  it("orders hits by distance and breaks ties by chunk id", async () => {
    const index = new VectorIndex();
    await index.add([embedded("c", [0, 1]), embedded("b", [1, 0]), embedded("a", [1, 0])]);

    const hits = await index.search([1, 0], 3);
    expect(hits.map((hit) => hit.chunk.id)).toEqual(["a", "b", "c"]);
    expect(hits[0]?.score).toBe(1);
    expect(hits[2]?.score).toBe(0);
  });

  it("limits results to k and to the restricted ids", async () => {
    const index = new VectorIndex();
    await index.add([embedded("a", [1, 0]), embedded("b", [0.9, 0.1]), embedded("c", [0, 1])]);

    expect((await index.search([1, 0], 1)).map((hit) => hit.chunk.id)).toEqual(["a"]);
    const restricted = await index.search([1, 0], 5, { restrictTo: new Set(["c", "b", "missing"]) });
    expect(restricted.map((hit) => hit.chunk.id)).toEqual(["b", "c"]);
  });

  it("rejects a query of the wrong dimension", async () => {
    const index = new VectorIndex();
    await index.add([embedded("a", [1, 0])]);
    await expect(index.search([1, 0, 0], 1)).rejects.toThrow("Vector dimension mismatch: expected 2, got 3");
  });

  it("never lets a search observe half of a batch", async () => {
    const index = new VectorIndex();
    const batch = Array.from({ length: 50 }, (_, i) => embedded(`chunk-${String(i).padStart(2, "0")}`, [1, i]));

    const [inserted, hits] = await Promise.all([index.add(batch), index.search([1, 0], 100)]);
    expect(inserted).toBe(50);
    expect(hits).toHaveLength(50);
  });

  it("round-trips through a snapshot", async () => {
    const index = new VectorIndex({ metric: "l2", model: "axis-2" });
    await index.add([embedded("b", [0, 1], "s2"), embedded("a", [1, 0], "s1")]);

    const restored = VectorIndex.fromSnapshot(index.snapshot());
    expect(restored.metric).toBe("l2");
    expect(restored.model).toBe("axis-2");
    expect(restored.chunks().map((chunk) => chunk.id)).toEqual(["a", "b"]);
    expect(restored.get("b")?.sessionId).toBe("s2");
  });
});
