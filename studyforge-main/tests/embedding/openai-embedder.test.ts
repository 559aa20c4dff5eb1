import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("openai", () => {
  const MockOpenAI = vi.fn();
  return { default: MockOpenAI };
});

import OpenAI from "openai";
import { OpenAIEmbedder } from "../../src/embedding/openai-embedder.js";

function mockOpenAIConstructor(mockCreate: ReturnType<typeof vi.fn>): void {
  vi.mocked(OpenAI).mockImplementation(function (this: unknown) {
    return { embeddings: { create: mockCreate } } as unknown as OpenAI;
  } as never);
}

describe("OpenAIEmbedder", () => {
  const originalEnv = { ...process.env };

  beforeEach(() => {
    vi.clearAllMocks();
  });

  afterEach(() => {
    process.env = { ...originalEnv };
  });

  it("throws when OPENAI_API_KEY is missing", () => {
    delete process.env["OPENAI_API_KEY"];
    const embedder = new OpenAIEmbedder({ model: "text-embedding-3-small" });
    expect(() => embedder.start()).toThrow("Missing OPENAI_API_KEY environment variable.");
  });

  it("creates the client without SDK retries", () => {
    process.env["OPENAI_API_KEY"] = "test-secret";
    new OpenAIEmbedder({ model: "text-embedding-3-small" }).start();
    expect(OpenAI).toHaveBeenCalledWith({ apiKey: "test-secret", maxRetries: 0 });
  });

  it("returns vectors in input order", async () => {
    const mockCreate = vi.fn().mockResolvedValue({
      data: [
        { index: 1, embedding: [0, 1] },
        { index: 0, embedding: [1, 0] },
      ],
    });
    mockOpenAIConstructor(mockCreate);

    const embedder = new OpenAIEmbedder({ model: "text-embedding-3-small", dimensions: 2, apiKey: "test-secret" });
    const vectors = await embedder.embedBatch(["first", "second"]);

    expect(vectors).toEqual([[1, 0], [0, 1]]);
    expect(mockCreate).toHaveBeenCalledWith(
      { model: "text-embedding-3-small", input: ["first", "second"], dimensions: 2 },
      { signal: undefined },
    );
  });

  it("rejects a response with the wrong number of rows", async () => {
    mockOpenAIConstructor(vi.fn().mockResolvedValue({ data: [{ index: 0, embedding: [1, 0] }] }));

    const embedder = new OpenAIEmbedder({ model: "text-embedding-3-small", apiKey: "test-secret" });
    await expect(embedder.embedBatch(["first", "second"])).rejects.toThrow(
      "Unexpected OpenAI response: expected 2 embeddings, got 1",
    );
  });

  it("does not call the API for an empty batch", async () => {
    const embedder = new OpenAIEmbedder({ model: "text-embedding-3-small", apiKey: "test-secret" });
    expect(await embedder.embedBatch([])).toEqual([]);
    expect(OpenAI).not.toHaveBeenCalled();
  });
});
