import OpenAI from "openai";
import type { EmbeddingProvider } from "./types.js";

export interface OpenAIEmbedderOptions {
  model: string;
  dimensions?: number;
  apiKey?: string;
  /** Retries done inside the SDK. Defaults to 0 since the indexer retries each batch once. */
  sdkRetries?: number;
}

export class OpenAIEmbedder implements EmbeddingProvider {
  readonly model: string;
  readonly dimensions?: number;
  private readonly apiKey?: string;
  private readonly sdkRetries: number;
  private client: OpenAI | null = null;

  constructor(options: OpenAIEmbedderOptions) {
    this.model = options.model;
    this.dimensions = options.dimensions;
    this.apiKey = options.apiKey;
    this.sdkRetries = options.sdkRetries ?? 0;
  }

  start(): void {
    const apiKey = this.apiKey ?? process.env["OPENAI_API_KEY"];
    if (!apiKey) {
      throw new Error("Missing OPENAI_API_KEY environment variable.");
    }
    this.client = new OpenAI({ apiKey, maxRetries: this.sdkRetries });
  }

  stop(): void {
    this.client = null;
  }

  async embedBatch(texts: readonly string[], signal?: AbortSignal): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }
    if (!this.client) {
      this.start();
    }
    const client = this.client;
    if (!client) {
      throw new Error("OpenAI embedder failed to start.");
    }

    const response = await client.embeddings.create(
      {
        model: this.model,
        input: [...texts],
        ...(this.dimensions ? { dimensions: this.dimensions } : {}),
      },
      { signal },
    );

    const rows = [...response.data].sort((a, b) => a.index - b.index);
    if (rows.length !== texts.length) {
      throw new Error(`Unexpected OpenAI response: expected ${texts.length} embeddings, got ${rows.length}`);
    }

    return rows.map((row) => row.embedding);
  }
}
