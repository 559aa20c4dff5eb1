import type { EngineConfig } from "../config/engine-config.js";
import { LocalTextEmbedder } from "./local-embedder.js";
import { OpenAIEmbedder } from "./openai-embedder.js";
import type { EmbeddingProvider } from "./types.js";

export function createEmbeddingProvider(config: EngineConfig): EmbeddingProvider {
  const { embedding } = config;
  switch (embedding.provider) {
    case "openai":
      return new OpenAIEmbedder({ model: embedding.model, dimensions: embedding.dimensions });
    case "local":
      return new LocalTextEmbedder({ dimensions: embedding.dimensions });
  }
}
