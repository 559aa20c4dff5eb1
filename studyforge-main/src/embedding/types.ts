export interface EmbeddingProvider {
  /** Identifier of the model behind the vectors. Persisted with the index. */
  readonly model: string;
  /** Fixed output dimension, when known before the first call. */
  readonly dimensions?: number;
  /** One vector per input text, in input order. Must be deterministic for identical input. */
  embedBatch(texts: readonly string[], signal?: AbortSignal): Promise<number[][]>;
  start?(): void | Promise<void>;
  stop?(): void | Promise<void>;
}
