import type { EmbeddingProvider } from "../embedding/types.js";
import { logTopicQueryRetry } from "../shared/engine-logger.js";
import { errorMessage } from "../shared/errors.js";
import { callWithRetry, raceAbort } from "../shared/timeout.js";
import type { Topic } from "./types.js";

/** Text a topic is embedded from: its keywords (or its name when it has none) plus any hints. */
export function topicQueryText(topic: Topic, hints: readonly string[] = []): string {
  const base = topic.keywords.length > 0 ? [...topic.keywords] : [topic.name];
  const extra = hints.map((hint) => hint.trim()).filter((hint) => hint.length > 0);
  return [...base, ...extra].join(" ");
}

export interface TopicVectorCacheOptions {
  timeoutMs?: number;
  /** Retries per failed query embedding. */
  maxRetries?: number;
}

const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * Embeds topic queries once per distinct query text, through the same
 * provider the chunks were embedded with.
 *
 * The model call is shared by every caller asking for the same text and is
 * bounded only by the timeout. A caller's signal ends that caller's wait,
 * not the shared call.
 */
export class TopicVectorCache {
  private readonly embedder: EmbeddingProvider;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly vectors = new Map<string, Promise<number[]>>();

  constructor(embedder: EmbeddingProvider, options?: TopicVectorCacheOptions) {
    this.embedder = embedder;
    this.timeoutMs = Math.max(1, options?.timeoutMs ?? DEFAULT_TIMEOUT_MS);
    this.maxRetries = Math.max(0, Math.min(1, Math.floor(options?.maxRetries ?? 1)));
  }

  async vectorFor(topic: Topic, hints?: readonly string[], signal?: AbortSignal): Promise<number[]> {
    signal?.throwIfAborted();
    const text = topicQueryText(topic, hints);
    let pending = this.vectors.get(text);
    if (!pending) {
      pending = this.embedQuery(topic.id, text);
      this.vectors.set(text, pending);
      pending.catch(() => this.vectors.delete(text));
    }
    return raceAbort(pending, signal);
  }

  private embedQuery(topicId: string, text: string): Promise<number[]> {
    return callWithRetry(async (callSignal) => {
      const rows = await this.embedder.embedBatch([text], callSignal);
      const vector = rows[0];
      if (!vector || vector.length === 0) {
        throw new Error(`Embedder returned no vector for topic '${topicId}'`);
      }
      return vector;
    }, {
      timeoutMs: this.timeoutMs,
      maxRetries: this.maxRetries,
      onRetry: (err) => logTopicQueryRetry(topicId, errorMessage(err)),
    });
  }

  async vectorsFor(topics: readonly Topic[], signal?: AbortSignal): Promise<Map<string, number[]>> {
    const out = new Map<string, number[]>();
    for (const topic of topics) {
      out.set(topic.id, await this.vectorFor(topic, undefined, signal));
    }
    return out;
  }

  clear(): void {
    this.vectors.clear();
  }
}
