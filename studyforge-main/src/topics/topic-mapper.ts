import type { Chunk } from "../chunking/types.js";
import { isEmbedded } from "../chunking/types.js";
import { logTopicMapping, logTopicSkippedChunks } from "../shared/engine-logger.js";
import { cosineSimilarity } from "../index/similarity.js";
import { compareIds } from "../index/vector-index.js";
import { keywordFraction } from "./keywords.js";
import type { TopicVectorCache } from "./topic-vectors.js";
import type { Topic, TopicAssignment } from "./types.js";

export interface TopicMapperOptions {
  vectors: TopicVectorCache;
  /** Minimum combined score for an assignment. */
  threshold?: number;
  /** Added to the similarity, scaled by the fraction of the topic's keywords found in the chunk. */
  keywordBonus?: number;
}

const DEFAULT_THRESHOLD = 0.3;
const DEFAULT_KEYWORD_BONUS = 0.2;

/**
 * Batch chunk-to-topic mapping. Always recomputed in full from the current
 * chunks and topics; there is no incremental update.
 */
export class TopicMapper {
  private readonly vectors: TopicVectorCache;
  private readonly threshold: number;
  private readonly keywordBonus: number;

  constructor(options: TopicMapperOptions) {
    this.vectors = options.vectors;
    this.threshold = options.threshold ?? DEFAULT_THRESHOLD;
    this.keywordBonus = options.keywordBonus ?? DEFAULT_KEYWORD_BONUS;
  }

  scoreChunk(chunk: Chunk, topic: Topic, topicVector: readonly number[]): number {
    const similarity = isEmbedded(chunk) ? Math.max(0, cosineSimilarity(chunk.embedding, topicVector)) : 0;
    const bonus = this.keywordBonus * keywordFraction(chunk.text, topic);
    return clamp01(similarity + bonus);
  }

  /** Assignments ordered by topic (input order), then chunk id. */
  async map(chunks: readonly Chunk[], topics: readonly Topic[], signal?: AbortSignal): Promise<TopicAssignment[]> {
    const embedded = [...chunks].filter(isEmbedded).sort((a, b) => compareIds(a.id, b.id));
    const skipped = chunks.length - embedded.length;
    if (skipped > 0) {
      logTopicSkippedChunks(skipped);
    }

    const topicVectors = await this.vectors.vectorsFor(topics, signal);
    const assignments: TopicAssignment[] = [];

    for (const topic of topics) {
      signal?.throwIfAborted();
      const topicVector = topicVectors.get(topic.id);
      if (!topicVector) continue;

      let assigned = 0;
      for (const chunk of embedded) {
        const score = this.scoreChunk(chunk, topic, topicVector);
        if (score >= this.threshold) {
          assignments.push(Object.freeze({ chunkId: chunk.id, topicId: topic.id, score }));
          assigned++;
        }
      }
      logTopicMapping(topic.id, assigned, embedded.length);
    }

    return assignments;
  }
}

export function groupAssignmentsByTopic(assignments: readonly TopicAssignment[]): Map<string, TopicAssignment[]> {
  const byTopic = new Map<string, TopicAssignment[]>();
  for (const assignment of assignments) {
    const bucket = byTopic.get(assignment.topicId) ?? [];
    bucket.push(assignment);
    byTopic.set(assignment.topicId, bucket);
  }
  return byTopic;
}

function clamp01(value: number): number {
  return Math.max(0, Math.min(1, value));
}
