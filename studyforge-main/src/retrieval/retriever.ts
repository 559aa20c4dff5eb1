import type { VectorIndex } from "../index/vector-index.js";
import type { SearchHit } from "../index/types.js";
import { mapWithConcurrency } from "../shared/async-pool.js";
import { logBudgetStop, logBudgetTooSmall, logRetrieveFallback, logRetrieveResult } from "../shared/engine-logger.js";
import { measureText } from "../shared/text-length.js";
import type { BudgetUnit } from "../shared/text-length.js";
import type { TopicVectorCache } from "../topics/topic-vectors.js";
import type { Topic, TopicAssignment } from "../topics/types.js";
import { dedupeRanked } from "./dedup.js";
import type {
  BudgetStop,
  BudgetTooSmall,
  RetrievalFailure,
  RetrievalRequest,
  RetrievalResult,
  RetrieveAllOptions,
  RetrieveAllResult,
  RetrieveOptions,
  RetrievedChunk,
} from "./types.js";

export interface RetrieverOptions {
  index: VectorIndex;
  vectors: TopicVectorCache;
  assignments?: readonly TopicAssignment[];
  duplicateThreshold?: number;
  /** Result size of the full-index search used for topics with no assignments. */
  fallbackCandidates?: number;
  budgetUnit?: BudgetUnit;
  concurrency?: number;
}

const DEFAULT_DUPLICATE_THRESHOLD = 0.8;
const DEFAULT_FALLBACK_CANDIDATES = 50;
const DEFAULT_CONCURRENCY = 4;

export class Retriever {
  private readonly index: VectorIndex;
  private readonly vectors: TopicVectorCache;
  private readonly duplicateThreshold: number;
  private readonly fallbackCandidates: number;
  private readonly budgetUnit: BudgetUnit;
  private readonly concurrency: number;
  private assigned = new Map<string, Set<string>>();

  constructor(options: RetrieverOptions) {
    this.index = options.index;
    this.vectors = options.vectors;
    this.duplicateThreshold = options.duplicateThreshold ?? DEFAULT_DUPLICATE_THRESHOLD;
    this.fallbackCandidates = Math.max(1, Math.floor(options.fallbackCandidates ?? DEFAULT_FALLBACK_CANDIDATES));
    this.budgetUnit = options.budgetUnit ?? "chars";
    this.concurrency = Math.max(1, Math.floor(options.concurrency ?? DEFAULT_CONCURRENCY));
    this.setAssignments(options.assignments ?? []);
  }

  /** Replaces the assignment set wholesale, as produced by a mapping pass. */
  setAssignments(assignments: readonly TopicAssignment[]): void {
    const next = new Map<string, Set<string>>();
    for (const assignment of assignments) {
      const bucket = next.get(assignment.topicId) ?? new Set<string>();
      bucket.add(assignment.chunkId);
      next.set(assignment.topicId, bucket);
    }
    this.assigned = next;
  }

  assignedChunkIds(topicId: string): ReadonlySet<string> {
    return this.assigned.get(topicId) ?? new Set<string>();
  }

  /**
   * Ranked, de-duplicated chunks for `topic` whose combined length fits
   * `budget`. Searches only the topic's assigned chunks; a topic with none
   * in the index falls back to the whole index and says so in `mode`.
   * Accumulation stops at the first chunk that would overflow the budget and
   * reports it as `budgetStop`; `budgetTooSmall` is set only when no
   * candidate fits at all.
   */
  async retrieve(topic: Topic, budget: number, options?: RetrieveOptions): Promise<RetrievalResult> {
    if (Number.isNaN(budget) || budget < 0) {
      throw new RangeError(`Retrieval budget must be a non-negative number, got: ${budget}`);
    }

    const queryVector = await this.vectors.vectorFor(topic, options?.hints, options?.signal);
    options?.signal?.throwIfAborted();

    const restrictTo = new Set([...this.assignedChunkIds(topic.id)].filter((id) => this.index.has(id)));
    const mode = restrictTo.size > 0 ? "assigned" : "fallback";

    let hits: SearchHit[];
    if (mode === "assigned") {
      hits = await this.index.search(queryVector, restrictTo.size, { restrictTo });
    } else {
      logRetrieveFallback(topic.id, this.fallbackCandidates);
      hits = await this.index.search(queryVector, this.fallbackCandidates);
    }

    const ranked: RetrievedChunk[] = hits.map((hit) => ({ chunk: hit.chunk, score: hit.score }));
    const { kept, dropped } = dedupeRanked(ranked, (entry) => entry.chunk.text, this.duplicateThreshold);

    const items: RetrievedChunk[] = [];
    let totalLength = 0;
    let budgetStop: BudgetStop | undefined;
    for (const [position, entry] of kept.entries()) {
      const length = measureText(entry.chunk.text, this.budgetUnit);
      if (totalLength + length > budget) {
        budgetStop = Object.freeze({
          kind: "budget_stop",
          topicId: topic.id,
          chunkId: entry.chunk.id,
          length,
          remaining: budget - totalLength,
          skipped: kept.length - position,
        });
        logBudgetStop(topic.id, entry.chunk.id, length, budget - totalLength);
        break;
      }
      items.push(entry);
      totalLength += length;
    }

    let budgetTooSmall: BudgetTooSmall | undefined;
    const smallestRequired = kept.length > 0
      ? Math.min(...kept.map((entry) => measureText(entry.chunk.text, this.budgetUnit)))
      : 0;
    if (items.length === 0 && kept.length > 0 && budget < smallestRequired) {
      budgetTooSmall = Object.freeze({
        kind: "budget_too_small",
        topicId: topic.id,
        budget,
        smallestRequired,
        unit: this.budgetUnit,
      });
      logBudgetTooSmall(topic.id, budget, smallestRequired);
    }

    logRetrieveResult(topic.id, mode, items.length, dropped, totalLength, budget);
    return Object.freeze({
      topicId: topic.id,
      mode,
      items: Object.freeze(items),
      totalLength,
      budget,
      unit: this.budgetUnit,
      duplicatesDropped: dropped,
      ...(budgetTooSmall ? { budgetTooSmall } : {}),
      ...(budgetStop ? { budgetStop } : {}),
    });
  }

  /**
   * Retrieves every request over a bounded pool. A failing topic is
   * recorded and the rest carry on; an abort stops the whole fan-out.
   */
  async retrieveAll(requests: readonly RetrievalRequest[], options?: RetrieveAllOptions): Promise<RetrieveAllResult> {
    const failures: RetrievalFailure[] = [];
    const signal = options?.signal;

    const outcomes = await mapWithConcurrency(
      requests,
      options?.concurrency ?? this.concurrency,
      async (request): Promise<RetrievalResult | null> => {
        try {
          return await this.retrieve(request.topic, request.budget, { hints: request.hints, signal });
        } catch (err) {
          if (signal?.aborted) {
            throw err;
          }
          failures.push({
            topicId: request.topic.id,
            error: err instanceof Error ? err : new Error(String(err)),
          });
          return null;
        }
      },
      signal,
    );

    const order = new Map(requests.map((request, position) => [request.topic.id, position]));
    failures.sort((a, b) => (order.get(a.topicId) ?? 0) - (order.get(b.topicId) ?? 0));

    return {
      results: outcomes.filter((outcome): outcome is RetrievalResult => outcome !== null),
      failures,
    };
  }
}
