import type { EmbeddedChunk } from "../chunking/types.js";
import type { BudgetUnit } from "../shared/text-length.js";
import type { Topic } from "../topics/types.js";

export type RetrievalMode = "assigned" | "fallback";

export interface RetrievedChunk {
  readonly chunk: EmbeddedChunk;
  /** Similarity to the topic query, higher is closer. */
  readonly score: number;
}

/** Reported, never thrown: the budget cannot hold even the smallest candidate. */
export interface BudgetTooSmall {
  readonly kind: "budget_too_small";
  readonly topicId: string;
  readonly budget: number;
  readonly smallestRequired: number;
  readonly unit: BudgetUnit;
}

/**
 * Reported, never thrown: accumulation stopped at `chunkId` because it would
 * overflow the budget, with `skipped` ranked candidates (that one included)
 * left out. Smaller chunks further down the ranking are not tried.
 */
export interface BudgetStop {
  readonly kind: "budget_stop";
  readonly topicId: string;
  readonly chunkId: string;
  readonly length: number;
  /** Budget left when the chunk was reached. */
  readonly remaining: number;
  readonly skipped: number;
}

export interface RetrievalResult {
  readonly topicId: string;
  readonly mode: RetrievalMode;
  /** Rank order, no near-duplicates, total length within `budget`. */
  readonly items: readonly RetrievedChunk[];
  readonly totalLength: number;
  readonly budget: number;
  readonly unit: BudgetUnit;
  readonly duplicatesDropped: number;
  /** Present only when the budget is below the length of every candidate. */
  readonly budgetTooSmall?: BudgetTooSmall;
  readonly budgetStop?: BudgetStop;
}

export interface RetrieveOptions {
  hints?: readonly string[];
  signal?: AbortSignal;
}

export interface RetrievalRequest {
  topic: Topic;
  budget: number;
  hints?: readonly string[];
}

export interface RetrievalFailure {
  topicId: string;
  error: Error;
}

export interface RetrieveAllOptions {
  concurrency?: number;
  signal?: AbortSignal;
}

export interface RetrieveAllResult {
  /** Successful results in request order. */
  results: RetrievalResult[];
  failures: RetrievalFailure[];
}
