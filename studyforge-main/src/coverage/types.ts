export type CoverageStatus = "covered" | "partial" | "missing";

export interface CoverageRecord {
  readonly topicId: string;
  readonly name: string;
  readonly required: boolean;
  readonly matchedChunkCount: number;
  /** Fraction of the topic's keywords found in its matched chunks. */
  readonly keywordHitRatio: number;
  readonly matchedKeywords: readonly string[];
  readonly missingKeywords: readonly string[];
  readonly coverageScore: number;
  /** The topic's configured weight. */
  readonly weight: number;
  /** `coverageScore * weight`. */
  readonly weightedScore: number;
  readonly status: CoverageStatus;
}

export interface CoverageOptions {
  chunkWeight: number;
  keywordWeight: number;
  /** Matched-chunk count at which the chunk component saturates at 1. */
  saturationChunkCount: number;
  coveredThreshold: number;
  partialThreshold: number;
}

export interface CoverageStats {
  topics: number;
  mean: number;
  median: number;
  min: number;
  max: number;
  /** Sum of weighted scores over the sum of weights; 0 when every weight is 0. */
  weightedMean: number;
}
