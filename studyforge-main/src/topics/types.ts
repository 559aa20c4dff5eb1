export interface Topic {
  readonly id: string;
  readonly name: string;
  readonly keywords: readonly string[];
  /** A required topic left uncovered blocks the build. */
  readonly required: boolean;
  readonly description?: string;
  readonly weight: number;
}

export interface TopicAssignment {
  readonly chunkId: string;
  readonly topicId: string;
  /** Combined similarity and keyword score in [0, 1]. */
  readonly score: number;
}
