import type { Chunk } from "../chunking/types.js";
import { logCoverage, logCoverageGate } from "../shared/engine-logger.js";
import { MissingRequiredTopicCoverageError } from "../shared/errors.js";
import type { MissingRequiredTopicCoverage } from "../shared/errors.js";
import { matchKeywords } from "../topics/keywords.js";
import type { Topic, TopicAssignment } from "../topics/types.js";
import type { CoverageOptions, CoverageRecord, CoverageStatus } from "./types.js";

export const DEFAULT_COVERAGE_OPTIONS: Readonly<CoverageOptions> = Object.freeze({
  chunkWeight: 0.5,
  keywordWeight: 0.5,
  saturationChunkCount: 3,
  coveredThreshold: 0.7,
  partialThreshold: 0.35,
});

export interface CoverageGate {
  passed: boolean;
  overridden: boolean;
  missing: MissingRequiredTopicCoverage[];
}

export interface CoverageGateOptions {
  /** Let a build through even when required topics are missing. */
  allowMissingRequired?: boolean;
}

/**
 * Per-topic coverage, recomputed from the assignments on every call.
 *
 * score = chunkWeight * min(1, matched / saturationChunkCount)
 *       + keywordWeight * keywordHitRatio, clamped to [0, 1].
 * A topic with no keywords is scored on its chunk component alone.
 */
export function scoreCoverage(
  topics: readonly Topic[],
  assignments: readonly TopicAssignment[],
  chunks: readonly Chunk[] | ReadonlyMap<string, Chunk>,
  options?: Partial<CoverageOptions>,
): CoverageRecord[] {
  const opts: CoverageOptions = { ...DEFAULT_COVERAGE_OPTIONS, ...options };
  const chunkById = new Map<string, Chunk>();
  for (const chunk of chunks.values()) {
    chunkById.set(chunk.id, chunk);
  }

  const matched = new Map<string, Set<string>>();
  for (const assignment of assignments) {
    const bucket = matched.get(assignment.topicId) ?? new Set<string>();
    bucket.add(assignment.chunkId);
    matched.set(assignment.topicId, bucket);
  }

  return topics.map((topic) => {
    const chunkIds = matched.get(topic.id) ?? new Set<string>();
    const texts = [...chunkIds].flatMap((id) => {
      const chunk = chunkById.get(id);
      return chunk ? [chunk.text] : [];
    });

    const matchedKeywords = matchKeywords(texts.join("\n"), topic.keywords);
    const missingKeywords = topic.keywords.filter((keyword) => !matchedKeywords.includes(keyword));
    const keywordHitRatio = topic.keywords.length > 0 ? matchedKeywords.length / topic.keywords.length : 0;
    const chunkComponent = Math.min(1, chunkIds.size / Math.max(1, opts.saturationChunkCount));

    const coverageScore = topic.keywords.length > 0
      ? clamp01(opts.chunkWeight * chunkComponent + opts.keywordWeight * keywordHitRatio)
      : clamp01(chunkComponent);
    const status = coverageStatus(coverageScore, opts);
    logCoverage(topic.id, coverageScore, status);

    return Object.freeze({
      topicId: topic.id,
      name: topic.name,
      required: topic.required,
      matchedChunkCount: chunkIds.size,
      keywordHitRatio,
      matchedKeywords: Object.freeze(matchedKeywords),
      missingKeywords: Object.freeze(missingKeywords),
      coverageScore,
      weight: topic.weight,
      weightedScore: coverageScore * topic.weight,
      status,
    });
  });
}

export function coverageStatus(score: number, options: Pick<CoverageOptions, "coveredThreshold" | "partialThreshold">): CoverageStatus {
  if (score >= options.coveredThreshold) return "covered";
  if (score >= options.partialThreshold) return "partial";
  return "missing";
}

export function evaluateCoverageGate(records: readonly CoverageRecord[], options?: CoverageGateOptions): CoverageGate {
  const missing: MissingRequiredTopicCoverage[] = records
    .filter((record) => record.required && record.status === "missing")
    .map((record) => ({
      kind: "missing_required_topic",
      topicId: record.topicId,
      topicName: record.name,
      coverageScore: record.coverageScore,
    }));

  const overridden = missing.length > 0 && (options?.allowMissingRequired ?? false);
  const passed = missing.length === 0 || overridden;
  logCoverageGate(passed, missing.map((entry) => entry.topicId), overridden);
  return { passed, overridden, missing };
}

/** Throws MissingRequiredTopicCoverageError unless the gate passes. */
export function assertCoverageGate(records: readonly CoverageRecord[], options?: CoverageGateOptions): CoverageGate {
  const gate = evaluateCoverageGate(records, options);
  if (!gate.passed) {
    throw new MissingRequiredTopicCoverageError(gate.missing);
  }
  return gate;
}

function clamp01(value: number): number {
  return Math.max(0, Math.min(1, value));
}
