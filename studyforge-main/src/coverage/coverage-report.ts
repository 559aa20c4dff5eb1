import { logCoverageReport } from "../shared/engine-logger.js";
import { writeTextFile } from "../shared/io.js";
import type { CoverageRecord, CoverageStats } from "./types.js";

const DEFAULT_GAP_THRESHOLD = 0.1;

const CSV_COLUMNS = [
  "topic_id",
  "name",
  "required",
  "status",
  "coverage_score",
  "weight",
  "weighted_coverage",
  "matched_chunk_count",
  "keyword_hit_ratio",
  "missing_keywords",
] as const;

export function summarizeCoverage(records: readonly CoverageRecord[]): CoverageStats {
  if (records.length === 0) {
    return { topics: 0, mean: 0, median: 0, min: 0, max: 0, weightedMean: 0 };
  }

  const scores = records.map((record) => record.coverageScore).sort((a, b) => a - b);
  const total = scores.reduce((sum, score) => sum + score, 0);
  const totalWeight = records.reduce((sum, record) => sum + record.weight, 0);
  const weightedTotal = records.reduce((sum, record) => sum + record.weightedScore, 0);
  return {
    topics: scores.length,
    mean: total / scores.length,
    median: scores[Math.floor(scores.length / 2)] ?? 0,
    min: scores[0] ?? 0,
    max: scores[scores.length - 1] ?? 0,
    weightedMean: totalWeight > 0 ? weightedTotal / totalWeight : 0,
  };
}

export function findCoverageGaps(records: readonly CoverageRecord[], threshold = DEFAULT_GAP_THRESHOLD): CoverageRecord[] {
  return records.filter((record) => record.coverageScore < threshold);
}

export function renderCoverageSummary(records: readonly CoverageRecord[], gapThreshold = DEFAULT_GAP_THRESHOLD): string {
  if (records.length === 0) {
    return "No coverage data available.";
  }

  const stats = summarizeCoverage(records);
  const gaps = findCoverageGaps(records, gapThreshold);
  const lines = [
    "Topic Coverage Summary",
    "=".repeat(50),
    `Total Topics: ${stats.topics}`,
    `Mean Coverage: ${percent(stats.mean)}`,
    `Median Coverage: ${percent(stats.median)}`,
    `Weighted Coverage: ${percent(stats.weightedMean)}`,
    `Coverage Range: ${percent(stats.min)} - ${percent(stats.max)}`,
    "",
  ];

  if (gaps.length > 0) {
    lines.push(`${gaps.length} topic(s) with low coverage (<${percent(gapThreshold)}):`);
    for (const gap of gaps) {
      lines.push(`  - ${gap.name}: ${percent(gap.coverageScore)}${gap.required ? " (required)" : ""}`);
    }
  } else {
    lines.push("All topics have adequate coverage");
  }

  return lines.join("\n");
}

/** CSV with one row per topic, highest score first. */
export function toCoverageCsv(records: readonly CoverageRecord[]): string {
  const rows = [...records]
    .sort((a, b) => b.coverageScore - a.coverageScore || (a.topicId < b.topicId ? -1 : a.topicId > b.topicId ? 1 : 0))
    .map((record) => [
      record.topicId,
      record.name,
      String(record.required),
      record.status,
      round(record.coverageScore),
      round(record.weight),
      round(record.weightedScore),
      String(record.matchedChunkCount),
      round(record.keywordHitRatio),
      record.missingKeywords.join(";"),
    ].map(csvField).join(","));

  return [CSV_COLUMNS.join(","), ...rows].join("\n") + "\n";
}

export async function writeCoverageReport(records: readonly CoverageRecord[], outputPath: string): Promise<void> {
  await writeTextFile(outputPath, toCoverageCsv(records));
  logCoverageReport(outputPath, records.length);
}

function percent(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

function round(value: number): string {
  return String(Math.round(value * 10_000) / 10_000);
}

function csvField(value: string): string {
  return /[",\n\r]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}
