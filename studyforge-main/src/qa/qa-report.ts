import type { CitationRegistry } from "../citations/citation-registry.js";
import type { UncitedContentViolation } from "../citations/types.js";
import { evaluateCoverageGate } from "../coverage/coverage-scorer.js";
import type { CoverageRecord } from "../coverage/types.js";
import type { MissingRequiredTopicCoverage } from "../shared/errors.js";
import type { Topic } from "../topics/types.js";

const MARKER_PATTERN = /\[(vid|slide|exam)\b[^\]]*\]/g;

export interface CitationMarkerCounts {
  total: number;
  video: number;
  slide: number;
  exam: number;
}

export interface KeywordRecall {
  total: number;
  found: string[];
  missing: string[];
  /** 100 when there are no keywords to look for. */
  percent: number;
}

export interface TopicKeywordRecall extends KeywordRecall {
  topicId: string;
}

export interface QaReportInput {
  coverage: readonly CoverageRecord[];
  registry: CitationRegistry;
  /** Generated text per topic id. */
  content?: ReadonlyMap<string, string>;
  topics?: readonly Topic[];
  allowMissingRequired?: boolean;
}

export interface QaReport {
  passed: boolean;
  uncited: UncitedContentViolation[];
  missingRequired: MissingRequiredTopicCoverage[];
  markers: CitationMarkerCounts;
  keywordRecall: TopicKeywordRecall[];
}

/** Counts inline source markers (`[vid …]`, `[slide …]`, `[exam …]`) by kind. */
export function checkCitationMarkers(text: string): CitationMarkerCounts {
  const counts: CitationMarkerCounts = { total: 0, video: 0, slide: 0, exam: 0 };
  for (const match of text.matchAll(MARKER_PATTERN)) {
    counts.total++;
    switch (match[1]) {
      case "vid":
        counts.video++;
        break;
      case "slide":
        counts.slide++;
        break;
      case "exam":
        counts.exam++;
        break;
    }
  }
  return counts;
}

/** Case-insensitive substring recall of `keywords` in `text`. */
export function checkKeywordRecall(text: string, keywords: readonly string[]): KeywordRecall {
  const haystack = text.toLowerCase();
  const found: string[] = [];
  const missing: string[] = [];
  for (const keyword of keywords) {
    (haystack.includes(keyword.toLowerCase()) ? found : missing).push(keyword);
  }
  return {
    total: keywords.length,
    found,
    missing,
    percent: keywords.length > 0 ? (found.length / keywords.length) * 100 : 100,
  };
}

/**
 * Gathers QA findings for a synthesis run. Nothing here throws on a
 * finding; `passed` is false when any unit is uncited or a required topic
 * is missing without an override.
 */
export function buildQaReport(input: QaReportInput): QaReport {
  const uncited = input.registry.violations();
  const gate = evaluateCoverageGate(input.coverage, { allowMissingRequired: input.allowMissingRequired });
  const content = input.content ?? new Map<string, string>();

  const markers: CitationMarkerCounts = { total: 0, video: 0, slide: 0, exam: 0 };
  for (const text of content.values()) {
    const counts = checkCitationMarkers(text);
    markers.total += counts.total;
    markers.video += counts.video;
    markers.slide += counts.slide;
    markers.exam += counts.exam;
  }

  const keywordRecall: TopicKeywordRecall[] = [];
  for (const topic of input.topics ?? []) {
    const text = content.get(topic.id);
    if (text === undefined) continue;
    keywordRecall.push({ topicId: topic.id, ...checkKeywordRecall(text, topic.keywords) });
  }

  return {
    passed: uncited.length === 0 && gate.passed,
    uncited,
    missingRequired: gate.missing,
    markers,
    keywordRecall,
  };
}
