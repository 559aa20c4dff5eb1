import { describe, expect, it } from "vitest";
import { CitationRegistry } from "../../src/citations/citation-registry.js";
import type { CoverageRecord } from "../../src/coverage/types.js";
import { buildQaReport, checkCitationMarkers, checkKeywordRecall } from "../../src/qa/qa-report.js";
import { createLocator, slide } from "../../src/sources/locator.js";
import { normalizeTopics } from "../../src/topics/topic-config.js";

function record(topicId: string, required: boolean, status: CoverageRecord["status"]): CoverageRecord {
  return {
    topicId,
    name: topicId,
    required,
    matchedChunkCount: 0,
    keywordHitRatio: 0,
    matchedKeywords: [],
    missingKeywords: [],
    coverageScore: status === "covered" ? 1 : 0,
    weight: 1,
    weightedScore: status === "covered" ? 1 : 0,
    status,
  };
}

describe("checkCitationMarkers", () => {
  it("counts markers by kind and ignores look-alikes", () => {
    const counts = checkCitationMarkers(
      "See [slide 4] and [vid 00:01:05], also [exam Q3] and [slide 7]. Not [video x] nor [1].",
    );
    expect(counts).toEqual({ total: 4, video: 1, slide: 2, exam: 1 });
  });
});

describe("checkKeywordRecall", () => {
  it("reports found and missing keywords", () => {
    expect(checkKeywordRecall("Big-O bounds for sorting", ["big-o", "heap"])).toEqual({
      total: 2,
      found: ["big-o"],
      missing: ["heap"],
      percent: 50,
    });
  });

  it("treats an empty keyword list as full recall", () => {
    expect(checkKeywordRecall("anything", []).percent).toBe(100);
  });
});

describe("buildQaReport", () => {
  const topics = normalizeTopics([
    { id: "sorting", name: "Sorting", keywords: ["merge sort", "pivot"], required: true },
    { id: "graphs", name: "Graphs", keywords: ["vertex"], required: true },
  ]);

  it("collects uncited units and missing required topics without throwing", () => {
    const registry = new CitationRegistry();
    const citation = registry.cite({ locator: createLocator("slide", "slides05", slide(4)) });
    registry.attach("sorting-summary", [citation]);
    registry.attach("graphs-summary", []);

    const report = buildQaReport({
      coverage: [record("sorting", true, "covered"), record("graphs", true, "missing")],
      registry,
      topics,
      content: new Map([["sorting", "Merge sort splits the input [slide 4]."]]),
    });

    expect(report.passed).toBe(false);
    expect(report.uncited).toEqual([{ kind: "uncited_content", unitId: "graphs-summary" }]);
    expect(report.missingRequired.map((entry) => entry.topicId)).toEqual(["graphs"]);
    expect(report.markers).toEqual({ total: 1, video: 0, slide: 1, exam: 0 });
    expect(report.keywordRecall).toEqual([
      { topicId: "sorting", total: 2, found: ["merge sort"], missing: ["pivot"], percent: 50 },
    ]);
  });

  it("passes a clean run", () => {
    const registry = new CitationRegistry();
    registry.attach("sorting-summary", [registry.cite({ locator: createLocator("slide", "slides05", slide(4)) })]);

    const report = buildQaReport({
      coverage: [record("sorting", true, "covered"), record("graphs", false, "missing")],
      registry,
    });

    expect(report.passed).toBe(true);
    expect(report.keywordRecall).toEqual([]);
  });

  it("honours the missing-coverage override", () => {
    const report = buildQaReport({
      coverage: [record("graphs", true, "missing")],
      registry: new CitationRegistry(),
      allowMissingRequired: true,
    });

    expect(report.passed).toBe(true);
    expect(report.missingRequired).toHaveLength(1);
  });
});
