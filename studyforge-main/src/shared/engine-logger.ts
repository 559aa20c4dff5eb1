/**
 * Pipeline logger for the retrieval-and-provenance engine.
 *
 * Every line prints a bright green [STUDYFORGE] prefix so you can filter with:
 *   grep "\[STUDYFORGE\]"
 *
 * Categories:
 *   CHUNK     — record segmentation
 *   EMBED     — embedding batches, retries, failures
 *   INDEX     — vector inserts and searches
 *   STORE     — persisted index reads and writes
 *   TOPIC     — topic mapping passes
 *   RETRIEVE  — per-topic retrieval, fallbacks, budget signals
 *   CITE      — citation creation and uncited content
 *   COVERAGE  — coverage scoring and gate verdicts
 *   FILE      — config and topic files that could not be read
 */

import { isLevelEnabled } from "./log-level.js";

const R = "\x1b[0m";
const GREEN = "\x1b[32m";
const DIM = "\x1b[2m";
const BOLD = "\x1b[1m";
const CYAN = "\x1b[36m";
const YELLOW = "\x1b[33m";
const RED = "\x1b[31m";
const MAGENTA = "\x1b[35m";
const BLUE = "\x1b[34m";
const WHITE = "\x1b[37m";

type Category = "CHUNK" | "EMBED" | "INDEX" | "STORE" | "TOPIC" | "RETRIEVE" | "CITE" | "COVERAGE" | "FILE";
type Severity = "debug" | "info" | "warn" | "error";

const CATEGORY_COLORS: Record<Category, string> = {
  CHUNK: WHITE,
  EMBED: CYAN,
  INDEX: BLUE,
  STORE: RED,
  TOPIC: MAGENTA,
  RETRIEVE: YELLOW,
  CITE: GREEN,
  COVERAGE: YELLOW,
  FILE: DIM,
};

function ts(): string {
  return new Date().toISOString().slice(11, 23); // HH:MM:SS.mmm
}

function shortId(id: string): string {
  return id.slice(0, 10);
}

function engineLog(
  severity: Severity,
  category: Category,
  message: string,
  detail?: Record<string, unknown>,
): void {
  if (!isLevelEnabled(severity)) return;

  const color = CATEGORY_COLORS[category];
  const prefix = `${GREEN}${BOLD}[STUDYFORGE]${R}`;
  const cat = `${color}${category.padEnd(8)}${R}`;
  const time = `${DIM}${ts()}${R}`;
  const line = severity === "warn" || severity === "error"
    ? `${severity === "warn" ? YELLOW : RED}${message}${R}`
    : message;

  if (detail) {
    const parts = Object.entries(detail)
      .map(([k, v]) => `${DIM}${k}=${R}${formatValue(v)}`)
      .join(" ");
    console.log(`${prefix} ${time} ${cat} ${line}  ${parts}`);
  } else {
    console.log(`${prefix} ${time} ${cat} ${line}`);
  }
}

function formatValue(v: unknown): string {
  if (v === null || v === undefined) return `${DIM}null${R}`;
  if (typeof v === "string") {
    if (v.length > 80) return `"${v.slice(0, 77)}..."`;
    return `"${v}"`;
  }
  if (typeof v === "number" || typeof v === "boolean") return String(v);
  return JSON.stringify(v);
}

// ── Public API ─────────────────────────────────────────────

export function logChunked(recordCount: number, chunkCount: number, maxChunkChars: number): void {
  engineLog("info", "CHUNK", "✂ Records chunked", { records: recordCount, chunks: chunkCount, maxChars: maxChunkChars });
}

export function logEmbedStart(pending: number, skipped: number, batches: number): void {
  engineLog("info", "EMBED", "▶ Embedding pass START", { pending, alreadyIndexed: skipped, batches });
}

export function logEmbedRetry(batchIndex: number, reason: string): void {
  engineLog("warn", "EMBED", `↻ Batch ${batchIndex} failed, retrying once`, { reason });
}

export function logEmbedBatchFailed(batchIndex: number, chunkCount: number, reason: string): void {
  engineLog("error", "EMBED", `✗ Batch ${batchIndex} FAILED after retry`, { chunks: chunkCount, reason });
}

export function logEmbedDone(inserted: number, failedChunks: number, aborted: boolean): void {
  engineLog("info", "EMBED", "✅ Embedding pass DONE", { inserted, failedChunks, aborted });
}

export function logIndexInsert(inserted: number, duplicates: number, size: number): void {
  engineLog("debug", "INDEX", "+ Vectors inserted", { inserted, duplicates, size });
}

export function logIndexSearch(k: number, restricted: number | null, hits: number): void {
  engineLog("debug", "INDEX", "🔎 Search", { k, restrictedTo: restricted ?? "all", hits });
}

export function logStoreSave(dataDir: string, sessions: number, chunks: number): void {
  engineLog("info", "STORE", "💾 Index persisted", { dir: dataDir, sessions, chunks });
}

export function logStoreLoad(dataDir: string, sessions: number, chunks: number): void {
  engineLog("info", "STORE", "📖 Index loaded", { dir: dataDir, sessions, chunks });
}

export function logStoreMissing(dataDir: string): void {
  engineLog("info", "STORE", "∅ No persisted index, starting empty", { dir: dataDir });
}

export function logTopicMapping(topicId: string, assigned: number, candidates: number): void {
  engineLog("info", "TOPIC", `Topic '${topicId}' mapped`, { assigned, candidates });
}

export function logTopicSkippedChunks(count: number): void {
  engineLog("warn", "TOPIC", "⚠ Chunks without embeddings skipped", { count });
}

export function logTopicQueryRetry(topicId: string, reason: string): void {
  engineLog("warn", "TOPIC", "Topic query embedding failed, retrying", { topic: topicId, reason });
}

export function logRetrieveFallback(topicId: string, candidates: number): void {
  engineLog("warn", "RETRIEVE", `⚠ No assignments for '${topicId}', using full-index fallback`, { candidates });
}

export function logRetrieveResult(topicId: string, mode: string, returned: number, dropped: number, used: number, budget: number): void {
  engineLog("info", "RETRIEVE", `Topic '${topicId}' retrieved`, { mode, returned, duplicatesDropped: dropped, used, budget });
}

export function logBudgetStop(topicId: string, chunkId: string, length: number, remaining: number): void {
  engineLog("debug", "RETRIEVE", "Budget reached, stopping", { topic: topicId, chunk: shortId(chunkId), length, remaining });
}

export function logBudgetTooSmall(topicId: string, budget: number, smallestRequired: number): void {
  engineLog("warn", "RETRIEVE", `⚠ Budget too small for '${topicId}'`, { budget, required: smallestRequired });
}

export function logCitationCreated(citationId: string, ordinal: number, display: string): void {
  engineLog("debug", "CITE", `★ Citation [${ordinal}] created`, { id: shortId(citationId), source: display });
}

export function logUncitedContent(unitId: string): void {
  engineLog("warn", "CITE", "⚠ Content unit has no citations", { unitId });
}

export function logCoverage(topicId: string, score: number, status: string): void {
  engineLog("info", "COVERAGE", `Topic '${topicId}' ${status}`, { score: Math.round(score * 100) / 100 });
}

export function logCoverageGate(passed: boolean, blocking: string[], overridden: boolean): void {
  engineLog(passed ? "info" : "error", "COVERAGE", passed ? "✓ Coverage gate passed" : "✗ Coverage gate FAILED", {
    blocking: blocking.join(", "),
    overridden,
  });
}

export function logCoverageReport(outputPath: string, rows: number): void {
  engineLog("info", "COVERAGE", "📄 Coverage report saved", { path: outputPath, rows });
}

export function logFileSkipped(label: string, reason: string): void {
  engineLog("warn", "FILE", "File skipped", { file: label, reason });
}
