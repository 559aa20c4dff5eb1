import { LocatorError } from "../shared/errors.js";
import { secondsToTimecode } from "./timecode.js";
import type { Locator, Position, SourceKind } from "./types.js";

const SOURCE_KINDS: readonly SourceKind[] = ["video", "transcript", "slide", "exam"];

export function isSourceKind(value: unknown): value is SourceKind {
  return typeof value === "string" && (SOURCE_KINDS as readonly string[]).includes(value);
}

export function timeRange(startSeconds: number, endSeconds: number): Position {
  return { kind: "time_range", startSeconds, endSeconds };
}

export function slide(slideNumber: number): Position {
  return { kind: "slide", slideNumber };
}

export function question(questionId: string): Position {
  return { kind: "question", questionId };
}

export function createLocator(sourceKind: SourceKind, sourceId: string, position: Position): Locator {
  if (!isSourceKind(sourceKind)) {
    throw new LocatorError(`Unknown source kind: ${String(sourceKind)}`);
  }
  const id = sourceId.trim();
  if (id.length === 0) {
    throw new LocatorError("Locator sourceId must be non-empty");
  }

  return Object.freeze({
    sourceKind,
    sourceId: id,
    position: Object.freeze(validatePosition(position)),
  });
}

function validatePosition(position: Position): Position {
  switch (position.kind) {
    case "time_range": {
      const { startSeconds, endSeconds } = position;
      if (!Number.isFinite(startSeconds) || !Number.isFinite(endSeconds) || startSeconds < 0) {
        throw new LocatorError(`Invalid time range: ${startSeconds}-${endSeconds}`);
      }
      if (endSeconds < startSeconds) {
        throw new LocatorError(`Time range ends before it starts: ${startSeconds}-${endSeconds}`);
      }
      return { kind: "time_range", startSeconds, endSeconds };
    }
    case "slide":
      if (!Number.isInteger(position.slideNumber) || position.slideNumber < 1) {
        throw new LocatorError(`Slide number must be a positive integer, got: ${position.slideNumber}`);
      }
      return { kind: "slide", slideNumber: position.slideNumber };
    case "question": {
      const questionId = position.questionId.trim();
      if (questionId.length === 0) {
        throw new LocatorError("Question id must be non-empty");
      }
      return { kind: "question", questionId };
    }
  }
}

export function positionKey(position: Position): string {
  switch (position.kind) {
    case "time_range":
      return `t:${position.startSeconds}-${position.endSeconds}`;
    case "slide":
      return `s:${position.slideNumber}`;
    case "question":
      return `q:${position.questionId}`;
  }
}

/** Canonical join key between chunks and citations. */
export function locatorKey(locator: Locator): string {
  return `${locator.sourceKind}|${locator.sourceId}|${positionKey(locator.position)}`;
}

export function locatorsEqual(a: Locator, b: Locator): boolean {
  return locatorKey(a) === locatorKey(b);
}

export function formatLocator(locator: Locator): string {
  const { position } = locator;
  switch (position.kind) {
    case "time_range":
      return `${locator.sourceId}, ${secondsToTimecode(position.startSeconds)}-${secondsToTimecode(position.endSeconds)}`;
    case "slide":
      return `${locator.sourceId}, slide ${position.slideNumber}`;
    case "question":
      return `${locator.sourceId}, question ${position.questionId}`;
  }
}

/** Short inline label: [vid HH:MM:SS], [slide n] or [exam id]. */
export function locatorMarker(locator: Locator): string {
  const { position } = locator;
  switch (position.kind) {
    case "time_range":
      return `[vid ${secondsToTimecode(position.startSeconds)}]`;
    case "slide":
      return `[slide ${position.slideNumber}]`;
    case "question":
      return `[exam ${position.questionId}]`;
  }
}

/** Type guard for locators read back from persisted JSON. */
export function isLocator(value: unknown): value is Locator {
  if (!value || typeof value !== "object") return false;
  const row = value as Record<string, unknown>;
  if (!isSourceKind(row["sourceKind"]) || typeof row["sourceId"] !== "string") return false;

  const position = row["position"];
  if (!position || typeof position !== "object") return false;
  const pos = position as Record<string, unknown>;
  switch (pos["kind"]) {
    case "time_range":
      return typeof pos["startSeconds"] === "number" && typeof pos["endSeconds"] === "number";
    case "slide":
      return typeof pos["slideNumber"] === "number";
    case "question":
      return typeof pos["questionId"] === "string";
    default:
      return false;
  }
}
