export type SourceKind = "video" | "transcript" | "slide" | "exam";

export type Position =
  | { kind: "time_range"; startSeconds: number; endSeconds: number }
  | { kind: "slide"; slideNumber: number }
  | { kind: "question"; questionId: string };

export interface Locator {
  readonly sourceKind: SourceKind;
  readonly sourceId: string;
  readonly position: Readonly<Position>;
}

/** A normalized record as handed over by the transcript, slide and exam parsers. */
export interface SourceRecord {
  locator: Locator;
  text: string;
  /** Lecture session the record belongs to. Defaults to the locator's sourceId. */
  sessionId?: string;
}
