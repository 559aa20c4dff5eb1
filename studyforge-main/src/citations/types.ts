import type { Locator, SourceKind } from "../sources/types.js";

export interface Citation {
  /** Stable hash of the locator key. */
  readonly id: string;
  /** Run-stable "[n]" number, in creation order starting at 1. */
  readonly ordinal: number;
  readonly displayText: string;
  /** Short inline label such as `[slide 4]`. */
  readonly marker: string;
  readonly locator: Locator;
}

/** QA-level record for a content unit attached with no citations. */
export interface UncitedContentViolation {
  readonly kind: "uncited_content";
  readonly unitId: string;
}

export interface CitationExportRecord {
  id: string;
  ordinal: number;
  sourceKind: SourceKind;
  sourceId: string;
  locatorKey: string;
  displayText: string;
  marker: string;
  /** Content units that used this citation, in attach order. */
  units: string[];
}
