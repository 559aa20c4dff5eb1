import { logCitationCreated, logUncitedContent } from "../shared/engine-logger.js";
import { CitationError } from "../shared/errors.js";
import { contentHash } from "../shared/hash.js";
import { formatLocator, locatorKey, locatorMarker } from "../sources/locator.js";
import type { Locator, SourceKind } from "../sources/types.js";
import type { Citation, CitationExportRecord, UncitedContentViolation } from "./types.js";

export type CitationRef = Citation | string;

export function citationId(locator: Locator): string {
  return `cite_${contentHash(locatorKey(locator))}`;
}

/**
 * Citations for one synthesis run. Keyed by locator, so every chunk cut
 * from the same slide, time range or question resolves to one citation.
 * Everything here is append-only for the life of the run.
 *
 * `cite` is synchronous: concurrent topic tasks interleave only at awaits,
 * so the check-or-create never races.
 */
export class CitationRegistry {
  private readonly byKey = new Map<string, Citation>();
  private readonly byId = new Map<string, Citation>();
  private readonly ordered: Citation[] = [];
  private readonly units = new Map<string, string[]>();

  get size(): number {
    return this.ordered.length;
  }

  cite(source: { readonly locator: Locator }): Citation {
    const key = locatorKey(source.locator);
    const existing = this.byKey.get(key);
    if (existing) {
      return existing;
    }

    const citation: Citation = Object.freeze({
      id: citationId(source.locator),
      ordinal: this.ordered.length + 1,
      displayText: formatLocator(source.locator),
      marker: locatorMarker(source.locator),
      locator: source.locator,
    });
    this.byKey.set(key, citation);
    this.byId.set(citation.id, citation);
    this.ordered.push(citation);
    logCitationCreated(citation.id, citation.ordinal, citation.displayText);
    return citation;
  }

  /** Unique citations for `sources`, in first-use order. */
  citeAll(sources: readonly { readonly locator: Locator }[]): Citation[] {
    const out: Citation[] = [];
    const seen = new Set<string>();
    for (const source of sources) {
      const citation = this.cite(source);
      if (seen.has(citation.id)) continue;
      seen.add(citation.id);
      out.push(citation);
    }
    return out;
  }

  /**
   * Records that content unit `unitId` used `refs`. Repeated calls for the
   * same unit append. Every ref must already be registered in this run.
   * A unit left with no citations is reported by `violations()`.
   */
  attach(unitId: string, refs: readonly CitationRef[]): void {
    const id = unitId.trim();
    if (id.length === 0) {
      throw new CitationError("Content unit id must be non-empty");
    }

    const resolved = refs.map((ref) => this.resolve(ref));
    const attached = this.units.get(id) ?? [];
    for (const citation of resolved) {
      if (!attached.includes(citation.id)) {
        attached.push(citation.id);
      }
    }
    this.units.set(id, attached);

    if (attached.length === 0) {
      logUncitedContent(id);
    }
  }

  violations(): UncitedContentViolation[] {
    const out: UncitedContentViolation[] = [];
    for (const [unitId, citationIds] of this.units) {
      if (citationIds.length === 0) {
        out.push({ kind: "uncited_content", unitId });
      }
    }
    return out;
  }

  citations(): readonly Citation[] {
    return [...this.ordered];
  }

  get(id: string): Citation | undefined {
    return this.byId.get(id);
  }

  byKind(kind: SourceKind): Citation[] {
    return this.ordered.filter((citation) => citation.locator.sourceKind === kind);
  }

  unitIds(): string[] {
    return [...this.units.keys()];
  }

  unitCitations(unitId: string): Citation[] {
    return (this.units.get(unitId) ?? []).flatMap((id) => {
      const citation = this.byId.get(id);
      return citation ? [citation] : [];
    });
  }

  /** Numbered markers such as `[1] [3]`, one per distinct citation, in the given order. */
  formatMarkers(refs: readonly CitationRef[]): string {
    return uniqueInOrder(refs.map((ref) => `[${this.resolve(ref).ordinal}]`)).join(" ");
  }

  /** Inline source labels such as `[slide 4] [vid 00:01:05]`, duplicates removed. */
  formatInline(refs: readonly CitationRef[]): string {
    return uniqueInOrder(refs.map((ref) => this.resolve(ref).marker)).join(" ");
  }

  exportRecords(): CitationExportRecord[] {
    const usedBy = new Map<string, string[]>();
    for (const [unitId, citationIds] of this.units) {
      for (const id of citationIds) {
        const bucket = usedBy.get(id) ?? [];
        bucket.push(unitId);
        usedBy.set(id, bucket);
      }
    }

    return this.ordered.map((citation) => ({
      id: citation.id,
      ordinal: citation.ordinal,
      sourceKind: citation.locator.sourceKind,
      sourceId: citation.locator.sourceId,
      locatorKey: locatorKey(citation.locator),
      displayText: citation.displayText,
      marker: citation.marker,
      units: usedBy.get(citation.id) ?? [],
    }));
  }

  private resolve(ref: CitationRef): Citation {
    const id = typeof ref === "string" ? ref : ref.id;
    const citation = this.byId.get(id);
    if (!citation) {
      throw new CitationError(`Unknown citation id: ${id}`);
    }
    return citation;
  }
}

function uniqueInOrder(values: readonly string[]): string[] {
  return [...new Set(values)];
}
