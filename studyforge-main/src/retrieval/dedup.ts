import { tokenizeWords } from "../shared/text-length.js";

export function tokenSet(text: string): Set<string> {
  return new Set(tokenizeWords(text));
}

/** Token Jaccard similarity. Two empty sets count as identical. */
export function jaccard(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  if (a.size === 0 && b.size === 0) return 1;

  let shared = 0;
  const [small, large] = a.size <= b.size ? [a, b] : [b, a];
  for (const token of small) {
    if (large.has(token)) shared++;
  }
  return shared / (a.size + b.size - shared);
}

export function textOverlap(a: string, b: string): number {
  return jaccard(tokenSet(a), tokenSet(b));
}

/**
 * Walks `ranked` in order and drops every entry whose overlap with an
 * already kept entry reaches `threshold`. The higher ranked one survives.
 */
export function dedupeRanked<T>(
  ranked: readonly T[],
  textOf: (entry: T) => string,
  threshold: number,
): { kept: T[]; dropped: number } {
  const kept: T[] = [];
  const keptTokens: Set<string>[] = [];
  let dropped = 0;

  for (const entry of ranked) {
    const tokens = tokenSet(textOf(entry));
    if (keptTokens.some((other) => jaccard(tokens, other) >= threshold)) {
      dropped++;
      continue;
    }
    kept.push(entry);
    keptTokens.push(tokens);
  }

  return { kept, dropped };
}
