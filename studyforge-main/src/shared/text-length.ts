const BYTES_PER_TOKEN = 4;
const WORD_PATTERN = /[\p{L}\p{N}]+/gu;

export type BudgetUnit = "chars" | "tokens";

export function estimateTextTokens(text: string): number {
  if (!text || text.trim().length === 0) return 0;
  return Math.max(1, Math.ceil(Buffer.byteLength(text, "utf8") / BYTES_PER_TOKEN));
}

/** Length of `text` in the unit a retrieval budget is expressed in. */
export function measureText(text: string, unit: BudgetUnit): number {
  return unit === "tokens" ? estimateTextTokens(text) : text.length;
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/** Lower-cased word tokens. Punctuation and symbols are dropped. */
export function tokenizeWords(text: string): string[] {
  return text.toLowerCase().match(WORD_PATTERN) ?? [];
}
