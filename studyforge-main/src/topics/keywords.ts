import type { Topic } from "./types.js";

/** Case-insensitive substring match of each keyword against `text`. */
export function matchKeywords(text: string, keywords: readonly string[]): string[] {
  const haystack = text.toLowerCase();
  return keywords.filter((keyword) => haystack.includes(keyword.toLowerCase()));
}

export function keywordFraction(text: string, topic: Topic): number {
  if (topic.keywords.length === 0) return 0;
  return matchKeywords(text, topic.keywords).length / topic.keywords.length;
}
