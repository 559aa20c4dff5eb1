import { tokenizeWords } from "../shared/text-length.js";
import type { EmbeddingProvider } from "./types.js";

export interface LocalTextEmbedderOptions {
  dimensions?: number;
}

const DEFAULT_DIMENSIONS = 384;
const MIN_DIMENSIONS = 32;
const NGRAM_SIZE = 2;

/**
 * Deterministic hashed embedder over words and their character bigrams.
 * Runs offline and gives the same vector for the same text on every machine.
 * Bigrams let "Big-O" and "O(log n)" share features through the word "o".
 */
export class LocalTextEmbedder implements EmbeddingProvider {
  readonly model: string;
  readonly dimensions: number;

  constructor(options?: LocalTextEmbedderOptions) {
    this.dimensions = Math.max(MIN_DIMENSIONS, Math.floor(options?.dimensions ?? DEFAULT_DIMENSIONS));
    this.model = `local-hash-${this.dimensions}`;
  }

  async embedBatch(texts: readonly string[]): Promise<number[][]> {
    return texts.map((text) => this.embedHashedText(text));
  }

  private embedHashedText(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    const tokens = tokenizeWords(text);

    if (tokens.length === 0) {
      return vector;
    }

    for (const feature of textFeatures(tokens)) {
      const idx = stableHash(feature) % this.dimensions;
      vector[idx] = (vector[idx] ?? 0) + 1;
    }

    const norm = Math.hypot(...vector);
    if (norm === 0) {
      return vector;
    }

    return vector.map((value) => value / norm);
  }
}

/** Each word, then the bigrams of the word padded with `<` and `>`, prefixed `#`. */
export function textFeatures(tokens: readonly string[]): string[] {
  const features: string[] = [];
  for (const token of tokens) {
    features.push(token);
    const padded = `<${token}>`;
    for (let i = 0; i + NGRAM_SIZE <= padded.length; i++) {
      features.push(`#${padded.slice(i, i + NGRAM_SIZE)}`);
    }
  }
  return features;
}

export function stableHash(value: string): number {
  let hash = 2166136261;
  for (let i = 0; i < value.length; i++) {
    hash ^= value.charCodeAt(i);
    hash = Math.imul(hash, 16777619);
  }
  return hash >>> 0;
}
