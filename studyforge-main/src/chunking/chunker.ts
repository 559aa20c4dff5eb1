import { logChunked } from "../shared/engine-logger.js";
import { contentHash } from "../shared/hash.js";
import { locatorKey } from "../sources/locator.js";
import type { Locator, SourceRecord } from "../sources/types.js";
import type { Chunk } from "./types.js";

export const DEFAULT_MAX_CHUNK_CHARS = 500;
const MIN_CHUNK_CHARS = 20;

const PARAGRAPH_BREAK = /\n\s*\n/;
const SENTENCE_BREAK = /(?<=[.!?])\s+(?=\S)/;
const PARAGRAPH_SEPARATOR = "\n\n";
const SENTENCE_SEPARATOR = " ";

export interface ChunkerOptions {
  maxChunkChars?: number;
}

interface Unit {
  text: string;
  /** Separator placed before this unit when it joins the previous one. */
  separator: string;
}

export function chunkId(locator: Locator, text: string): string {
  return `chk_${contentHash(locatorKey(locator), text)}`;
}

export function chunkRecords(records: readonly SourceRecord[], options?: ChunkerOptions): Chunk[] {
  const maxChars = Math.max(MIN_CHUNK_CHARS, Math.floor(options?.maxChunkChars ?? DEFAULT_MAX_CHUNK_CHARS));
  const chunks: Chunk[] = [];
  const seen = new Set<string>();

  for (const record of records) {
    const sessionId = record.sessionId?.trim() || record.locator.sourceId;

    for (const text of splitRecordText(record.text, maxChars)) {
      const id = chunkId(record.locator, text);
      if (seen.has(id)) continue;
      seen.add(id);
      chunks.push(Object.freeze({ id, text, locator: record.locator, sessionId }));
    }
  }

  logChunked(records.length, chunks.length, maxChars);
  return chunks;
}

/** Splits one record's text into pieces of at most `maxChars`, on paragraph then sentence boundaries. */
export function splitRecordText(raw: string, maxChars: number): string[] {
  const paragraphs = raw
    .split(PARAGRAPH_BREAK)
    .map((entry) => entry.replace(/\s+/g, " ").trim())
    .filter((entry) => entry.length > 0);

  if (paragraphs.length === 0) {
    return [];
  }

  const whole = paragraphs.join(PARAGRAPH_SEPARATOR);
  if (whole.length <= maxChars) {
    return [whole];
  }

  const units: Unit[] = [];
  paragraphs.forEach((paragraph, paragraphIndex) => {
    const sentences = paragraph.split(SENTENCE_BREAK).filter((entry) => entry.length > 0);
    sentences.forEach((sentence, sentenceIndex) => {
      const separator = sentenceIndex > 0
        ? SENTENCE_SEPARATOR
        : (paragraphIndex > 0 ? PARAGRAPH_SEPARATOR : "");
      const pieces = sentence.length > maxChars ? splitLongSentence(sentence, maxChars) : [sentence];
      pieces.forEach((piece, pieceIndex) => {
        units.push({ text: piece, separator: pieceIndex === 0 ? separator : SENTENCE_SEPARATOR });
      });
    });
  });

  const pieces: string[] = [];
  let current = "";

  for (const unit of units) {
    if (current.length === 0) {
      current = unit.text;
      continue;
    }

    const candidate = `${current}${unit.separator}${unit.text}`;
    if (candidate.length > maxChars) {
      pieces.push(current);
      current = unit.text;
      continue;
    }
    current = candidate;
  }

  if (current.length > 0) {
    pieces.push(current);
  }

  return pieces;
}

function splitLongSentence(text: string, maxChars: number): string[] {
  const words = text.split(" ").filter((entry) => entry.length > 0);
  const slices: string[] = [];
  let current = "";

  for (const word of words) {
    if (word.length > maxChars) {
      if (current.length > 0) {
        slices.push(current);
        current = "";
      }
      // A single word longer than the limit is the only place a cut is unavoidable.
      for (let offset = 0; offset < word.length; offset += maxChars) {
        slices.push(word.slice(offset, offset + maxChars));
      }
      continue;
    }

    if (current.length === 0) {
      current = word;
    } else if (current.length + 1 + word.length > maxChars) {
      slices.push(current);
      current = word;
    } else {
      current = `${current} ${word}`;
    }
  }

  if (current.length > 0) {
    slices.push(current);
  }

  return slices;
}
