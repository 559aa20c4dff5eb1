import { describe, expect, it } from "vitest";
import { collapseWhitespace, estimateTextTokens, measureText, tokenizeWords } from "../../src/shared/text-length.js";
import { contentHash } from "../../src/shared/hash.js";

describe("text-length", () => {
  it("estimates tokens from utf-8 bytes", () => {
    expect(estimateTextTokens("")).toBe(0);
    expect(estimateTextTokens("abcd")).toBe(1);
    expect(estimateTextTokens("abcde")).toBe(2);
  });

  it("measures in the requested unit", () => {
    const text = "merge sort splits the array in halves";
    expect(measureText(text, "chars")).toBe(37);
    expect(measureText(text, "tokens")).toBe(10);
  });

  it("tokenizes lower-cased words and drops punctuation", () => {
    expect(tokenizeWords("Big-O, O(n log n)!")).toEqual(["big", "o", "o", "n", "log", "n"]);
  });

  it("collapses whitespace", () => {
    expect(collapseWhitespace("  a \n\t b  ")).toBe("a b");
  });
});

describe("contentHash", () => {
  it("is stable and separates part boundaries", () => {
    expect(contentHash("ab", "c")).toBe(contentHash("ab", "c"));
    expect(contentHash("ab", "c")).not.toBe(contentHash("a", "bc"));
    expect(contentHash("x")).toMatch(/^[0-9a-f]{16}$/);
  });
});
