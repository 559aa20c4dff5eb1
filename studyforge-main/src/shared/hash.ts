import { createHash } from "node:crypto";

const ID_HEX_LENGTH = 16;

/** Content address over the given parts. Parts are length-prefixed so ("ab","c") and ("a","bc") differ. */
export function contentHash(...parts: string[]): string {
  const hash = createHash("sha256");
  for (const part of parts) {
    hash.update(`${part.length}:`);
    hash.update(part);
  }
  return hash.digest("hex").slice(0, ID_HEX_LENGTH);
}
