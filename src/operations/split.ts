/**
 * Split on an exact delimiter
 */

import { resolveSplitOptions, toBytes } from "../core/arguments";
import { ByteString } from "../core/byte-string";
import { KmpSearcher } from "../core/kmp";
import type { ByteLike, SplitOptions } from "../types";

/**
 * Cut `text` at each non-overlapping occurrence of `delim`
 *
 * Delimiters are searched from `options.start`, but the first piece always
 * begins at offset 0. At most `options.limit` cuts are made when the limit
 * is non-negative. Whatever follows the last cut (the whole text when there
 * is none) is always the final piece, so the result is never empty and
 * joining it with `delim` gives back `text`.
 *
 * @example
 * ```typescript
 * split(",", "a,b,,c").map(String); // ["a", "b", "", "c"]
 * split(",", "a,b,c", { limit: 1 }).map(String); // ["a", "b,c"]
 * split(",", "abc").map(String); // ["abc"]
 * ```
 */
export function split(delim: ByteLike, text: ByteLike, options?: SplitOptions): ByteString[] {
  const { start, limit } = resolveSplitOptions(options);
  const source = toBytes(text, "text");
  const needle = toBytes(delim, "delim");
  const searcher = new KmpSearcher(source, needle, start);
  const pieces: ByteString[] = [];

  let lastIndex = 0;
  let remaining = limit;
  let offset = searcher.next();
  while (offset !== null && remaining !== 0) {
    pieces.push(ByteString.from(source, lastIndex, offset));
    lastIndex = offset + needle.length;
    remaining--;
    offset = searcher.next();
  }
  pieces.push(ByteString.from(source, lastIndex));

  return pieces;
}
