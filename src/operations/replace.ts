/**
 * Exact substring substitution
 */

import { resolveSearchOptions, toByteString, toBytes } from "../core/arguments";
import { ByteString } from "../core/byte-string";
import { GrowableBuffer } from "../core/growable-buffer";
import { KmpSearcher } from "../core/kmp";
import type { ByteLike, SearchOptions } from "../types";

/**
 * Replace the first occurrence of `pattern` in `text` with `subst`
 *
 * Only occurrences at or after `options.start` are considered; bytes
 * before it are copied unchanged.
 *
 * @returns The new string, or `text` itself (as a `ByteString`) when
 *   `pattern` does not occur
 *
 * @example
 * ```typescript
 * replace("a", "o", "banana").toString(); // "bonana"
 * ```
 */
export function replace(
  pattern: ByteLike,
  subst: ByteLike,
  text: ByteLike,
  options?: SearchOptions
): ByteString {
  const { start } = resolveSearchOptions(options);
  const source = toBytes(text, "text");
  const needle = toBytes(pattern, "pattern");
  const replacement = toBytes(subst, "subst");
  const searcher = new KmpSearcher(source, needle, start);

  const offset = searcher.next();
  if (offset === null) {
    return toByteString(text, "text");
  }

  const tail = offset + needle.length;
  return ByteString.begin(source.length - needle.length + replacement.length)
    .write(0, source.subarray(0, offset))
    .write(offset, replacement)
    .write(offset + replacement.length, source.subarray(tail))
    .end();
}

/**
 * Replace every non-overlapping occurrence of `pattern` in `text` with `subst`
 *
 * @example
 * ```typescript
 * replaceAll("a", "o", "banana").toString(); // "bonono"
 * replaceAll("aa", "b", "aaaaa").toString(); // "bba"
 * ```
 */
export function replaceAll(
  pattern: ByteLike,
  subst: ByteLike,
  text: ByteLike,
  options?: SearchOptions
): ByteString {
  const { start } = resolveSearchOptions(options);
  const source = toBytes(text, "text");
  const needle = toBytes(pattern, "pattern");
  const replacement = toBytes(subst, "subst");
  const searcher = new KmpSearcher(source, needle, start);
  const out = new GrowableBuffer(source.length);

  let lastIndex = 0;
  let offset = searcher.next();
  while (offset !== null) {
    out.append(source, lastIndex, offset).append(replacement);
    lastIndex = offset + needle.length;
    searcher.seek(lastIndex);
    offset = searcher.next();
  }
  out.append(source, lastIndex);

  return out.toByteString();
}
