/**
 * Substring extraction
 */

import { toBytes, toInteger } from "../core/arguments";
import { ByteString } from "../core/byte-string";
import type { ByteLike } from "../types";

function clampIndex(index: number, length: number): number {
  if (index < 0) return Math.max(0, length + index);
  return Math.min(index, length);
}

/**
 * Bytes in the half-open range `[start, end)`
 *
 * Negative indices count from the end, `-1` being the last byte. Indices
 * outside the string are clamped, and `end` before `start` gives an empty
 * string.
 *
 * @example
 * ```typescript
 * slice("hello", 1, 3).toString(); // "el"
 * slice("hello", -3).toString(); // "llo"
 * slice("hello", 0, -1).toString(); // "hell"
 * slice("hello", 4, 2).length; // 0
 * ```
 */
export function slice(bytes: ByteLike, start = 0, end?: number): ByteString {
  const source = toBytes(bytes, "bytes");
  const from = clampIndex(toInteger(start, "start"), source.length);
  const to = end === undefined ? source.length : clampIndex(toInteger(end, "end"), source.length);
  return to <= from ? ByteString.empty() : ByteString.from(source, from, to);
}
