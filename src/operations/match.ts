/**
 * Pattern matching entry point
 */

import { PatternMatcher } from "../core/pattern-matcher";
import type { ByteLike, MatchCapture, MatchOptions } from "../types";

/**
 * Match `pattern` against `text`, starting at the 1-based `options.start`
 *
 * See `PatternMatcher` for the pattern language.
 *
 * @returns One entry per capture (a `ByteString`, or a 1-based offset for
 *   `()`), the whole match when the pattern has no captures, or `null`
 * @throws {PatternError} Malformed pattern or invalid capture reference
 * @throws {ResourceLimitError} More than 256 captures, or nesting past the
 *   depth budget
 *
 * @example
 * ```typescript
 * match("hello world", "(%a+) (%a+)")?.map(String); // ["hello", "world"]
 * match("key = value", "^(%w+)%s*=%s*(%w+)$")?.map(String); // ["key", "value"]
 * match("hello", "%d"); // null
 * ```
 */
export function match(
  text: ByteLike,
  pattern: ByteLike,
  options?: MatchOptions
): MatchCapture[] | null {
  return new PatternMatcher(pattern).match(text, options);
}
