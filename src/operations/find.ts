/**
 * Exact substring search
 *
 * Both operations scan with Knuth-Morris-Pratt and report non-overlapping
 * occurrences: a byte that belongs to one occurrence never starts another.
 */

import { resolveSearchOptions, toBytes } from "../core/arguments";
import { KmpSearcher } from "../core/kmp";
import type { ByteLike, SearchOptions } from "../types";

/**
 * Offset of the first occurrence of `pattern` in `text`
 *
 * @param pattern - Non-empty needle
 * @param text - Haystack
 * @param options - `start`: first offset considered (default 0)
 * @returns 0-based offset, or `null` when `pattern` does not occur
 * @throws {ValidationError} Empty pattern, non-byte argument or bad options
 *
 * @example
 * ```typescript
 * find("ab", "ababab"); // 0
 * find("ab", "ababab", { start: 1 }); // 2
 * find("zz", "ababab"); // null
 * ```
 */
export function find(pattern: ByteLike, text: ByteLike, options?: SearchOptions): number | null {
  const { start } = resolveSearchOptions(options);
  const searcher = new KmpSearcher(toBytes(text, "text"), toBytes(pattern, "pattern"), start);
  return searcher.next();
}

/**
 * Offsets of every non-overlapping occurrence of `pattern` in `text`
 *
 * @example
 * ```typescript
 * findAll("ab", "ababab"); // [0, 2, 4]
 * findAll("aa", "aaaa"); // [0, 2]
 * ```
 */
export function findAll(pattern: ByteLike, text: ByteLike, options?: SearchOptions): number[] {
  const { start } = resolveSearchOptions(options);
  const searcher = new KmpSearcher(toBytes(text, "text"), toBytes(pattern, "pattern"), start);
  return [...searcher];
}
