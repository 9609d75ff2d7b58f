/**
 * Shared types for byte-string operations
 */

import type { ByteString } from "./core/byte-string";

/**
 * Any value accepted where a byte sequence is expected.
 *
 * Strings are UTF-8 encoded before use, so `"é"` is two bytes.
 */
export type ByteLike = ByteString | Uint8Array | string;

/**
 * One entry of a successful `match`: the captured bytes, or the 1-based
 * offset recorded by a position capture `()`.
 */
export type MatchCapture = ByteString | number;

/**
 * Options for operations that scan from an offset
 */
export interface SearchOptions {
  /**
   * 0-based offset where scanning begins. Bytes before it are never part
   * of a match but are kept in replace results.
   * @default 0
   * @minimum 0
   */
  start?: number;
}

/**
 * Options for `split`
 */
export interface SplitOptions extends SearchOptions {
  /**
   * Maximum number of cuts; any negative value means no limit.
   * The remainder is always returned as the last piece.
   * @default -1
   */
  limit?: number;
}

/**
 * Options for `checkSet`
 */
export interface CheckSetOptions {
  /**
   * Test membership in the complement of the set instead.
   * @default false
   */
  complement?: boolean;
}

/**
 * Options for `match`
 */
export interface MatchOptions {
  /**
   * 1-based offset where matching begins. Zero is treated as 1; negative
   * values count back from the end, `-1` being the last byte.
   * @default 1
   */
  start?: number;
}
