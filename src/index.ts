/**
 * bytepat - byte strings, exact search and Lua-style pattern matching
 *
 * Immutable byte strings with cached hashes, Knuth-Morris-Pratt substring
 * search, and a backtracking matcher for a compact pattern language, plus
 * the everyday operations built on them.
 */

// Byte strings
export { ByteString, ByteStringBuilder, MAX_BYTE_STRING_LENGTH } from "./core/byte-string";
export { hashBytes } from "./core/hashing";
export { isByteLike } from "./core/arguments";
// Exact search engine
export { buildFailureTable, KmpSearcher } from "./core/kmp";
// Pattern engine
export { MAX_CAPTURES, MAX_MATCH_DEPTH, PatternMatcher } from "./core/pattern-matcher";
// Error types
export {
  BytepatError,
  ERROR_SUGGESTIONS,
  getErrorSuggestion,
  PatternError,
  ResourceLimitError,
  ValidationError,
} from "./errors";
// Operations
export {
  asciiLower,
  asciiUpper,
  bytesToInts,
  checkSet,
  compare,
  equal,
  find,
  findAll,
  intsToBytes,
  join,
  match,
  repeat,
  replace,
  replaceAll,
  reverse,
  slice,
  split,
} from "./operations";
// Effect service
export {
  type ByteStringFailure,
  ByteStringService,
  type ByteStringServiceShape,
} from "./service";
// Types
export type {
  ByteLike,
  CheckSetOptions,
  MatchCapture,
  MatchOptions,
  SearchOptions,
  SplitOptions,
} from "./types";
