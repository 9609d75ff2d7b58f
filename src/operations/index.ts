/**
 * Byte-string operations
 *
 * Exact search (`find`, `findAll`, `replace`, `replaceAll`, `split`) runs on
 * Knuth-Morris-Pratt; `match` runs the backtracking pattern matcher; the
 * rest are plain byte transformations.
 */

export { checkSet } from "./check-set";
export { compare, equal } from "./compare";
export { find, findAll } from "./find";
export { join } from "./join";
export { match } from "./match";
export { replace, replaceAll } from "./replace";
export { slice } from "./slice";
export { split } from "./split";
export {
  asciiLower,
  asciiUpper,
  bytesToInts,
  intsToBytes,
  repeat,
  reverse,
} from "./transform";
