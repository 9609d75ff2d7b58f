/**
 * Byte-set membership
 */

import { resolveCheckSetOptions, toBytes } from "../core/arguments";
import type { ByteLike, CheckSetOptions } from "../types";

/**
 * True when every byte of `text` is a member of `set`
 *
 * The set is a 256-bit table built from the bytes of `set`; with
 * `complement` it holds every byte *not* in `set`. An empty `text` is
 * always accepted.
 *
 * @example
 * ```typescript
 * checkSet("abc", "cab"); // true
 * checkSet("abc", "xyz"); // false
 * checkSet("abc", "xyz", { complement: true }); // true
 * ```
 */
export function checkSet(set: ByteLike, text: ByteLike, options?: CheckSetOptions): boolean {
  const { complement } = resolveCheckSetOptions(options);
  const members = toBytes(set, "set");
  const source = toBytes(text, "text");

  const bitset = new Uint32Array(8);
  for (const b of members) {
    bitset[b >> 5] = (bitset[b >> 5] ?? 0) | (1 << (b & 31));
  }
  if (complement) {
    for (let i = 0; i < bitset.length; i++) {
      bitset[i] = ~(bitset[i] ?? 0);
    }
  }

  for (const b of source) {
    if (((bitset[b >> 5] ?? 0) & (1 << (b & 31))) === 0) {
      return false;
    }
  }
  return true;
}
