/**
 * Knuth-Morris-Pratt exact search over bytes
 *
 * A `KmpSearcher` walks a text once, left to right, and reports the start
 * offset of each occurrence of a fixed pattern. Occurrences never overlap:
 * once a match is reported the pattern cursor restarts at zero, so a byte
 * that ended one match cannot begin the next. `"aa"` in `"aaaa"` is found
 * at 0 and 2, not at 1.
 *
 * @module kmp
 */

import { ValidationError } from "../errors";

/**
 * Build the prefix-function table for `pattern`
 *
 * `table[k]` is the length of the longest proper prefix of
 * `pattern[0..k]` that is also a suffix of it.
 *
 * @example
 * ```typescript
 * buildFailureTable(new TextEncoder().encode("abab")); // Int32Array [0, 0, 1, 2]
 * ```
 */
export function buildFailureTable(pattern: Uint8Array): Int32Array {
  const table = new Int32Array(pattern.length);
  let j = 0;

  for (let i = 1; i < pattern.length; i++) {
    while (j > 0 && pattern[j] !== pattern[i]) {
      j = table[j - 1] ?? 0;
    }
    if (pattern[j] === pattern[i]) {
      j++;
    }
    table[i] = j;
  }

  return table;
}

/**
 * Restartable cursor yielding successive non-overlapping match offsets
 *
 * @example
 * ```typescript
 * const searcher = new KmpSearcher(encode("ababab"), encode("ab"));
 * [...searcher]; // [0, 2, 4]
 * ```
 */
export class KmpSearcher implements Iterable<number> {
  private readonly failure: Int32Array;
  private i = 0;
  private j = 0;

  constructor(
    readonly text: Uint8Array,
    readonly pattern: Uint8Array,
    start = 0
  ) {
    if (pattern.length === 0) {
      throw new ValidationError("expected non-empty pattern");
    }
    this.failure = buildFailureTable(pattern);
    this.seek(start);
  }

  /**
   * Rewind the text cursor to `index` and the pattern cursor to 0
   */
  seek(index: number): void {
    this.i = index;
    this.j = 0;
  }

  /**
   * Offset of the next occurrence, or `null` once the text is exhausted
   */
  next(): number | null {
    const { text, pattern, failure } = this;
    const last = pattern.length - 1;
    let i = this.i;
    let j = this.j;

    while (i < text.length) {
      if (text[i] === pattern[j]) {
        if (j === last) {
          this.i = i + 1;
          this.j = 0;
          return i - j;
        }
        i++;
        j++;
      } else if (j > 0) {
        j = failure[j - 1] ?? 0;
      } else {
        i++;
      }
    }

    this.i = i;
    this.j = j;
    return null;
  }

  *[Symbol.iterator](): Iterator<number> {
    let offset = this.next();
    while (offset !== null) {
      yield offset;
      offset = this.next();
    }
  }
}
