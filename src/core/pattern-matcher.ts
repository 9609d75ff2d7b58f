/**
 * Backtracking matcher for Lua-style byte patterns.
 *
 * The pattern text is interpreted directly, one item at a time, by a
 * single step function. Items that cannot branch (literals, classes
 * without a suffix, escapes, `$`, `%b`, `%f`, backreferences, captures)
 * advance the source and pattern cursors inside a loop; only the
 * quantifiers `?`, `*`, `+` and `-` recurse, each recursion consuming one
 * unit of a fixed depth budget.
 *
 * | Item | Meaning |
 * |---|---|
 * | `.` | any byte |
 * | `%a %c %d %g %l %p %s %u %w %x %z` | class, uppercase for the complement |
 * | `%` + other byte | that byte literally |
 * | `[set]`, `[^set]` | bracket class of bytes, `%x` classes and `lo-hi` ranges |
 * | `%bxy` | balanced span from `x` to its matching `y` |
 * | `%f[set]` | frontier: previous byte not in set, current byte in set |
 * | `%1`-`%9` | repeat of a closed capture |
 * | `(...)`, `()` | substring capture, position capture |
 * | `^` first, `$` last | anchors |
 * | `* + ?` / `-` | greedy repetitions / lazy repetition |
 *
 * @module pattern-matcher
 *
 * @remarks
 * Captures are opened and closed in place. Each step keeps the capture
 * level it started with and the captures it closed, and restores both when
 * it fails, so the capture table after a failed branch is the table before
 * it. Opening captures therefore costs no depth: the capture limit and the
 * depth limit are reached independently.
 */

import { PatternError, ResourceLimitError } from "../errors";
import type { ByteLike, MatchCapture, MatchOptions } from "../types";
import { resolveMatchOptions, toBytes } from "./arguments";
import { ByteString } from "./byte-string";
import { CHAR_ESC, matchBracketClass, matchClass } from "./char-class";

/** Most captures a single pattern may open */
export const MAX_CAPTURES = 256;

/** Nesting budget of the step function for one `match` call */
export const MAX_MATCH_DEPTH = 200;

const CAP_UNFINISHED = -1;
const CAP_POSITION = -2;

const OPEN_PAREN = 0x28;
const CLOSE_PAREN = 0x29;
const DOLLAR = 0x24;
const CARET = 0x5e;
const DOT = 0x2e;
const OPEN_BRACKET = 0x5b;
const CLOSE_BRACKET = 0x5d;
const DIGIT_ZERO = 0x30;
const DIGIT_ONE = 0x31;
const DIGIT_NINE = 0x39;

type Quantifier = "?" | "*" | "+" | "-";

const QUANTIFIERS: ReadonlyMap<number, Quantifier> = new Map([
  [0x3f, "?"],
  [0x2a, "*"],
  [0x2b, "+"],
  [0x2d, "-"],
]);

/**
 * One pattern item, decoded at pattern offset `p`. `next` is the offset of
 * the item that follows it.
 */
type PatternItem =
  | { kind: "open-capture"; position: boolean; next: number }
  | { kind: "close-capture"; next: number }
  | { kind: "end-anchor" }
  | { kind: "balance"; open: number; close: number; next: number }
  | { kind: "frontier"; setStart: number; setEnd: number; next: number }
  | { kind: "backreference"; digit: number; next: number }
  | { kind: "single"; classStart: number; classEnd: number; quantifier: Quantifier | null };

interface Capture {
  start: number;
  /** Completed length, `CAP_UNFINISHED` or `CAP_POSITION` */
  length: number;
}

const decoder = new TextDecoder("utf-8");

/**
 * Per-call matching state: source, pattern, depth budget and capture table
 */
class MatchState {
  private depth = MAX_MATCH_DEPTH;
  private level = 0;
  private readonly captures: Capture[] = [];
  private readonly patternEnd: number;

  constructor(
    private readonly source: Uint8Array,
    private readonly pattern: Uint8Array,
    private readonly patternText: string
  ) {
    this.patternEnd = pattern.length;
  }

  /**
   * Prepare for an attempt at a new start offset
   */
  reset(): void {
    this.level = 0;
    if (this.depth !== MAX_MATCH_DEPTH) {
      throw new Error(`match depth not restored between attempts (${this.depth})`);
    }
  }

  /**
   * Match the pattern from offset `p` against the source from offset `s`
   *
   * @returns Source offset just past the match, or `null` for no match
   */
  step(s: number, p: number): number | null {
    if (this.depth-- === 0) {
      throw ResourceLimitError.forRecursion(MAX_MATCH_DEPTH, this.patternText);
    }
    const levelAtEntry = this.level;
    const closed: number[] = [];
    const result = this.run(s, p, closed);
    if (result === null) {
      for (const l of closed) {
        this.slot(l).length = CAP_UNFINISHED;
      }
      this.level = levelAtEntry;
    }
    this.depth++;
    return result;
  }

  /**
   * Captures of a successful attempt that started at `s` and ended at `e`
   */
  collect(s: number, e: number): MatchCapture[] {
    if (this.level === 0) {
      return [ByteString.from(this.source, s, e)];
    }
    const result: MatchCapture[] = [];
    for (let i = 0; i < this.level; i++) {
      const capture = this.slot(i);
      if (capture.length === CAP_UNFINISHED) {
        throw new PatternError("unfinished capture", this.patternText);
      }
      result.push(
        capture.length === CAP_POSITION
          ? capture.start + 1
          : ByteString.from(this.source, capture.start, capture.start + capture.length)
      );
    }
    return result;
  }

  private run(s: number, p: number, closed: number[]): number | null {
    while (p !== this.patternEnd) {
      const item = this.readItem(p);

      switch (item.kind) {
        case "open-capture": {
          if (this.level >= MAX_CAPTURES) {
            throw ResourceLimitError.forCaptures(MAX_CAPTURES, this.patternText);
          }
          this.captures[this.level] = {
            start: s,
            length: item.position ? CAP_POSITION : CAP_UNFINISHED,
          };
          this.level++;
          p = item.next;
          break;
        }

        case "close-capture": {
          const l = this.captureToClose(p);
          const capture = this.slot(l);
          capture.length = s - capture.start;
          closed.push(l);
          p = item.next;
          break;
        }

        case "end-anchor":
          return s === this.source.length ? s : null;

        case "balance": {
          const end = this.matchBalance(s, item.open, item.close);
          if (end === null) return null;
          s = end;
          p = item.next;
          break;
        }

        case "frontier": {
          const previous = s === 0 ? 0 : (this.source[s - 1] ?? 0);
          const current = this.source[s] ?? 0;
          if (
            matchBracketClass(previous, this.pattern, item.setStart, item.setEnd) ||
            !matchBracketClass(current, this.pattern, item.setStart, item.setEnd)
          ) {
            return null;
          }
          p = item.next;
          break;
        }

        case "backreference": {
          const end = this.matchCapture(s, item.digit, p);
          if (end === null) return null;
          s = end;
          p = item.next;
          break;
        }

        case "single": {
          const { classStart, classEnd, quantifier } = item;
          if (!this.singleMatch(s, classStart, classEnd)) {
            if (quantifier === "*" || quantifier === "?" || quantifier === "-") {
              p = classEnd + 1;
              break;
            }
            return null;
          }
          switch (quantifier) {
            case "?": {
              const res = this.step(s + 1, classEnd + 1);
              if (res !== null) return res;
              p = classEnd + 1;
              break;
            }
            case "+":
              return this.maxExpand(s + 1, classStart, classEnd);
            case "*":
              return this.maxExpand(s, classStart, classEnd);
            case "-":
              return this.minExpand(s, classStart, classEnd);
            case null:
              s++;
              p = classEnd;
              break;
          }
          break;
        }
      }
    }
    return s;
  }

  private readItem(p: number): PatternItem {
    const c = this.pattern[p];

    if (c === OPEN_PAREN) {
      return this.pattern[p + 1] === CLOSE_PAREN
        ? { kind: "open-capture", position: true, next: p + 2 }
        : { kind: "open-capture", position: false, next: p + 1 };
    }
    if (c === CLOSE_PAREN) {
      return { kind: "close-capture", next: p + 1 };
    }
    if (c === DOLLAR && p + 1 === this.patternEnd) {
      return { kind: "end-anchor" };
    }
    if (c === CHAR_ESC) {
      const next = this.pattern[p + 1];
      if (next === 0x62) {
        // %bxy
        if (p + 2 >= this.patternEnd - 1) {
          throw new PatternError("malformed pattern (missing arguments to '%b')", this.patternText, p);
        }
        return {
          kind: "balance",
          open: this.pattern[p + 2] ?? 0,
          close: this.pattern[p + 3] ?? 0,
          next: p + 4,
        };
      }
      if (next === 0x66) {
        // %f[set]
        if (this.pattern[p + 2] !== OPEN_BRACKET) {
          throw new PatternError("missing '[' after '%f' in pattern", this.patternText, p);
        }
        const end = this.classEnd(p + 2);
        return { kind: "frontier", setStart: p + 2, setEnd: end - 1, next: end };
      }
      if (next !== undefined && next >= DIGIT_ZERO && next <= DIGIT_NINE) {
        return { kind: "backreference", digit: next, next: p + 2 };
      }
    }

    const classEnd = this.classEnd(p);
    const suffix = this.pattern[classEnd];
    return {
      kind: "single",
      classStart: p,
      classEnd,
      quantifier: suffix === undefined ? null : (QUANTIFIERS.get(suffix) ?? null),
    };
  }

  /**
   * Offset just past the single-byte class starting at `p`
   */
  private classEnd(p: number): number {
    const c = this.pattern[p++];
    if (c === CHAR_ESC) {
      if (p === this.patternEnd) {
        throw new PatternError("malformed pattern (ends with '%')", this.patternText, p - 1);
      }
      return p + 1;
    }
    if (c === OPEN_BRACKET) {
      const open = p - 1;
      if (this.pattern[p] === CARET) p++;
      do {
        if (p >= this.patternEnd) {
          throw new PatternError("malformed pattern (missing ']')", this.patternText, open);
        }
        // the first member may be ']' itself; '%]' escapes one
        if (this.pattern[p++] === CHAR_ESC && p < this.patternEnd) p++;
      } while (this.pattern[p] !== CLOSE_BRACKET);
      return p + 1;
    }
    return p;
  }

  private singleMatch(s: number, p: number, ep: number): boolean {
    const c = this.source[s];
    if (c === undefined) return false;
    switch (this.pattern[p]) {
      case DOT:
        return true;
      case CHAR_ESC:
        return matchClass(c, this.pattern[p + 1] ?? 0);
      case OPEN_BRACKET:
        return matchBracketClass(c, this.pattern, p, ep - 1);
      default:
        return this.pattern[p] === c;
    }
  }

  private matchBalance(s: number, open: number, close: number): number | null {
    if (s >= this.source.length || this.source[s] !== open) return null;
    let depth = 1;
    while (++s < this.source.length) {
      const c = this.source[s];
      if (c === close) {
        if (--depth === 0) return s + 1;
      } else if (c === open) {
        depth++;
      }
    }
    return null;
  }

  private maxExpand(s: number, p: number, ep: number): number | null {
    let i = 0;
    while (this.singleMatch(s + i, p, ep)) i++;
    // try the continuation with the most repetitions first
    for (; i >= 0; i--) {
      const res = this.step(s + i, ep + 1);
      if (res !== null) return res;
    }
    return null;
  }

  private minExpand(s: number, p: number, ep: number): number | null {
    for (;;) {
      const res = this.step(s, ep + 1);
      if (res !== null) return res;
      if (!this.singleMatch(s, p, ep)) return null;
      s++;
    }
  }

  private matchCapture(s: number, digit: number, p: number): number | null {
    const l = digit - DIGIT_ONE;
    const capture = l >= 0 && l < this.level ? this.slot(l) : undefined;
    if (capture === undefined || capture.length === CAP_UNFINISHED) {
      throw new PatternError(`invalid capture index %${l + 1}`, this.patternText, p);
    }
    // a position capture has no text to repeat
    if (capture.length === CAP_POSITION || this.source.length - s < capture.length) {
      return null;
    }
    for (let i = 0; i < capture.length; i++) {
      if (this.source[capture.start + i] !== this.source[s + i]) return null;
    }
    return s + capture.length;
  }

  private captureToClose(p: number): number {
    for (let level = this.level - 1; level >= 0; level--) {
      if (this.slot(level).length === CAP_UNFINISHED) return level;
    }
    throw new PatternError("invalid pattern capture", this.patternText, p);
  }

  private slot(l: number): Capture {
    const capture = this.captures[l];
    if (capture === undefined) {
      throw new Error(`capture slot ${l} was never opened`);
    }
    return capture;
  }
}

/**
 * Convert a 1-based, possibly negative start to a 1-based offset
 */
function relativeStart(pos: number, length: number): number {
  if (pos > 0) return pos;
  if (pos === 0) return 1;
  if (pos < -length) return 1;
  return length + pos + 1;
}

/**
 * Matcher for one pattern, reusable across texts.
 *
 * @example
 * ```typescript
 * const matcher = new PatternMatcher("(%a+) (%a+)");
 * matcher.match("hello world")?.map(String); // ["hello", "world"]
 *
 * new PatternMatcher("%b()").match("x(foo(bar))y")?.map(String); // ["(foo(bar))"]
 * new PatternMatcher("()ll()").match("hello"); // [3, 5]
 * ```
 */
export class PatternMatcher {
  private readonly pattern: Uint8Array;
  private readonly patternText: string;
  private readonly anchored: boolean;

  constructor(pattern: ByteLike) {
    // copy so later writes to a caller's Uint8Array cannot change the pattern
    this.pattern = toBytes(pattern, "pattern").slice();
    this.patternText = decoder.decode(this.pattern);
    this.anchored = this.pattern[0] === CARET;
  }

  /**
   * Find the first match at or after `options.start`
   *
   * @returns The captures, the whole match when the pattern has none, or
   *   `null` when nothing matches
   * @throws {PatternError} Malformed pattern or invalid capture reference
   * @throws {ResourceLimitError} Too many captures or pattern too complex
   */
  match(text: ByteLike, options: MatchOptions = {}): MatchCapture[] | null {
    const source = toBytes(text, "text");
    const { start } = resolveMatchOptions(options);
    const init = relativeStart(start, source.length) - 1;
    if (init > source.length) {
      return null;
    }

    const state = new MatchState(source, this.pattern, this.patternText);
    const patternStart = this.anchored ? 1 : 0;
    let s = init;
    do {
      state.reset();
      const end = state.step(s, patternStart);
      if (end !== null) {
        return state.collect(s, end);
      }
      s++;
    } while (s <= source.length && !this.anchored);

    return null;
  }

  /**
   * True when the pattern matches somewhere in `text`
   */
  test(text: ByteLike, options: MatchOptions = {}): boolean {
    return this.match(text, options) !== null;
  }
}
