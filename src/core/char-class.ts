/**
 * Character classes of the pattern language
 *
 * Classes use the C locale: only ASCII letters are alphabetic, bytes
 * 128-255 belong to no class but their complements.
 */

/** Escape byte introducing a class or a literal (`%`) */
export const CHAR_ESC = 0x25;

const isAlpha = (c: number): boolean => (c >= 0x41 && c <= 0x5a) || (c >= 0x61 && c <= 0x7a);
const isDigit = (c: number): boolean => c >= 0x30 && c <= 0x39;
const isLower = (c: number): boolean => c >= 0x61 && c <= 0x7a;
const isUpper = (c: number): boolean => c >= 0x41 && c <= 0x5a;
const isControl = (c: number): boolean => c < 0x20 || c === 0x7f;
const isGraph = (c: number): boolean => c > 0x20 && c < 0x7f;
const isSpace = (c: number): boolean => (c >= 0x09 && c <= 0x0d) || c === 0x20;
const isAlnum = (c: number): boolean => isAlpha(c) || isDigit(c);
const isPunct = (c: number): boolean => isGraph(c) && !isAlnum(c);
const isHexDigit = (c: number): boolean =>
  isDigit(c) || (c >= 0x41 && c <= 0x46) || (c >= 0x61 && c <= 0x66);

const CLASS_PREDICATES: ReadonlyMap<number, (c: number) => boolean> = new Map([
  [0x61, isAlpha], // a
  [0x63, isControl], // c
  [0x64, isDigit], // d
  [0x67, isGraph], // g
  [0x6c, isLower], // l
  [0x70, isPunct], // p
  [0x73, isSpace], // s
  [0x75, isUpper], // u
  [0x77, isAlnum], // w
  [0x78, isHexDigit], // x
  [0x7a, (c: number) => c === 0], // z
]);

/**
 * Test byte `c` against the class letter following a `%`
 *
 * A lowercase letter selects the class, its uppercase form the complement.
 * Any other byte is an escaped literal and matches only itself.
 *
 * @example
 * ```typescript
 * matchClass(0x37, 0x64); // true  ('7' is %d)
 * matchClass(0x37, 0x44); // false ('7' is not %D)
 * matchClass(0x2e, 0x2e); // true  (%. is a literal '.')
 * ```
 */
export function matchClass(c: number, cl: number): boolean {
  const predicate = CLASS_PREDICATES.get(isUpper(cl) ? cl + 0x20 : cl);
  if (predicate === undefined) {
    return cl === c;
  }
  const res = predicate(c);
  return isLower(cl) ? res : !res;
}

/**
 * Test byte `c` against the bracket class `pattern[p..ec]`
 *
 * `p` is the index of the opening `[` and `ec` the index of the closing `]`.
 * Members are literal bytes, `%x` classes and `lo-hi` ranges; a `^` right
 * after the bracket negates the whole class.
 */
export function matchBracketClass(c: number, pattern: Uint8Array, p: number, ec: number): boolean {
  let sig = true;
  if (pattern[p + 1] === 0x5e) {
    // ^
    sig = false;
    p++;
  }
  while (++p < ec) {
    const b = pattern[p] ?? 0;
    if (b === CHAR_ESC) {
      p++;
      if (matchClass(c, pattern[p] ?? 0)) return sig;
    } else if (pattern[p + 1] === 0x2d && p + 2 < ec) {
      // lo-hi
      p += 2;
      if (b <= c && c <= (pattern[p] ?? 0)) return sig;
    } else if (b === c) {
      return sig;
    }
  }
  return !sig;
}
