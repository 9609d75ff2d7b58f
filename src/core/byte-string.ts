/**
 * Immutable byte strings with cached identity
 *
 * A `ByteString` owns a fixed-length byte buffer that nothing can write to
 * once it exists. Its length and a 32-bit hash are computed once, when the
 * string is finalized, and make inequality checks cheap.
 *
 * Strings are produced in two phases: `ByteString.begin(n)` hands out a
 * `ByteStringBuilder` over `n` writable bytes, and `builder.end()` hashes
 * the content and returns the finished string. A builder cannot be written
 * to or ended again after that.
 *
 * @module byte-string
 */

import { ResourceLimitError, ValidationError } from "../errors";
import { hashBytes } from "./hashing";

/** Largest length a byte string may have (signed 32-bit limit). */
export const MAX_BYTE_STRING_LENGTH = 0x7fffffff;

const encoder = new TextEncoder();
const decoder = new TextDecoder("utf-8");

/** Only holders of this token may call the `ByteString` constructor */
const FINALIZED: unique symbol = Symbol("ByteString.finalized");

/** Content of every live string, for `borrowBytes` */
const contents = new WeakMap<ByteString, Uint8Array>();

/**
 * Write-once buffer that yields a `ByteString` through `end()`
 *
 * @example
 * ```typescript
 * const builder = ByteString.begin(3);
 * builder.write(0, new Uint8Array([104, 105]));
 * builder.set(2, 33);
 * const str = builder.end(); // "hi!"
 * ```
 */
export class ByteStringBuilder {
  private buffer: Uint8Array | null;

  /** @internal use `ByteString.begin` */
  constructor(length: number) {
    if (!Number.isInteger(length) || length < 0) {
      throw new ValidationError(`expected non-negative integer length, got ${length}`);
    }
    if (length > MAX_BYTE_STRING_LENGTH) {
      throw ResourceLimitError.forLength(length, MAX_BYTE_STRING_LENGTH, "begin");
    }
    this.buffer = new Uint8Array(length);
  }

  /** Number of bytes the finished string will hold */
  get length(): number {
    return this.open().length;
  }

  /** Store one byte (truncated to 8 bits) */
  set(index: number, byte: number): this {
    const buffer = this.open();
    if (!Number.isInteger(index) || index < 0 || index >= buffer.length) {
      throw new ValidationError(`index ${index} out of range [0, ${buffer.length})`);
    }
    buffer[index] = byte & 0xff;
    return this;
  }

  /** Copy `bytes` into the buffer starting at `offset` */
  write(offset: number, bytes: Uint8Array): this {
    const buffer = this.open();
    if (!Number.isInteger(offset) || offset < 0 || offset + bytes.length > buffer.length) {
      throw new ValidationError(
        `cannot write ${bytes.length} bytes at offset ${offset} into a buffer of ${buffer.length}`
      );
    }
    buffer.set(bytes, offset);
    return this;
  }

  /**
   * Compute the hash and freeze the content
   */
  end(): ByteString {
    const buffer = this.open();
    this.buffer = null;
    return new ByteString(FINALIZED, buffer, hashBytes(buffer));
  }

  private open(): Uint8Array {
    if (this.buffer === null) {
      throw new ValidationError("byte string builder already finalized");
    }
    return this.buffer;
  }
}

/**
 * Immutable byte sequence
 */
export class ByteString {
  private readonly data: Uint8Array;
  /** Signed 32-bit hash of the content */
  readonly hash: number;
  private utf8?: string;

  /**
   * Not callable from outside this module: strings come from `begin`/`end`,
   * `from`, `fromString` or `empty`.
   */
  constructor(token: typeof FINALIZED, data: Uint8Array, hash: number) {
    if (token !== FINALIZED) {
      throw new ValidationError(
        "ByteString cannot be constructed directly; use ByteString.begin, from or fromString"
      );
    }
    this.data = data;
    this.hash = hash;
    contents.set(this, data);
  }

  /**
   * Start building a string of exactly `length` bytes
   */
  static begin(length: number): ByteStringBuilder {
    return new ByteStringBuilder(length);
  }

  /** Copy `bytes`, or a `[start, end)` range of them, into a new string */
  static from(bytes: Uint8Array, start = 0, end = bytes.length): ByteString {
    return ByteString.begin(end - start)
      .write(0, bytes.subarray(start, end))
      .end();
  }

  /** UTF-8 encode `text` */
  static fromString(text: string): ByteString {
    const bytes = encoder.encode(text);
    if (bytes.length > MAX_BYTE_STRING_LENGTH) {
      throw ResourceLimitError.forLength(bytes.length, MAX_BYTE_STRING_LENGTH, "fromString");
    }
    return new ByteString(FINALIZED, bytes, hashBytes(bytes));
  }

  static empty(): ByteString {
    return ByteString.begin(0).end();
  }

  get length(): number {
    return this.data.length;
  }

  /** Byte at `index`, or `undefined` when out of range */
  at(index: number): number | undefined {
    return this.data[index];
  }

  /** Copy of the content */
  toBytes(): Uint8Array {
    return this.data.slice();
  }

  equals(other: ByteString): boolean {
    return ByteString.equal(this, other);
  }

  /** Decode as UTF-8 (invalid sequences become U+FFFD) */
  toString(): string {
    if (this.utf8 === undefined) {
      this.utf8 = decoder.decode(this.data);
    }
    return this.utf8;
  }

  toHex(): string {
    return Array.from(this.data, (b) => b.toString(16).padStart(2, "0")).join("");
  }

  /**
   * Compare against raw bytes without materializing a `ByteString`
   *
   * @param rawHash - `hashBytes(raw, 0, rawLength)`, usually precomputed
   */
  static equalToConst(
    lhs: ByteString,
    raw: Uint8Array,
    rawLength: number,
    rawHash: number
  ): boolean {
    if (lhs.data === raw && lhs.length === rawLength) return true;
    if (lhs.hash !== rawHash || lhs.length !== rawLength) return false;
    for (let i = 0; i < rawLength; i++) {
      if (lhs.data[i] !== raw[i]) return false;
    }
    return true;
  }

  /** Byte-for-byte equality, short-circuited by hash and length */
  static equal(lhs: ByteString, rhs: ByteString): boolean {
    if (lhs === rhs) return true;
    return ByteString.equalToConst(lhs, rhs.data, rhs.length, rhs.hash);
  }

  /**
   * Lexicographic order by unsigned byte value; on a common prefix the
   * shorter string sorts first.
   */
  static compare(lhs: ByteString, rhs: ByteString): -1 | 0 | 1 {
    const a = lhs.data;
    const b = rhs.data;
    const len = Math.min(a.length, b.length);
    for (let i = 0; i < len; i++) {
      const x = a[i] ?? 0;
      const y = b[i] ?? 0;
      if (x !== y) return x < y ? -1 : 1;
    }
    if (a.length === b.length) return 0;
    return a.length < b.length ? -1 : 1;
  }
}

/**
 * Content of `str` without a copy, for the engines in this package. Not
 * re-exported from the package entry point; callers must not write to it.
 */
export function borrowBytes(str: ByteString): Uint8Array {
  const data = contents.get(str);
  if (data === undefined) {
    throw new ValidationError("byte string was not finalized");
  }
  return data;
}
