/**
 * Byte-wise transformations
 *
 * Pure, length-preserving (or length-multiplying) rewrites of a byte
 * sequence. Case conversion is ASCII-only: bytes outside `A-Z`/`a-z` are
 * copied unchanged.
 */

import { toBytes, toInteger } from "../core/arguments";
import { ByteString, MAX_BYTE_STRING_LENGTH } from "../core/byte-string";
import { ResourceLimitError, ValidationError } from "../errors";
import type { ByteLike } from "../types";

/**
 * Build a string of the same length, mapping each byte through `fn`
 */
function mapBytes(bytes: ByteLike, fn: (byte: number, index: number) => number): ByteString {
  const source = toBytes(bytes, "bytes");
  const builder = ByteString.begin(source.length);
  source.forEach((byte, i) => {
    builder.set(i, fn(byte, i));
  });
  return builder.end();
}

/**
 * `n` copies of `bytes`, concatenated
 *
 * @throws {ValidationError} When `n` is negative or not an integer
 * @throws {ResourceLimitError} When the result would be too long
 *
 * @example
 * ```typescript
 * repeat("ab", 3).toString(); // "ababab"
 * ```
 */
export function repeat(bytes: ByteLike, n: number): ByteString {
  const source = toBytes(bytes, "bytes");
  const count = toInteger(n, "n");
  if (count < 0) {
    throw new ValidationError("expected non-negative number of repetitions");
  }
  const total = count * source.length;
  if (total > MAX_BYTE_STRING_LENGTH) {
    throw ResourceLimitError.forLength(total, MAX_BYTE_STRING_LENGTH, "repeat");
  }

  const builder = ByteString.begin(total);
  for (let offset = 0; offset < total; offset += source.length) {
    builder.write(offset, source);
  }
  return builder.end();
}

/**
 * Byte values of `bytes`
 *
 * @example
 * ```typescript
 * bytesToInts("AZ"); // [65, 90]
 * ```
 */
export function bytesToInts(bytes: ByteLike): number[] {
  return Array.from(toBytes(bytes, "bytes"));
}

/**
 * String whose bytes are the low 8 bits of each integer
 *
 * @example
 * ```typescript
 * intsToBytes(104, 105).toString(); // "hi"
 * intsToBytes(321, -1).toBytes(); // Uint8Array [65, 255]
 * ```
 */
export function intsToBytes(...ints: number[]): ByteString {
  const builder = ByteString.begin(ints.length);
  ints.forEach((value, i) => {
    builder.set(i, toInteger(value, `ints[${i}]`) & 0xff);
  });
  return builder.end();
}

export function asciiLower(bytes: ByteLike): ByteString {
  return mapBytes(bytes, (c) => (c >= 0x41 && c <= 0x5a ? c + 32 : c));
}

export function asciiUpper(bytes: ByteLike): ByteString {
  return mapBytes(bytes, (c) => (c >= 0x61 && c <= 0x7a ? c - 32 : c));
}

/**
 * Bytes in reverse order (multi-byte UTF-8 sequences are reversed too)
 */
export function reverse(bytes: ByteLike): ByteString {
  const source = toBytes(bytes, "bytes");
  return mapBytes(source, (_, i) => source[source.length - 1 - i] ?? 0);
}
