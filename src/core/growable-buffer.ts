/**
 * Append-only growable buffer for results whose size is not known up front.
 *
 * The buffer grows by doubling when capacity is exceeded.
 * Bytes in [0, length) are valid; bytes beyond are uninitialized.
 */

import { ResourceLimitError } from "../errors";
import { ByteString, MAX_BYTE_STRING_LENGTH } from "./byte-string";

export class GrowableBuffer {
  private bytes: Uint8Array;
  private count = 0;

  constructor(capacity = 0) {
    this.bytes = new Uint8Array(capacity);
  }

  /** Number of valid bytes in the buffer */
  get length(): number {
    return this.count;
  }

  /**
   * Append `data[start, end)`.
   */
  append(data: Uint8Array, start = 0, end = data.length): this {
    const size = end - start;
    if (size <= 0) return this;
    const needed = this.count + size;
    if (needed > MAX_BYTE_STRING_LENGTH) {
      throw ResourceLimitError.forLength(needed, MAX_BYTE_STRING_LENGTH, "buffer append");
    }
    if (needed > this.bytes.length) {
      const grown = new Uint8Array(Math.max(this.bytes.length * 2, needed));
      grown.set(this.bytes.subarray(0, this.count));
      this.bytes = grown;
    }
    this.bytes.set(data.subarray(start, end), this.count);
    this.count = needed;
    return this;
  }

  /**
   * Copy the valid bytes into a finished `ByteString`.
   */
  toByteString(): ByteString {
    return ByteString.from(this.bytes, 0, this.count);
  }
}
