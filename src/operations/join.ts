/**
 * Concatenate byte sequences
 */

import { toBytes } from "../core/arguments";
import { ByteString, MAX_BYTE_STRING_LENGTH } from "../core/byte-string";
import { ResourceLimitError, ValidationError } from "../errors";
import type { ByteLike } from "../types";

/**
 * Join `parts` into one string, with `sep` between neighbours
 *
 * @throws {ValidationError} When `parts` is not an array or an element is
 *   not a byte sequence (the message names its index)
 * @throws {ResourceLimitError} When the result would be too long
 *
 * @example
 * ```typescript
 * join(["a", "b", "c"], ", ").toString(); // "a, b, c"
 * join([]).length; // 0
 * ```
 */
export function join(parts: readonly ByteLike[], sep: ByteLike = ""): ByteString {
  if (!Array.isArray(parts)) {
    throw new ValidationError(`expected array for argument "parts", got ${typeof parts}`);
  }
  const separator = toBytes(sep, "sep");
  const chunks = parts.map((part: unknown, i) => toBytes(part, `parts[${i}]`));

  let total = 0;
  chunks.forEach((chunk, i) => {
    if (i > 0) total += separator.length;
    total += chunk.length;
    if (total > MAX_BYTE_STRING_LENGTH) {
      throw ResourceLimitError.forLength(total, MAX_BYTE_STRING_LENGTH, "join");
    }
  });

  const builder = ByteString.begin(total);
  let offset = 0;
  chunks.forEach((chunk, i) => {
    if (i > 0) {
      builder.write(offset, separator);
      offset += separator.length;
    }
    builder.write(offset, chunk);
    offset += chunk.length;
  });
  return builder.end();
}
