import { toByteString } from "../core/arguments";
import { ByteString } from "../core/byte-string";
import type { ByteLike } from "../types";

/** Byte-for-byte equality of two byte sequences */
export function equal(lhs: ByteLike, rhs: ByteLike): boolean {
  return ByteString.equal(toByteString(lhs, "lhs"), toByteString(rhs, "rhs"));
}

/** Lexicographic order by unsigned byte value, shorter first on a common prefix */
export function compare(lhs: ByteLike, rhs: ByteLike): -1 | 0 | 1 {
  return ByteString.compare(toByteString(lhs, "lhs"), toByteString(rhs, "rhs"));
}
