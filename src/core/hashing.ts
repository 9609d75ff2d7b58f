/**
 * Non-cryptographic hashing for byte-string identity
 */

/**
 * djb2 over a byte range, wrapped to a signed 32-bit integer
 *
 * Fast and well distributed for hash tables and equality pre-checks.
 * NOT suitable for security.
 *
 * @param bytes - Bytes to hash
 * @param start - First index included (default 0)
 * @param end - Index after the last byte included (default `bytes.length`)
 * @returns Signed 32-bit hash
 *
 * @example
 * ```typescript
 * hashBytes(new Uint8Array([])) // 5381
 * hashBytes(new Uint8Array([97])) // 177670 ("a")
 * ```
 */
export function hashBytes(bytes: Uint8Array, start = 0, end = bytes.length): number {
  let hash = 5381;
  for (let i = start; i < end; i++) {
    hash = ((hash << 5) + hash + (bytes[i] ?? 0)) | 0; // (hash * 33) + byte
  }
  return hash;
}
