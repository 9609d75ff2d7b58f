/**
 * Tests for exact substring search
 */

import { describe, expect, test } from "vitest";
import { ByteString } from "../../src/core/byte-string";
import { ValidationError } from "../../src/errors";
import { find, findAll } from "../../src/operations/find";
import type { ByteLike } from "../../src/types";

describe("find", () => {
  test("returns the first offset", () => {
    expect(find("ab", "ababab")).toBe(0);
    expect(find("abac", "ababac")).toBe(2);
  });

  test("starts at the given offset", () => {
    expect(find("ab", "ababab", { start: 1 })).toBe(2);
    expect(find("ab", "ababab", { start: 10 })).toBeNull();
  });

  test("returns null when absent", () => {
    expect(find("zz", "ababab")).toBeNull();
    expect(find("a", "")).toBeNull();
  });

  test("accepts any byte-like arguments", () => {
    expect(find(new Uint8Array([0x62]), ByteString.fromString("abc"))).toBe(1);
  });

  test("rejects an empty pattern", () => {
    expect(() => find("", "abc")).toThrow(ValidationError);
    expect(() => find("", "abc")).toThrow("expected non-empty pattern");
  });

  test("rejects non-byte arguments", () => {
    expect(() => find("a", 42 as unknown as ByteLike)).toThrow(
      'expected byte sequence for argument "text", got number'
    );
    expect(() => find(null as unknown as ByteLike, "abc")).toThrow(
      'expected byte sequence for argument "pattern", got null'
    );
  });

  test("rejects invalid options", () => {
    expect(() => find("a", "abc", { start: -1 })).toThrow(ValidationError);
    expect(() => find("a", "abc", { start: 1.5 })).toThrow(/Invalid search options/);
  });
});

describe("findAll", () => {
  test("returns non-overlapping offsets", () => {
    expect(findAll("ab", "ababab")).toEqual([0, 2, 4]);
    expect(findAll("aa", "aaaa")).toEqual([0, 2]);
    expect(findAll("aa", "aaaaa")).toEqual([0, 2]);
  });

  test("starts at the given offset", () => {
    expect(findAll("ab", "ababab", { start: 1 })).toEqual([2, 4]);
  });

  test("returns an empty array when absent", () => {
    expect(findAll("x", "abc")).toEqual([]);
  });
});
