/**
 * Tests for slicing, byte transformations, set membership and comparison
 */

import { describe, expect, test } from "vitest";
import { ResourceLimitError, ValidationError } from "../../src/errors";
import { checkSet } from "../../src/operations/check-set";
import { compare, equal } from "../../src/operations/compare";
import { slice } from "../../src/operations/slice";
import {
  asciiLower,
  asciiUpper,
  bytesToInts,
  intsToBytes,
  repeat,
  reverse,
} from "../../src/operations/transform";

describe("slice", () => {
  test("extracts a half-open range", () => {
    expect(slice("hello", 1, 3).toString()).toBe("el");
    expect(slice("hello").toString()).toBe("hello");
    expect(slice("hello", 2).toString()).toBe("llo");
  });

  test("negative indices count from the end", () => {
    expect(slice("hello", -3).toString()).toBe("llo");
    expect(slice("hello", 0, -1).toString()).toBe("hell");
    expect(slice("hello", -1).toString()).toBe("o");
  });

  test("clamps out-of-range indices", () => {
    expect(slice("hello", -100).toString()).toBe("hello");
    expect(slice("hello", 2, 100).toString()).toBe("llo");
    expect(slice("hello", 4, 2).length).toBe(0);
  });

  test("rejects fractional indices", () => {
    expect(() => slice("hello", 1.5)).toThrow('expected integer for argument "start", got 1.5');
  });
});

describe("repeat", () => {
  test("concatenates copies", () => {
    expect(repeat("ab", 3).toString()).toBe("ababab");
    expect(repeat("ab", 0).length).toBe(0);
    expect(repeat("", 5).length).toBe(0);
  });

  test("rejects a negative count", () => {
    expect(() => repeat("ab", -1)).toThrow(ValidationError);
    expect(() => repeat("ab", -1)).toThrow("expected non-negative number of repetitions");
  });

  test("rejects a result that would be too long", () => {
    expect(() => repeat("ab", 2 ** 30)).toThrow(ResourceLimitError);
    expect(() => repeat("ab", 2 ** 30)).toThrow("result string is too long (repeat)");
  });
});

describe("byte conversions", () => {
  test("bytesToInts", () => {
    expect(bytesToInts("AZ")).toEqual([65, 90]);
    expect(bytesToInts("")).toEqual([]);
  });

  test("intsToBytes keeps the low 8 bits", () => {
    expect(intsToBytes(104, 105).toString()).toBe("hi");
    expect(intsToBytes(321, -1).toBytes()).toEqual(new Uint8Array([65, 255]));
    expect(intsToBytes().length).toBe(0);
  });

  test("intsToBytes rejects non-integers", () => {
    expect(() => intsToBytes(1.5)).toThrow('expected integer for argument "ints[0]", got 1.5');
  });
});

describe("ASCII case", () => {
  test("converts letters only", () => {
    expect(asciiLower("Hello, World!").toString()).toBe("hello, world!");
    expect(asciiUpper("Hello, World!").toString()).toBe("HELLO, WORLD!");
  });

  test("leaves non-ASCII bytes alone", () => {
    expect(asciiUpper(new Uint8Array([0xe9, 0x61])).toBytes()).toEqual(new Uint8Array([0xe9, 0x41]));
  });

  test("round-trips strings without letters", () => {
    const text = "123 !? []";
    expect(asciiUpper(asciiLower(text)).toString()).toBe(text);
    expect(asciiLower(asciiUpper(text)).toString()).toBe(text);
  });
});

describe("reverse", () => {
  test("reverses bytes", () => {
    expect(reverse("abc").toString()).toBe("cba");
    expect(reverse("").length).toBe(0);
    expect(reverse(reverse("hello")).toString()).toBe("hello");
  });
});

describe("checkSet", () => {
  test("accepts text made only of set members", () => {
    expect(checkSet("abc", "cab")).toBe(true);
    expect(checkSet("abc", "")).toBe(true);
  });

  test("rejects text with a byte outside the set", () => {
    expect(checkSet("abc", "xyz")).toBe(false);
    expect(checkSet("abc", "xaybz")).toBe(false);
  });

  test("distinguishes bytes sharing a word of the bit set", () => {
    // 'a' (97) and 'i' (105) fall in the same 32-bit word, 8 bits apart
    expect(checkSet("a", "i")).toBe(false);
    expect(checkSet("i", "i")).toBe(true);
  });

  test("complement inverts membership", () => {
    expect(checkSet("abc", "xyz", { complement: true })).toBe(true);
    expect(checkSet("abc", "xaz", { complement: true })).toBe(false);
  });

  test("handles high bytes", () => {
    expect(checkSet(new Uint8Array([0xff]), new Uint8Array([0xff, 0xff]))).toBe(true);
    expect(checkSet(new Uint8Array([0xff]), new Uint8Array([0xfe]))).toBe(false);
  });
});

describe("equal and compare", () => {
  test("equal compares content", () => {
    expect(equal("abc", new Uint8Array([97, 98, 99]))).toBe(true);
    expect(equal("abc", "abd")).toBe(false);
  });

  test("compare orders lexicographically", () => {
    expect(compare("abc", "abd")).toBe(-1);
    expect(compare("ab", "abc")).toBe(-1);
    expect(compare("b", "abc")).toBe(1);
    expect(compare("abc", "abc")).toBe(0);
  });
});
