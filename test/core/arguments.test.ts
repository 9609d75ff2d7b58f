/**
 * Tests for argument narrowing and option resolution
 */

import { describe, expect, test } from "vitest";
import {
  isByteLike,
  resolveCheckSetOptions,
  resolveMatchOptions,
  resolveSearchOptions,
  resolveSplitOptions,
  toByteString,
  toBytes,
  toInteger,
} from "../../src/core/arguments";
import { ByteString } from "../../src/core/byte-string";
import { ValidationError } from "../../src/errors";

describe("isByteLike", () => {
  test("accepts byte strings, byte arrays and strings", () => {
    expect(isByteLike(ByteString.fromString("a"))).toBe(true);
    expect(isByteLike(new Uint8Array(2))).toBe(true);
    expect(isByteLike("")).toBe(true);
  });

  test("rejects everything else", () => {
    expect(isByteLike(42)).toBe(false);
    expect(isByteLike(null)).toBe(false);
    expect(isByteLike([97])).toBe(false);
    expect(isByteLike(new Uint16Array(1))).toBe(false);
  });
});

describe("toBytes", () => {
  test("encodes strings as UTF-8", () => {
    expect(toBytes("é", "text")).toEqual(new Uint8Array([0xc3, 0xa9]));
  });

  test("returns byte arrays as given", () => {
    const bytes = new Uint8Array([1, 2]);
    expect(toBytes(bytes, "text")).toBe(bytes);
  });

  test("reads byte strings", () => {
    expect(toBytes(ByteString.fromString("hi"), "text")).toEqual(new Uint8Array([104, 105]));
  });

  test("names the argument it rejects", () => {
    expect(() => toBytes([97], "sep")).toThrow(ValidationError);
    expect(() => toBytes([97], "sep")).toThrow('expected byte sequence for argument "sep", got array');
  });
});

describe("toByteString", () => {
  test("reuses a byte string", () => {
    const str = ByteString.fromString("abc");
    expect(toByteString(str, "lhs")).toBe(str);
  });

  test("copies a byte array", () => {
    const bytes = new Uint8Array([0x61]);
    const str = toByteString(bytes, "lhs");
    bytes[0] = 0x62;
    expect(str.toString()).toBe("a");
  });

  test("rejects other values", () => {
    expect(() => toByteString(undefined, "rhs")).toThrow(
      'expected byte sequence for argument "rhs", got undefined'
    );
  });
});

describe("toInteger", () => {
  test("accepts integers", () => {
    expect(toInteger(-3, "n")).toBe(-3);
  });

  test("rejects non-integers", () => {
    expect(() => toInteger(Number.NaN, "n")).toThrow('expected integer for argument "n", got NaN');
    expect(() => toInteger("3", "n")).toThrow('expected integer for argument "n", got 3');
  });
});

describe("option resolution", () => {
  test("fills in defaults", () => {
    expect(resolveSearchOptions()).toEqual({ start: 0 });
    expect(resolveSplitOptions({})).toEqual({ start: 0, limit: -1 });
    expect(resolveCheckSetOptions()).toEqual({ complement: false });
    expect(resolveMatchOptions()).toEqual({ start: 1 });
  });

  test("keeps given values", () => {
    expect(resolveSplitOptions({ start: 2, limit: 0 })).toEqual({ start: 2, limit: 0 });
    expect(resolveMatchOptions({ start: -2 })).toEqual({ start: -2 });
  });

  test("rejects invalid values", () => {
    expect(() => resolveSearchOptions({ start: -1 })).toThrow(/^Invalid search options: /);
    expect(() => resolveMatchOptions({ start: 0.5 })).toThrow(/^Invalid match options: /);
  });
});
