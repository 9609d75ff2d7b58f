/**
 * Tests for ByteString construction, identity and ordering
 */

import { describe, expect, test } from "vitest";
import { ByteString, MAX_BYTE_STRING_LENGTH } from "../../src/core/byte-string";
import { hashBytes } from "../../src/core/hashing";
import { ResourceLimitError, ValidationError } from "../../src/errors";
import * as bytepat from "../../src/index";

const encode = (text: string): Uint8Array => new TextEncoder().encode(text);

describe("ByteString", () => {
  describe("two-phase construction", () => {
    test("builds a string from written bytes", () => {
      const builder = ByteString.begin(3);
      builder.write(0, encode("hi"));
      builder.set(2, 33);
      const str = builder.end();

      expect(str.toString()).toBe("hi!");
      expect(str.length).toBe(3);
      expect(str.hash).toBe(hashBytes(encode("hi!")));
    });

    test("unwritten bytes are zero", () => {
      const str = ByteString.begin(2).end();
      expect(str.toBytes()).toEqual(new Uint8Array([0, 0]));
    });

    test("truncates bytes stored with set", () => {
      const str = ByteString.begin(1).set(0, 0x141).end();
      expect(str.at(0)).toBe(0x41);
    });

    test("rejects use of a finalized builder", () => {
      const builder = ByteString.begin(1);
      builder.end();

      expect(() => builder.end()).toThrow(ValidationError);
      expect(() => builder.set(0, 1)).toThrow("byte string builder already finalized");
      expect(() => builder.write(0, new Uint8Array(1))).toThrow(ValidationError);
      expect(() => builder.length).toThrow(ValidationError);
    });

    test("rejects writes outside the buffer", () => {
      const builder = ByteString.begin(2);
      expect(() => builder.write(1, encode("ab"))).toThrow(
        "cannot write 2 bytes at offset 1 into a buffer of 2"
      );
      expect(() => builder.set(2, 0)).toThrow("index 2 out of range [0, 2)");
    });

    test("rejects invalid lengths", () => {
      expect(() => ByteString.begin(-1)).toThrow(ValidationError);
      expect(() => ByteString.begin(1.5)).toThrow("expected non-negative integer length, got 1.5");
      expect(() => ByteString.begin(MAX_BYTE_STRING_LENGTH + 1)).toThrow(ResourceLimitError);
    });
  });

  describe("content access", () => {
    test("toBytes returns a copy", () => {
      const str = ByteString.fromString("abc");
      const copy = str.toBytes();
      copy[0] = 0x7a;

      expect(str.toString()).toBe("abc");
    });

    test("from copies a range", () => {
      const source = encode("hello");
      const str = ByteString.from(source, 1, 3);
      source[1] = 0x45;

      expect(str.toString()).toBe("el");
    });

    test("renders hex", () => {
      expect(ByteString.fromString("AZ").toHex()).toBe("415a");
      expect(ByteString.empty().toHex()).toBe("");
    });

    test("at returns undefined out of range", () => {
      expect(ByteString.fromString("a").at(1)).toBeUndefined();
    });
  });

  describe("immutability", () => {
    test("bytes written into a builder are copied", () => {
      const source = encode("abc");
      const str = ByteString.begin(3).write(0, source).end();
      source[0] = 0x7a;

      expect(str.toString()).toBe("abc");
      expect(str.hash).toBe(hashBytes(encode("abc")));
      expect(ByteString.equal(str, ByteString.fromString("abc"))).toBe(true);
    });

    test("a builder hands out no writable buffer", () => {
      const builder = ByteString.begin(3);
      expect("bytes" in builder).toBe(false);
    });

    test("a finished string exposes no internal array", () => {
      const str = ByteString.fromString("abc");
      expect("view" in str).toBe(false);

      const copy = str.toBytes();
      copy[0] = 0x7a;
      expect(ByteString.equal(str, ByteString.fromString("abc"))).toBe(true);
      expect(ByteString.equal(str, ByteString.fromString("zbc"))).toBe(false);
    });

    test("the zero-copy accessor is not part of the public API", () => {
      expect("borrowBytes" in bytepat).toBe(false);
      expect("ByteString" in bytepat).toBe(true);
    });

    test("cannot be constructed with an arbitrary hash", () => {
      expect(() => Reflect.construct(ByteString, [new Uint8Array([1]), 42])).toThrow(
        ValidationError
      );
      expect(() =>
        Reflect.construct(ByteString, [Symbol("ByteString.finalized"), new Uint8Array([1]), 42])
      ).toThrow("ByteString cannot be constructed directly");
    });
  });

  describe("identity", () => {
    test("hash depends only on content", () => {
      const a = ByteString.fromString("abc");
      const b = ByteString.from(new Uint8Array([97, 98, 99]));

      expect(a.hash).toBe(b.hash);
      expect(ByteString.equal(a, b)).toBe(true);
      expect(a.equals(b)).toBe(true);
    });

    test("djb2 values", () => {
      expect(ByteString.empty().hash).toBe(5381);
      expect(ByteString.fromString("a").hash).toBe(177670);
    });

    test("distinguishes different content", () => {
      expect(ByteString.equal(ByteString.fromString("abc"), ByteString.fromString("abd"))).toBe(false);
      expect(ByteString.equal(ByteString.fromString("ab"), ByteString.fromString("abc"))).toBe(false);
    });

    test("equalToConst compares against raw bytes", () => {
      const str = ByteString.fromString("abc");
      const raw = encode("abc");

      expect(ByteString.equalToConst(str, raw, raw.length, hashBytes(raw))).toBe(true);
      expect(ByteString.equalToConst(str, raw, raw.length, hashBytes(raw) + 1)).toBe(false);
      expect(ByteString.equalToConst(str, raw, 2, hashBytes(raw, 0, 2))).toBe(false);
    });
  });

  describe("compare", () => {
    const cmp = (a: string, b: string): number =>
      ByteString.compare(ByteString.fromString(a), ByteString.fromString(b));

    test("orders lexicographically", () => {
      expect(cmp("abc", "abd")).toBe(-1);
      expect(cmp("b", "abc")).toBe(1);
      expect(cmp("abc", "abc")).toBe(0);
    });

    test("shorter string first on a common prefix", () => {
      expect(cmp("ab", "abc")).toBe(-1);
      expect(cmp("abc", "ab")).toBe(1);
      expect(cmp("", "")).toBe(0);
    });

    test("compares bytes as unsigned", () => {
      const high = ByteString.from(new Uint8Array([0xff]));
      const low = ByteString.from(new Uint8Array([0x01]));
      expect(ByteString.compare(high, low)).toBe(1);
    });
  });
});
