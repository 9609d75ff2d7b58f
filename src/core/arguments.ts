/**
 * Argument coercion and option validation shared by the operations
 *
 * Byte arguments are narrowed by hand (ArkType has no notion of a
 * `ByteString`), option objects through ArkType schemas. Every failure is
 * a `ValidationError` that names the offending argument.
 */

import { type } from "arktype";
import { ValidationError } from "../errors";
import type { ByteLike, CheckSetOptions, MatchOptions, SearchOptions, SplitOptions } from "../types";
import { borrowBytes, ByteString } from "./byte-string";

const encoder = new TextEncoder();

/**
 * Type guard for values accepted as byte sequences
 */
export function isByteLike(value: unknown): value is ByteLike {
  return value instanceof ByteString || value instanceof Uint8Array || typeof value === "string";
}

/**
 * Borrow the bytes of a byte-like argument without copying where possible
 *
 * @param value - Argument to narrow
 * @param argument - Argument name used in the error message
 * @throws {ValidationError} When `value` is not byte-like
 */
export function toBytes(value: unknown, argument: string): Uint8Array {
  if (!isByteLike(value)) {
    throw ValidationError.forArgument(argument, value);
  }
  if (value instanceof ByteString) return borrowBytes(value);
  if (typeof value === "string") return encoder.encode(value);
  return value;
}

/**
 * Narrow a byte-like argument to a `ByteString`, reusing it when it already is one
 */
export function toByteString(value: unknown, argument: string): ByteString {
  if (!isByteLike(value)) {
    throw ValidationError.forArgument(argument, value);
  }
  if (value instanceof ByteString) return value;
  if (typeof value === "string") return ByteString.fromString(value);
  return ByteString.from(value);
}

/**
 * Narrow an integer argument
 */
export function toInteger(value: unknown, argument: string): number {
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new ValidationError(`expected integer for argument "${argument}", got ${String(value)}`);
  }
  return value;
}

const SearchOptionsSchema = type({
  "start?": "number.integer>=0",
});

const SplitOptionsSchema = type({
  "start?": "number.integer>=0",
  "limit?": "number.integer",
});

const CheckSetOptionsSchema = type({
  "complement?": "boolean",
});

const MatchOptionsSchema = type({
  "start?": "number.integer",
});

/**
 * Validate search options and fill in defaults
 */
export function resolveSearchOptions(options: SearchOptions = {}): Required<SearchOptions> {
  const result = SearchOptionsSchema(options);
  if (result instanceof type.errors) {
    throw new ValidationError(`Invalid search options: ${result.summary}`);
  }
  return { start: result.start ?? 0 };
}

/**
 * Validate split options and fill in defaults
 */
export function resolveSplitOptions(options: SplitOptions = {}): Required<SplitOptions> {
  const result = SplitOptionsSchema(options);
  if (result instanceof type.errors) {
    throw new ValidationError(`Invalid split options: ${result.summary}`);
  }
  return { start: result.start ?? 0, limit: result.limit ?? -1 };
}

/**
 * Validate check-set options and fill in defaults
 */
export function resolveCheckSetOptions(options: CheckSetOptions = {}): Required<CheckSetOptions> {
  const result = CheckSetOptionsSchema(options);
  if (result instanceof type.errors) {
    throw new ValidationError(`Invalid check-set options: ${result.summary}`);
  }
  return { complement: result.complement ?? false };
}

/**
 * Validate match options and fill in defaults
 */
export function resolveMatchOptions(options: MatchOptions = {}): Required<MatchOptions> {
  const result = MatchOptionsSchema(options);
  if (result instanceof type.errors) {
    throw new ValidationError(`Invalid match options: ${result.summary}`);
  }
  return { start: result.start ?? 1 };
}
