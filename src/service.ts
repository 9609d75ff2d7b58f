/**
 * Effect-based byte-string service
 *
 * Exposes the operations through a `Context.Tag` so Effect programs can
 * depend on them and handle their failures in the typed error channel.
 * "Nothing found" stays a success (`Option.none()`, an empty array, the
 * unchanged text); malformed input and exhausted limits fail with
 * `ValidationError` or `PatternError`. Failures are logged at debug level,
 * annotated with the operation name, before they are propagated.
 *
 * @example
 * ```typescript
 * import { Effect, Option } from "effect";
 * import { ByteStringService } from "./service";
 *
 * const program = Effect.gen(function* () {
 *   const strings = yield* ByteStringService;
 *   const captures = yield* strings.match("hello world", "(%a+) (%a+)");
 *   return Option.map(captures, (caps) => caps.map(String));
 * });
 *
 * Effect.runSync(program.pipe(Effect.provide(ByteStringService.Live)));
 * // Option.some(["hello", "world"])
 * ```
 *
 * @module service
 */

import { Context, Effect, Layer, Option } from "effect";
import type { ByteString } from "./core/byte-string";
import { BytepatError, PatternError, ValidationError } from "./errors";
import {
  asciiLower,
  asciiUpper,
  bytesToInts,
  checkSet,
  compare,
  equal,
  find,
  findAll,
  intsToBytes,
  join,
  match,
  repeat,
  replace,
  replaceAll,
  reverse,
  slice,
  split,
} from "./operations";
import type {
  ByteLike,
  CheckSetOptions,
  MatchCapture,
  MatchOptions,
  SearchOptions,
  SplitOptions,
} from "./types";

/**
 * Failures an operation can report
 */
export type ByteStringFailure = ValidationError | PatternError;

// =============================================================================
// SERVICE SHAPE (Interface)
// =============================================================================

/**
 * Shape of the byte-string service
 */
export interface ByteStringServiceShape {
  readonly find: (
    pattern: ByteLike,
    text: ByteLike,
    options?: SearchOptions
  ) => Effect.Effect<Option.Option<number>, ByteStringFailure>;

  readonly findAll: (
    pattern: ByteLike,
    text: ByteLike,
    options?: SearchOptions
  ) => Effect.Effect<number[], ByteStringFailure>;

  readonly replace: (
    pattern: ByteLike,
    subst: ByteLike,
    text: ByteLike,
    options?: SearchOptions
  ) => Effect.Effect<ByteString, ByteStringFailure>;

  readonly replaceAll: (
    pattern: ByteLike,
    subst: ByteLike,
    text: ByteLike,
    options?: SearchOptions
  ) => Effect.Effect<ByteString, ByteStringFailure>;

  readonly split: (
    delim: ByteLike,
    text: ByteLike,
    options?: SplitOptions
  ) => Effect.Effect<ByteString[], ByteStringFailure>;

  readonly join: (
    parts: readonly ByteLike[],
    sep?: ByteLike
  ) => Effect.Effect<ByteString, ByteStringFailure>;

  readonly slice: (
    bytes: ByteLike,
    start?: number,
    end?: number
  ) => Effect.Effect<ByteString, ByteStringFailure>;

  readonly repeat: (bytes: ByteLike, n: number) => Effect.Effect<ByteString, ByteStringFailure>;

  readonly bytesToInts: (bytes: ByteLike) => Effect.Effect<number[], ByteStringFailure>;

  readonly intsToBytes: (...ints: number[]) => Effect.Effect<ByteString, ByteStringFailure>;

  readonly asciiLower: (bytes: ByteLike) => Effect.Effect<ByteString, ByteStringFailure>;

  readonly asciiUpper: (bytes: ByteLike) => Effect.Effect<ByteString, ByteStringFailure>;

  readonly reverse: (bytes: ByteLike) => Effect.Effect<ByteString, ByteStringFailure>;

  readonly checkSet: (
    set: ByteLike,
    text: ByteLike,
    options?: CheckSetOptions
  ) => Effect.Effect<boolean, ByteStringFailure>;

  readonly equal: (lhs: ByteLike, rhs: ByteLike) => Effect.Effect<boolean, ByteStringFailure>;

  readonly compare: (lhs: ByteLike, rhs: ByteLike) => Effect.Effect<-1 | 0 | 1, ByteStringFailure>;

  /**
   * Pattern match; `Option.none()` when nothing matches
   */
  readonly match: (
    text: ByteLike,
    pattern: ByteLike,
    options?: MatchOptions
  ) => Effect.Effect<Option.Option<MatchCapture[]>, ByteStringFailure>;
}

// =============================================================================
// FAILURE MAPPING
// =============================================================================

/**
 * Keep library errors as they are; anything else is a defect, not a failure
 */
function toFailure(error: unknown): ByteStringFailure {
  if (error instanceof ValidationError || error instanceof PatternError) {
    return error;
  }
  throw error;
}

/**
 * Run a synchronous operation, routing its library errors to the failure channel
 */
function attempt<A>(operation: string, run: () => A): Effect.Effect<A, ByteStringFailure> {
  return Effect.try({ try: run, catch: toFailure }).pipe(
    Effect.tapError((error: BytepatError) =>
      Effect.logDebug(`${operation} failed: ${error.message}`).pipe(
        Effect.annotateLogs({ operation, code: error.code })
      )
    )
  );
}

// =============================================================================
// SERVICE TAG
// =============================================================================

/**
 * Byte-string service for Effect-based dependency injection
 */
export class ByteStringService extends Context.Tag("@bytepat/ByteStringService")<
  ByteStringService,
  ByteStringServiceShape
>() {
  /**
   * Layer backed by the synchronous operations
   */
  static readonly Live: Layer.Layer<ByteStringService> = Layer.succeed(
    ByteStringService,
    createLiveService()
  );
}

function createLiveService(): ByteStringServiceShape {
  return {
    find: (pattern, text, options) =>
      attempt("find", () => Option.fromNullable(find(pattern, text, options))),
    findAll: (pattern, text, options) => attempt("findAll", () => findAll(pattern, text, options)),
    replace: (pattern, subst, text, options) =>
      attempt("replace", () => replace(pattern, subst, text, options)),
    replaceAll: (pattern, subst, text, options) =>
      attempt("replaceAll", () => replaceAll(pattern, subst, text, options)),
    split: (delim, text, options) => attempt("split", () => split(delim, text, options)),
    join: (parts, sep) => attempt("join", () => join(parts, sep)),
    slice: (bytes, start, end) => attempt("slice", () => slice(bytes, start, end)),
    repeat: (bytes, n) => attempt("repeat", () => repeat(bytes, n)),
    bytesToInts: (bytes) => attempt("bytesToInts", () => bytesToInts(bytes)),
    intsToBytes: (...ints) => attempt("intsToBytes", () => intsToBytes(...ints)),
    asciiLower: (bytes) => attempt("asciiLower", () => asciiLower(bytes)),
    asciiUpper: (bytes) => attempt("asciiUpper", () => asciiUpper(bytes)),
    reverse: (bytes) => attempt("reverse", () => reverse(bytes)),
    checkSet: (set, text, options) => attempt("checkSet", () => checkSet(set, text, options)),
    equal: (lhs, rhs) => attempt("equal", () => equal(lhs, rhs)),
    compare: (lhs, rhs) => attempt("compare", () => compare(lhs, rhs)),
    match: (text, pattern, options) =>
      attempt("match", () => Option.fromNullable(match(text, pattern, options))),
  };
}
