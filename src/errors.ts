/**
 * Error handling for byte-string operations and pattern matching
 *
 * Two kinds of outcome never meet here: a search that finds nothing returns
 * `null`, an empty array or the input unchanged, while malformed input and
 * exhausted engine limits throw one of the classes below.
 */

/**
 * Base error class for all bytepat errors
 */
export class BytepatError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: string
  ) {
    super(message);
    this.name = "BytepatError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Validation errors for arguments and option objects
 */
export class ValidationError extends BytepatError {
  constructor(message: string, context?: string) {
    super(message, "VALIDATION_ERROR", context);
    this.name = "ValidationError";
  }

  /**
   * Create error for an argument that is not a byte sequence
   */
  static forArgument(argument: string, received: unknown): ValidationError {
    return new ValidationError(
      `expected byte sequence for argument "${argument}", got ${describeValue(received)}`,
      `Argument: ${argument}`
    );
  }
}

/**
 * Malformed pattern syntax or an invalid capture reference
 */
export class PatternError extends BytepatError {
  constructor(
    message: string,
    public readonly pattern: string,
    public readonly position?: number
  ) {
    super(
      message,
      "PATTERN_ERROR",
      position === undefined ? `Pattern: ${pattern}` : `Pattern: ${pattern} (offset ${position})`
    );
    this.name = "PatternError";
  }
}

/**
 * Engine and result-size limits
 */
export class ResourceLimitError extends ValidationError {
  constructor(
    message: string,
    public readonly resourceType: "captures" | "recursion" | "length",
    public readonly actualValue: number,
    public readonly maxAllowed: number,
    context?: string
  ) {
    super(message, context);
    this.name = "ResourceLimitError";
  }

  /**
   * Create error for a pattern that opens more captures than the table holds
   */
  static forCaptures(maxCaptures: number, pattern: string): ResourceLimitError {
    return new ResourceLimitError(
      "too many captures",
      "captures",
      maxCaptures + 1,
      maxCaptures,
      `Pattern: ${pattern}`
    );
  }

  /**
   * Create error for a match that nests deeper than the depth budget
   */
  static forRecursion(maxDepth: number, pattern: string): ResourceLimitError {
    return new ResourceLimitError(
      "pattern too complex",
      "recursion",
      maxDepth + 1,
      maxDepth,
      `Pattern: ${pattern}`
    );
  }

  /**
   * Create error for a result that would not fit in a byte string
   */
  static forLength(actualLength: number, maxLength: number, operation: string): ResourceLimitError {
    return new ResourceLimitError(
      `result string is too long (${operation})`,
      "length",
      actualLength,
      maxLength,
      `Operation: ${operation}, Actual: ${actualLength} bytes, Max: ${maxLength} bytes`
    );
  }

  override toString(): string {
    let msg = super.toString();
    msg += `\nResource Limit Violation:`;
    msg += `\n  Type: ${this.resourceType}`;
    msg += `\n  Actual: ${this.actualValue}`;
    msg += `\n  Maximum: ${this.maxAllowed}`;
    return msg;
  }
}

/**
 * Error recovery suggestions for common issues
 */
export const ERROR_SUGGESTIONS = {
  ESCAPE_AT_END: "Escape a trailing '%' as '%%'",
  UNTERMINATED_CLASS: "Close every bracket class with ']' (write '%]' for a literal bracket)",
  BALANCE_ARGUMENTS: "Follow '%b' with exactly two delimiter bytes, e.g. '%b()'",
  FRONTIER_SET: "Follow '%f' with a bracket class, e.g. '%f[%w]'",
  CAPTURE_INDEX: "Backreferences must name a capture that is already closed",
  TOO_MANY_CAPTURES: "Split the pattern into several matches with fewer captures",
  TOO_COMPLEX: "Reduce the number of consecutive quantified items in the pattern",
  RESULT_TOO_LONG: "Produce the result in smaller pieces",
  BAD_ARGUMENT: "Pass a ByteString, Uint8Array or string",
} as const;

/**
 * Get helpful suggestion for common error patterns
 */
export function getErrorSuggestion(error: BytepatError): string | undefined {
  if (error instanceof ResourceLimitError) {
    switch (error.resourceType) {
      case "captures":
        return ERROR_SUGGESTIONS.TOO_MANY_CAPTURES;
      case "recursion":
        return ERROR_SUGGESTIONS.TOO_COMPLEX;
      case "length":
        return ERROR_SUGGESTIONS.RESULT_TOO_LONG;
    }
  }

  const message = error.message.toLowerCase();

  if (message.includes("ends with '%'")) {
    return ERROR_SUGGESTIONS.ESCAPE_AT_END;
  }
  if (message.includes("missing ']'")) {
    return ERROR_SUGGESTIONS.UNTERMINATED_CLASS;
  }
  if (message.includes("'%b'")) {
    return ERROR_SUGGESTIONS.BALANCE_ARGUMENTS;
  }
  if (message.includes("'%f'")) {
    return ERROR_SUGGESTIONS.FRONTIER_SET;
  }
  if (message.includes("capture")) {
    return ERROR_SUGGESTIONS.CAPTURE_INDEX;
  }
  if (message.includes("byte sequence")) {
    return ERROR_SUGGESTIONS.BAD_ARGUMENT;
  }

  return undefined;
}

function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (typeof value === "object") {
    const ctor: unknown = Object.getPrototypeOf(value)?.constructor;
    return typeof ctor === "function" && ctor.name !== "" ? ctor.name : "object";
  }
  return typeof value;
}
