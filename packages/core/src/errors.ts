/**
 * Selector Error Code Registry
 *
 * Standardized error codes for selector construction, resolution and arithmetic.
 * Every failure raised by the core is a {@link SelectorError} subclass with a
 * deterministic numeric code, so callers can branch on `code` instead of messages.
 */

// ============================================================================
// Error Code Ranges
// ============================================================================

/**
 * Selector Error Codes
 *
 * Ranges:
 * - 1000-1999: Construction errors
 * - 2000-2999: Quote resolution errors
 * - 3000-3999: Interval arithmetic errors
 * - 4000-4999: Document bounds errors
 * - 5000-5999: Schema errors (raised by the schema package)
 */
export enum SelectorErrorCodes {
  // ============================================================================
  // 1000-1999: Construction
  // ============================================================================

  /** Start offset is negative or not an integer */
  INVALID_START = 1001,
  /** End offset is not after the start offset */
  INVALID_END = 1002,
  /** Quote selector has no exact text and no usable context */
  EMPTY_QUOTE = 1003,
  /** Margin or shift argument is not a usable integer */
  INVALID_ARGUMENT = 1004,

  // ============================================================================
  // 2000-2999: Quote resolution
  // ============================================================================

  /** No qualifying match in the document */
  QUOTE_NOT_FOUND = 2001,
  /** More than one qualifying match in the document */
  QUOTE_AMBIGUOUS = 2002,
  /** Context matched but the span between prefix and suffix is empty */
  QUOTE_EMPTY_SPAN = 2003,

  // ============================================================================
  // 3000-3999: Interval arithmetic
  // ============================================================================

  /** Shift would move the start offset below zero */
  RANGE_UNDERFLOW = 3001,
  /** Pairwise merge of intervals that neither overlap nor touch */
  INCOMPATIBLE_RANGES = 3002,

  // ============================================================================
  // 4000-4999: Document bounds
  // ============================================================================

  /** Selector reaches past the end of the document */
  OUT_OF_BOUNDS = 4001,

  // ============================================================================
  // 5000-5999: Schema
  // ============================================================================

  /** Serialized record failed validation */
  SCHEMA_INVALID = 5001,
  /** Shorthand value is malformed */
  SHORTHAND_MALFORMED = 5002,
}

export type SelectorErrorCategory =
  | "construction"
  | "resolution"
  | "arithmetic"
  | "bounds"
  | "schema"
  | "unknown";

function getErrorCategory(code: SelectorErrorCodes): SelectorErrorCategory {
  if (code >= 1000 && code < 2000) {
    return "construction";
  }
  if (code >= 2000 && code < 3000) {
    return "resolution";
  }
  if (code >= 3000 && code < 4000) {
    return "arithmetic";
  }
  if (code >= 4000 && code < 5000) {
    return "bounds";
  }
  if (code >= 5000 && code < 6000) {
    return "schema";
  }
  return "unknown";
}

// ============================================================================
// Literal truncation
// ============================================================================

/** Longest literal text copied into an error message */
export const MAX_LITERAL_LENGTH = 100;

/**
 * Shorten literal text before it is embedded in an error message.
 */
export function truncateLiteral(text: string, maxLength: number = MAX_LITERAL_LENGTH): string {
  if (text.length <= maxLength) {
    return text;
  }
  return `${text.slice(0, maxLength)}...`;
}

// ============================================================================
// Error Classes
// ============================================================================

export type SelectorErrorOptions = {
  context?: Record<string, unknown>;
  cause?: unknown;
};

export interface SelectorErrorJSON {
  name: string;
  code: SelectorErrorCodes;
  category: SelectorErrorCategory;
  message: string;
  context?: Record<string, unknown>;
  timestamp: number;
}

/**
 * Base class for every failure raised by selector operations.
 */
export class SelectorError extends Error {
  readonly code: SelectorErrorCodes;
  readonly category: SelectorErrorCategory;
  readonly context?: Record<string, unknown>;
  readonly timestamp: number;

  constructor(code: SelectorErrorCodes, message: string, options: SelectorErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "SelectorError";
    this.code = code;
    this.category = getErrorCategory(code);
    this.context = options.context;
    this.timestamp = Date.now();
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): SelectorErrorJSON {
    return {
      name: this.name,
      code: this.code,
      category: this.category,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp,
    };
  }
}

/** Construction-time invariant violation */
export class InvalidSelectorError extends SelectorError {
  constructor(code: SelectorErrorCodes, message: string, options?: SelectorErrorOptions) {
    super(code, message, options);
    this.name = "InvalidSelectorError";
  }
}

export type TextSelectionFailure = "no_match" | "ambiguous" | "empty_span";

/** Quote resolution found zero, or more than one, qualifying match */
export class TextSelectionError extends SelectorError {
  readonly reason: TextSelectionFailure;
  readonly matchCount: number;

  constructor(
    reason: TextSelectionFailure,
    message: string,
    matchCount: number,
    options: SelectorErrorOptions = {}
  ) {
    super(codeForFailure(reason), message, {
      ...options,
      context: { reason, matchCount, ...options.context },
    });
    this.name = "TextSelectionError";
    this.reason = reason;
    this.matchCount = matchCount;
  }
}

function codeForFailure(reason: TextSelectionFailure): SelectorErrorCodes {
  switch (reason) {
    case "ambiguous":
      return SelectorErrorCodes.QUOTE_AMBIGUOUS;
    case "empty_span":
      return SelectorErrorCodes.QUOTE_EMPTY_SPAN;
    default:
      return SelectorErrorCodes.QUOTE_NOT_FOUND;
  }
}

/** A shift would push a start offset below zero */
export class RangeUnderflowError extends SelectorError {
  constructor(message: string, options?: SelectorErrorOptions) {
    super(SelectorErrorCodes.RANGE_UNDERFLOW, message, options);
    this.name = "RangeUnderflowError";
  }
}

/** Strict pairwise merge called on disjoint intervals */
export class IncompatibleRangeError extends SelectorError {
  constructor(message: string, options?: SelectorErrorOptions) {
    super(SelectorErrorCodes.INCOMPATIBLE_RANGES, message, options);
    this.name = "IncompatibleRangeError";
  }
}

/** A selector reaches past the end of the target document */
export class OutOfBoundsError extends SelectorError {
  constructor(message: string, options?: SelectorErrorOptions) {
    super(SelectorErrorCodes.OUT_OF_BOUNDS, message, options);
    this.name = "OutOfBoundsError";
  }
}

// ============================================================================
// Type Guards
// ============================================================================

export function isSelectorError(error: unknown): error is SelectorError {
  return error instanceof SelectorError;
}

export function hasErrorCode(error: unknown, code: SelectorErrorCodes): boolean {
  return isSelectorError(error) && error.code === code;
}

export function hasErrorCategory(error: unknown, category: SelectorErrorCategory): boolean {
  return isSelectorError(error) && error.category === category;
}
