/**
 * Position Selector
 *
 * An immutable half-open character interval `[start, end)` over some document.
 * `end` may be unbounded, in which case it is stored as `Number.POSITIVE_INFINITY`
 * and the selector runs to the end of whatever document it is applied to.
 */

import {
  IncompatibleRangeError,
  InvalidSelectorError,
  OutOfBoundsError,
  RangeUnderflowError,
  SelectorErrorCodes,
  TextSelectionError,
  truncateLiteral,
} from "../errors.js";
import { DEFAULT_QUOTE_OPTIONS, type QuoteOptions, resolveOptions } from "../options.js";
import { PositionSet } from "./positionSet.js";
import { QuoteSelector } from "./quoteSelector.js";

/** Anything the containment and union operations accept on their right-hand side */
export type PositionLike = PositionSelector | PositionSet;

function assertInteger(value: number, name: string): void {
  if (!Number.isInteger(value)) {
    throw new InvalidSelectorError(
      SelectorErrorCodes.INVALID_ARGUMENT,
      `${name} must be an integer, got ${value}`,
      { context: { [name]: value } }
    );
  }
}

function assertNonNegativeInteger(value: number, name: string): void {
  assertInteger(value, name);
  if (value < 0) {
    throw new InvalidSelectorError(
      SelectorErrorCodes.INVALID_ARGUMENT,
      `${name} must not be negative, got ${value}`,
      { context: { [name]: value } }
    );
  }
}

function indexOfOrFail(document: string, needle: string): number {
  const index = document.indexOf(needle);
  if (index === -1) {
    throw new TextSelectionError(
      "no_match",
      `String "${truncateLiteral(needle)}" not found in text`,
      0
    );
  }
  return index;
}

export class PositionSelector {
  readonly start: number;
  readonly end: number;

  constructor(start: number, end?: number | null) {
    if (!Number.isInteger(start) || start < 0) {
      throw new InvalidSelectorError(
        SelectorErrorCodes.INVALID_START,
        `Start position must be a non-negative integer, got ${start}`,
        { context: { start, end } }
      );
    }
    const resolvedEnd = end ?? Number.POSITIVE_INFINITY;
    if (resolvedEnd !== Number.POSITIVE_INFINITY && !Number.isInteger(resolvedEnd)) {
      throw new InvalidSelectorError(
        SelectorErrorCodes.INVALID_END,
        `End position must be an integer or unbounded, got ${resolvedEnd}`,
        { context: { start, end } }
      );
    }
    if (resolvedEnd <= start) {
      throw new InvalidSelectorError(
        SelectorErrorCodes.INVALID_END,
        `End position must be greater than start position (${start}, ${resolvedEnd})`,
        { context: { start, end } }
      );
    }
    this.start = start;
    this.end = resolvedEnd;
  }

  /**
   * Build a selector from offsets, or from strings located in `document`.
   *
   * A string `start` resolves to the index of its first occurrence; a string
   * `end` resolves to the end of its first occurrence.
   */
  static between(
    document: string,
    start: number | string = 0,
    end?: number | string | null
  ): PositionSelector {
    const startIndex = typeof start === "string" ? indexOfOrFail(document, start) : start;
    const endIndex = typeof end === "string" ? indexOfOrFail(document, end) + end.length : end;
    return new PositionSelector(startIndex, endIndex);
  }

  static compare(a: PositionSelector, b: PositionSelector): number {
    if (a.start !== b.start) {
      return a.start - b.start;
    }
    if (a.end === b.end) {
      return 0;
    }
    return a.end < b.end ? -1 : 1;
  }

  get isUnbounded(): boolean {
    return this.end === Number.POSITIVE_INFINITY;
  }

  /** End offset for serialization: `null` when unbounded */
  get boundedEnd(): number | null {
    return this.isUnbounded ? null : this.end;
  }

  length(): number {
    return this.end - this.start;
  }

  equals(other: PositionSelector): boolean {
    return this.start === other.start && this.end === other.end;
  }

  /** True if the two intervals share at least one offset */
  overlaps(other: PositionSelector): boolean {
    return this.start < other.end && other.start < this.end;
  }

  /** True if one interval ends exactly where the other begins */
  touches(other: PositionSelector): boolean {
    return this.end === other.start || other.end === this.start;
  }

  /**
   * Strict pairwise union. Disjoint inputs cannot be represented by a single
   * selector and fail with {@link IncompatibleRangeError}.
   */
  merge(other: PositionSelector): PositionSelector {
    if (!this.overlaps(other) && !this.touches(other)) {
      throw new IncompatibleRangeError(
        `Cannot merge disjoint ranges ${this.toString()} and ${other.toString()}`,
        { context: { left: [this.start, this.boundedEnd], right: [other.start, other.boundedEnd] } }
      );
    }
    return new PositionSelector(
      Math.min(this.start, other.start),
      Math.max(this.end, other.end)
    );
  }

  /**
   * Union with a selector or set: a single selector when the result is one
   * interval with no pending quotes, otherwise a {@link PositionSet}.
   */
  union(other: PositionLike): PositionSelector | PositionSet {
    const combined = new PositionSet([this]).union(other);
    const [only] = combined.positions;
    if (only && combined.positions.length === 1 && combined.quotes.length === 0) {
      return only;
    }
    return combined;
  }

  /** Overlapping sub-interval, or `null` when the intervals share no offset */
  intersect(other: PositionSelector): PositionSelector | null {
    if (!this.overlaps(other)) {
      return null;
    }
    return new PositionSelector(
      Math.max(this.start, other.start),
      Math.min(this.end, other.end)
    );
  }

  /** Parts of this interval not covered by `other` */
  difference(other: PositionLike): PositionSet {
    return new PositionSet([this]).difference(other);
  }

  covers(other: PositionLike): boolean {
    if (other instanceof PositionSelector) {
      return other.start >= this.start && other.end <= this.end;
    }
    return other.positions.every((position) => this.covers(position));
  }

  strictlyCovers(other: PositionLike): boolean {
    if (!this.covers(other)) {
      return false;
    }
    if (other instanceof PositionSelector) {
      return !this.equals(other);
    }
    const [only] = other.positions;
    return !(only && other.positions.length === 1 && this.equals(only));
  }

  /**
   * Translate both bounds by `n`. Fails with {@link RangeUnderflowError} when
   * the start would become negative.
   */
  shift(n: number): PositionSelector {
    assertInteger(n, "shift");
    if (this.start + n < 0) {
      throw new RangeUnderflowError(
        `Adding ${n} to ${this.toString()} would result in a negative start position`,
        { context: { start: this.start, end: this.boundedEnd, shift: n } }
      );
    }
    return new PositionSelector(this.start + n, this.end + n);
  }

  /**
   * Move both bounds left by `n`, clipping the start at zero. Only an end
   * that would no longer lie after the clipped start is an error.
   */
  subtract(n: number): PositionSelector {
    assertInteger(n, "subtract");
    const start = Math.max(0, this.start - n);
    const end = this.end - n;
    if (end <= start) {
      throw new RangeUnderflowError(
        `Subtracting ${n} from ${this.toString()} would leave no text before the end position`,
        { context: { start: this.start, end: this.boundedEnd, subtract: n } }
      );
    }
    return new PositionSelector(start, end);
  }

  /** Throws {@link OutOfBoundsError} unless this interval lies inside `document` */
  verifyTextPositions(document: string): void {
    const tooShort = this.isUnbounded
      ? this.start > document.length
      : this.end > document.length;
    if (tooShort) {
      throw new OutOfBoundsError(
        `Text "${truncateLiteral(document)}" is too short to include the interval ${this.toString()}`,
        { context: { start: this.start, end: this.boundedEnd, documentLength: document.length } }
      );
    }
  }

  selectText(document: string): string {
    this.verifyTextPositions(document);
    return document.slice(this.start, this.end);
  }

  /**
   * Quote selector for this interval, taking `leftMargin` characters before it
   * as the prefix and `rightMargin` characters after it as the suffix.
   */
  asQuote(document: string, leftMargin = 0, rightMargin = 0): QuoteSelector {
    assertNonNegativeInteger(leftMargin, "leftMargin");
    assertNonNegativeInteger(rightMargin, "rightMargin");
    if (this.start >= document.length) {
      throw new OutOfBoundsError(
        `String of length ${document.length} is not long enough to include any of the range ${this.toString()}`,
        { context: { start: this.start, end: this.boundedEnd, documentLength: document.length } }
      );
    }
    const exact = this.selectText(document);
    const end = Math.min(this.end, document.length);
    return new QuoteSelector({
      exact,
      prefix: document.slice(Math.max(0, this.start - leftMargin), this.start),
      suffix: document.slice(end, Math.min(document.length, end + rightMargin)),
    });
  }

  /**
   * Quote selector that resolves back to exactly this interval, widening the
   * context on both sides until the quote is unique in `document`.
   */
  uniqueQuote(document: string, options?: Partial<QuoteOptions>): QuoteSelector {
    const { marginStep } = resolveOptions(DEFAULT_QUOTE_OPTIONS, options);
    assertNonNegativeInteger(marginStep, "marginStep");
    if (marginStep === 0) {
      throw new InvalidSelectorError(
        SelectorErrorCodes.INVALID_ARGUMENT,
        "marginStep must be at least 1"
      );
    }
    const exact = this.selectText(document);
    for (let margin = 0; margin < document.length - exact.length; margin += marginStep) {
      const candidate = this.asQuote(document, margin, margin);
      if (this.isLocatedBy(candidate, document)) {
        return candidate;
      }
    }
    const fallback = new QuoteSelector({
      exact,
      prefix: document.slice(0, this.start),
      suffix: document.slice(this.start + exact.length),
    });
    if (!this.isLocatedBy(fallback, document)) {
      const location = fallback.locate(document);
      throw new TextSelectionError(
        "ambiguous",
        `No quote in the text resolves uniquely to ${this.toString()}`,
        location.kind === "found" ? 1 : location.matchCount,
        { context: { start: this.start, end: this.boundedEnd } }
      );
    }
    return fallback;
  }

  private isLocatedBy(quote: QuoteSelector, document: string): boolean {
    const location = quote.locate(document);
    return (
      location.kind === "found" &&
      location.start === this.start &&
      location.end === this.start + quote.exact.length
    );
  }

  toString(): string {
    return `PositionSelector(${this.start}, ${this.isUnbounded ? "unbounded" : this.end})`;
  }
}
