/**
 * Position Set
 *
 * Sorted, merged collection of position selectors plus quote selectors that
 * have not been anchored to a document yet. Every operation returns a new set;
 * the constructor normalizes, so no caller ever sees overlapping or adjacent
 * intervals.
 */

import {
  InvalidSelectorError,
  SelectorErrorCodes,
  TextSelectionError,
} from "../errors.js";
import { getLogger } from "../observability/logger.js";
import {
  DEFAULT_PUNCTUATION_MARGIN,
  type PreviewOptions,
  type PunctuationMarginOptions,
  type QuoteOptions,
  resolveOptions,
} from "../options.js";
import { TextSequence } from "../sequence/textSequence.js";
import { type PositionLike, PositionSelector } from "./positionSelector.js";
import { QuoteSelector } from "./quoteSelector.js";

export type PositionTuple = readonly [start: number, end?: number | null];

// ============================================================================
// Normalization
// ============================================================================

/**
 * Sort by start and merge every run of overlapping or touching intervals.
 */
export function normalizeIntervals(intervals: readonly PositionSelector[]): PositionSelector[] {
  const sorted = [...intervals].sort(PositionSelector.compare);
  const merged: PositionSelector[] = [];
  for (const interval of sorted) {
    const last = merged[merged.length - 1];
    if (last && interval.start <= last.end) {
      merged[merged.length - 1] = last.merge(interval);
    } else {
      merged.push(interval);
    }
  }
  return merged;
}

function dedupeQuotes(quotes: readonly QuoteSelector[]): QuoteSelector[] {
  const seen = new Map<string, QuoteSelector>();
  for (const quote of quotes) {
    if (!seen.has(quote.key())) {
      seen.set(quote.key(), quote);
    }
  }
  return [...seen.values()];
}

function toPositions(other: PositionLike): readonly PositionSelector[] {
  return other instanceof PositionSelector ? [other] : other.positions;
}

/**
 * Parts of `interval` not covered by any of `cuts` (which must be normalized).
 */
function cutInterval(
  interval: PositionSelector,
  cuts: readonly PositionSelector[]
): PositionSelector[] {
  const pieces: PositionSelector[] = [];
  let cursor = interval.start;
  for (const cut of cuts) {
    if (cut.end <= cursor || cut.start >= interval.end) {
      continue;
    }
    if (cut.start > cursor) {
      pieces.push(new PositionSelector(cursor, cut.start));
    }
    cursor = Math.max(cursor, cut.end);
    if (cursor >= interval.end) {
      return pieces;
    }
  }
  pieces.push(new PositionSelector(cursor, interval.end));
  return pieces;
}

function assertMargin(value: number, name: string): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidSelectorError(
      SelectorErrorCodes.INVALID_ARGUMENT,
      `${name} must be a non-negative integer, got ${value}`,
      { context: { [name]: value } }
    );
  }
}

// ============================================================================
// Position Set
// ============================================================================

export class PositionSet {
  readonly positions: readonly PositionSelector[];
  readonly quotes: readonly QuoteSelector[];

  constructor(
    positions: readonly PositionSelector[] = [],
    quotes: readonly QuoteSelector[] = []
  ) {
    this.positions = normalizeIntervals(positions);
    this.quotes = dedupeQuotes(quotes);
  }

  static empty(): PositionSet {
    return new PositionSet();
  }

  static fromTuples(tuples: readonly PositionTuple[]): PositionSet {
    return new PositionSet(tuples.map(([start, end]) => new PositionSelector(start, end)));
  }

  static fromQuotes(quotes: readonly (QuoteSelector | string)[]): PositionSet {
    return new PositionSet(
      [],
      quotes.map((quote) => (typeof quote === "string" ? new QuoteSelector(quote) : quote))
    );
  }

  isEmpty(): boolean {
    return this.positions.length === 0 && this.quotes.length === 0;
  }

  /** Total number of characters covered by the resolved intervals */
  coverage(): number {
    return this.positions.reduce((total, position) => total + position.length(), 0);
  }

  // ==========================================================================
  // Set algebra
  // ==========================================================================

  union(other: PositionLike | QuoteSelector): PositionSet {
    if (other instanceof QuoteSelector) {
      return new PositionSet(this.positions, [...this.quotes, other]);
    }
    if (other instanceof PositionSelector) {
      return new PositionSet([...this.positions, other], this.quotes);
    }
    return new PositionSet(
      [...this.positions, ...other.positions],
      [...this.quotes, ...other.quotes]
    );
  }

  /** Pairwise overlap of the intervals. Quotes are dropped. */
  intersect(other: PositionLike): PositionSet {
    const overlaps: PositionSelector[] = [];
    for (const left of this.positions) {
      for (const right of toPositions(other)) {
        const overlap = left.intersect(right);
        if (overlap) {
          overlaps.push(overlap);
        }
      }
    }
    return new PositionSet(overlaps);
  }

  /** Intervals of this set with everything in `other` cut out. Quotes are kept. */
  difference(other: PositionLike): PositionSet {
    const cuts = normalizeIntervals(toPositions(other));
    return new PositionSet(
      this.positions.flatMap((position) => cutInterval(position, cuts)),
      this.quotes
    );
  }

  covers(other: PositionLike): boolean {
    const wanted = normalizeIntervals(toPositions(other));
    const overlap = this.intersect(other).positions;
    return (
      overlap.length === wanted.length &&
      overlap.every((position, index) => {
        const match = wanted[index];
        return match !== undefined && position.equals(match);
      })
    );
  }

  strictlyCovers(other: PositionLike): boolean {
    return this.covers(other) && !new PositionSet(toPositions(other)).samePositions(this);
  }

  equals(other: PositionSet): boolean {
    if (!this.samePositions(other) || this.quotes.length !== other.quotes.length) {
      return false;
    }
    const keys = new Set(this.quotes.map((quote) => quote.key()));
    return other.quotes.every((quote) => keys.has(quote.key()));
  }

  private samePositions(other: PositionSet): boolean {
    return (
      this.positions.length === other.positions.length &&
      this.positions.every((position, index) => {
        const match = other.positions[index];
        return match !== undefined && position.equals(match);
      })
    );
  }

  // ==========================================================================
  // Offset arithmetic
  // ==========================================================================

  /** Translate every interval; fails if any start would become negative */
  shift(n: number): PositionSet {
    return new PositionSet(
      this.positions.map((position) => position.shift(n)),
      this.quotes
    );
  }

  /** Move every interval left by `n`, clipping starts at zero */
  subtract(n: number): PositionSet {
    return new PositionSet(
      this.positions.map((position) => position.subtract(n)),
      this.quotes
    );
  }

  /**
   * Widen every interval by `left` characters before it (clipped at zero) and
   * `right` characters after it. Quotes are kept as they are.
   */
  addMargin(left: number, right: number = left): PositionSet {
    assertMargin(left, "left");
    assertMargin(right, "right");
    return new PositionSet(
      this.positions.map(
        (position) => new PositionSelector(Math.max(0, position.start - left), position.end + right)
      ),
      this.quotes
    );
  }

  // ==========================================================================
  // Document-bound operations
  // ==========================================================================

  /**
   * Resolve every stored quote against `document` and fold the results into
   * the intervals. Fails on the first quote that does not resolve.
   */
  resolveQuotes(document: string): PositionSet {
    if (this.quotes.length === 0) {
      return this;
    }
    const resolved = this.quotes.map((quote, index) => {
      try {
        return quote.resolve(document);
      } catch (error) {
        if (!(error instanceof TextSelectionError)) {
          throw error;
        }
        getLogger().warn("quote resolution failed", {
          quoteIndex: index,
          reason: error.reason,
          matchCount: error.matchCount,
        });
        throw new TextSelectionError(
          error.reason,
          `Quote ${index} could not be resolved: ${error.message}`,
          error.matchCount,
          { context: { ...error.context, quoteIndex: index }, cause: error }
        );
      }
    });
    return new PositionSet([...this.positions, ...resolved]);
  }

  /**
   * Resolve quotes, then fill each gap between neighbouring intervals that is
   * at most `width` long and made only of margin characters.
   */
  bridgePunctuation(document: string, options?: Partial<PunctuationMarginOptions>): PositionSet {
    const { width, characters } = resolveOptions(DEFAULT_PUNCTUATION_MARGIN, options);
    if (!Number.isInteger(width) || width < 1) {
      throw new InvalidSelectorError(
        SelectorErrorCodes.INVALID_ARGUMENT,
        `Margin width must be a positive integer, got ${width}`,
        { context: { width } }
      );
    }
    const { positions } = this.resolveQuotes(document);
    const bridges: PositionSelector[] = [];
    positions.forEach((left, index) => {
      const right = positions[index + 1];
      if (!right || left.isUnbounded) {
        return;
      }
      const gap = document.slice(left.end, right.start);
      const gapWidth = right.start - left.end;
      if (
        gapWidth <= width &&
        gap.length === gapWidth &&
        [...gap].every((char) => characters.includes(char))
      ) {
        bridges.push(new PositionSelector(left.end, right.start));
      }
    });
    return new PositionSet([...positions, ...bridges]);
  }

  /** Each interval as a quote selector that is unique in `document` */
  positionsAsQuotes(document: string, options?: Partial<QuoteOptions>): QuoteSelector[] {
    return this.positions.map((position) => position.uniqueQuote(document, options));
  }

  asQuotes(document: string, options?: Partial<QuoteOptions>): QuoteSelector[] {
    return [...this.positionsAsQuotes(document, options), ...this.quotes];
  }

  asTextSequence(document: string): TextSequence {
    return TextSequence.render(document, this);
  }

  preview(document: string, options?: Partial<PreviewOptions>): string {
    return this.asTextSequence(document).preview(options);
  }

  /**
   * Selected text with punctuation gaps bridged, every omission marked by the
   * ellipsis.
   */
  selectText(
    document: string,
    margin?: Partial<PunctuationMarginOptions>,
    options?: Partial<PreviewOptions>
  ): string {
    return this.bridgePunctuation(document, margin).asTextSequence(document).format(options);
  }

  toString(): string {
    const positions = this.positions.map((position) => position.toString()).join(", ");
    const quotes = this.quotes.map((quote) => quote.toString()).join(", ");
    return `PositionSet([${positions}], [${quotes}])`;
  }
}
