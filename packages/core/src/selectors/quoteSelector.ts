/**
 * Quote Selector
 *
 * Locates a span by the text it contains (`exact`) and the text around it
 * (`prefix`, `suffix`). Resolution is exact-substring matching; a quote that
 * matches more than once after filtering by context is ambiguous and fails.
 */

import {
  InvalidSelectorError,
  SelectorErrorCodes,
  TextSelectionError,
  type TextSelectionFailure,
  truncateLiteral,
} from "../errors.js";
import { getLogger } from "../observability/logger.js";
import { PositionSelector } from "./positionSelector.js";
import {
  endsWithWhitespace,
  findOccurrences,
  isFollowedBy,
  isPrecededBy,
  skipWhitespaceBackward,
  skipWhitespaceForward,
  startsWithWhitespace,
} from "./textMatch.js";

export interface QuoteSelectorInit {
  exact?: string;
  prefix?: string;
  suffix?: string;
}

/** Outcome of locating a quote without throwing */
export type QuoteLocation =
  | { kind: "found"; start: number; end: number }
  | { kind: TextSelectionFailure; matchCount: number };

type ContextMatch =
  | { kind: "found"; index: number }
  | { kind: TextSelectionFailure; matchCount: number };

function locateUnique(document: string, needle: string): ContextMatch {
  const occurrences = findOccurrences(document, needle);
  const [index] = occurrences;
  if (index === undefined) {
    return { kind: "no_match", matchCount: 0 };
  }
  if (occurrences.length > 1) {
    return { kind: "ambiguous", matchCount: occurrences.length };
  }
  return { kind: "found", index };
}

export class QuoteSelector {
  readonly exact: string;
  readonly prefix: string;
  readonly suffix: string;

  constructor(init: QuoteSelectorInit | string) {
    const fields = typeof init === "string" ? { exact: init } : init;
    this.exact = fields.exact ?? "";
    this.prefix = fields.prefix ?? "";
    this.suffix = fields.suffix ?? "";
    if (
      this.exact.length === 0 &&
      this.prefix.trim().length === 0 &&
      this.suffix.trim().length === 0
    ) {
      throw new InvalidSelectorError(
        SelectorErrorCodes.EMPTY_QUOTE,
        "Quote selector needs exact text, a prefix or a suffix"
      );
    }
  }

  /**
   * Find the span this quote refers to in `document`.
   */
  locate(document: string): QuoteLocation {
    const location =
      this.exact.length > 0 ? this.locateExact(document) : this.locateBetweenContext(document);
    getLogger().debug("quote located", {
      exact: truncateLiteral(this.exact),
      outcome: location.kind,
    });
    return location;
  }

  // Whitespace at an edge of `exact` is part of the match, so context on that
  // side must sit right against it.
  private locateExact(document: string): QuoteLocation {
    const looseBefore = !startsWithWhitespace(this.exact);
    const looseAfter = !endsWithWhitespace(this.exact);
    const candidates = findOccurrences(document, this.exact).filter(
      (index) =>
        isPrecededBy(document, index, this.prefix, looseBefore) &&
        isFollowedBy(document, index + this.exact.length, this.suffix, looseAfter)
    );
    const [start] = candidates;
    if (start === undefined) {
      return { kind: "no_match", matchCount: 0 };
    }
    if (candidates.length > 1) {
      return { kind: "ambiguous", matchCount: candidates.length };
    }
    return { kind: "found", start, end: start + this.exact.length };
  }

  private locateBetweenContext(document: string): QuoteLocation {
    const prefix = this.prefix.trim();
    const suffix = this.suffix.trim();

    let contentStart = 0;
    let prefixEnd = 0;
    if (prefix.length > 0) {
      const match = locateUnique(document, prefix);
      if (match.kind !== "found") {
        return match;
      }
      prefixEnd = match.index + prefix.length;
      contentStart = skipWhitespaceForward(document, prefixEnd);
    }

    let contentEnd = document.length;
    if (suffix.length > 0) {
      const match = locateUnique(document, suffix);
      if (match.kind !== "found") {
        return match;
      }
      if (match.index < prefixEnd) {
        return { kind: "no_match", matchCount: 0 };
      }
      contentEnd = skipWhitespaceBackward(document, match.index);
    }

    if (contentEnd <= contentStart) {
      return { kind: "empty_span", matchCount: 1 };
    }
    return { kind: "found", start: contentStart, end: contentEnd };
  }

  /**
   * Resolve to exact offsets, failing with {@link TextSelectionError} unless
   * exactly one span qualifies.
   */
  resolve(document: string): PositionSelector {
    const location = this.locate(document);
    if (location.kind === "found") {
      return new PositionSelector(location.start, location.end);
    }
    throw new TextSelectionError(
      location.kind,
      this.describeFailure(location.kind, location.matchCount),
      location.matchCount,
      {
        context: {
          exact: truncateLiteral(this.exact),
          prefix: truncateLiteral(this.prefix),
          suffix: truncateLiteral(this.suffix),
        },
      }
    );
  }

  asPosition(document: string): PositionSelector {
    return this.resolve(document);
  }

  selectText(document: string): string {
    return this.resolve(document).selectText(document);
  }

  isUniqueIn(document: string): boolean {
    return this.locate(document).kind === "found";
  }

  /**
   * Copy with `exact` taken from `document`, or `null` if the quote does not
   * resolve there.
   */
  rebuild(document: string): QuoteSelector | null {
    const location = this.locate(document);
    if (location.kind !== "found") {
      return null;
    }
    return new QuoteSelector({
      exact: document.slice(location.start, location.end),
      prefix: this.prefix,
      suffix: this.suffix,
    });
  }

  /** Canonical identity used for set membership */
  key(): string {
    return JSON.stringify([this.exact, this.prefix, this.suffix]);
  }

  equals(other: QuoteSelector): boolean {
    return this.exact === other.exact && this.prefix === other.prefix && this.suffix === other.suffix;
  }

  toString(): string {
    return `QuoteSelector(${JSON.stringify(this.prefix)}|${JSON.stringify(this.exact)}|${JSON.stringify(this.suffix)})`;
  }

  private describeFailure(reason: TextSelectionFailure, matchCount: number): string {
    const quote = `"${truncateLiteral(this.prefix)}|${truncateLiteral(this.exact)}|${truncateLiteral(this.suffix)}"`;
    switch (reason) {
      case "ambiguous":
        return `Quote ${quote} matched ${matchCount} locations in the text`;
      case "empty_span":
        return `Quote ${quote} selects no text between its prefix and suffix`;
      default:
        return `Quote ${quote} was not found in the text`;
    }
  }
}
