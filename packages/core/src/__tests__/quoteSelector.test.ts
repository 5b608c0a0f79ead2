/**
 * Quote Selector Tests
 */

import { describe, expect, it } from "vitest";
import {
  hasErrorCode,
  InvalidSelectorError,
  SelectorErrorCodes,
  TextSelectionError,
} from "../errors.js";
import { PositionSelector } from "../selectors/positionSelector.js";
import { QuoteSelector } from "../selectors/quoteSelector.js";
import { captureError } from "./fixtures/captureError.js";
import { legalText, s102b } from "./fixtures/passages.js";

describe("QuoteSelector construction", () => {
  it("accepts a bare string as the exact text", () => {
    const quote = new QuoteSelector("process");
    expect(quote.exact).toBe("process");
    expect(quote.prefix).toBe("");
    expect(quote.suffix).toBe("");
  });

  it("rejects a quote with nothing to match", () => {
    const error = captureError(() => new QuoteSelector({}));
    expect(error).toBeInstanceOf(InvalidSelectorError);
    expect(hasErrorCode(error, SelectorErrorCodes.EMPTY_QUOTE)).toBe(true);
  });

  it("rejects whitespace-only context without exact text", () => {
    expect(() => new QuoteSelector({ prefix: "  ", suffix: "\n" })).toThrow(InvalidSelectorError);
  });

  it("compares by all three fields", () => {
    const quote = new QuoteSelector({ exact: "work", prefix: "such" });
    expect(quote.equals(new QuoteSelector({ exact: "work", prefix: "such" }))).toBe(true);
    expect(quote.equals(new QuoteSelector({ exact: "work", suffix: "such" }))).toBe(false);
    expect(quote.key()).toBe('["work","such",""]');
  });
});

describe("QuoteSelector resolution with exact text", () => {
  it("resolves a phrase that occurs once", () => {
    const position = new QuoteSelector("process").resolve(s102b);
    expect(position.equals(new PositionSelector(103, 110))).toBe(true);
  });

  it("uses the suffix to pick one of several matches", () => {
    const quote = new QuoteSelector({ exact: "authorship", suffix: "include" });
    expect(quote.resolve(legalText).equals(new PositionSelector(306, 316))).toBe(true);
  });

  it("uses the prefix to pick one of several matches", () => {
    const quote = new QuoteSelector({ exact: "work", prefix: "such" });
    expect(quote.asPosition(s102b).toString()).toBe("PositionSelector(268, 272)");
    expect(quote.selectText(s102b)).toBe("work");
  });

  it("fails on repeated text without context", () => {
    const error = captureError(() => new QuoteSelector("authorship").resolve(legalText));
    expect(error).toBeInstanceOf(TextSelectionError);
    expect(error).toMatchObject({ reason: "ambiguous", matchCount: 2 });
    expect(hasErrorCode(error, SelectorErrorCodes.QUOTE_AMBIGUOUS)).toBe(true);
  });

  it("fails when context still leaves several matches", () => {
    const quote = new QuoteSelector({ exact: "authorship", prefix: "of" });
    expect(quote.locate(legalText)).toEqual({ kind: "ambiguous", matchCount: 2 });
  });

  it("fails when the only match has the wrong context", () => {
    const quote = new QuoteSelector({ exact: "process", prefix: "method" });
    expect(quote.locate(s102b)).toEqual({ kind: "no_match", matchCount: 0 });
  });

  it("does not skip whitespace that belongs to the quoted text", () => {
    const text = "foo  bar";
    const quote = new QuoteSelector({ exact: " ", prefix: "foo" });
    expect(quote.locate(text)).toEqual({ kind: "found", start: 3, end: 4 });
    expect(new QuoteSelector({ exact: " ", suffix: "bar" }).locate(text)).toEqual({
      kind: "found",
      start: 4,
      end: 5,
    });
  });

  it("fails on text that is absent", () => {
    const error = captureError(() => new QuoteSelector("patent").resolve(legalText));
    expect(error).toMatchObject({ reason: "no_match", code: SelectorErrorCodes.QUOTE_NOT_FOUND });
  });

  it("matches case-sensitively", () => {
    expect(new QuoteSelector("copyright protection").isUniqueIn(legalText)).toBe(false);
    expect(new QuoteSelector("Copyright protection").isUniqueIn(legalText)).toBe(true);
  });

  it("truncates long quotes in error messages", () => {
    const exact = "x".repeat(150);
    const error = captureError(() => new QuoteSelector(exact).resolve(legalText));
    expect(error).toBeInstanceOf(TextSelectionError);
    expect(error).toMatchObject({
      message: `Quote "|${"x".repeat(100)}...|" was not found in the text`,
    });
  });
});

describe("QuoteSelector resolution from context", () => {
  it("selects the text between prefix and suffix", () => {
    const quote = new QuoteSelector({ prefix: "in accordance with", suffix: "original works" });
    expect(quote.resolve(legalText).toString()).toBe("PositionSelector(50, 64)");
    expect(quote.selectText(legalText)).toBe("this title, in");
  });

  it("runs to the end of the document without a suffix", () => {
    const quote = new QuoteSelector({ prefix: "Works of authorship include" });
    expect(quote.selectText(legalText)).toBe("the following categories:");
  });

  it("runs from the start of the document without a prefix", () => {
    const quote = new QuoteSelector({ suffix: "subsists" });
    expect(quote.selectText(legalText)).toBe("Copyright protection");
  });

  it("fails when the suffix comes before the prefix", () => {
    const quote = new QuoteSelector({ prefix: "device.", suffix: "Copyright" });
    expect(quote.locate(legalText)).toEqual({ kind: "no_match", matchCount: 0 });
  });

  it("fails when only whitespace separates prefix and suffix", () => {
    const quote = new QuoteSelector({ prefix: "Copyright", suffix: "protection" });
    const error = captureError(() => quote.resolve(legalText));
    expect(error).toMatchObject({ reason: "empty_span" });
  });

  it("fails when the prefix is not unique", () => {
    const quote = new QuoteSelector({ prefix: "authorship" });
    expect(quote.locate(legalText)).toEqual({ kind: "ambiguous", matchCount: 2 });
  });
});

describe("QuoteSelector rebuild", () => {
  it("fills in the exact text from the document", () => {
    const quote = new QuoteSelector({ prefix: "in accordance with", suffix: "original works" });
    const rebuilt = quote.rebuild(legalText);
    expect(rebuilt?.exact).toBe("this title, in");
    expect(rebuilt?.prefix).toBe("in accordance with");
  });

  it("returns null when the quote does not resolve", () => {
    expect(new QuoteSelector("authorship").rebuild(legalText)).toBeNull();
  });
});
