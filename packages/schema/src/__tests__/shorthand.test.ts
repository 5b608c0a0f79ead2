/**
 * Shorthand Expansion Tests
 */

import { SelectorErrorCodes } from "@textmark/core";
import { describe, expect, it } from "vitest";
import { SchemaValidationError } from "../errors.js";
import { expandPositionShorthand, expandQuoteShorthand, expandShorthand } from "../shorthand.js";

describe("expandQuoteShorthand", () => {
  it("reads a bare string as exact text", () => {
    expect(expandQuoteShorthand("method of operation")).toEqual({
      exact: "method of operation",
      prefix: "",
      suffix: "",
    });
  });

  it("splits prefix, exact and suffix on two pipes", () => {
    expect(expandQuoteShorthand("process, system,|method of operation|, concept")).toEqual({
      exact: "method of operation",
      prefix: "process, system,",
      suffix: ", concept",
    });
  });

  it("rejects any other number of pipes", () => {
    expect(() => expandQuoteShorthand("system|method")).toThrow(SchemaValidationError);
    expect(() => expandQuoteShorthand("a|b|c|d")).toThrow(SchemaValidationError);
  });

  it("marks the error as malformed shorthand", () => {
    try {
      expandQuoteShorthand("system|method");
      expect.fail("expected a validation error");
    } catch (error) {
      expect(error).toMatchObject({
        code: SelectorErrorCodes.SHORTHAND_MALFORMED,
        message:
          'Invalid quote shorthand: Quote shorthand needs 0 or 2 "|" separators (prefix|exact|suffix), found 1',
      });
    }
  });
});

describe("expandPositionShorthand", () => {
  it("reads a pair as start and end", () => {
    expect(expandPositionShorthand([4, 17])).toEqual({ start: 4, end: 17 });
    expect(expandPositionShorthand([4, null])).toEqual({ start: 4, end: null });
  });

  it("rejects anything but a pair of integers", () => {
    expect(() => expandPositionShorthand([4])).toThrow(SchemaValidationError);
    expect(() => expandPositionShorthand([4, 5, 6])).toThrow(SchemaValidationError);
    expect(() => expandPositionShorthand(["4", 5])).toThrow(SchemaValidationError);
  });
});

describe("expandShorthand", () => {
  it("expands booleans", () => {
    expect(expandShorthand(true)).toEqual({ kind: "position", record: { start: 0, end: null } });
    expect(expandShorthand(false)).toBeNull();
  });

  it("expands pairs and strings", () => {
    expect(expandShorthand([1, 3])).toEqual({ kind: "position", record: { start: 1, end: 3 } });
    expect(expandShorthand("any|idea|,")).toEqual({
      kind: "quote",
      record: { exact: "idea", prefix: "any", suffix: "," },
    });
  });

  it("passes records through", () => {
    expect(expandShorthand({ start: 2, end: 9 })).toEqual({
      kind: "position",
      record: { start: 2, end: 9 },
    });
    expect(expandShorthand({ exact: "idea" })).toEqual({
      kind: "quote",
      record: { exact: "idea", prefix: "", suffix: "" },
    });
  });

  it("rejects values of no known shape", () => {
    expect(() => expandShorthand(42)).toThrow(SchemaValidationError);
    expect(() => expandShorthand({ begin: 2 })).toThrow(SchemaValidationError);
  });

  it("rejects an empty record instead of selecting everything", () => {
    expect(() => expandShorthand({})).toThrow(SchemaValidationError);
    expect(expandShorthand({ end: 5 })).toEqual({ kind: "position", record: { start: 0, end: 5 } });
  });
});
