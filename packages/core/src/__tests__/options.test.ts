import { describe, expect, it } from "vitest";
import {
  DEFAULT_PREVIEW_OPTIONS,
  DEFAULT_PUNCTUATION_MARGIN,
  DEFAULT_QUOTE_OPTIONS,
  resolveOptions,
} from "../options.js";
import { PositionSet } from "../selectors/positionSet.js";

describe("option defaults", () => {
  it("cannot be changed at run time", () => {
    expect(Object.isFrozen(DEFAULT_PREVIEW_OPTIONS)).toBe(true);
    expect(Object.isFrozen(DEFAULT_QUOTE_OPTIONS)).toBe(true);
    expect(Object.isFrozen(DEFAULT_PUNCTUATION_MARGIN)).toBe(true);
    expect(Reflect.set(DEFAULT_PREVIEW_OPTIONS, "ellipsis", "###")).toBe(false);
    expect(DEFAULT_PREVIEW_OPTIONS.ellipsis).toBe("…");
    expect(PositionSet.fromTuples([[0, 4], [5, 10]]).preview("Some text.")).toBe("Some…text.");
  });

  it("merges overrides into a fresh object", () => {
    const resolved = resolveOptions(DEFAULT_PUNCTUATION_MARGIN, { width: 1 });
    expect(resolved).toEqual({ width: 1, characters: ",.\"' ;[]()" });
    expect(resolved).not.toBe(DEFAULT_PUNCTUATION_MARGIN);
    expect(DEFAULT_PUNCTUATION_MARGIN.width).toBe(3);
  });
});
