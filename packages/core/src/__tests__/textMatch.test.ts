import { describe, expect, it } from "vitest";
import {
  endsWithWhitespace,
  findOccurrences,
  isFollowedBy,
  isPrecededBy,
  skipWhitespaceBackward,
  skipWhitespaceForward,
  startsWithWhitespace,
} from "../selectors/textMatch.js";

describe("findOccurrences", () => {
  it("finds overlapping matches", () => {
    expect(findOccurrences("aaaa", "aa")).toEqual([0, 1, 2]);
  });

  it("finds nothing for an empty needle", () => {
    expect(findOccurrences("text", "")).toEqual([]);
  });
});

describe("whitespace skipping", () => {
  it("moves past whitespace in either direction", () => {
    expect(skipWhitespaceForward("a \n b", 1)).toBe(4);
    expect(skipWhitespaceBackward("a \n b", 4)).toBe(1);
    expect(skipWhitespaceForward("a  ", 1)).toBe(3);
    expect(skipWhitespaceBackward("  a", 2)).toBe(0);
  });
});

describe("edge whitespace", () => {
  it("looks only at the first and last character", () => {
    expect(startsWithWhitespace(" a")).toBe(true);
    expect(startsWithWhitespace("a ")).toBe(false);
    expect(endsWithWhitespace("a\n")).toBe(true);
    expect(endsWithWhitespace("")).toBe(false);
  });
});

describe("context checks", () => {
  const text = "works of authorship fixed";

  it("matches a prefix across whitespace", () => {
    expect(isPrecededBy(text, 9, "of")).toBe(true);
    expect(isPrecededBy(text, 9, " of ")).toBe(true);
    expect(isPrecededBy(text, 9, "works")).toBe(false);
  });

  it("matches a suffix across whitespace", () => {
    expect(isFollowedBy(text, 19, "fixed")).toBe(true);
    expect(isFollowedBy(text, 19, "fix")).toBe(true);
    expect(isFollowedBy(text, 19, "of")).toBe(false);
  });

  it("treats blank context as matching", () => {
    expect(isPrecededBy(text, 0, "  ")).toBe(true);
    expect(isFollowedBy(text, text.length, "")).toBe(true);
  });

  it("does not match a prefix that runs off the start", () => {
    expect(isPrecededBy(text, 2, "the works")).toBe(false);
  });

  it("matches exactly against the index when not tolerant", () => {
    expect(isPrecededBy(text, 9, "of", false)).toBe(false);
    expect(isPrecededBy(text, 9, "of ", false)).toBe(true);
    expect(isFollowedBy(text, 19, "fixed", false)).toBe(false);
    expect(isFollowedBy(text, 19, " fixed", false)).toBe(true);
  });
});
