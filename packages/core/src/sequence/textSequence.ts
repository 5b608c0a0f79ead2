/**
 * Text Sequence
 *
 * A document rendered against a selection: alternating gap and included
 * segments in document order. Built on demand for previews and comparisons.
 */

import { DEFAULT_PREVIEW_OPTIONS, type PreviewOptions, resolveOptions } from "../options.js";
import { PositionSelector } from "../selectors/positionSelector.js";
import { PositionSet } from "../selectors/positionSet.js";

export interface TextSegment {
  readonly text: string;
  readonly included: boolean;
}

/** Characters ignored at either end of a passage when comparing meaning */
const INSIGNIFICANT_EDGE = ",:;. ";

function stripEdges(text: string): string {
  let start = 0;
  let end = text.length;
  while (start < end && INSIGNIFICANT_EDGE.includes(text.charAt(start))) {
    start++;
  }
  while (end > start && INSIGNIFICANT_EDGE.includes(text.charAt(end - 1))) {
    end--;
  }
  return text.slice(start, end);
}

function gap(text = ""): TextSegment {
  return { text, included: false };
}

function passage(text: string): TextSegment {
  return { text, included: true };
}

export class TextSequence {
  readonly segments: readonly TextSegment[];

  constructor(segments: readonly TextSegment[] = []) {
    this.segments = segments;
  }

  /**
   * Build a sequence by hand: strings are included passages, `null` marks
   * omitted text.
   */
  static fromParts(parts: readonly (string | null)[]): TextSequence {
    return new TextSequence(parts.map((part) => (part === null ? gap() : passage(part))));
  }

  /**
   * Walk `document` against the selection, resolving any pending quotes first.
   */
  static render(document: string, selection: PositionSet | PositionSelector): TextSequence {
    const set =
      selection instanceof PositionSelector ? new PositionSet([selection]) : selection;
    const { positions } = set.resolveQuotes(document);
    const segments: TextSegment[] = [];
    let cursor = 0;
    for (const position of positions) {
      if (position.start >= document.length) {
        break;
      }
      if (position.start > cursor) {
        segments.push(gap(document.slice(cursor, position.start)));
      }
      cursor = Math.min(position.end, document.length);
      segments.push(passage(document.slice(position.start, cursor)));
    }
    if (cursor < document.length) {
      segments.push(gap(document.slice(cursor)));
    }
    return new TextSequence(segments);
  }

  get length(): number {
    return this.segments.length;
  }

  /** Text of the included segments, in order */
  passages(): string[] {
    return this.segments.filter((segment) => segment.included).map((segment) => segment.text);
  }

  /** Copy without leading or trailing gaps */
  strip(): TextSequence {
    let start = 0;
    let end = this.segments.length;
    if (this.segments[start]?.included === false) {
      start++;
    }
    if (end > start && this.segments[end - 1]?.included === false) {
      end--;
    }
    return new TextSequence(this.segments.slice(start, end));
  }

  /** Append `other`, collapsing a gap that would sit on both sides of the seam */
  concat(other: TextSequence): TextSequence {
    const last = this.segments[this.segments.length - 1];
    const [first, ...rest] = other.segments;
    if (last && first && !last.included && !first.included) {
      return new TextSequence([
        ...this.segments.slice(0, -1),
        gap(last.text + first.text),
        ...rest,
      ]);
    }
    return new TextSequence([...this.segments, ...other.segments]);
  }

  /**
   * True when both sequences, ignoring leading and trailing gaps, have the same
   * shape and the same passages up to edge punctuation.
   */
  means(other: TextSequence): boolean {
    const mine = this.strip().segments;
    const theirs = other.strip().segments;
    if (mine.length !== theirs.length) {
      return false;
    }
    return mine.every((segment, index) => {
      const counterpart = theirs[index];
      if (!counterpart || segment.included !== counterpart.included) {
        return false;
      }
      return !segment.included || stripEdges(segment.text) === stripEdges(counterpart.text);
    });
  }

  /** True when every passage of `other` appears within some passage of this sequence */
  implies(other: TextSequence): boolean {
    const mine = this.passages();
    return other
      .passages()
      .every((wanted) => mine.some((text) => text.includes(stripEdges(wanted))));
  }

  strictlyImplies(other: TextSequence): boolean {
    return !this.means(other) && this.implies(other);
  }

  /**
   * Included text joined by the ellipsis wherever a gap separates two passages;
   * passages with no gap between them are joined as they are. Leading and trailing gaps are marked only when the selection is enclosed
   * by omitted text on both sides.
   */
  preview(options?: Partial<PreviewOptions>): string {
    const { ellipsis } = resolveOptions(DEFAULT_PREVIEW_OPTIONS, options);
    const first = this.segments[0];
    const last = this.segments[this.segments.length - 1];
    const enclosed =
      this.segments.length > 1 && first?.included === false && last?.included === false;

    let result = "";
    let pendingGap = false;
    for (const segment of this.segments) {
      if (!segment.included) {
        pendingGap = true;
        continue;
      }
      if (result.length > 0 && pendingGap) {
        result += ellipsis;
      }
      result += segment.text;
      pendingGap = false;
    }
    if (result.length === 0) {
      return "";
    }
    return enclosed ? `${ellipsis}${result}${ellipsis}` : result;
  }

  /**
   * Every omitted stretch, leading and trailing ones included, becomes one
   * ellipsis; passages that meet directly are joined by a space.
   */
  format(options?: Partial<PreviewOptions>): string {
    const { ellipsis } = resolveOptions(DEFAULT_PREVIEW_OPTIONS, options);
    let result = "";
    for (const segment of this.segments) {
      if (!segment.included) {
        if (!result.endsWith(ellipsis)) {
          result += ellipsis;
        }
        continue;
      }
      if (result.length > 0 && !result.endsWith(ellipsis) && !result.endsWith(" ")) {
        result += " ";
      }
      result += segment.text;
    }
    return result === ellipsis ? "" : result;
  }

  toString(): string {
    return this.format();
  }
}
