/**
 * Selection Factory
 *
 * Builds resolved position sets for one document from whatever mix of
 * selectors and shorthand a caller has at hand.
 */

import { PositionSelector, PositionSet, QuoteSelector } from "@textmark/core";
import { positionFromRecord, quoteFromRecord } from "./schemas.js";
import { expandShorthand, type SelectorShorthand } from "./shorthand.js";

export type SelectionItem = PositionSelector | QuoteSelector | SelectorShorthand;

export type Selection = SelectionItem | PositionSet | SelectionItem[];

function isPositionPair(value: unknown): boolean {
  return Array.isArray(value) && value.length === 2 && typeof value[0] === "number";
}

function isSelectionList(value: Selection): value is SelectionItem[] {
  return Array.isArray(value) && !isPositionPair(value);
}

export class SelectionFactory {
  constructor(readonly document: string) {}

  /** The whole document, or nothing */
  fromBool(selected: boolean): PositionSet {
    if (!selected || this.document.length === 0) {
      return PositionSet.empty();
    }
    return new PositionSet([new PositionSelector(0, this.document.length)]);
  }

  fromSelection(selection: Selection): PositionSet {
    if (selection instanceof PositionSet) {
      return selection.resolveQuotes(this.document);
    }
    if (typeof selection === "boolean") {
      return this.fromBool(selection);
    }
    if (isSelectionList(selection)) {
      return this.fromSelectionSequence(selection);
    }
    return this.fromSelectionSequence([selection]);
  }

  /**
   * Resolve each item against the document. Strings are read as quote
   * shorthand, so `"prefix|exact|suffix"` works here.
   */
  fromSelectionSequence(items: readonly SelectionItem[]): PositionSet {
    const positions: PositionSelector[] = [];
    for (const item of items) {
      const position = this.toPosition(item);
      if (position) {
        positions.push(position);
      }
    }
    return new PositionSet(positions);
  }

  /** Each string is exact text; no `|` splitting */
  fromExactStrings(strings: readonly string[]): PositionSet {
    return this.fromQuoteSelectors(strings.map((exact) => new QuoteSelector({ exact })));
  }

  fromQuoteSelectors(quotes: readonly QuoteSelector[]): PositionSet {
    return new PositionSet(quotes.map((quote) => quote.resolve(this.document)));
  }

  private toPosition(item: SelectionItem): PositionSelector | null {
    if (item instanceof PositionSelector) {
      return item;
    }
    if (item instanceof QuoteSelector) {
      return item.resolve(this.document);
    }
    const expanded = expandShorthand(item);
    if (!expanded) {
      return null;
    }
    if (expanded.kind === "position") {
      return positionFromRecord(expanded.record);
    }
    return quoteFromRecord(expanded.record).resolve(this.document);
  }
}
