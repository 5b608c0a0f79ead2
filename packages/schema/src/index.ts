export { formatValidationError, SchemaValidationError } from "./errors.js";
export { type Selection, SelectionFactory, type SelectionItem } from "./factory.js";
export {
  deserializePosition,
  deserializePositionSet,
  deserializeQuote,
  parseRecord,
  positionFromRecord,
  type PositionSelectorRecord,
  type PositionSelectorRecordInput,
  PositionSelectorRecordSchema,
  type PositionSetRecord,
  type PositionSetRecordInput,
  PositionSetRecordSchema,
  quoteFromRecord,
  type QuoteSelectorRecord,
  type QuoteSelectorRecordInput,
  QuoteSelectorRecordSchema,
  serializePosition,
  serializePositionSet,
  serializeQuote,
} from "./schemas.js";
export {
  type ExpandedSelector,
  expandPositionShorthand,
  expandQuoteShorthand,
  expandShorthand,
  PositionShorthandSchema,
  QuoteShorthandSchema,
  type SelectorShorthand,
  SelectorShorthandSchema,
} from "./shorthand.js";
