// Errors
export * from "./errors.js";
// Logging
export {
  createLogger,
  createSelectorLogger,
  getLogger,
  setDefaultLogger,
  type Logger,
  type LoggerConfig,
  type LogLevel,
  type SelectorLogger,
} from "./observability/logger.js";
// Option defaults
export * from "./options.js";
// Selectors
export { type PositionLike, PositionSelector } from "./selectors/positionSelector.js";
export { normalizeIntervals, PositionSet, type PositionTuple } from "./selectors/positionSet.js";
export {
  type QuoteLocation,
  QuoteSelector,
  type QuoteSelectorInit,
} from "./selectors/quoteSelector.js";
export { findOccurrences, isFollowedBy, isPrecededBy } from "./selectors/textMatch.js";
// Rendering
export { type TextSegment, TextSequence } from "./sequence/textSequence.js";
