/**
 * Record Schemas
 *
 * Canonical serialized forms of the three selector types. Field order is part
 * of the format: `start, end`; `exact, prefix, suffix`; `positions, quotes`.
 *
 * @module schemas
 */

import { PositionSelector, PositionSet, QuoteSelector } from "@textmark/core";
import { z } from "zod";
import { SchemaValidationError } from "./errors.js";

// ============================================================================
// Record Schemas
// ============================================================================

export const PositionSelectorRecordSchema = z.object({
  start: z.number().int().min(0).default(0),
  /** `null` means the selector runs to the end of the document */
  end: z.number().int().nullable().default(null),
});

export const QuoteSelectorRecordSchema = z.object({
  exact: z.string().default(""),
  prefix: z.string().default(""),
  suffix: z.string().default(""),
});

export const PositionSetRecordSchema = z.object({
  positions: z.array(PositionSelectorRecordSchema).default([]),
  quotes: z.array(QuoteSelectorRecordSchema).default([]),
});

export type PositionSelectorRecord = z.infer<typeof PositionSelectorRecordSchema>;
export type QuoteSelectorRecord = z.infer<typeof QuoteSelectorRecordSchema>;
export type PositionSetRecord = z.infer<typeof PositionSetRecordSchema>;

export type PositionSelectorRecordInput = z.input<typeof PositionSelectorRecordSchema>;
export type QuoteSelectorRecordInput = z.input<typeof QuoteSelectorRecordSchema>;
export type PositionSetRecordInput = z.input<typeof PositionSetRecordSchema>;

// ============================================================================
// Validation
// ============================================================================

/**
 * Parse `data` with `schema`, throwing {@link SchemaValidationError} on failure.
 */
export function parseRecord<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown,
  what: string
): z.output<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new SchemaValidationError(what, result.error.issues);
  }
  return result.data;
}

// ============================================================================
// Serialization
// ============================================================================

export function serializePosition(selector: PositionSelector): PositionSelectorRecord {
  return { start: selector.start, end: selector.boundedEnd };
}

export function serializeQuote(quote: QuoteSelector): QuoteSelectorRecord {
  return { exact: quote.exact, prefix: quote.prefix, suffix: quote.suffix };
}

export function serializePositionSet(set: PositionSet): PositionSetRecord {
  return {
    positions: set.positions.map(serializePosition),
    quotes: set.quotes.map(serializeQuote),
  };
}

export function positionFromRecord(record: PositionSelectorRecord): PositionSelector {
  return new PositionSelector(record.start, record.end);
}

export function quoteFromRecord(record: QuoteSelectorRecord): QuoteSelector {
  return new QuoteSelector(record);
}

export function deserializePosition(data: unknown): PositionSelector {
  return positionFromRecord(parseRecord(PositionSelectorRecordSchema, data, "position selector"));
}

export function deserializeQuote(data: unknown): QuoteSelector {
  return quoteFromRecord(parseRecord(QuoteSelectorRecordSchema, data, "quote selector"));
}

export function deserializePositionSet(data: unknown): PositionSet {
  const record = parseRecord(PositionSetRecordSchema, data, "position set");
  return new PositionSet(
    record.positions.map(positionFromRecord),
    record.quotes.map(quoteFromRecord)
  );
}
