/**
 * Shorthand Expansion
 *
 * Compact ways of writing selectors, expanded to canonical records before any
 * core type is constructed:
 *
 * - `[start, end]` is a position selector (`end` may be `null`)
 * - `"exact"` or `"prefix|exact|suffix"` is a quote selector
 * - `true` selects the whole document, `false` selects nothing
 * - records naming `start`/`end` or `exact`/`prefix`/`suffix` pass through
 */

import { SelectorErrorCodes } from "@textmark/core";
import { z } from "zod";
import { SchemaValidationError } from "./errors.js";
import {
  type PositionSelectorRecord,
  type PositionSelectorRecordInput,
  PositionSelectorRecordSchema,
  type QuoteSelectorRecord,
  type QuoteSelectorRecordInput,
  QuoteSelectorRecordSchema,
} from "./schemas.js";

const QUOTE_SEPARATOR = "|";

function countSeparators(text: string): number {
  return text.split(QUOTE_SEPARATOR).length - 1;
}

export const QuoteShorthandSchema = z
  .string()
  .superRefine((text, ctx) => {
    const separators = countSeparators(text);
    if (separators !== 0 && separators !== 2) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Quote shorthand needs 0 or 2 "${QUOTE_SEPARATOR}" separators (prefix|exact|suffix), found ${separators}`,
      });
    }
  })
  .transform((text): QuoteSelectorRecord => {
    const [prefix = "", exact = "", suffix = ""] =
      countSeparators(text) === 0 ? ["", text, ""] : text.split(QUOTE_SEPARATOR);
    return { exact, prefix, suffix };
  });

export const PositionShorthandSchema = z
  .tuple([z.number().int().min(0), z.number().int().nullable()])
  .transform(([start, end]): PositionSelectorRecord => ({ start, end }));

const WHOLE_DOCUMENT: PositionSelectorRecord = { start: 0, end: null };

function asPosition(record: PositionSelectorRecord) {
  return { kind: "position" as const, record };
}

function asQuote(record: QuoteSelectorRecord) {
  return { kind: "quote" as const, record };
}

/** A record given as shorthand must name at least one of `fields` */
function namingOneOf(fields: readonly string[]) {
  return z
    .object({})
    .passthrough()
    .refine((record) => fields.some((field) => field in record), {
      message: `Record shorthand needs at least one of ${fields.join(", ")}`,
    });
}

export const SelectorShorthandSchema = z.union([
  z.boolean().transform((selected) => (selected ? asPosition(WHOLE_DOCUMENT) : null)),
  PositionShorthandSchema.transform(asPosition),
  QuoteShorthandSchema.transform(asQuote),
  namingOneOf(["start", "end"])
    .pipe(PositionSelectorRecordSchema.strict())
    .transform(asPosition),
  namingOneOf(["exact", "prefix", "suffix"])
    .pipe(QuoteSelectorRecordSchema.strict())
    .transform(asQuote),
]);

export type SelectorShorthand =
  | boolean
  | [number, number | null]
  | string
  | PositionSelectorRecordInput
  | QuoteSelectorRecordInput;
export type ExpandedSelector = z.output<typeof SelectorShorthandSchema>;

function expand<T extends z.ZodTypeAny>(schema: T, value: unknown, what: string): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new SchemaValidationError(
      what,
      result.error.issues,
      SelectorErrorCodes.SHORTHAND_MALFORMED
    );
  }
  return result.data;
}

/** Split `"prefix|exact|suffix"` (or a bare `"exact"`) into a quote record */
export function expandQuoteShorthand(text: string): QuoteSelectorRecord {
  return expand(QuoteShorthandSchema, text, "quote shorthand");
}

/** Turn `[start, end]` into a position record */
export function expandPositionShorthand(pair: unknown): PositionSelectorRecord {
  return expand(PositionShorthandSchema, pair, "position shorthand");
}

/**
 * Expand any shorthand form. `null` means the value selects nothing.
 */
export function expandShorthand(value: unknown): ExpandedSelector {
  return expand(SelectorShorthandSchema, value, "selector shorthand");
}
