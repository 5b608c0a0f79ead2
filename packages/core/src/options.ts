/**
 * Option defaults for rendering, quoting and punctuation margins.
 *
 * Nothing here is mutable at run time: callers pass partial overrides per call
 * and they are merged over these defaults.
 */

export interface PreviewOptions {
  /** Marker standing in for omitted text */
  ellipsis: string;
}

export const DEFAULT_PREVIEW_OPTIONS: Readonly<PreviewOptions> = Object.freeze({
  ellipsis: "…",
});

export interface QuoteOptions {
  /** How many characters of context to add per attempt when building a unique quote */
  marginStep: number;
}

export const DEFAULT_QUOTE_OPTIONS: Readonly<QuoteOptions> = Object.freeze({
  marginStep: 5,
});

export interface PunctuationMarginOptions {
  /** Widest gap that may be bridged */
  width: number;
  /** Characters a bridged gap may consist of */
  characters: string;
}

export const DEFAULT_PUNCTUATION_MARGIN: Readonly<PunctuationMarginOptions> = Object.freeze({
  width: 3,
  characters: ",.\"' ;[]()",
});

export function resolveOptions<T extends object>(defaults: Readonly<T>, overrides?: Partial<T>): T {
  return { ...defaults, ...overrides };
}
