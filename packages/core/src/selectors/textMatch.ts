/**
 * Exact substring search with whitespace-tolerant context checks.
 *
 * Offsets are UTF-16 code unit indices, the same unit `String.prototype.slice` uses.
 */

const WHITESPACE = /\s/;

function isWhitespace(char: string): boolean {
  return WHITESPACE.test(char);
}

/**
 * Every start index of `needle` in `haystack`, overlapping occurrences included.
 */
export function findOccurrences(haystack: string, needle: string): number[] {
  if (needle.length === 0) {
    return [];
  }
  const found: number[] = [];
  let index = haystack.indexOf(needle);
  while (index !== -1) {
    found.push(index);
    index = haystack.indexOf(needle, index + 1);
  }
  return found;
}

/**
 * First index at or after `index` that is not whitespace (or the text length).
 */
export function skipWhitespaceForward(text: string, index: number): number {
  let cursor = index;
  while (cursor < text.length && isWhitespace(text[cursor] ?? "")) {
    cursor++;
  }
  return cursor;
}

/**
 * Index just after the last non-whitespace character before `index` (or 0).
 */
export function skipWhitespaceBackward(text: string, index: number): number {
  let cursor = index;
  while (cursor > 0 && isWhitespace(text[cursor - 1] ?? "")) {
    cursor--;
  }
  return cursor;
}

/**
 * True when the text before `index` ends with `prefix`.
 *
 * With `tolerant` set, the prefix is trimmed and whitespace between it and
 * `index` is skipped; otherwise it must end exactly at `index`. An empty (or,
 * when tolerant, whitespace-only) prefix always matches.
 */
export function isPrecededBy(
  text: string,
  index: number,
  prefix: string,
  tolerant = true
): boolean {
  if (!tolerant) {
    return index >= prefix.length && text.startsWith(prefix, index - prefix.length);
  }
  const wanted = prefix.trim();
  if (wanted.length === 0) {
    return true;
  }
  const boundary = skipWhitespaceBackward(text, index);
  const from = boundary - wanted.length;
  return from >= 0 && text.startsWith(wanted, from);
}

/**
 * True when the text from `index` starts with `suffix`, skipping whitespace
 * before a trimmed suffix when `tolerant` is set.
 */
export function isFollowedBy(
  text: string,
  index: number,
  suffix: string,
  tolerant = true
): boolean {
  if (!tolerant) {
    return text.startsWith(suffix, index);
  }
  const wanted = suffix.trim();
  if (wanted.length === 0) {
    return true;
  }
  return text.startsWith(wanted, skipWhitespaceForward(text, index));
}

/** Whether the first character of `text` is whitespace */
export function startsWithWhitespace(text: string): boolean {
  return isWhitespace(text.charAt(0));
}

export function endsWithWhitespace(text: string): boolean {
  return isWhitespace(text.charAt(text.length - 1));
}
