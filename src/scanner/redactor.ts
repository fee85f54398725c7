/**
 * Display helpers for matched content. Lengths count code points, so a
 * surrogate pair is never split.
 */

const VISIBLE_CHARS = 4;
const MASK = '*'.repeat(6);

export const DISPLAY_LIMIT = 150;
const ELLIPSIS = '...';

/**
 * Masks a matched string: up to four characters become asterisks, longer
 * strings keep their first four characters followed by a fixed six-asterisk mask.
 */
export function redact(text: string): string {
  const chars = Array.from(text);
  if (chars.length <= VISIBLE_CHARS) {
    return '*'.repeat(chars.length);
  }
  return chars.slice(0, VISIBLE_CHARS).join('') + MASK;
}

/** Cuts strings longer than `limit` to `limit - 3` characters plus an ellipsis. */
export function truncateForDisplay(text: string, limit = DISPLAY_LIMIT): string {
  const chars = Array.from(text);
  if (chars.length <= limit) return text;
  return chars.slice(0, limit - ELLIPSIS.length).join('') + ELLIPSIS;
}

/** Value shown for a match: verbatim or redacted, truncated, and trimmed. */
export function formatMatch(text: string, show: boolean): string {
  const value = show ? text : redact(text);
  return truncateForDisplay(value).trim();
}
