export const ELLIPSIS = '...';

export function collapseWhitespace(s: string): string {
  return s.replace(/\s+/g, ' ').trim();
}

/** Lowercase word tokens (letters, digits, underscore; accented letters included). */
export function wordTokens(s: string): string[] {
  return s.toLowerCase().match(/[\p{L}\p{N}_]+/gu) ?? [];
}

export function countWords(s: string): number {
  return s.split(/\s+/).filter(Boolean).length;
}

/**
 * Cut `s` so that the result, ellipsis included, fits in `max` characters.
 * The cut falls on the last whitespace before the limit; a text with no
 * whitespace in range is hard-cut.
 */
export function truncateAtWord(s: string, max: number): string {
  if (s.length <= max) return s;
  const budget = Math.max(0, max - ELLIPSIS.length);
  const head = s.slice(0, budget);
  if (/\s/.test(s.charAt(budget))) return head.trimEnd() + ELLIPSIS;
  const lastSpace = head.search(/\s\S*$/);
  const kept = lastSpace > 0 ? head.slice(0, lastSpace) : head;
  return kept.trimEnd() + ELLIPSIS;
}

/** Sentinel texts produced by failed extraction or fetching. */
export function isFailureSentinel(s: string): boolean {
  return s.startsWith('error') || s.startsWith('limited');
}
