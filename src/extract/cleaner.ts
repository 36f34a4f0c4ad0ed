import { collapseWhitespace, truncateAtWord } from '../utils/text.js';

const AGENCIES = 'ANSA|AGI|Adnkronos|LaPresse|Italpress|Askanews|Dire|ADN';

// Italian wire-service leaders, applied repeatedly until none matches
const PREFIX_PATTERNS: RegExp[] = [
  new RegExp(`^\\((?:${AGENCIES})\\)\\s*[-–—]?\\s*`, 'i'),
  // dateline: "ROMA, 12 MAR -", "MILANO, 3 gennaio 2024 -"
  /^[A-ZÀ-Ý][A-ZÀ-Ý' .]{1,30},\s*\d{1,2}\s+[A-Za-zà-ù]{3,9}\.?(?:\s+\d{4})?\s*[-–—]\s*/,
  // byline: "di Mario Rossi -", "By Jane Doe |"
  /^(?:[Dd]i|[Bb]y)\s+\p{Lu}[\p{L}']+(?:\s+\p{Lu}[\p{L}']+){0,2}\s*[-–—|]\s*/u,
];

const SUFFIX_PATTERNS: RegExp[] = [
  /\s*©?\s*RIPRODUZIONE RISERVATA\s*©?\s*$/i,
];

const MAX_PREFIX_PASSES = 4;

export function stripBoilerplate(text: string): string {
  let out = text;
  for (let pass = 0; pass < MAX_PREFIX_PASSES; pass++) {
    const before = out;
    for (const re of PREFIX_PATTERNS) out = out.replace(re, '');
    if (out === before) break;
  }
  for (const re of SUFFIX_PATTERNS) out = out.replace(re, '');
  return out.trim();
}

function wordSet(s: string): Set<string> {
  return new Set(s.toLowerCase().split(/\s+/).filter(Boolean));
}

/** Shared words over the larger of the two word sets. */
export function wordOverlap(a: string, b: string): number {
  const wa = wordSet(a);
  const wb = wordSet(b);
  const larger = Math.max(wa.size, wb.size);
  if (larger === 0) return 0;
  let shared = 0;
  for (const w of wa) if (wb.has(w)) shared++;
  return shared / larger;
}

export const DUPLICATE_MIN_LENGTH = 200;
const DUPLICATE_SAMPLE_LENGTH = 200;

/**
 * Many sources emit the article body twice. When the openings of the two
 * halves share more than `threshold` of their words, keep the first half.
 */
export function dropDuplicateHalf(text: string, threshold: number): string {
  if (text.length < DUPLICATE_MIN_LENGTH) return text;
  const mid = Math.floor(text.length / 2);
  const first = text.slice(0, mid).trim();
  const second = text.slice(mid).trim();
  const overlap = wordOverlap(first.slice(0, DUPLICATE_SAMPLE_LENGTH), second.slice(0, DUPLICATE_SAMPLE_LENGTH));
  return overlap > threshold ? first : text;
}

export type CleanOptions = {
  duplicateOverlap: number;
  maxLength?: number;
};

export function cleanContent(raw: string, { duplicateOverlap, maxLength }: CleanOptions): string {
  let text = collapseWhitespace(raw);
  text = stripBoilerplate(text);
  text = dropDuplicateHalf(text, duplicateOverlap);
  if (maxLength !== undefined) text = truncateAtWord(text, maxLength);
  return text;
}
