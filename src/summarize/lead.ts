import { truncateAtWord } from '../utils/text.js';
import { MIN_SUMMARY_INPUT } from './extractive.js';
import { splitSentences } from './sentences.js';

export const LEAD_MAX_SENTENCES = 4;

/**
 * Opening sentences, as many of the first four as fit in `maxLength`.
 * A first sentence longer than the cap falls back to a word-boundary cut.
 */
export function leadSummary(text: string, maxLength: number): string {
  if (!text || text.length < MIN_SUMMARY_INPUT) return text;

  const parts: string[] = [];
  let length = 0;
  for (const { text: sentence } of splitSentences(text).slice(0, LEAD_MAX_SENTENCES)) {
    if (length + sentence.length > maxLength) break;
    parts.push(sentence);
    length += sentence.length + 1;
  }
  if (parts.length === 0) return truncateAtWord(text, maxLength);
  return parts.join(' ');
}
