import { collapseWhitespace } from '../utils/text.js';
import type { Sentence } from './types.js';

const ABBREVIATIONS = /\b(Dr|Mr|Mrs|Ms|Prof|Sr|Jr)\./g;
const MASK = '\u0000';

/**
 * Split on `.`, `!` or `?` followed by whitespace, keeping the terminal
 * punctuation. Titles such as "Dr." never end a sentence.
 */
export function splitSentences(text: string): Sentence[] {
  const masked = text.replace(ABBREVIATIONS, `$1${MASK}`);
  return masked
    .split(/(?<=[.!?])\s+/)
    .map(part => collapseWhitespace(part.split(MASK).join('.')))
    .filter(Boolean)
    .map((sentence, index) => ({ index, text: sentence }));
}
