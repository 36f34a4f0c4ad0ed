import { countWords, truncateAtWord, wordTokens } from '../utils/text.js';
import { splitSentences } from './sentences.js';
import { STOP_WORDS } from './stopwords.js';
import type { ScoredSentence, Sentence, SummaryOptions, WordFrequencyTable } from './types.js';

export const MIN_SUMMARY_INPUT = 100;
export const MIN_SENTENCE_WORDS = 5;

export function wordFrequencies(sentences: Sentence[]): WordFrequencyTable {
  const counts = new Map<string, number>();
  for (const { text } of sentences) {
    for (const word of wordTokens(text)) {
      if (word.length <= 2 || STOP_WORDS.has(word)) continue;
      counts.set(word, (counts.get(word) ?? 0) + 1);
    }
  }
  const max = Math.max(0, ...counts.values());
  const table = new Map<string, number>();
  for (const [word, count] of counts) table.set(word, count / max);
  return table;
}

/** Lead paragraphs carry the news: indexes 0-2 and 3-4 get boosted. */
export function positionBoost(index: number): number {
  if (index < 3) return 1.3;
  if (index < 5) return 1.15;
  return 1;
}

export function scoreSentences(sentences: Sentence[], table: WordFrequencyTable): ScoredSentence[] {
  const scored: ScoredSentence[] = [];
  for (const sentence of sentences) {
    if (countWords(sentence.text) < MIN_SENTENCE_WORDS) continue;
    const words = wordTokens(sentence.text);
    const total = words.reduce((sum, w) => sum + (table.get(w) ?? 0), 0);
    const mean = words.length ? total / words.length : 0;
    scored.push({ ...sentence, score: mean * positionBoost(sentence.index) });
  }
  return scored;
}

/** Highest scores first, then back into reading order. */
export function pickTop(scored: ScoredSentence[], n: number): ScoredSentence[] {
  return [...scored]
    .sort((a, b) => b.score - a.score)
    .slice(0, n)
    .sort((a, b) => a.index - b.index);
}

export function joinSentences(sentences: Sentence[], maxLength: number): string {
  return truncateAtWord(sentences.map(s => s.text).join(' '), maxLength);
}

/** Top sentences by score; the lead when no sentence was long enough to score. */
export function selectSentences(sentences: Sentence[], scored: ScoredSentence[], n: number): Sentence[] {
  return scored.length ? pickTop(scored, n) : sentences.slice(0, n);
}

export function extractiveSummary(text: string, { numSentences, maxLength }: SummaryOptions): string {
  if (!text || text.length < MIN_SUMMARY_INPUT) return text;
  const sentences = splitSentences(text);
  if (sentences.length <= numSentences) return text;

  const table = wordFrequencies(sentences);
  if (table.size === 0) return joinSentences(sentences.slice(0, numSentences), maxLength);

  return joinSentences(selectSentences(sentences, scoreSentences(sentences, table), numSentences), maxLength);
}
