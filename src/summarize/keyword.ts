import { countWords } from '../utils/text.js';
import { joinSentences, MIN_SENTENCE_WORDS, MIN_SUMMARY_INPUT, selectSentences } from './extractive.js';
import { splitSentences } from './sentences.js';
import type { ScoredSentence, SummaryOptions } from './types.js';

// Runs of capitalized words: names, places, organizations
const PROPER_NOUNS = /\p{Lu}\p{Ll}+(?:\s+\p{Lu}\p{Ll}+)*/gu;
// Standalone figures with an optional currency sign and unit, percent or magnitude
const FIGURES =
  /(?<![\p{L}\p{N}_])[$€£]?\d+(?:[.,]\d+)?(?:\s*(?:%|€|\$|km\/h|km|mila|milioni|miliardi|million|billion))?(?![\p{L}\p{N}_])/gu;

export function extractKeywords(text: string): Set<string> {
  return new Set([...(text.match(PROPER_NOUNS) ?? []), ...(text.match(FIGURES) ?? [])]);
}

const LEAD_BOOST = 1.3;

export function keywordSummary(text: string, { numSentences, maxLength }: SummaryOptions): string {
  if (!text || text.length < MIN_SUMMARY_INPUT) return text;
  const sentences = splitSentences(text);
  if (sentences.length <= numSentences) return text;

  const keywords = [...extractKeywords(text)];
  const scored: ScoredSentence[] = [];
  for (const sentence of sentences) {
    const words = countWords(sentence.text);
    if (words < MIN_SENTENCE_WORDS) continue;
    const hits = keywords.filter(k => sentence.text.includes(k)).length;
    const score = (hits / words) * (sentence.index < 2 ? LEAD_BOOST : 1);
    scored.push({ ...sentence, score });
  }
  return joinSentences(selectSentences(sentences, scored, numSentences), maxLength);
}
