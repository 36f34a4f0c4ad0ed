import { isFailureSentinel } from '../utils/text.js';
import { extractiveSummary } from './extractive.js';
import { keywordSummary } from './keyword.js';
import { leadSummary } from './lead.js';
import type { SummaryMethod, SummaryResult } from './types.js';

export type { Sentence, SummaryMethod, SummaryResult, SummaryStrategy } from './types.js';
export { splitSentences } from './sentences.js';
export { extractiveSummary, leadSummary, keywordSummary };

export const SUMMARY_METHODS: readonly SummaryMethod[] = ['auto', 'extractive', 'keyword', 'lead'];

/** Below this, frequency statistics are too thin to beat the lead. */
export const AUTO_EXTRACTIVE_THRESHOLD = 1500;

export function isSummaryMethod(value: string): value is SummaryMethod {
  return SUMMARY_METHODS.some(m => m === value);
}

export function summarize(
  text: string,
  { method = 'auto', maxLength = 500, numSentences = 3 }: { method?: SummaryMethod; maxLength?: number; numSentences?: number } = {},
): SummaryResult {
  if (!text || isFailureSentinel(text) || text.length <= maxLength) {
    return { text, method, strategy: 'passthrough' };
  }
  const opts = { maxLength, numSentences };
  switch (method) {
    case 'extractive':
      return { text: extractiveSummary(text, opts), method, strategy: 'extractive' };
    case 'keyword':
      return { text: keywordSummary(text, opts), method, strategy: 'keyword' };
    case 'lead':
      return { text: leadSummary(text, maxLength), method, strategy: 'lead' };
    case 'auto':
      return text.length > AUTO_EXTRACTIVE_THRESHOLD
        ? { text: extractiveSummary(text, opts), method, strategy: 'extractive' }
        : { text: leadSummary(text, maxLength), method, strategy: 'lead' };
  }
}

export function autoSummarize(text: string, options?: { method?: SummaryMethod; maxLength?: number }): string {
  return summarize(text, options).text;
}
