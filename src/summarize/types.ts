export type SummaryMethod = 'auto' | 'extractive' | 'keyword' | 'lead';

export type SummaryStrategy = Exclude<SummaryMethod, 'auto'> | 'passthrough';

export type Sentence = {
  index: number;
  text: string;
};

export type ScoredSentence = Sentence & { score: number };

export type WordFrequencyTable = ReadonlyMap<string, number>;

export type SummaryResult = {
  text: string;
  method: SummaryMethod;
  strategy: SummaryStrategy;
};

export interface SummaryOptions {
  maxLength: number;
  numSentences: number;
}
