import type { CheerioAPI } from 'cheerio';

export type HtmlDocument = {
  url: string;
  html: string;
};

export type ExtractionSource =
  | { kind: 'StructuredData' }
  | { kind: 'SelectorCascade'; selectorId: string }
  | { kind: 'ArticleTag' }
  | { kind: 'CommonSelectors' }
  | { kind: 'MainTag' }
  | { kind: 'BodyFallback' }
  | { kind: 'None' };

export type CandidateBlock = {
  source: ExtractionSource;
  paragraphs: string[];
};

export type ExtractedArticle = Readonly<{
  content: string;
  source: ExtractionSource;
  charLength: number;
}>;

export type PageMetadata = {
  title: string;
  description: string;
};

export type SiteClass = {
  id: string;
  hosts: string[];
  /** Short-article sites validate against `minParagraphsShort`. */
  short: boolean;
  selectors: string[];
};

export interface ExtractionOptions {
  /** Paragraphs shorter than this are noise (captions, bylines). */
  minParagraphLength: number;
  minParagraphs: number;
  /** Minimum for site classes whose articles run short. */
  minParagraphsShort: number;
  structuredDataMinLength: number;
  duplicateOverlap: number;
  maxContentLength?: number;
  siteClasses: SiteClass[];
}

export interface ExtractionContext {
  $: CheerioAPI;
  url: URL | null;
  jsonBlocks: string[];
  options: ExtractionOptions;
}

export interface ExtractionStrategy {
  readonly name: string;
  attempt(ctx: ExtractionContext): CandidateBlock | null;
}
