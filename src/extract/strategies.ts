import type { Cheerio, CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import { collapseWhitespace } from '../utils/text.js';
import {
  BODY_PARAGRAPH_DENYLIST,
  CONTENT_CONTAINERS,
  GENERIC_SELECTORS,
  MAX_PARAGRAPH_LINKS,
  siteClassFor,
} from './selectors.js';
import { structuredDataStrategy } from './structured_data.js';
import type { CandidateBlock, ExtractionContext, ExtractionSource, ExtractionStrategy } from './types.js';

/** Collapsed text of each node, keeping only texts of at least `minLength` chars. */
export function paragraphTexts($: CheerioAPI, nodes: Cheerio<Element>, minLength: number): string[] {
  const texts: string[] = [];
  nodes.each((_, el) => {
    const text = collapseWhitespace($(el).text());
    if (text.length >= minLength) texts.push(text);
  });
  return texts;
}

function accept(source: ExtractionSource, paragraphs: string[], min: number): CandidateBlock | null {
  return paragraphs.length >= min ? { source, paragraphs } : null;
}

export const selectorCascadeStrategy: ExtractionStrategy = {
  name: 'selector-cascade',
  attempt({ $, url, options }: ExtractionContext) {
    const site = siteClassFor(url, options.siteClasses);
    const passes: Array<{ selectors: string[]; min: number }> = [];
    if (site) {
      passes.push({ selectors: site.selectors, min: site.short ? options.minParagraphsShort : options.minParagraphs });
    }
    passes.push({ selectors: GENERIC_SELECTORS, min: options.minParagraphs });

    for (const { selectors, min } of passes) {
      for (const selector of selectors) {
        const found = accept(
          { kind: 'SelectorCascade', selectorId: selector },
          paragraphTexts($, $<Element, string>(selector), options.minParagraphLength),
          min,
        );
        if (found) return found;
      }
    }
    return null;
  },
};

export const articleTagStrategy: ExtractionStrategy = {
  name: 'article-tag',
  attempt({ $, options }: ExtractionContext) {
    for (const el of $('article').toArray()) {
      const copy = $(el).clone();
      copy.find('aside, figure').remove();
      const found = accept({ kind: 'ArticleTag' }, paragraphTexts($, copy.find('p'), options.minParagraphLength), options.minParagraphs);
      if (found) return found;
    }
    return null;
  },
};

export const commonSelectorsStrategy: ExtractionStrategy = {
  name: 'common-selectors',
  attempt({ $, options }: ExtractionContext) {
    for (const container of CONTENT_CONTAINERS) {
      const paragraphs = paragraphTexts($, $(container).find('p'), options.minParagraphLength);
      const found = accept({ kind: 'CommonSelectors' }, paragraphs, options.minParagraphs);
      if (found) return found;
    }
    return null;
  },
};

export const mainTagStrategy: ExtractionStrategy = {
  name: 'main-tag',
  attempt({ $, options }: ExtractionContext) {
    return accept({ kind: 'MainTag' }, paragraphTexts($, $('main p'), options.minParagraphLength), options.minParagraphs);
  },
};

export const bodyFallbackStrategy: ExtractionStrategy = {
  name: 'body-fallback',
  attempt({ $, options }: ExtractionContext) {
    const paragraphs: string[] = [];
    $('body p').each((_, el) => {
      const node = $(el);
      const text = collapseWhitespace(node.text());
      if (text.length < options.minParagraphLength) return;
      const lower = text.toLowerCase();
      if (BODY_PARAGRAPH_DENYLIST.some(k => lower.includes(k))) return;
      if (node.find('a').length > MAX_PARAGRAPH_LINKS) return;
      paragraphs.push(text);
    });
    return accept({ kind: 'BodyFallback' }, paragraphs, options.minParagraphs);
  },
};

/** Tried in order; the first block returned wins. */
export const DEFAULT_STRATEGIES: readonly ExtractionStrategy[] = [
  structuredDataStrategy,
  selectorCascadeStrategy,
  articleTagStrategy,
  commonSelectorsStrategy,
  mainTagStrategy,
  bodyFallbackStrategy,
];
