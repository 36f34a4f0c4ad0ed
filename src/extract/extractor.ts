import { load, type CheerioAPI } from 'cheerio';
import type { AppConfig } from '../config.js';
import { beautifyDescription, sanitizeTitle } from '../text/sanitize.js';
import { cleanContent } from './cleaner.js';
import { normalizeMarkup } from './normalizer.js';
import { SITE_CLASSES } from './selectors.js';
import { DEFAULT_STRATEGIES } from './strategies.js';
import { collectJsonBlocks } from './structured_data.js';
import type {
  ExtractedArticle,
  ExtractionOptions,
  ExtractionSource,
  ExtractionStrategy,
  HtmlDocument,
  PageMetadata,
} from './types.js';

export const NO_CONTENT =
  'limited content available: the page may require a subscription or JavaScript to render';

export const DEFAULT_EXTRACTION_OPTIONS: ExtractionOptions = {
  minParagraphLength: 50,
  minParagraphs: 3,
  minParagraphsShort: 2,
  structuredDataMinLength: 200,
  duplicateOverlap: 0.8,
  siteClasses: SITE_CLASSES,
};

export function extractionOptionsFromConfig(cfg: AppConfig): ExtractionOptions {
  return {
    ...DEFAULT_EXTRACTION_OPTIONS,
    minParagraphLength: cfg.MIN_PARAGRAPH_LENGTH,
    minParagraphs: cfg.MIN_PARAGRAPHS,
    minParagraphsShort: cfg.MIN_PARAGRAPHS_SHORT,
    structuredDataMinLength: cfg.STRUCTURED_DATA_MIN_LENGTH,
    duplicateOverlap: cfg.DUPLICATE_OVERLAP,
    maxContentLength: cfg.CONTENT_MAX_LENGTH,
  };
}

export type PageExtraction = {
  article: ExtractedArticle;
  metadata: PageMetadata;
};

function parseUrl(raw: string): URL | null {
  try {
    return new URL(raw);
  } catch {
    return null;
  }
}

function makeArticle(content: string, source: ExtractionSource): ExtractedArticle {
  return Object.freeze({ content, source, charLength: content.length });
}

/** Title and description from the head, read before pruning removes `<meta>`. */
export function readPageMetadata($: CheerioAPI): PageMetadata {
  const meta = (sel: string) => $(sel).first().attr('content') ?? '';
  const title = meta('meta[property="og:title"]') || $('title').first().text() || $('h1').first().text();
  const description = meta('meta[name="description"]') || meta('meta[property="og:description"]');
  return { title: sanitizeTitle(title), description: beautifyDescription(description) };
}

export function extractPage(
  doc: HtmlDocument,
  overrides: Partial<ExtractionOptions> = {},
  strategies: readonly ExtractionStrategy[] = DEFAULT_STRATEGIES,
): PageExtraction {
  const options = { ...DEFAULT_EXTRACTION_OPTIONS, ...overrides };
  const $ = load(doc.html);
  const metadata = readPageMetadata($);
  const jsonBlocks = collectJsonBlocks($);
  normalizeMarkup($);

  const ctx = { $, url: parseUrl(doc.url), jsonBlocks, options };
  for (const strategy of strategies) {
    const block = strategy.attempt(ctx);
    if (!block) continue;
    const content = cleanContent(block.paragraphs.join('\n\n'), {
      duplicateOverlap: options.duplicateOverlap,
      maxLength: options.maxContentLength,
    });
    if (content) return { article: makeArticle(content, block.source), metadata };
  }
  return { article: makeArticle(NO_CONTENT, { kind: 'None' }), metadata };
}

export function extractArticle(
  doc: HtmlDocument,
  overrides: Partial<ExtractionOptions> = {},
  strategies: readonly ExtractionStrategy[] = DEFAULT_STRATEGIES,
): ExtractedArticle {
  return extractPage(doc, overrides, strategies).article;
}

export function isNoContent(article: ExtractedArticle): boolean {
  return article.source.kind === 'None';
}

export function describeSource(source: ExtractionSource): string {
  return source.kind === 'SelectorCascade' ? `SelectorCascade(${source.selectorId})` : source.kind;
}
