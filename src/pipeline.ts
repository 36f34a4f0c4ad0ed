import type { AppConfig } from './config.js';
import { errorMessage } from './errors.js';
import { describeSource, extractionOptionsFromConfig, extractPage } from './extract/extractor.js';
import type { ExtractionOptions, HtmlDocument, PageMetadata } from './extract/types.js';
import { fetchText } from './fetch/http.js';
import { getCategory, type FeedCatalog } from './feeds/catalog.js';
import { fetchFeed, type FeedItem } from './feeds/rss.js';
import type { MetricsCollector } from './observability/metrics.js';
import { summarize, type SummaryMethod, type SummaryResult } from './summarize/index.js';
import { extractCleanText, formatArticleSummary } from './text/sanitize.js';

export type PipelineOptions = {
  extraction: Partial<ExtractionOptions>;
  summarize: boolean;
  summaryMethod: SummaryMethod;
  summaryMaxLength: number;
  timeoutMs: number;
  metrics?: MetricsCollector;
};

export type ArticleRecord = {
  title: string;
  description: string;
  link: string;
  pubDate: string;
  content: string;
  source: string;
  charLength: number;
  summary: SummaryResult | null;
};

export type FeedDigest = {
  feedUrl: string;
  title: string;
  articles: ArticleRecord[];
  error?: string;
};

/** Feed-side metadata used when the page itself has none. */
export type RecordFallback = Partial<PageMetadata> & { pubDate?: string };

export const FETCH_FAILURE_PREFIX = 'error fetching article';

export const DESCRIPTION_MAX_LENGTH = 300;

export function pipelineOptionsFromConfig(cfg: AppConfig): PipelineOptions {
  return {
    extraction: extractionOptionsFromConfig(cfg),
    summarize: cfg.SUMMARIZE,
    summaryMethod: cfg.SUMMARY_METHOD,
    summaryMaxLength: cfg.SUMMARY_MAX_LENGTH,
    timeoutMs: cfg.FETCH_TIMEOUT_MS,
  };
}

/** Extract, then optionally summarize, an already fetched page. */
export function processDocument(
  doc: HtmlDocument,
  options: PipelineOptions,
  fallback: RecordFallback = {},
): ArticleRecord {
  const { article, metadata } = extractPage(doc, options.extraction);
  options.metrics?.incrementCounter('extraction_source', { source: article.source.kind });
  return {
    title: metadata.title || fallback.title || '',
    description: metadata.description || fallback.description || '',
    link: doc.url,
    pubDate: fallback.pubDate ?? '',
    content: article.content,
    source: describeSource(article.source),
    charLength: article.charLength,
    summary: options.summarize
      ? summarize(article.content, { method: options.summaryMethod, maxLength: options.summaryMaxLength })
      : null,
  };
}

/** Fetch failures propagate as FetchError; the caller decides skip or report. */
export async function processUrl(
  url: string,
  options: PipelineOptions,
  fallback: RecordFallback = {},
): Promise<ArticleRecord> {
  const html = await fetchText(url, { timeoutMs: options.timeoutMs });
  return processDocument({ url, html }, options, fallback);
}

export function failedRecord(item: FeedItem, err: unknown): ArticleRecord {
  const content = `${FETCH_FAILURE_PREFIX}: ${errorMessage(err)}`;
  return {
    title: item.title,
    description: item.description,
    link: item.link,
    pubDate: item.pubDate,
    content,
    source: 'None',
    charLength: content.length,
    summary: null,
  };
}

/** Title, capped description and date/link lines of one digest entry. */
export function formatRecordHeader(record: ArticleRecord): string {
  return formatArticleSummary(
    record.title,
    extractCleanText(record.description, DESCRIPTION_MAX_LENGTH),
    record.link,
    record.pubDate,
  );
}

async function processItem(item: FeedItem, options: PipelineOptions): Promise<ArticleRecord> {
  const started = Date.now();
  try {
    const record = await processUrl(item.link, options, {
      title: item.title,
      description: item.description,
      pubDate: item.pubDate,
    });
    options.metrics?.incrementCounter('articles_total', { status: 'ok' });
    return record;
  } catch (err) {
    options.metrics?.incrementCounter('articles_total', { status: 'error' });
    return failedRecord(item, err);
  } finally {
    options.metrics?.recordHistogram('article_duration_ms', Date.now() - started);
  }
}

/**
 * Process the newest `maxArticles` items of a feed concurrently. One
 * article's failure becomes an inline error record and never aborts the rest.
 */
export async function digestFeed(
  feedUrl: string,
  options: PipelineOptions & { maxArticles: number },
): Promise<FeedDigest> {
  const feed = await fetchFeed(feedUrl, { timeoutMs: options.timeoutMs });
  const items = feed.items.filter(i => i.link).slice(0, options.maxArticles);
  const articles = await Promise.all(items.map(item => processItem(item, options)));
  return { feedUrl, title: feed.title, articles };
}

/** Digest every feed of a catalog category; a feed that fails reports its error inline. */
export async function digestCategory(
  catalog: FeedCatalog,
  categoryId: string,
  options: PipelineOptions & { maxArticles: number },
): Promise<FeedDigest[]> {
  const category = getCategory(catalog, categoryId);
  return Promise.all(
    category.feeds.map(async (source): Promise<FeedDigest> => {
      try {
        const digest = await digestFeed(source.url, options);
        return { ...digest, title: digest.title || source.name };
      } catch (err) {
        options.metrics?.incrementCounter('feeds_failed');
        return { feedUrl: source.url, title: source.name, articles: [], error: errorMessage(err) };
      }
    }),
  );
}
