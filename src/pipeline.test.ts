import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { loadConfig } from './config.js';
import { parseFeedCatalog } from './feeds/catalog.js';
import { MetricsCollector } from './observability/metrics.js';
import {
  digestCategory,
  digestFeed,
  failedRecord,
  formatRecordHeader,
  pipelineOptionsFromConfig,
  processDocument,
  type ArticleRecord,
} from './pipeline.js';

const PARAS = [
  'The regional government announced a new plan to renovate historic train stations.',
  'Engineers expect the first phase of the works to finish before the summer holidays.',
  'Local businesses welcomed the decision, hoping for more visitors in the town centre.',
];

const ARTICLE_HTML = `<html><head><title>Stations plan</title></head><body><article>${PARAS.map(p => `<p>${p}</p>`).join('')}</article></body></html>`;

const FEED_URL = 'https://news.test/rss';
const BROKEN_FEED_URL = 'https://broken.test/rss';

const RSS = `<rss><channel><title>Town News</title>
  <item><title>Stations</title><link>https://news.test/stations</link><description>Renovation plan</description>
    <pubDate>Tue, 02 Jan 2024 10:00:00 GMT</pubDate></item>
  <item><title>Broken</title><link>https://news.test/broken</link><description>Server trouble</description>
    <pubDate>Mon, 01 Jan 2024 10:00:00 GMT</pubDate></item>
  <item><title>No link</title><description>Skipped</description></item>
</channel></rss>`;

const ROUTES: Record<string, () => Response> = {
  [FEED_URL]: () => new Response(RSS),
  'https://news.test/stations': () => new Response(ARTICLE_HTML),
  'https://news.test/broken': () => new Response('oops', { status: 500 }),
  [BROKEN_FEED_URL]: () => new Response('down', { status: 503 }),
};

beforeEach(() => {
  vi.stubGlobal(
    'fetch',
    vi.fn(async (input: string | URL | Request) => {
      const route = ROUTES[String(input)];
      return route ? route() : new Response('not found', { status: 404 });
    }),
  );
});

afterEach(() => {
  vi.unstubAllGlobals();
});

const options = () => ({ ...pipelineOptionsFromConfig(loadConfig({})), maxArticles: 5 });

describe('processDocument', () => {
  it('extracts and passes short content through the summarizer', () => {
    const record = processDocument({ url: 'https://news.test/stations', html: ARTICLE_HTML }, options());
    expect(record.title).toBe('Stations plan');
    expect(record.source).toBe('ArticleTag');
    expect(record.content).toBe(PARAS.join(' '));
    expect(record.summary).toEqual({ text: PARAS.join(' '), method: 'auto', strategy: 'passthrough' });
  });

  it('skips summarizing when disabled and uses fallback metadata', () => {
    const html = `<html><body><article>${PARAS.map(p => `<p>${p}</p>`).join('')}</article></body></html>`;
    const record = processDocument({ url: 'https://news.test/x', html }, { ...options(), summarize: false }, {
      title: 'From feed',
      description: 'Feed description.',
    });
    expect(record.summary).toBeNull();
    expect(record.title).toBe('From feed');
    expect(record.description).toBe('Feed description.');
  });
});

describe('failedRecord', () => {
  it('turns an error into an inline record', () => {
    const item = { title: 'T', link: 'https://a.test', description: 'D', pubDate: '', publishedAt: null };
    expect(failedRecord(item, new Error('boom'))).toEqual({
      title: 'T',
      description: 'D',
      link: 'https://a.test',
      pubDate: '',
      content: 'error fetching article: boom',
      source: 'None',
      charLength: 'error fetching article: boom'.length,
      summary: null,
    });
  });
});

describe('formatRecordHeader', () => {
  const record: ArticleRecord = {
    title: 'Stations <b>plan</b>',
    description: 'a'.repeat(400),
    link: 'https://news.test/stations',
    pubDate: '2024-01-02',
    content: '',
    source: 'ArticleTag',
    charLength: 0,
    summary: null,
  };

  it('caps the description and prints date and link', () => {
    expect(formatRecordHeader(record)).toBe(
      `Title: Stations plan\nDescription: ${'a'.repeat(300)}...\nDate: 2024-01-02 | Link: https://news.test/stations`,
    );
  });

  it('leaves out an empty date', () => {
    expect(formatRecordHeader({ ...record, description: 'Short.', pubDate: '' })).toBe(
      'Title: Stations plan\nDescription: Short.\nLink: https://news.test/stations',
    );
  });
});

describe('digestFeed', () => {
  it('keeps going when one article fails', async () => {
    const metrics = new MetricsCollector();
    const digest = await digestFeed(FEED_URL, { ...options(), metrics });

    expect(digest.title).toBe('Town News');
    expect(digest.articles.map(a => a.link)).toEqual(['https://news.test/stations', 'https://news.test/broken']);
    expect(digest.articles[0]?.source).toBe('ArticleTag');
    expect(digest.articles[0]?.pubDate).toBe('Tue, 02 Jan 2024 10:00:00 GMT');
    expect(digest.articles[1]?.pubDate).toBe('Mon, 01 Jan 2024 10:00:00 GMT');
    expect(digest.articles[1]?.content).toBe('error fetching article: HTTP 500');
    expect(digest.articles[1]?.title).toBe('Broken');

    expect(metrics.counter('articles_total', { status: 'ok' })).toBe(1);
    expect(metrics.counter('articles_total', { status: 'error' })).toBe(1);
    expect(metrics.counter('extraction_source', { source: 'ArticleTag' })).toBe(1);
    expect(metrics.getReport().histograms[0]?.count).toBe(2);
  });

  it('honours the article limit', async () => {
    const digest = await digestFeed(FEED_URL, { ...options(), maxArticles: 1 });
    expect(digest.articles).toHaveLength(1);
  });
});

describe('digestCategory', () => {
  it('reports a failing feed without dropping the others', async () => {
    const catalog = parseFeedCatalog({
      local: {
        name: 'Local',
        feeds: [
          { name: 'Town', url: FEED_URL },
          { name: 'Broken', url: BROKEN_FEED_URL },
        ],
      },
    });
    const metrics = new MetricsCollector();
    const digests = await digestCategory(catalog, 'local', { ...options(), metrics });

    expect(digests[0]?.articles).toHaveLength(2);
    expect(digests[1]).toEqual({ feedUrl: BROKEN_FEED_URL, title: 'Broken', articles: [], error: 'HTTP 503' });
    expect(metrics.counter('feeds_failed')).toBe(1);
  });
});
