import { load, type Cheerio } from 'cheerio';
import type { Element } from 'domhandler';
import { fetchText, FEED_ACCEPT, type FetchOptions } from '../fetch/http.js';
import { beautifyDescription, sanitizeTitle } from '../text/sanitize.js';
import { fieldAttribute, fieldText, MISSING, type FeedField } from './field.js';

export type FeedItem = {
  title: string;
  link: string;
  description: string;
  pubDate: string;
  publishedAt: Date | null;
};

export type Feed = {
  title: string;
  items: FeedItem[];
};

function toField(node: Cheerio<Element>): FeedField {
  if (node.length === 0) return MISSING;
  const content = node.text().trim();
  const attributes = node.attr() ?? {};
  return Object.keys(attributes).length > 0
    ? { kind: 'structured', content, attributes }
    : { kind: 'text', value: content };
}

export function parseDateSafely(raw: string): Date | null {
  if (!raw) return null;
  const date = new Date(raw);
  return Number.isNaN(date.getTime()) ? null : date;
}

/** A permalink guid beats `<link>`; Atom links live in `href`. */
export function articleLink(guid: FeedField, link: FeedField): string {
  const guidText = fieldText(guid);
  if (guidText.startsWith('http')) return guidText;
  return fieldText(link) || fieldAttribute(link, 'href') || '';
}

export function parseFeed(xml: string): Feed {
  const $ = load(xml, { xml: true });
  const items: FeedItem[] = [];

  $('item, entry').each((_, el) => {
    const node = $(el);
    const child = (name: string) => toField(node.children(name).first());
    const link = node.children('link[rel="alternate"]').length
      ? toField(node.children('link[rel="alternate"]').first())
      : child('link');
    const pubDate = fieldText(child('pubDate')) || fieldText(child('published')) || fieldText(child('updated'));
    items.push({
      title: sanitizeTitle(fieldText(child('title'))),
      link: articleLink(child('guid'), link),
      description: beautifyDescription(fieldText(child('description')) || fieldText(child('summary'))),
      pubDate,
      publishedAt: parseDateSafely(pubDate),
    });
  });

  // newest first, undated last; sort is stable for equal dates
  items.sort((a, b) => {
    if (!a.publishedAt || !b.publishedAt) return Number(!a.publishedAt) - Number(!b.publishedAt);
    return b.publishedAt.getTime() - a.publishedAt.getTime();
  });

  const title = sanitizeTitle($('channel > title').first().text() || $('feed > title').first().text());
  return { title, items };
}

export async function fetchFeed(url: string, options: FetchOptions = {}): Promise<Feed> {
  const xml = await fetchText(url, { ...options, accept: FEED_ACCEPT });
  return parseFeed(xml);
}
