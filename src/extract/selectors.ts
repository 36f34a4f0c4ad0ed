import type { SiteClass } from './types.js';

export const REMOVED_TAGS = [
  'script', 'style', 'nav', 'header', 'footer', 'aside', 'menu',
  'iframe', 'noscript', 'svg', 'form', 'button', 'link', 'meta',
];

// matched as case-insensitive substrings of class and id
export const NOISE_KEYWORDS = [
  'advert', 'adsense', 'adslot', 'adunit', 'dfp-', 'banner', 'sponsor', 'promo',
  'outbrain', 'taboola', 'paywall', 'piano-', 'subscribe', 'newsletter',
  'cookie', 'consent', 'popup', 'modal', 'social', 'share', 'related',
  'recommend', 'comment', 'sidebar', 'navbar', 'breadcrumb', 'menu',
];

export const SITE_CLASSES: SiteClass[] = [
  {
    id: 'wire',
    hosts: ['ansa.it', 'adnkronos.com', 'agi.it', 'askanews.it', 'lapresse.it', 'italpress.com'],
    short: true,
    selectors: [
      '.news-txt p',
      '.post-single-text p',
      '.article-text p',
      '.news-body p',
      'div[itemprop="articleBody"] p',
    ],
  },
  {
    id: 'daily',
    hosts: [
      'corriere.it', 'repubblica.it', 'ilsole24ore.com', 'gazzetta.it',
      'tg24.sky.it', 'lastampa.it', 'ilpost.it',
    ],
    short: false,
    selectors: [
      'p.chapter-paragraph',
      '.story__text p',
      '.atext p',
      '.c-article-body p',
      '.c-paragraph',
      '.detail_body p',
    ],
  },
];

// paragraph-level selectors used on any site
export const GENERIC_SELECTORS = [
  'p.article-paragraph',
  'p.article__paragraph',
  'p.story-text',
  'p.paragraph',
  '.rich-text p',
  '.body-text p',
  '.text-body p',
  '[data-component="text-block"] p',
];

export const CONTENT_CONTAINERS = [
  '[itemprop="articleBody"]',
  '.articleBody',
  '.article-body',
  '.article-content',
  '.article__content',
  '.post-content',
  '.entry-content',
  '.story-body',
  '.story-content',
  '.content-body',
  '.main-content',
  '#article-body',
  '#content',
];

export const BODY_PARAGRAPH_DENYLIST = ['cookie', 'privacy', 'terms', 'login', 'subscribe', 'menu'];

export const MAX_PARAGRAPH_LINKS = 3;

export function siteClassFor(url: URL | null, classes: SiteClass[]): SiteClass | undefined {
  if (!url) return undefined;
  const host = url.hostname.toLowerCase();
  return classes.find(c => c.hosts.some(h => host === h || host.endsWith(`.${h}`)));
}
