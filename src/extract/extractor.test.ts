import { describe, expect, it } from 'vitest';
import { describeSource, extractArticle, extractPage, isNoContent, NO_CONTENT } from './extractor.js';
import type { ExtractionStrategy } from './types.js';

const PARAS = [
  'The regional government announced a new plan to renovate historic train stations.',
  'Engineers expect the first phase of the works to finish before the summer holidays.',
  'Local businesses welcomed the decision, hoping for more visitors in the town centre.',
  'Opposition councillors asked for a detailed cost estimate before the next vote.',
  'Residents will be able to comment on the designs at public meetings in October.',
];

const BODY =
  'The city council approved a new transport plan on Monday after months of debate. ' +
  'Officials said the plan would add twelve new bus routes and extend the tram network. ' +
  'Critics argued that the budget was too small to cover maintenance costs. ' +
  'The mayor promised that construction would begin early next year.';

const URL = 'https://example.com/news/1';

function page(body: string, head = ''): string {
  return `<html><head><title>Test page</title>${head}</head><body>${body}</body></html>`;
}

function ps(texts: string[], attrs = ''): string {
  return texts.map(t => `<p${attrs}>${t}</p>`).join('\n');
}

const joined = (n: number) => PARAS.slice(0, n).join(' ');

describe('extractArticle cascade', () => {
  it('prefers structured data over matching selectors', () => {
    const head = `<script type="application/ld+json">${JSON.stringify({ '@type': 'NewsArticle', articleBody: BODY })}</script>`;
    const html = page(`<div class="article-body">${ps(PARAS)}</div>${ps(PARAS, ' class="paragraph"')}`, head);

    const article = extractArticle({ url: URL, html });
    expect(article.source).toEqual({ kind: 'StructuredData' });
    expect(article.content).toBe(BODY);
    expect(article.charLength).toBe(BODY.length);
  });

  it('accepts the first generic selector with enough paragraphs', () => {
    const html = page(`<div>${ps(PARAS.slice(0, 3), ' class="article-paragraph"')}</div>`);
    const article = extractArticle({ url: URL, html });
    expect(article.source).toEqual({ kind: 'SelectorCascade', selectorId: 'p.article-paragraph' });
    expect(article.content).toBe(joined(3));
  });

  it('falls through when a selector matches fewer paragraphs than required', () => {
    const outside = ps(
      [
        'A first paragraph matched by the generic selector, long enough to count.',
        'A second paragraph matched by the generic selector, long enough to count.',
      ],
      ' class="paragraph"',
    );
    const html = page(`${outside}<article>${ps(PARAS.slice(0, 3))}</article>`);

    const article = extractArticle({ url: URL, html });
    expect(article.source).toEqual({ kind: 'ArticleTag' });
    expect(article.content).toBe(joined(3));
  });

  it('drops paragraphs shorter than the minimum before counting', () => {
    const html = page(`<div>${ps([...PARAS.slice(0, 2), 'Photo: Reuters'], ' class="article-paragraph"')}</div>`);
    expect(extractArticle({ url: URL, html }).source.kind).not.toBe('SelectorCascade');
  });

  it('uses the short-article threshold on wire-service hosts', () => {
    const html = page(`<div class="news-txt">${ps(PARAS.slice(0, 2))}</div>`);

    const wire = extractArticle({ url: 'https://www.ansa.it/sito/notizie/articolo.html', html });
    expect(wire.source).toEqual({ kind: 'SelectorCascade', selectorId: '.news-txt p' });
    expect(wire.content).toBe(joined(2));

    expect(isNoContent(extractArticle({ url: URL, html }))).toBe(true);
  });

  it('skips figures nested in the article', () => {
    const caption = 'A long photo caption that easily passes the minimum paragraph length.';
    const html = page(`<article><figure><p>${caption}</p></figure>${ps(PARAS.slice(0, 3))}</article>`);
    const article = extractArticle({ url: URL, html });
    expect(article.source).toEqual({ kind: 'ArticleTag' });
    expect(article.content).toBe(joined(3));
  });

  it('falls back to common content containers', () => {
    const html = page(`<div class="entry-content">${ps(PARAS.slice(0, 3))}</div>`);
    expect(extractArticle({ url: URL, html }).source).toEqual({ kind: 'CommonSelectors' });
  });

  it('falls back to the main element', () => {
    const html = page(`<main>${ps(PARAS.slice(0, 3))}</main>`);
    expect(extractArticle({ url: URL, html }).source).toEqual({ kind: 'MainTag' });
  });

  it('scans body paragraphs, skipping navigation text and link farms', () => {
    const cookie = 'We use cookie files to improve your experience on this website every day.';
    const links =
      '<p>Read <a href="/1">one</a> <a href="/2">two</a> <a href="/3">three</a> <a href="/4">four</a> more coverage from our partners today.</p>';
    const html = page(`<div>${ps([PARAS[0], cookie])}${links}${ps(PARAS.slice(1, 3))}<p>Too short.</p></div>`);

    const article = extractArticle({ url: URL, html });
    expect(article.source).toEqual({ kind: 'BodyFallback' });
    expect(article.content).toBe(joined(3));
  });

  it('returns the no-content sentinel when nothing qualifies', () => {
    const html = page(ps(['Short one.', 'Short two.', 'Short three.', 'Short four.']));
    const article = extractArticle({ url: URL, html });
    expect(article.source).toEqual({ kind: 'None' });
    expect(article.content).toBe(NO_CONTENT);
    expect(article.charLength).toBe(NO_CONTENT.length);
  });

  it('removes noisy containers before matching', () => {
    const html = page(
      `<div class="related-stories">${ps(PARAS.slice(0, 3), ' class="article-paragraph"')}</div>` +
        `<main>${ps(PARAS.slice(2, 5))}</main>`,
    );
    const article = extractArticle({ url: URL, html });
    expect(article.source).toEqual({ kind: 'MainTag' });
    expect(article.content).toBe(PARAS.slice(2, 5).join(' '));
  });
});

describe('extractArticle output', () => {
  it('is deterministic for identical input', () => {
    const html = page(`<article>${ps(PARAS)}</article>`);
    expect(extractArticle({ url: URL, html }).content).toBe(extractArticle({ url: URL, html }).content);
  });

  it('caps content length at a word boundary', () => {
    const html = page(`<article>${ps(PARAS.slice(0, 3))}</article>`);
    const article = extractArticle({ url: URL, html }, { maxContentLength: 100 });
    expect(article.content).toBe(`${PARAS[0]} Engineers...`);
  });

  it('honours tuned thresholds', () => {
    const html = page(`<article>${ps(PARAS.slice(0, 2))}</article>`);
    expect(isNoContent(extractArticle({ url: URL, html }))).toBe(true);
    expect(extractArticle({ url: URL, html }, { minParagraphs: 2 }).source).toEqual({ kind: 'ArticleTag' });
  });

  it('returns a frozen record', () => {
    const article = extractArticle({ url: URL, html: page('') });
    expect(Object.isFrozen(article)).toBe(true);
  });

  it('runs a custom strategy list', () => {
    const fixed: ExtractionStrategy = {
      name: 'fixed',
      attempt: () => ({ source: { kind: 'MainTag' }, paragraphs: ['  custom   content  '] }),
    };
    expect(extractArticle({ url: URL, html: page('') }, {}, [fixed]).content).toBe('custom content');
  });
});

describe('extractPage metadata', () => {
  it('reads title and description before pruning', () => {
    const head =
      '<meta property="og:title" content="Open Graph &amp; title">' +
      '<meta name="description" content="A short description">';
    const { metadata } = extractPage({ url: URL, html: page('', head) });
    expect(metadata).toEqual({ title: 'Open Graph & title', description: 'A short description.' });
  });

  it('falls back to the title element', () => {
    expect(extractPage({ url: URL, html: page('') }).metadata.title).toBe('Test page');
  });
});

describe('describeSource', () => {
  it('includes the selector for cascade results', () => {
    expect(describeSource({ kind: 'SelectorCascade', selectorId: '.atext p' })).toBe('SelectorCascade(.atext p)');
    expect(describeSource({ kind: 'BodyFallback' })).toBe('BodyFallback');
  });
});
