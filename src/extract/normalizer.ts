import type { CheerioAPI } from 'cheerio';
import { NOISE_KEYWORDS, REMOVED_TAGS } from './selectors.js';

const PROTECTED_TAGS = new Set(['html', 'head', 'body']);

function isNoise(attr: string | undefined): boolean {
  if (!attr) return false;
  const value = attr.toLowerCase();
  return NOISE_KEYWORDS.some(k => value.includes(k));
}

/** Prune non-content nodes from the tree in place. */
export function normalizeMarkup($: CheerioAPI): void {
  $(REMOVED_TAGS.join(',')).remove();

  const noisy = $('[class], [id]').filter((_, el) => {
    if (PROTECTED_TAGS.has(el.tagName.toLowerCase())) return false;
    const node = $(el);
    return isNoise(node.attr('class')) || isNoise(node.attr('id'));
  });
  noisy.remove();
}
