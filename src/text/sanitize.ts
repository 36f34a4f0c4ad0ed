import { htmlToText } from 'html-to-text';
import { ELLIPSIS } from '../utils/text.js';

const HEADINGS = ['h1', 'h2', 'h3', 'h4', 'h5', 'h6'].map(selector => ({
  selector,
  options: { uppercase: false },
}));

/** Strip markup and decode entities. */
export function cleanHtmlTags(text: string): string {
  if (!text) return '';
  return htmlToText(text, {
    wordwrap: false,
    selectors: [
      { selector: 'a', options: { ignoreHref: true } },
      { selector: 'img', format: 'skip' },
      ...HEADINGS,
    ],
  }).trim();
}

export function beautifyDescription(description: string): string {
  if (!description) return '';
  let clean = cleanHtmlTags(description).replace(/\s+/g, ' ');
  clean = clean.replace(/^\s*-\s*/, '');
  clean = clean.replace(/\s*(?:\.\.\.|…)\s*$/, ELLIPSIS);
  clean = clean.trim();
  if (clean && !/[.!?]$/.test(clean)) clean += '.';
  return clean;
}

export function sanitizeTitle(title: string): string {
  if (!title) return '';
  return cleanHtmlTags(title).replace(/\s+/g, ' ').replace(/^\s*-\s*/, '').trim();
}

/**
 * Beautified text capped at `maxLength` characters plus an ellipsis. The cut
 * moves back to the last space only when that keeps over 80% of the cap.
 */
export function extractCleanText(text: string, maxLength?: number): string {
  if (!text) return '';
  const clean = beautifyDescription(text);
  if (!maxLength || clean.length <= maxLength) return clean;
  const truncated = clean.slice(0, maxLength);
  const lastSpace = truncated.lastIndexOf(' ');
  return (lastSpace > maxLength * 0.8 ? truncated.slice(0, lastSpace) : truncated) + ELLIPSIS;
}

export function formatArticleSummary(title: string, description: string, link = '', pubDate = ''): string {
  const parts: string[] = [];
  const cleanTitle = sanitizeTitle(title);
  const cleanDesc = beautifyDescription(description);
  if (cleanTitle) parts.push(`Title: ${cleanTitle}`);
  if (cleanDesc) parts.push(`Description: ${cleanDesc}`);

  const meta: string[] = [];
  if (pubDate) meta.push(`Date: ${pubDate}`);
  if (link) meta.push(`Link: ${link}`);
  if (meta.length) parts.push(meta.join(' | '));

  return parts.join('\n');
}
