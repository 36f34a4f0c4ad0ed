import type { CheerioAPI } from 'cheerio';
import { htmlToText } from 'html-to-text';
import type { CandidateBlock, ExtractionContext, ExtractionStrategy } from './types.js';

const JSON_SCRIPTS = 'script[type="application/ld+json"], script[type="application/json"]';

/** Raw JSON script bodies, read before the normalizer drops `<script>`. */
export function collectJsonBlocks($: CheerioAPI): string[] {
  return $(JSON_SCRIPTS)
    .map((_, el) => $(el).text())
    .get()
    .filter(s => s.trim().length > 0);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Depth-first walk yielding every `articleBody` string, `@graph` included. */
export function* articleBodies(value: unknown): Generator<string> {
  if (Array.isArray(value)) {
    for (const item of value) yield* articleBodies(item);
    return;
  }
  if (!isRecord(value)) return;
  const body = value.articleBody;
  if (typeof body === 'string') yield body;
  for (const [key, child] of Object.entries(value)) {
    if (key !== 'articleBody' && typeof child === 'object') yield* articleBodies(child);
  }
}

function bodyText(body: string): string {
  if (!/<[a-z][^>]*>/i.test(body)) return body.trim();
  return htmlToText(body, { wordwrap: false, selectors: [{ selector: 'a', options: { ignoreHref: true } }] }).trim();
}

export function parseJsonBlock(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    // malformed blocks are common (trailing commas, CMS templating); skip them
    return undefined;
  }
}

export const structuredDataStrategy: ExtractionStrategy = {
  name: 'structured-data',
  attempt({ jsonBlocks, options }: ExtractionContext): CandidateBlock | null {
    for (const raw of jsonBlocks) {
      const data = parseJsonBlock(raw);
      if (data === undefined) continue;
      for (const body of articleBodies(data)) {
        const text = bodyText(body);
        if (text.length > options.structuredDataMinLength) {
          return { source: { kind: 'StructuredData' }, paragraphs: [text] };
        }
      }
    }
    return null;
  },
};
