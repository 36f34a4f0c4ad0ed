import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ConfigError } from '../errors.js';

const feedSource = z.object({ name: z.string().min(1), url: z.string().url() });

const feedCategory = z.object({
  name: z.string().min(1),
  description: z.string().default(''),
  feeds: z.array(feedSource).min(1),
});

const catalogSchema = z.record(z.string().regex(/^[a-z0-9_]+$/), feedCategory);

export type FeedSource = z.infer<typeof feedSource>;
export type FeedCategory = z.infer<typeof feedCategory>;
export type FeedCatalog = z.infer<typeof catalogSchema>;

export const DEFAULT_CATALOG_PATH = fileURLToPath(new URL('../../data/feeds.json', import.meta.url));

export function parseFeedCatalog(data: unknown): FeedCatalog {
  const parsed = catalogSchema.safeParse(data);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(i => `feeds.${i.path.join('.')}: ${i.message}`));
  }
  return parsed.data;
}

export async function loadFeedCatalog(path: string = DEFAULT_CATALOG_PATH): Promise<FeedCatalog> {
  const raw = await readFile(path, 'utf-8');
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError([`${path}: ${err instanceof Error ? err.message : String(err)}`]);
  }
  return parseFeedCatalog(data);
}

export function getCategory(catalog: FeedCatalog, id: string): FeedCategory {
  const category = catalog[id];
  if (!category) {
    throw new ConfigError([`unknown feed category "${id}" (available: ${Object.keys(catalog).join(', ')})`]);
  }
  return category;
}
