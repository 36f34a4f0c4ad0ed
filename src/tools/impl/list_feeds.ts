import { z } from 'zod';
import type { AppConfig } from '../../config.js';
import { getCategory, loadFeedCatalog } from '../../feeds/catalog.js';
import type { ToolSpec } from '../types.js';

const schema = z.object({
  category: z.string().optional(),
});

export function listFeedsTool(cfg: AppConfig): ToolSpec<typeof schema> {
  return {
    name: 'list_feeds',
    description: 'List the configured feed categories, or the feeds of one category.',
    schema,
    async run({ category }) {
      const catalog = await loadFeedCatalog(cfg.FEEDS_FILE);
      if (category) return { [category]: getCategory(catalog, category) };
      return Object.fromEntries(
        Object.entries(catalog).map(([id, c]) => [id, { name: c.name, description: c.description, feeds: c.feeds.length }]),
      );
    },
  };
}
