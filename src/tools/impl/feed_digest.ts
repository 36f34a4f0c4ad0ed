import { z } from 'zod';
import type { AppConfig } from '../../config.js';
import { loadFeedCatalog } from '../../feeds/catalog.js';
import { digestCategory, pipelineOptionsFromConfig } from '../../pipeline.js';
import type { ToolSpec } from '../types.js';

const schema = z.object({
  category: z.string().min(1),
  limit: z.number().int().min(1).max(50).optional(),
  summarize: z.boolean().optional(),
});

export function feedDigestTool(cfg: AppConfig): ToolSpec<typeof schema> {
  return {
    name: 'feed_digest',
    description: 'Fetch every feed of a category and extract (and summarize) its newest articles.',
    schema,
    network: true,
    async run({ category, limit, summarize }) {
      const catalog = await loadFeedCatalog(cfg.FEEDS_FILE);
      const base = pipelineOptionsFromConfig(cfg);
      return digestCategory(catalog, category, {
        ...base,
        summarize: summarize ?? base.summarize,
        maxArticles: limit ?? cfg.MAX_ARTICLES,
      });
    },
  };
}
