import { z } from 'zod';
import type { AppConfig } from '../../config.js';
import { pipelineOptionsFromConfig, processDocument, processUrl } from '../../pipeline.js';
import { SUMMARY_METHODS } from '../../summarize/index.js';
import type { ToolSpec } from '../types.js';

const schema = z.object({
  url: z.string().url(),
  html: z.string().min(1).optional().describe('Page markup; fetched from url when omitted'),
  summarize: z.boolean().optional(),
  method: z.enum(['auto', 'extractive', 'keyword', 'lead']).optional(),
  maxLength: z.number().int().min(50).max(5_000).optional(),
});

export function extractArticleTool(cfg: AppConfig): ToolSpec<typeof schema> {
  return {
    name: 'extract_article',
    description: `Extract the readable content of a news article page and optionally summarize it (${SUMMARY_METHODS.join('|')}).`,
    schema,
    network: true,
    async run({ url, html, summarize, method, maxLength }) {
      const base = pipelineOptionsFromConfig(cfg);
      const options = {
        ...base,
        summarize: summarize ?? base.summarize,
        summaryMethod: method ?? base.summaryMethod,
        summaryMaxLength: maxLength ?? base.summaryMaxLength,
      };
      return html ? processDocument({ url, html }, options) : processUrl(url, options);
    },
  };
}
