import { z } from 'zod';
import type { AppConfig } from '../../config.js';
import { summarize } from '../../summarize/index.js';
import type { ToolSpec } from '../types.js';

const schema = z.object({
  text: z.string().min(1),
  method: z.enum(['auto', 'extractive', 'keyword', 'lead']).optional(),
  maxLength: z.number().int().min(50).max(5_000).optional(),
});

export function summarizeTextTool(cfg: AppConfig): ToolSpec<typeof schema> {
  return {
    name: 'summarize_text',
    description: 'Summarize text by sentence extraction (no language model).',
    schema,
    async run({ text, method, maxLength }) {
      return summarize(text, {
        method: method ?? cfg.SUMMARY_METHOD,
        maxLength: maxLength ?? cfg.SUMMARY_MAX_LENGTH,
      });
    },
  };
}
