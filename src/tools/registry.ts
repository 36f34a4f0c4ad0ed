import type { AppConfig } from '../config.js';
import { ToolInputError } from '../errors.js';
import { extractArticleTool } from './impl/extract_article.js';
import { feedDigestTool } from './impl/feed_digest.js';
import { listFeedsTool } from './impl/list_feeds.js';
import { summarizeTextTool } from './impl/summarize_text.js';
import type { AnyToolSpec } from './types.js';

export function builtinTools(cfg: AppConfig): AnyToolSpec[] {
  return [extractArticleTool(cfg), summarizeTextTool(cfg), listFeedsTool(cfg), feedDigestTool(cfg)];
}

export class ToolRegistry {
  private tools = new Map<string, AnyToolSpec>();

  registerTools(tools: AnyToolSpec[]): void {
    for (const tool of tools) {
      if (this.tools.has(tool.name)) throw new Error(`Tool already registered: ${tool.name}`);
      this.tools.set(tool.name, tool);
    }
  }

  get(name: string): AnyToolSpec | undefined {
    return this.tools.get(name);
  }

  list(): AnyToolSpec[] {
    return Array.from(this.tools.values());
  }

  /** Validate `rawArgs` against the tool's schema, then run it. */
  async run(name: string, rawArgs: unknown): Promise<unknown> {
    const tool = this.tools.get(name);
    if (!tool) throw new Error(`Unknown tool: ${name}`);
    const parsed = tool.schema.safeParse(rawArgs);
    if (!parsed.success) {
      throw new ToolInputError(name, parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`));
    }
    return tool.run(parsed.data);
  }
}
