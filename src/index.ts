#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { readFile } from 'node:fs/promises';
import { text as readStream } from 'node:stream/consumers';
import { loadConfig, type AppConfig } from './config.js';
import { errorMessage, FetchError } from './errors.js';
import { getCategory, loadFeedCatalog } from './feeds/catalog.js';
import { MetricsCollector } from './observability/metrics.js';
import {
  digestCategory,
  formatRecordHeader,
  pipelineOptionsFromConfig,
  processDocument,
  processUrl,
  type ArticleRecord,
  type FeedDigest,
  type PipelineOptions,
} from './pipeline.js';
import { isSummaryMethod, summarize, type SummaryMethod } from './summarize/index.js';
import { builtinTools, ToolRegistry } from './tools/registry.js';

type SummaryFlags = { method?: SummaryMethod; maxLength?: number; summarize?: boolean };

function parseMethod(value: string): SummaryMethod {
  if (!isSummaryMethod(value)) throw new InvalidArgumentError('expected auto, extractive, keyword or lead');
  return value;
}

function parsePositiveInt(value: string): number {
  const n = parseInt(value, 10);
  if (!Number.isInteger(n) || n <= 0) throw new InvalidArgumentError('expected a positive integer');
  return n;
}

function applyFlags(cfg: AppConfig, opts: SummaryFlags): PipelineOptions {
  const base = pipelineOptionsFromConfig(cfg);
  return {
    ...base,
    summarize: opts.summarize === false ? false : base.summarize,
    summaryMethod: opts.method ?? base.summaryMethod,
    summaryMaxLength: opts.maxLength ?? base.summaryMaxLength,
  };
}

function printRecord(record: ArticleRecord): void {
  console.log(chalk.bold(record.title || '(untitled)'));
  if (record.description) console.log(chalk.gray(record.description));
  console.log(chalk.gray(`${record.link} · ${record.source} · ${record.charLength} chars`));
  if (record.summary) {
    console.log(chalk.cyan(`\nSummary (${record.summary.strategy}):`));
    console.log(record.summary.text);
  } else {
    console.log(`\n${record.content}`);
  }
}

function printDigest(digest: FeedDigest): void {
  console.log(chalk.blue(`\n=== ${digest.title} (${digest.feedUrl}) ===`));
  if (digest.error) {
    console.log(chalk.red(`  feed failed: ${digest.error}`));
    return;
  }
  for (const article of digest.articles) {
    console.log(`\n${chalk.yellow(formatRecordHeader(article))}`);
    console.log(chalk.gray(`Source: ${article.source}`));
    console.log(article.summary?.text ?? article.content);
  }
}

function withSummaryOptions(cmd: Command): Command {
  return cmd
    .option('--method <method>', 'summary method: auto | extractive | keyword | lead', parseMethod)
    .option('--max-length <n>', 'summary length cap in characters', parsePositiveInt)
    .option('--no-summarize', 'print the extracted content without summarizing')
    .option('--json', 'print the record as JSON');
}

const program = new Command();

program
  .name('newsdigest')
  .description('Extract readable article content from news pages and summarize it without a language model')
  .version('0.1.0');

withSummaryOptions(program.command('extract'))
  .argument('<url>', 'article URL to fetch')
  .description('Fetch an article and extract its main content')
  .action(async (url: string, opts: SummaryFlags & { json?: boolean }) => {
    const record = await processUrl(url, applyFlags(loadConfig(), opts));
    if (opts.json) console.log(JSON.stringify(record, null, 2));
    else printRecord(record);
  });

withSummaryOptions(program.command('extract-file'))
  .argument('<path>', 'saved HTML page')
  .option('--url <url>', 'URL the page was fetched from (selects site-specific rules)', 'about:blank')
  .description('Extract the main content of a saved HTML page')
  .action(async (path: string, opts: SummaryFlags & { json?: boolean; url: string }) => {
    const html = await readFile(path, 'utf-8');
    const record = processDocument({ url: opts.url, html }, applyFlags(loadConfig(), opts));
    if (opts.json) console.log(JSON.stringify(record, null, 2));
    else printRecord(record);
  });

program.command('summarize')
  .argument('[file]', 'text file to summarize (stdin when omitted)')
  .option('--method <method>', 'summary method: auto | extractive | keyword | lead', parseMethod)
  .option('--max-length <n>', 'summary length cap in characters', parsePositiveInt)
  .description('Summarize plain text')
  .action(async (file: string | undefined, opts: SummaryFlags) => {
    const cfg = loadConfig();
    const text = file ? await readFile(file, 'utf-8') : await readStream(process.stdin);
    const result = summarize(text.trim(), {
      method: opts.method ?? cfg.SUMMARY_METHOD,
      maxLength: opts.maxLength ?? cfg.SUMMARY_MAX_LENGTH,
    });
    console.log(chalk.gray(`[${result.strategy}]`));
    console.log(result.text);
  });

program.command('feeds')
  .argument('[category]', 'category to list feeds for')
  .description('List configured feed categories')
  .action(async (categoryId: string | undefined) => {
    const catalog = await loadFeedCatalog(loadConfig().FEEDS_FILE);
    if (categoryId) {
      const category = getCategory(catalog, categoryId);
      console.log(chalk.bold(`${category.name}: ${category.description}`));
      for (const feed of category.feeds) console.log(`- ${feed.name}: ${chalk.gray(feed.url)}`);
      return;
    }
    for (const [id, category] of Object.entries(catalog)) {
      console.log(`- ${chalk.bold(id)} (${category.feeds.length} feeds): ${category.description}`);
    }
  });

withSummaryOptions(program.command('digest'))
  .argument('<category>', 'feed category from the catalog')
  .option('--limit <n>', 'articles per feed', parsePositiveInt)
  .option('--stats', 'print extraction statistics at the end')
  .description('Extract and summarize the newest articles of every feed in a category')
  .action(async (categoryId: string, opts: SummaryFlags & { json?: boolean; limit?: number; stats?: boolean }) => {
    const cfg = loadConfig();
    const catalog = await loadFeedCatalog(cfg.FEEDS_FILE);
    const metrics = new MetricsCollector();
    const digests = await digestCategory(catalog, categoryId, {
      ...applyFlags(cfg, opts),
      maxArticles: opts.limit ?? cfg.MAX_ARTICLES,
      metrics,
    });
    if (opts.json) console.log(JSON.stringify(digests, null, 2));
    else digests.forEach(printDigest);

    if (opts.stats) {
      const report = metrics.getReport();
      console.log(chalk.bold('\nStats:'));
      for (const c of report.counters) {
        const labels = Object.entries(c.labels).map(([k, v]) => `${k}=${v}`).join(' ');
        console.log(`  ${c.name}${labels ? ` ${labels}` : ''}: ${c.value}`);
      }
      for (const h of report.histograms) {
        console.log(`  ${h.name}: n=${h.count} avg=${h.avg.toFixed(0)} max=${h.max}`);
      }
    }
  });

const tools = program.command('tools').description('Tool surface for agent integrations');

tools.command('list')
  .description('List available tools')
  .action(() => {
    const registry = new ToolRegistry();
    registry.registerTools(builtinTools(loadConfig()));
    for (const t of registry.list()) {
      console.log(`- ${t.name}${t.network ? ' [network]' : ''}: ${t.description}`);
    }
  });

tools.command('run')
  .argument('<name>', 'tool name')
  .argument('[json]', 'arguments as a JSON object', '{}')
  .description('Run a tool with JSON arguments')
  .action(async (name: string, json: string) => {
    let args: unknown;
    try {
      args = JSON.parse(json);
    } catch (err) {
      throw new InvalidArgumentError(`arguments are not valid JSON: ${errorMessage(err)}`);
    }
    const registry = new ToolRegistry();
    registry.registerTools(builtinTools(loadConfig()));
    console.log(JSON.stringify(await registry.run(name, args), null, 2));
  });

program.parseAsync().catch((err: unknown) => {
  const detail = err instanceof FetchError ? ` [${err.kind}${err.status ? ` ${err.status}` : ''}]` : '';
  console.error(chalk.red(`✖ ${errorMessage(err)}${detail}`));
  process.exitCode = 1;
});
