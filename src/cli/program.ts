import { Command, Option } from 'commander';
import { join } from 'path';
import type { AnalyticsSummary, ScrapeJobConfig, StorageAdapter } from '../types/index.js';
import { loadServerConfig, toPipelineSettings } from '../config/index.js';
import { createLogger } from '../logger/index.js';
import { OUTPUT_FORMATS, SORT_TYPES, TIME_FILTERS, normalizeScrapeRequest } from '../normalizer/index.js';
import { runFullScrape, type PipelineDeps, type PipelineResult } from '../pipeline/index.js';
import { LocalFileStorageAdapter } from '../storage/index.js';

const intArg = (value: string): number => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`Expected a positive integer, got: ${value}`);
  }
  return parsed;
};

const floatArg = (value: string): number => {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`Expected a non-negative number, got: ${value}`);
  }
  return parsed;
};

interface ScrapeCommandOptions {
  limit: number;
  format: string;
  output?: string;
  comments: boolean;
  pages: number;
  sort: string;
  time: string;
  delayMin: number;
  delayMax: number;
}

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
  /** Records the process exit status */
  setExitCode: (code: number) => void;
}

export interface CliDeps {
  io?: CliIO;
  /** Defaults to local files under OUTPUT_DIR */
  storage?: StorageAdapter;
  outputDir?: string;
  runPipeline?: (config: ScrapeJobConfig, deps: PipelineDeps) => Promise<PipelineResult>;
  env?: NodeJS.ProcessEnv;
}

const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
  setExitCode: (code) => {
    process.exitCode = code;
  },
};

/**
 * Summary printed after a successful run
 */
export function formatQuickAnalytics(summary: AnalyticsSummary): string[] {
  const average = summary.average_score === null ? 'n/a' : summary.average_score.toFixed(2);
  const lines = [
    'Quick Analytics:',
    `- Total Posts: ${summary.total_posts}`,
    `- Unique Authors: ${summary.unique_authors}`,
    `- Average Score: ${average}`,
    `- Self Posts: ${summary.self_posts_percentage.toFixed(1)}%`,
  ];

  if (summary.top_authors.length > 0) {
    lines.push('', 'Top Contributors:');
    for (const author of summary.top_authors.slice(0, 3)) {
      lines.push(`- ${author.name}: ${author.count} posts`);
    }
  }

  return lines;
}

export function buildProgram(deps: CliDeps = {}): Command {
  const io = deps.io ?? consoleIO;
  const runPipeline = deps.runPipeline ?? runFullScrape;

  const program = new Command();

  program
    .name('subreddit-scraper')
    .description('Scrape subreddit listings into CSV, JSON or text')
    .argument('<subreddit>', 'Subreddit to scrape')
    .option('--limit <number>', 'Maximum number of posts to scrape', intArg, 25)
    .addOption(new Option('--format <format>', 'Output format').choices(OUTPUT_FORMATS).default('csv'))
    .option('--output <name>', 'Output filename (without extension)')
    .option('--comments', 'Include comments', false)
    .option('--pages <number>', 'Number of pages to scrape', intArg, 1)
    .addOption(new Option('--sort <sort>', 'Sort method').choices(SORT_TYPES).default('hot'))
    .addOption(new Option('--time <time>', 'Time filter for top posts').choices(TIME_FILTERS).default('all'))
    .option('--delay-min <seconds>', 'Minimum delay between requests', floatArg, 1.0)
    .option('--delay-max <seconds>', 'Maximum delay between requests', floatArg, 3.0)
    .action(async (subreddit: string, options: ScrapeCommandOptions) => {
      const normalized = normalizeScrapeRequest({
        subreddit,
        post_limit: options.limit,
        output_format: options.format,
        include_comments: options.comments,
        pages: options.pages,
        sort_by: options.sort,
        time_filter: options.time,
        delay_min: options.delayMin,
        delay_max: options.delayMax,
      });

      if (!normalized.success || !normalized.data) {
        io.err(normalized.error?.message ?? 'Invalid arguments');
        const details = normalized.error?.details;
        if (Array.isArray(details)) {
          for (const detail of details) {
            io.err(`  ${String(detail)}`);
          }
        }
        io.setExitCode(1);
        return;
      }

      const env = deps.env ?? process.env;
      const serverConfig = loadServerConfig(env);
      const outputDir = deps.outputDir ?? serverConfig.OUTPUT_DIR;
      const storage = deps.storage ?? new LocalFileStorageAdapter(outputDir);

      const result = await runPipeline(normalized.data, {
        storage,
        settings: toPipelineSettings(serverConfig),
        baseName: options.output,
        logger: createLogger('cli', serverConfig.LOG_LEVEL),
      });

      if (!result.artifact) {
        io.err(result.persistError ?? 'No posts were scraped; nothing saved.');
        io.setExitCode(1);
        return;
      }

      io.out('');
      io.out('Scraping completed successfully!');
      io.out(`Data saved to: ${join(outputDir, result.artifact.fileName)}`);
      io.out('');
      for (const line of formatQuickAnalytics(result.analytics)) {
        io.out(line);
      }
    });

  return program;
}
