/**
 * Pipeline Module
 *
 * One complete job: paginate → persist posts → summarize → persist analytics.
 * Shared by the task runner and the command line.
 */

import type {
  AnalyticsSummary,
  ArtifactMetadata,
  Logger,
  Metrics,
  ScrapeJobConfig,
  ScrapeOutput,
  StorageAdapter,
} from '../types/index.js';
import type { PipelineSettings } from '../config/index.js';
import { createLogger, defaultMetrics, errorMessage } from '../logger/index.js';
import { PageFetcher, RandomizedPacingPolicy, type PageSource } from '../fetcher/index.js';
import { scrapeSubreddit } from '../scraper/index.js';
import { summarizePosts } from '../analytics/index.js';
import { persistPosts } from '../storage/index.js';

export const DEFAULT_PIPELINE_SETTINGS: PipelineSettings = {
  requestTimeoutMs: 10_000,
  maxFetchAttempts: 3,
  maxCommentsPerPost: 10,
};

export interface PipelineDeps {
  storage: StorageAdapter;
  /** Defaults to an axios-backed PageFetcher paced by the job's delay range */
  pages?: PageSource;
  settings?: PipelineSettings;
  /** Base name for the posts and analytics files; defaults to `<subreddit>_<sort>_<stamp>` */
  baseName?: string;
  logger?: Logger;
  metrics?: Metrics;
  now?: () => Date;
}

export interface PipelineResult {
  output: ScrapeOutput;
  /** Null when nothing was collected or the write failed */
  artifact: ArtifactMetadata | null;
  /** Set when posts were collected but could not be stored */
  persistError?: string;
  analytics: AnalyticsSummary;
  analyticsArtifact: ArtifactMetadata | null;
}

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * Local time as YYYYMMDD_HHMMSS, for file names
 */
export function formatFileStamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function createPageSource(
  config: ScrapeJobConfig,
  settings: PipelineSettings = DEFAULT_PIPELINE_SETTINGS,
  logger?: Logger,
  metrics?: Metrics
): PageSource {
  return new PageFetcher({
    pacing: new RandomizedPacingPolicy(config.delay_min, config.delay_max),
    timeoutMs: settings.requestTimeoutMs,
    logger,
    metrics,
  });
}

/**
 * Run a full scrape and store its artifacts
 *
 * Never rejects for fetch or storage failures; those surface as a short
 * post list, a null artifact or persistError.
 */
export async function runFullScrape(config: ScrapeJobConfig, deps: PipelineDeps): Promise<PipelineResult> {
  const logger = deps.logger ?? createLogger('pipeline');
  const metrics = deps.metrics ?? defaultMetrics;
  const now = deps.now ?? (() => new Date());
  const settings = deps.settings ?? DEFAULT_PIPELINE_SETTINGS;
  const pages = deps.pages ?? createPageSource(config, settings, logger, metrics);

  const output = await scrapeSubreddit(config, {
    pages,
    maxAttempts: settings.maxFetchAttempts,
    maxCommentsPerPost: settings.maxCommentsPerPost,
    logger,
    metrics,
    now,
  });

  const stamp = formatFileStamp(now());
  const baseName = deps.baseName ?? `${config.subreddit}_${config.sort_by}_${stamp}`;

  const persisted = await persistPosts(output.posts, config.output_format, baseName, deps.storage, logger);
  const artifact = persisted.success ? persisted.data ?? null : null;
  const persistError = persisted.success ? undefined : persisted.error?.message ?? 'Failed to save posts';

  const analytics = summarizePosts(output.posts);
  let analyticsArtifact: ArtifactMetadata | null = null;

  if (output.posts.length > 0) {
    const fileName = `${baseName}_analytics.json`;
    try {
      analyticsArtifact = await deps.storage.save(fileName, JSON.stringify(analytics, null, 2), {
        contentType: 'application/json',
      });
      logger.info(`Analytics saved to ${fileName}`);
    } catch (error) {
      logger.error('Error saving analytics', { fileName, error: errorMessage(error) });
    }
  }

  return { output, artifact, persistError, analytics, analyticsArtifact };
}
