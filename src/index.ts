/**
 * subreddit-scraper
 *
 * Paginated subreddit listing scraper: fetch, extract, summarize, export.
 */

// Types
export type * from './types/index.js';

// Configuration & logging
export { loadServerConfig, toPipelineSettings } from './config/index.js';
export type { ServerConfig, PipelineSettings } from './config/index.js';
export { createLogger, defaultMetrics, resolveLogLevel } from './logger/index.js';
export type { LogLevel } from './logger/index.js';

// Request normalization
export { normalizeScrapeRequest, canonicalizeSubreddit, ScrapeRequestSchema } from './normalizer/index.js';
export type { ScrapeRequest } from './normalizer/index.js';

// Fetching
export {
  PageFetcher,
  RandomizedPacingPolicy,
  FixedPacingPolicy,
  createHttpClient,
  USER_AGENTS,
} from './fetcher/index.js';
export type { FetchResult, HttpClient, HttpPage, PacingPolicy, PageSource } from './fetcher/index.js';

// Extraction
export {
  extractPosts,
  extractComments,
  parseScore,
  expandCommentCount,
  formatScrapeTime,
} from './extractor/index.js';
export type { CommentExtractOptions, FieldResult, ListingExtraction } from './extractor/index.js';

// Comments & pagination
export { CommentFetcher, MAX_COMMENT_DEPTH } from './comments/index.js';
export { scrapeSubreddit, buildListingUrl } from './scraper/index.js';
export type { ScraperDeps, TerminationReason } from './scraper/index.js';

// Analytics
export { summarizePosts } from './analytics/index.js';

// Rendering & storage
export {
  renderPosts,
  renderAsCsv,
  renderAsJSON,
  renderAsPlainText,
  flattenPostsForCsv,
} from './renderers/index.js';
export { LocalFileStorageAdapter, MemoryStorageAdapter, persistPosts } from './storage/index.js';

// Pipeline & tasks
export { runFullScrape, formatFileStamp } from './pipeline/index.js';
export type { PipelineDeps, PipelineResult } from './pipeline/index.js';
export { TaskRegistry, runScrapeTask, startScrapeTask, toStatusView } from './run-manager/index.js';
export type { TaskRecord, TaskStatus, TaskStatusView } from './run-manager/index.js';

// HTTP API
export { createApp } from './server/app.js';
