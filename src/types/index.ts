/**
 * Core type definitions for the subreddit scraper
 *
 * This module exports all shared types used across the system.
 * Field names of persisted records are snake_case: they are the
 * on-disk schema of the JSON/CSV exports and the task API payloads.
 */

/**
 * Unique identifier for a scrape task (UUID v4)
 */
export type TaskId = string;

// ============================================================================
// Job Configuration
// ============================================================================

export type SortType = 'hot' | 'new' | 'top' | 'rising';

export type TimeFilter = 'hour' | 'day' | 'week' | 'month' | 'year' | 'all';

export type OutputFormat = 'csv' | 'json' | 'txt';

/**
 * Canonical scrape job parameters.
 * Immutable input to a single pipeline run; delays are in seconds.
 */
export interface ScrapeJobConfig {
  readonly subreddit: string;
  readonly post_limit: number;
  readonly pages: number;
  readonly sort_by: SortType;
  readonly time_filter: TimeFilter;
  readonly include_comments: boolean;
  readonly output_format: OutputFormat;
  readonly delay_min: number;
  readonly delay_max: number;
}

// ============================================================================
// Scraped Records
// ============================================================================

/**
 * One reply entry from a post's discussion page
 */
export interface PostComment {
  author: string;
  text: string;
  /** Raw score text, e.g. "12 points" */
  score: string;
  timestamp: string;
}

/**
 * One listing entry extracted from a subreddit page
 */
export interface ScrapedPost {
  id: string;
  title: string;
  author: string;
  /** Raw score as found in the page */
  score: string;
  /** Best-effort numeric conversion of `score`; null when unparseable */
  score_numeric: number | null;
  /** Comment count text with any "k" suffix expanded to "000" */
  comments_count: string;
  post_url: string;
  comments_url: string;
  timestamp: string;
  flair: string;
  is_self_post: boolean;
  is_stickied: boolean;
  has_media: boolean;
  content: string;
  /** Local retrieval time, YYYY-MM-DD HH:MM:SS */
  scrape_time: string;
  comments?: PostComment[];
}

/**
 * Scrape metadata
 */
export interface ScrapeMeta {
  started_at: string;
  completed_at: string;
  subreddit: string;
  source_url: string;
  pages_fetched: number;
}

/**
 * Output of one pagination run
 */
export interface ScrapeOutput {
  scrape_meta: ScrapeMeta;
  posts: ScrapedPost[];
}

// ============================================================================
// Analytics
// ============================================================================

export interface AuthorCount {
  name: string;
  count: number;
}

export interface FlairCount {
  flair: string;
  count: number;
}

/**
 * Aggregate statistics over a completed post set
 */
export interface AnalyticsSummary {
  readonly total_posts: number;
  readonly unique_authors: number;
  readonly average_score: number | null;
  readonly median_score: number | null;
  readonly max_score: number | null;
  readonly min_score: number | null;
  readonly stickied_posts: number;
  readonly self_posts_percentage: number;
  readonly posts_with_media_percentage: number;
  readonly top_authors: readonly AuthorCount[];
  readonly flair_distribution: readonly FlairCount[];
}

// ============================================================================
// Storage
// ============================================================================

/**
 * Artifact metadata for storage tracking
 */
export interface ArtifactMetadata {
  fileName: string;
  createdAt: string;
  contentType: string;
  size?: number;
  checksum?: string;
}

/**
 * Storage adapter interface for artifact persistence
 */
export interface StorageAdapter {
  save(fileName: string, content: string | Buffer, metadata?: Record<string, unknown>): Promise<ArtifactMetadata>;
  load(fileName: string): Promise<{ content: string | Buffer; metadata: ArtifactMetadata }>;
  exists(fileName: string): Promise<boolean>;
  list(): Promise<ArtifactMetadata[]>;
  delete(fileName: string): Promise<void>;
}

// ============================================================================
// Observability
// ============================================================================

/**
 * Logger interface for observability
 */
export interface Logger {
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
}

/**
 * Metrics interface for observability
 */
export interface Metrics {
  increment(metric: string, tags?: Record<string, string>): void;
  gauge(metric: string, value: number, tags?: Record<string, string>): void;
  timing(metric: string, value: number, tags?: Record<string, string>): void;
}

// ============================================================================
// Module Results
// ============================================================================

/**
 * Result wrapper for module boundaries that report failure instead of throwing
 */
export interface ModuleResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: {
    code: string;
    message: string;
    details?: unknown;
  };
  metadata: {
    module: string;
    timestamp: string;
    duration?: number;
    taskId?: TaskId;
  };
}
