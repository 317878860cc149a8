/**
 * Scraper Module (pagination driver)
 *
 * Responsibilities:
 * - Build the listing URL for subreddit + sort (+ time filter for "top")
 * - Walk listing pages until the page cap, the post limit, the last page
 *   or a fetch failure
 * - Attach comments to each appended post when requested
 *
 * A fetch failure is not an error: the run stops and returns whatever was
 * collected up to that point.
 *
 * Usage:
 * ```typescript
 * const output = await scrapeSubreddit(config, { pages: fetcher });
 * console.log(output.posts.length);
 * ```
 */

import type { Logger, Metrics, ScrapeJobConfig, ScrapedPost, ScrapeOutput, SortType, TimeFilter } from '../types/index.js';
import { createLogger, defaultMetrics } from '../logger/index.js';
import { extractPosts } from '../extractor/index.js';
import { CommentFetcher, DEFAULT_MAX_COMMENTS } from '../comments/index.js';
import { DEFAULT_MAX_ATTEMPTS, type PageSource } from '../fetcher/index.js';

export const LISTING_BASE_URL = 'https://old.reddit.com';

/**
 * Why a pagination run ended. Only logged: callers see the posts alone.
 */
export type TerminationReason = 'limit_reached' | 'page_cap' | 'no_next_page' | 'fetch_failed';

export interface ScraperDeps {
  pages: PageSource;
  /** Defaults to a CommentFetcher over the same page source */
  comments?: CommentFetcher;
  maxAttempts?: number;
  maxCommentsPerPost?: number;
  logger?: Logger;
  metrics?: Metrics;
  now?: () => Date;
}

/**
 * Listing URL for a subreddit and sort order
 *
 * @example
 * buildListingUrl('typescript', 'top', 'week')
 * // => 'https://old.reddit.com/r/typescript/top/?t=week'
 */
export function buildListingUrl(subreddit: string, sortBy: SortType, timeFilter: TimeFilter): string {
  const url = `${LISTING_BASE_URL}/r/${subreddit}/${sortBy}/`;
  return sortBy === 'top' ? `${url}?t=${timeFilter}` : url;
}

/**
 * Next-page links are normally absolute; relative ones resolve against the page they came from
 */
function resolveNextUrl(href: string, pageUrl: string): string {
  try {
    return new URL(href, pageUrl).toString();
  } catch {
    return href;
  }
}

/**
 * Run one pagination job
 *
 * @param config - Normalized job configuration
 * @param deps - Page source and observability hooks
 * @returns Posts in page order, at most config.post_limit of them
 */
export async function scrapeSubreddit(config: ScrapeJobConfig, deps: ScraperDeps): Promise<ScrapeOutput> {
  const logger = deps.logger ?? createLogger('scraper');
  const metrics = deps.metrics ?? defaultMetrics;
  const now = deps.now ?? (() => new Date());
  const maxAttempts = deps.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  const maxComments = deps.maxCommentsPerPost ?? DEFAULT_MAX_COMMENTS;
  const comments = deps.comments ?? new CommentFetcher(deps.pages, { maxAttempts, logger });

  const startTime = Date.now();
  const startedAt = now().toISOString();
  const sourceUrl = buildListingUrl(config.subreddit, config.sort_by, config.time_filter);
  const tags = { subreddit: config.subreddit };

  logger.info(`Starting to scrape r/${config.subreddit}`, {
    sort: config.sort_by,
    pages: config.pages,
    postLimit: config.post_limit,
  });
  metrics.increment('scraper.started', tags);

  const posts: ScrapedPost[] = [];
  let currentUrl = sourceUrl;
  let page = 1;
  let pagesFetched = 0;
  let reason: TerminationReason = 'page_cap';

  while (page <= config.pages && posts.length < config.post_limit) {
    logger.info(`Scraping page ${page} of r/${config.subreddit}`, { url: currentUrl });

    const result = await deps.pages.fetchPage(currentUrl, maxAttempts);
    if (!result.ok) {
      reason = 'fetch_failed';
      logger.warn('Listing page unavailable, stopping', { page, url: currentUrl, error: result.error });
      break;
    }
    pagesFetched++;

    const remaining = config.post_limit - posts.length;
    const { posts: pagePosts, nextPageUrl } = extractPosts(result.document, remaining, { logger, now });

    for (const post of pagePosts) {
      if (config.include_comments && post.comments_url) {
        post.comments = await comments.fetchComments(post.comments_url, 1, maxComments);
      }
      posts.push(post);
    }

    logger.info(`Scraped ${pagePosts.length} posts from page ${page}`);

    if (posts.length >= config.post_limit) {
      reason = 'limit_reached';
      break;
    }
    if (nextPageUrl === null) {
      reason = 'no_next_page';
      break;
    }

    currentUrl = resolveNextUrl(nextPageUrl, result.finalUrl);
    page++;
  }

  const duration = Date.now() - startTime;
  metrics.timing('scraper.duration', duration, tags);
  metrics.gauge('scraper.pages_fetched', pagesFetched, tags);
  metrics.gauge('scraper.posts_collected', posts.length, tags);

  logger.info(`Finished scraping. Total posts: ${posts.length}`, {
    reason,
    pagesFetched,
    durationMs: duration,
  });

  return {
    scrape_meta: {
      started_at: startedAt,
      completed_at: now().toISOString(),
      subreddit: config.subreddit,
      source_url: sourceUrl,
      pages_fetched: pagesFetched,
    },
    posts,
  };
}
