/**
 * Comment Fetcher
 *
 * Retrieves one post's discussion page and returns a flat, truncated list
 * of its comments. Depth is capped: requests past MAX_COMMENT_DEPTH return
 * nothing and make no network call.
 */

import type { Logger, PostComment } from '../types/index.js';
import { createLogger, errorMessage } from '../logger/index.js';
import { extractComments } from '../extractor/index.js';
import { DEFAULT_MAX_ATTEMPTS, type PageSource } from '../fetcher/index.js';

export const MAX_COMMENT_DEPTH = 2;

export const DEFAULT_MAX_COMMENTS = 10;

export interface CommentFetcherOptions {
  maxAttempts?: number;
  logger?: Logger;
}

export class CommentFetcher {
  private readonly maxAttempts: number;
  private readonly logger: Logger;

  constructor(
    private readonly pages: PageSource,
    options: CommentFetcherOptions = {}
  ) {
    this.maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    this.logger = options.logger ?? createLogger('comments');
  }

  /**
   * @param url - Discussion page URL
   * @param depth - Current depth, starting at 1
   * @param maxComments - Truncation bound
   */
  async fetchComments(
    url: string,
    depth: number = 1,
    maxComments: number = DEFAULT_MAX_COMMENTS
  ): Promise<PostComment[]> {
    if (depth > MAX_COMMENT_DEPTH) {
      return [];
    }

    try {
      const result = await this.pages.fetchPage(url, this.maxAttempts);
      if (!result.ok) {
        this.logger.warn('Skipping comments, discussion page unavailable', { url, error: result.error });
        return [];
      }
      return extractComments(result.document, maxComments, { logger: this.logger });
    } catch (error) {
      this.logger.error('Error extracting comments', { url, error: errorMessage(error) });
      return [];
    }
  }
}
