/**
 * Extractor Module
 *
 * Pure transformation of parsed pages into records:
 * - Listing page → posts (bounded by a limit) + next-page URL
 * - Discussion page → flat comment list
 *
 * Every field is read by its own function returning a FieldResult, so a
 * missing element yields the documented default and is reported once per
 * post instead of aborting the page.
 */

import type { Cheerio, CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import type { Logger, PostComment, ScrapedPost } from '../types/index.js';
import { createLogger, errorMessage } from '../logger/index.js';
import {
  COMMENT_SELECTORS,
  CONTAINER_ID_PREFIX,
  LISTING_SELECTORS,
  POST_CLASSES,
  POST_URL_BASE,
} from './selectors.js';

export * from './selectors.js';

// ============================================================================
// Types
// ============================================================================

export interface FieldResult<T> {
  value: T;
  /** True when the source element or attribute was absent */
  defaulted: boolean;
}

export type PostContainer = Cheerio<Element>;

export interface ListingExtraction {
  posts: ScrapedPost[];
  /** Absent when the page has no next-page link */
  nextPageUrl: string | null;
}

export interface ExtractOptions {
  logger?: Logger;
  /** Clock used for scrape_time */
  now?: () => Date;
}

const present = <T>(value: T): FieldResult<T> => ({ value, defaulted: false });
const absent = <T>(value: T): FieldResult<T> => ({ value, defaulted: true });

/**
 * First matching element's trimmed text, or the fallback when nothing matches
 */
function textOf(scope: PostContainer, selector: string, fallback: string): FieldResult<string> {
  const element = scope.find(selector).first();
  return element.length > 0 ? present(element.text().trim()) : absent(fallback);
}

/**
 * First matching element's attribute, or the fallback when either is missing
 */
function attrOf(scope: PostContainer, selector: string, name: string, fallback: string): FieldResult<string> {
  const value = scope.find(selector).first().attr(name);
  return value === undefined ? absent(fallback) : present(value);
}

// ============================================================================
// Value Helpers
// ============================================================================

const NUMERIC_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Best-effort numeric conversion of a raw score
 *
 * @returns the number, or null for anything that is not plain decimal syntax
 */
export function parseScore(raw: string): number | null {
  const trimmed = raw.trim();
  if (!NUMERIC_PATTERN.test(trimmed)) {
    return null;
  }
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}

/**
 * Textual "k" expansion: "2k" → "2000", "1.5k" → "1.5000"
 */
export function expandCommentCount(raw: string): string {
  return raw.replaceAll('k', '000');
}

/**
 * Resolve root-relative links against the site base; other values pass through
 */
export function resolvePostUrl(href: string): string {
  return href.startsWith('/') ? new URL(href, POST_URL_BASE).toString() : href;
}

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * Local wall-clock time as YYYY-MM-DD HH:MM:SS
 */
export function formatScrapeTime(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

// ============================================================================
// Post Fields
// ============================================================================

export function extractPostId(container: PostContainer): FieldResult<string> {
  const id = container.attr('id');
  return id === undefined ? absent('') : present(id.replaceAll(CONTAINER_ID_PREFIX, ''));
}

export function extractTitle(container: PostContainer): FieldResult<string> {
  return textOf(container, LISTING_SELECTORS.title, 'No title');
}

export function extractPostUrl(container: PostContainer): FieldResult<string> {
  const href = attrOf(container, LISTING_SELECTORS.title, 'href', '');
  return { value: resolvePostUrl(href.value), defaulted: href.defaulted };
}

export function extractScore(container: PostContainer): FieldResult<string> {
  return attrOf(container, LISTING_SELECTORS.score, 'title', '0');
}

export function extractAuthor(container: PostContainer): FieldResult<string> {
  return textOf(container, LISTING_SELECTORS.author, 'Unknown');
}

export function extractFlair(container: PostContainer): FieldResult<string> {
  return textOf(container, LISTING_SELECTORS.flair, '');
}

export function extractTimestamp(container: PostContainer): FieldResult<string> {
  return attrOf(container, LISTING_SELECTORS.time, 'datetime', '');
}

/**
 * First token of the comments link text, with "k" expanded
 */
export function extractCommentsCount(container: PostContainer): FieldResult<string> {
  const text = textOf(container, LISTING_SELECTORS.comments, '0 comments');
  const token = text.value.split(/\s+/).find((part) => part.length > 0);
  if (token === undefined) {
    return absent('0');
  }
  return { value: expandCommentCount(token), defaulted: text.defaulted };
}

export function extractCommentsUrl(container: PostContainer): FieldResult<string> {
  return attrOf(container, LISTING_SELECTORS.comments, 'href', '');
}

export function extractIsSelf(container: PostContainer): FieldResult<boolean> {
  return present(container.hasClass(POST_CLASSES.self));
}

export function extractIsStickied(container: PostContainer): FieldResult<boolean> {
  return present(container.hasClass(POST_CLASSES.stickied));
}

export function extractHasMedia(container: PostContainer): FieldResult<boolean> {
  return present(container.find(LISTING_SELECTORS.media).length > 0);
}

/**
 * Self-post body; only read from expanded self posts
 */
export function extractContent(container: PostContainer): FieldResult<string> {
  if (!container.hasClass(POST_CLASSES.self) || !container.hasClass(POST_CLASSES.expando)) {
    return present('');
  }
  return textOf(container, LISTING_SELECTORS.content, '');
}

// ============================================================================
// Listing Extraction
// ============================================================================

/**
 * Build one post from its container
 *
 * @returns the post and the names of fields that fell back to defaults
 */
export function extractPost(
  container: PostContainer,
  scrapeTime: string
): { post: ScrapedPost; defaultedFields: string[] } {
  const fields = {
    id: extractPostId(container),
    title: extractTitle(container),
    author: extractAuthor(container),
    score: extractScore(container),
    comments_count: extractCommentsCount(container),
    post_url: extractPostUrl(container),
    comments_url: extractCommentsUrl(container),
    timestamp: extractTimestamp(container),
    flair: extractFlair(container),
    is_self_post: extractIsSelf(container),
    is_stickied: extractIsStickied(container),
    has_media: extractHasMedia(container),
    content: extractContent(container),
  };

  const defaultedFields = Object.entries(fields)
    .filter(([, result]) => result.defaulted)
    .map(([name]) => name);

  const post: ScrapedPost = {
    id: fields.id.value,
    title: fields.title.value,
    author: fields.author.value,
    score: fields.score.value,
    score_numeric: parseScore(fields.score.value),
    comments_count: fields.comments_count.value,
    post_url: fields.post_url.value,
    comments_url: fields.comments_url.value,
    timestamp: fields.timestamp.value,
    flair: fields.flair.value,
    is_self_post: fields.is_self_post.value,
    is_stickied: fields.is_stickied.value,
    has_media: fields.has_media.value,
    content: fields.content.value,
    scrape_time: scrapeTime,
  };

  return { post, defaultedFields };
}

/**
 * Extract up to postLimit posts from a listing page
 *
 * @param $ - Parsed listing page
 * @param postLimit - Maximum number of posts to return
 */
export function extractPosts($: CheerioAPI, postLimit: number, options: ExtractOptions = {}): ListingExtraction {
  const logger = options.logger ?? createLogger('extractor');
  const now = options.now ?? (() => new Date());
  const posts: ScrapedPost[] = [];

  for (const element of $(LISTING_SELECTORS.post).toArray()) {
    if (posts.length >= postLimit) {
      break;
    }

    try {
      const { post, defaultedFields } = extractPost($(element), formatScrapeTime(now()));
      if (defaultedFields.length > 0) {
        logger.warn('Post fields defaulted', { postId: post.id, fields: defaultedFields });
      }
      posts.push(post);
    } catch (error) {
      logger.warn('Error extracting post data', { error: errorMessage(error) });
    }
  }

  const nextHref = $(LISTING_SELECTORS.nextPage).first().attr('href');

  return { posts, nextPageUrl: nextHref ?? null };
}

// ============================================================================
// Comment Extraction
// ============================================================================

export function extractComment(entry: PostContainer): PostComment {
  return {
    author: textOf(entry, COMMENT_SELECTORS.author, 'Unknown').value,
    text: textOf(entry, COMMENT_SELECTORS.text, '').value,
    score: textOf(entry, COMMENT_SELECTORS.score, '0 points').value,
    timestamp: attrOf(entry, COMMENT_SELECTORS.time, 'datetime', '').value,
  };
}

export interface CommentExtractOptions {
  logger?: Logger;
  /** Reads one comment entry; defaults to extractComment */
  parseEntry?: (entry: PostContainer) => PostComment;
}

/**
 * Flat list of the first maxComments entries of a discussion page.
 * Nested replies are not followed; an entry that fails to parse is skipped.
 */
export function extractComments($: CheerioAPI, maxComments: number, options: CommentExtractOptions = {}): PostComment[] {
  const logger = options.logger ?? createLogger('extractor');
  const parseEntry = options.parseEntry ?? extractComment;
  const comments: PostComment[] = [];

  for (const element of $(COMMENT_SELECTORS.entry).toArray().slice(0, Math.max(0, maxComments))) {
    try {
      comments.push(parseEntry($(element)));
    } catch (error) {
      logger.warn('Error extracting comment', { error: errorMessage(error) });
    }
  }

  return comments;
}
