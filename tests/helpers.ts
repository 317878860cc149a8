/**
 * Shared test utilities: page builders, a scripted page source and a
 * recording logger.
 */

import * as cheerio from 'cheerio';
import type { FetchResult, PageSource } from '../src/fetcher/index.js';
import type { Logger, ScrapedPost } from '../src/types/index.js';

// ============================================================================
// Logger
// ============================================================================

export interface RecordedLog {
  level: 'debug' | 'info' | 'warn' | 'error';
  message: string;
  meta?: Record<string, unknown>;
}

export function createRecordingLogger(): Logger & { entries: RecordedLog[] } {
  const entries: RecordedLog[] = [];
  const record = (level: RecordedLog['level']) => (message: string, meta?: Record<string, unknown>) => {
    entries.push({ level, message, meta });
  };
  return {
    entries,
    debug: record('debug'),
    info: record('info'),
    warn: record('warn'),
    error: record('error'),
  };
}

// ============================================================================
// HTML Builders
// ============================================================================

export interface PostFixture {
  id: string;
  title?: string;
  href?: string;
  score?: string;
  author?: string;
  flair?: string;
  datetime?: string;
  commentsText?: string;
  commentsHref?: string;
  classes?: string[];
  content?: string;
  media?: boolean;
}

const escapeAttr = (value: string): string => value.replace(/&/g, '&amp;').replace(/"/g, '&quot;');

function postHtml(post: PostFixture): string {
  const classes = ['thing', 'link', ...(post.classes ?? [])].join(' ');
  const parts = [
    post.score === undefined ? '' : `<div class="score unvoted" title="${post.score}">${post.score}</div>`,
    post.title === undefined ? '' : `<a class="title" href="${escapeAttr(post.href ?? '')}">${post.title}</a>`,
    post.flair === undefined ? '' : `<span class="linkflairlabel">${post.flair}</span>`,
    post.author === undefined ? '' : `<a class="author">${post.author}</a>`,
    post.datetime === undefined ? '' : `<time datetime="${post.datetime}">earlier</time>`,
    post.commentsText === undefined
      ? ''
      : `<a class="comments" href="${escapeAttr(post.commentsHref ?? '')}">${post.commentsText}</a>`,
    post.media ? '<a class="thumbnail" href="#"><img src="thumb.jpg"></a>' : '',
    post.content === undefined ? '' : `<div class="expando"><div class="md">${post.content}</div></div>`,
  ];
  return `<div class="${classes}" id="thing_${post.id}">${parts.join('')}</div>`;
}

export function listingHtml(posts: PostFixture[], nextUrl?: string): string {
  const next = nextUrl === undefined ? '' : `<span class="next-button"><a href="${escapeAttr(nextUrl)}">next</a></span>`;
  return `<html><body><div id="siteTable">${posts.map(postHtml).join('')}</div>${next}</body></html>`;
}

/**
 * Fully populated listing posts with ids `${prefix}1`, `${prefix}2`, ...
 */
export function samplePosts(count: number, prefix: string = 't3_p'): PostFixture[] {
  return Array.from({ length: count }, (_, index) => ({
    id: `${prefix}${index + 1}`,
    title: `Post ${index + 1}`,
    href: `/r/test/comments/${prefix}${index + 1}/`,
    score: String(index + 1),
    author: `author_${index + 1}`,
    flair: 'Discussion',
    datetime: '2024-03-01T12:00:00+00:00',
    commentsText: `${index} comments`,
    commentsHref: `https://old.reddit.com/r/test/comments/${prefix}${index + 1}/`,
  }));
}

export interface CommentFixture {
  author?: string;
  text?: string;
  score?: string;
  datetime?: string;
}

export function commentsHtml(comments: CommentFixture[]): string {
  const entries = comments.map((comment) =>
    [
      '<div class="entry">',
      comment.author === undefined ? '' : `<a class="author">${comment.author}</a>`,
      comment.score === undefined ? '' : `<span class="score">${comment.score}</span>`,
      comment.datetime === undefined ? '' : `<time datetime="${comment.datetime}">then</time>`,
      comment.text === undefined ? '' : `<div class="md"><p>${comment.text}</p></div>`,
      '</div>',
    ].join('')
  );
  return `<html><body>${entries.join('')}</body></html>`;
}

// ============================================================================
// Page Source
// ============================================================================

/**
 * Serves scripted HTML by URL; unknown URLs fail like exhausted retries
 */
export class FakePageSource implements PageSource {
  readonly calls: string[] = [];

  constructor(private readonly pages: Record<string, string>) {}

  async fetchPage(url: string, maxAttempts: number = 3): Promise<FetchResult> {
    this.calls.push(url);
    const html = this.pages[url];
    if (html === undefined) {
      return { ok: false, error: 'Request failed with status code 503', finalUrl: url, attempts: maxAttempts };
    }
    return { ok: true, document: cheerio.load(html), finalUrl: url, attempts: 1 };
  }
}

// ============================================================================
// Records
// ============================================================================

export function makePost(overrides: Partial<ScrapedPost> = {}): ScrapedPost {
  return {
    id: 't3_default',
    title: 'Default title',
    author: 'someone',
    score: '1',
    score_numeric: 1,
    comments_count: '0',
    post_url: 'https://www.reddit.com/r/test/comments/default/',
    comments_url: 'https://old.reddit.com/r/test/comments/default/',
    timestamp: '2024-03-01T12:00:00+00:00',
    flair: '',
    is_self_post: false,
    is_stickied: false,
    has_media: false,
    content: '',
    scrape_time: '2024-03-01 12:30:00',
    ...overrides,
  };
}
