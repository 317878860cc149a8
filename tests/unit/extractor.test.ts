/**
 * Unit tests for the Extractor Module
 */

import { describe, test, expect } from '@jest/globals';
import { readFileSync } from 'fs';
import { join } from 'path';
import * as cheerio from 'cheerio';
import {
  expandCommentCount,
  extractComment,
  extractComments,
  extractPosts,
  formatScrapeTime,
  parseScore,
  resolvePostUrl,
} from '../../src/extractor/index.js';
import { commentsHtml, createRecordingLogger, listingHtml, samplePosts } from '../helpers.js';

const fixture = readFileSync(join(__dirname, '..', 'fixtures', 'listing-page.html'), 'utf-8');
const fixedNow = () => new Date(2024, 2, 1, 12, 30, 5);

describe('Extractor Module', () => {
  describe('parseScore()', () => {
    test('should parse integers and decimals', () => {
      expect(parseScore('42')).toBe(42);
      expect(parseScore('-3')).toBe(-3);
      expect(parseScore('1.5')).toBe(1.5);
      expect(parseScore(' 7 ')).toBe(7);
    });

    test('should return null for non-numeric scores', () => {
      expect(parseScore('•')).toBeNull();
      expect(parseScore('1.5k')).toBeNull();
      expect(parseScore('')).toBeNull();
      expect(parseScore('bad')).toBeNull();
    });
  });

  describe('expandCommentCount()', () => {
    test('should expand k suffixes textually', () => {
      expect(expandCommentCount('2k')).toBe('2000');
      expect(expandCommentCount('1.2k')).toBe('1.2000');
      expect(expandCommentCount('17')).toBe('17');
    });
  });

  describe('resolvePostUrl()', () => {
    test('should resolve root-relative links against the site', () => {
      expect(resolvePostUrl('/r/test/comments/abc/')).toBe('https://www.reddit.com/r/test/comments/abc/');
    });

    test('should keep absolute and empty links', () => {
      expect(resolvePostUrl('https://example.com/a')).toBe('https://example.com/a');
      expect(resolvePostUrl('')).toBe('');
    });
  });

  describe('formatScrapeTime()', () => {
    test('should format local time with zero padding', () => {
      expect(formatScrapeTime(new Date(2024, 0, 5, 9, 3, 7))).toBe('2024-01-05 09:03:07');
    });
  });

  describe('extractPosts()', () => {
    test('should extract every field of a complete self post', () => {
      const { posts } = extractPosts(cheerio.load(fixture), 25, { now: fixedNow, logger: createRecordingLogger() });

      expect(posts[0]).toEqual({
        id: 't3_aaa111',
        title: 'Weekly discussion thread',
        author: 'mod_alpha',
        score: '1523',
        score_numeric: 1523,
        comments_count: '2000',
        post_url: 'https://www.reddit.com/r/typescript/comments/aaa111/weekly_thread/',
        comments_url: 'https://old.reddit.com/r/typescript/comments/aaa111/weekly_thread/',
        timestamp: '2024-03-01T12:00:00+00:00',
        flair: 'Meta',
        is_self_post: true,
        is_stickied: true,
        has_media: false,
        content: 'Ask anything here.',
        scrape_time: '2024-03-01 12:30:05',
      });
    });

    test('should detect media and leave link posts without content', () => {
      const { posts } = extractPosts(cheerio.load(fixture), 25, { now: fixedNow, logger: createRecordingLogger() });

      expect(posts[1]?.post_url).toBe('https://example.com/article');
      expect(posts[1]?.has_media).toBe(true);
      expect(posts[1]?.is_self_post).toBe(false);
      expect(posts[1]?.content).toBe('');
      expect(posts[1]?.flair).toBe('');
    });

    test('should apply defaults for missing elements', () => {
      const { posts } = extractPosts(cheerio.load(fixture), 25, { now: fixedNow, logger: createRecordingLogger() });
      const post = posts[2];

      expect(post?.author).toBe('Unknown');
      expect(post?.timestamp).toBe('');
      expect(post?.score).toBe('•');
      expect(post?.score_numeric).toBeNull();
      expect(post?.comments_count).toBe('1.2000');
    });

    test('should only read content when the post is both self and expanded', () => {
      const { posts } = extractPosts(cheerio.load(fixture), 25, { now: fixedNow, logger: createRecordingLogger() });

      expect(posts[2]?.is_self_post).toBe(true);
      expect(posts[2]?.content).toBe('');
    });

    test('should log defaulted fields once per post', () => {
      const logger = createRecordingLogger();
      extractPosts(cheerio.load(fixture), 25, { now: fixedNow, logger });

      const warnings = logger.entries.filter((entry) => entry.level === 'warn');
      expect(warnings).toEqual([
        { level: 'warn', message: 'Post fields defaulted', meta: { postId: 't3_bbb222', fields: ['flair'] } },
        {
          level: 'warn',
          message: 'Post fields defaulted',
          meta: { postId: 't3_ccc333', fields: ['author', 'timestamp', 'flair'] },
        },
      ]);
    });

    test('should return the decoded next-page link', () => {
      const { nextPageUrl } = extractPosts(cheerio.load(fixture), 25, { now: fixedNow });

      expect(nextPageUrl).toBe('https://old.reddit.com/r/typescript/?count=25&after=t3_ccc333');
    });

    test('should return null when there is no next page', () => {
      const { nextPageUrl } = extractPosts(cheerio.load(listingHtml(samplePosts(2))), 25, { now: fixedNow });

      expect(nextPageUrl).toBeNull();
    });

    test('should return min(containers, limit) posts in document order', () => {
      const $ = cheerio.load(listingHtml(samplePosts(5)));

      expect(extractPosts($, 3, { now: fixedNow }).posts.map((post) => post.id)).toEqual(['t3_p1', 't3_p2', 't3_p3']);
      expect(extractPosts($, 10, { now: fixedNow }).posts).toHaveLength(5);
      expect(extractPosts($, 0, { now: fixedNow }).posts).toHaveLength(0);
    });

    test('should default every field of an empty container', () => {
      const { posts } = extractPosts(cheerio.load(listingHtml([{ id: 't3_bare' }])), 5, { now: fixedNow });

      expect(posts[0]).toMatchObject({
        id: 't3_bare',
        title: 'No title',
        post_url: '',
        score: '0',
        score_numeric: 0,
        author: 'Unknown',
        comments_count: '0',
        comments_url: '',
      });
    });

    const failingOnSecondCall = () => {
      let calls = 0;
      return () => {
        calls += 1;
        if (calls === 2) {
          throw new Error('clock unavailable');
        }
        return fixedNow();
      };
    };

    test('should skip a post that fails to extract and keep the rest', () => {
      const logger = createRecordingLogger();
      const $ = cheerio.load(listingHtml(samplePosts(4)));

      const { posts } = extractPosts($, 25, { now: failingOnSecondCall(), logger });

      expect(posts.map((post) => post.id)).toEqual(['t3_p1', 't3_p3', 't3_p4']);
      expect(logger.entries.filter((entry) => entry.message === 'Error extracting post data')).toEqual([
        { level: 'warn', message: 'Error extracting post data', meta: { error: 'clock unavailable' } },
      ]);
    });

    test('should fill the limit from later containers after a skipped post', () => {
      const $ = cheerio.load(listingHtml(samplePosts(4)));

      const { posts } = extractPosts($, 2, { now: failingOnSecondCall(), logger: createRecordingLogger() });

      expect(posts.map((post) => post.id)).toEqual(['t3_p1', 't3_p3']);
    });

    test('should return no posts for a page without containers', () => {
      const result = extractPosts(cheerio.load('<html><body><p>nothing</p></body></html>'), 25);

      expect(result).toEqual({ posts: [], nextPageUrl: null });
    });
  });

  describe('extractComments()', () => {
    test('should extract comment fields with defaults', () => {
      const $ = cheerio.load(
        commentsHtml([
          { author: 'alice', text: 'First!', score: '12 points', datetime: '2024-03-01T13:00:00+00:00' },
          {},
        ])
      );

      expect(extractComments($, 10)).toEqual([
        { author: 'alice', text: 'First!', score: '12 points', timestamp: '2024-03-01T13:00:00+00:00' },
        { author: 'Unknown', text: '', score: '0 points', timestamp: '' },
      ]);
    });

    test('should truncate to maxComments in document order', () => {
      const $ = cheerio.load(commentsHtml([{ author: 'a' }, { author: 'b' }, { author: 'c' }]));

      expect(extractComments($, 2).map((comment) => comment.author)).toEqual(['a', 'b']);
    });

    test('should skip a comment that fails to extract and keep the rest', () => {
      const logger = createRecordingLogger();
      const $ = cheerio.load(commentsHtml([{ author: 'a' }, { author: 'b' }, { author: 'c' }]));

      const comments = extractComments($, 10, {
        logger,
        parseEntry: (entry) => {
          const comment = extractComment(entry);
          if (comment.author === 'b') {
            throw new Error('malformed entry');
          }
          return comment;
        },
      });

      expect(comments.map((comment) => comment.author)).toEqual(['a', 'c']);
      expect(logger.entries).toEqual([
        { level: 'warn', message: 'Error extracting comment', meta: { error: 'malformed entry' } },
      ]);
    });
  });
});
