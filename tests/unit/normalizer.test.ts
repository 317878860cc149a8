/**
 * Unit tests for the Normalizer Module
 * Tests scrape request defaults, bounds and canonicalization
 */

import { describe, test, expect } from '@jest/globals';
import { canonicalizeSubreddit, normalizeScrapeRequest } from '../../src/normalizer/index.js';

describe('Normalizer Module', () => {
  describe('normalizeScrapeRequest()', () => {
    test('should apply defaults to a minimal request', () => {
      const result = normalizeScrapeRequest({ subreddit: 'typescript' });

      expect(result.success).toBe(true);
      expect(result.data).toEqual({
        subreddit: 'typescript',
        post_limit: 25,
        output_format: 'json',
        include_comments: false,
        pages: 1,
        sort_by: 'hot',
        time_filter: 'all',
        delay_min: 1,
        delay_max: 3,
      });
      expect(result.metadata.module).toBe('normalizer');
    });

    test('should keep explicit values', () => {
      const result = normalizeScrapeRequest({
        subreddit: 'r/node',
        post_limit: 100,
        output_format: 'txt',
        include_comments: true,
        pages: 10,
        sort_by: 'top',
        time_filter: 'week',
        delay_min: 0.5,
        delay_max: 1,
      });

      expect(result.data).toMatchObject({
        subreddit: 'node',
        post_limit: 100,
        output_format: 'txt',
        include_comments: true,
        pages: 10,
        sort_by: 'top',
        time_filter: 'week',
        delay_min: 0.5,
        delay_max: 1,
      });
    });

    test('should return a frozen config', () => {
      const result = normalizeScrapeRequest({ subreddit: 'typescript' });

      expect(Object.isFrozen(result.data)).toBe(true);
    });

    test('should reject a post limit outside 1-100', () => {
      const low = normalizeScrapeRequest({ subreddit: 'typescript', post_limit: 0 });
      const high = normalizeScrapeRequest({ subreddit: 'typescript', post_limit: 101 });

      expect(low.success).toBe(false);
      expect(low.error?.code).toBe('VALIDATION_ERROR');
      expect(low.error?.details).toEqual(['post_limit: Number must be greater than or equal to 1']);
      expect(high.error?.details).toEqual(['post_limit: Number must be less than or equal to 100']);
    });

    test('should reject a page count outside 1-10', () => {
      expect(normalizeScrapeRequest({ subreddit: 'typescript', pages: 11 }).success).toBe(false);
      expect(normalizeScrapeRequest({ subreddit: 'typescript', pages: 1.5 }).success).toBe(false);
    });

    test('should enforce delay floors and ordering', () => {
      expect(normalizeScrapeRequest({ subreddit: 'typescript', delay_min: 0.1 }).success).toBe(false);
      expect(normalizeScrapeRequest({ subreddit: 'typescript', delay_max: 0.9 }).success).toBe(false);

      const inverted = normalizeScrapeRequest({ subreddit: 'typescript', delay_min: 5, delay_max: 2 });

      expect(inverted.error?.details).toEqual(['delay_max: maximum delay must be greater than minimum delay']);
    });

    test('should accept equal delays', () => {
      expect(normalizeScrapeRequest({ subreddit: 'typescript', delay_min: 2, delay_max: 2 }).success).toBe(true);
    });

    test('should reject unknown enum values', () => {
      const result = normalizeScrapeRequest({ subreddit: 'typescript', sort_by: 'best', output_format: 'xml' });

      expect(result.success).toBe(false);
      const details = result.error?.details;
      expect(Array.isArray(details) && details.map((detail) => String(detail).split(':')[0])).toEqual([
        'output_format',
        'sort_by',
      ]);
    });

    test('should require a subreddit', () => {
      expect(normalizeScrapeRequest({}).error?.details).toEqual(['subreddit: Required']);
      expect(normalizeScrapeRequest({ subreddit: 'r/' }).error?.details).toContain('subreddit: subreddit is required');
    });

    test('should reject subreddit names with invalid characters', () => {
      expect(normalizeScrapeRequest({ subreddit: 'two words' }).error?.details).toEqual([
        'subreddit: subreddit may only contain letters, digits and underscores',
      ]);
    });

    test('should reject non-object input', () => {
      expect(normalizeScrapeRequest(null).success).toBe(false);
      expect(normalizeScrapeRequest('typescript').success).toBe(false);
    });
  });

  describe('canonicalizeSubreddit()', () => {
    test('should strip prefixes, whitespace and trailing slashes', () => {
      expect(canonicalizeSubreddit('  typescript ')).toBe('typescript');
      expect(canonicalizeSubreddit('r/typescript')).toBe('typescript');
      expect(canonicalizeSubreddit('/r/typescript/')).toBe('typescript');
      expect(canonicalizeSubreddit('R/Node')).toBe('Node');
    });
  });
});
