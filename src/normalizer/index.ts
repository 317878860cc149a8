/**
 * Normalizer Module
 *
 * Responsibilities:
 * - Accept raw scrape requests from the task API or the CLI
 * - Apply defaults and bounds (post limit 1-100, pages 1-10, delays)
 * - Canonicalize the subreddit name
 * - Produce an immutable ScrapeJobConfig
 *
 * Usage:
 * ```typescript
 * const result = normalizeScrapeRequest({ subreddit: 'r/typescript', post_limit: 50 });
 * if (result.success && result.data) startJob(result.data);
 * ```
 */

import { z } from 'zod';
import type { ModuleResult, OutputFormat, ScrapeJobConfig, SortType, TimeFilter } from '../types/index.js';

export const SORT_TYPES = ['hot', 'new', 'top', 'rising'] as const satisfies readonly SortType[];

export const TIME_FILTERS = ['hour', 'day', 'week', 'month', 'year', 'all'] as const satisfies readonly TimeFilter[];

export const OUTPUT_FORMATS = ['csv', 'json', 'txt'] as const satisfies readonly OutputFormat[];

export const POST_LIMIT_BOUNDS = { min: 1, max: 100 } as const;
export const PAGE_BOUNDS = { min: 1, max: 10 } as const;
export const DELAY_FLOORS = { min: 0.5, max: 1 } as const;

/**
 * Strip whitespace and a leading "r/" or "/r/" from a subreddit name
 */
export function canonicalizeSubreddit(value: string): string {
  return value.trim().replace(/^\/?r\//i, '').replace(/\/+$/, '');
}

/**
 * Zod schema for raw scrape requests
 */
export const ScrapeRequestSchema = z
  .object({
    subreddit: z
      .string()
      .transform(canonicalizeSubreddit)
      .pipe(
        z
          .string()
          .min(1, { message: 'subreddit is required' })
          .max(50)
          .regex(/^[A-Za-z0-9_]+$/, { message: 'subreddit may only contain letters, digits and underscores' })
      ),
    post_limit: z.number().int().min(POST_LIMIT_BOUNDS.min).max(POST_LIMIT_BOUNDS.max).default(25),
    output_format: z.enum(OUTPUT_FORMATS).default('json'),
    include_comments: z.boolean().default(false),
    pages: z.number().int().min(PAGE_BOUNDS.min).max(PAGE_BOUNDS.max).default(1),
    sort_by: z.enum(SORT_TYPES).default('hot'),
    time_filter: z.enum(TIME_FILTERS).default('all'),
    delay_min: z.number().min(DELAY_FLOORS.min).default(1.0),
    delay_max: z.number().min(DELAY_FLOORS.max).default(3.0),
  })
  .refine((request) => request.delay_max >= request.delay_min, {
    message: 'maximum delay must be greater than minimum delay',
    path: ['delay_max'],
  });

export type ScrapeRequest = z.input<typeof ScrapeRequestSchema>;

/**
 * Normalize a raw request to a canonical job configuration
 *
 * @param rawInput - Request body or CLI options
 * @returns ModuleResult containing the frozen config or validation details
 */
export function normalizeScrapeRequest(rawInput: unknown): ModuleResult<ScrapeJobConfig> {
  const startTime = Date.now();
  const timestamp = new Date().toISOString();

  const parseResult = ScrapeRequestSchema.safeParse(rawInput);

  if (!parseResult.success) {
    const errors = parseResult.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    return {
      success: false,
      error: {
        code: 'VALIDATION_ERROR',
        message: 'Scrape request validation failed',
        details: errors,
      },
      metadata: {
        module: 'normalizer',
        timestamp,
        duration: Date.now() - startTime,
      },
    };
  }

  const config: ScrapeJobConfig = Object.freeze({ ...parseResult.data });

  return {
    success: true,
    data: config,
    metadata: {
      module: 'normalizer',
      timestamp,
      duration: Date.now() - startTime,
    },
  };
}
