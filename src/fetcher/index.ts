/**
 * Fetcher Module
 *
 * Issues a single listing or discussion page request:
 * - Pacing delay before every attempt (randomized, supplied by a PacingPolicy)
 * - User-Agent rotation on every attempt
 * - Per-request timeout
 * - Retry with linear backoff (2s, 4s, ...) on transport errors and non-2xx
 *
 * A fetch never throws: exhausted retries come back as a failure result
 * and the caller decides whether that ends the run.
 */

import axios from 'axios';
import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { createLogger, defaultMetrics, errorMessage } from '../logger/index.js';
import type { Logger, Metrics } from '../types/index.js';

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_MAX_ATTEMPTS = 3;

export const DEFAULT_TIMEOUT_MS = 10_000;

/** Backoff between attempts is this many ms times the attempt number */
export const BACKOFF_UNIT_MS = 2_000;

/** Identity rotation pool */
export const USER_AGENTS = [
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/91.0.4472.124 Safari/537.36',
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/92.0.4515.107 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/15.0 Safari/605.1.15',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:90.0) Gecko/20100101 Firefox/90.0',
] as const;

export const DEFAULT_FETCH_HEADERS: Readonly<Record<string, string>> = {
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.5',
  DNT: '1',
  Connection: 'keep-alive',
  'Upgrade-Insecure-Requests': '1',
};

// ============================================================================
// Pacing Policy
// ============================================================================

/**
 * Delay and identity strategy applied before each network attempt
 */
export interface PacingPolicy {
  /** Milliseconds to wait before the next attempt */
  delayBeforeRequestMs(): number;
  /** User-Agent string for the next attempt */
  selectIdentity(): string;
}

type IdentityPool = readonly [string, ...string[]];

/**
 * Uniform random delay in [min, max] seconds and a random pool identity
 */
export class RandomizedPacingPolicy implements PacingPolicy {
  constructor(
    private readonly delayMinSeconds: number,
    private readonly delayMaxSeconds: number,
    private readonly identities: IdentityPool = USER_AGENTS,
    private readonly random: () => number = Math.random
  ) {
    if (delayMinSeconds < 0 || delayMaxSeconds < delayMinSeconds) {
      throw new RangeError(
        `Invalid delay range [${delayMinSeconds}, ${delayMaxSeconds}]: expected 0 <= min <= max`
      );
    }
  }

  delayBeforeRequestMs(): number {
    const seconds = this.delayMinSeconds + this.random() * (this.delayMaxSeconds - this.delayMinSeconds);
    return Math.round(seconds * 1000);
  }

  selectIdentity(): string {
    const index = Math.floor(this.random() * this.identities.length);
    return this.identities[index] ?? this.identities[0];
  }
}

/**
 * Deterministic policy: constant delay, constant identity
 */
export class FixedPacingPolicy implements PacingPolicy {
  constructor(
    private readonly delayMs: number = 0,
    private readonly identity: string = USER_AGENTS[0]
  ) {}

  delayBeforeRequestMs(): number {
    return this.delayMs;
  }

  selectIdentity(): string {
    return this.identity;
  }
}

// ============================================================================
// HTTP Client
// ============================================================================

export interface HttpPage {
  status: number;
  body: string;
  /** URL after redirects */
  finalUrl: string;
}

/**
 * Minimal GET seam; the axios-backed client is the production implementation
 */
export interface HttpClient {
  get(url: string, headers: Record<string, string>): Promise<HttpPage>;
}

/**
 * Read the post-redirect URL node's http adapter leaves on the request
 */
function resolveFinalUrl(request: unknown, fallback: string): string {
  if (typeof request !== 'object' || request === null || !('res' in request)) {
    return fallback;
  }
  const { res } = request;
  if (typeof res === 'object' && res !== null && 'responseUrl' in res && typeof res.responseUrl === 'string') {
    return res.responseUrl;
  }
  return fallback;
}

/**
 * Create the axios-backed HTTP client
 */
export function createHttpClient(timeoutMs: number = DEFAULT_TIMEOUT_MS): HttpClient {
  const instance = axios.create({
    timeout: timeoutMs,
    responseType: 'text',
    maxRedirects: 5,
  });

  return {
    async get(url, headers) {
      const response = await instance.get<string>(url, { headers });
      return {
        status: response.status,
        body: typeof response.data === 'string' ? response.data : String(response.data),
        finalUrl: resolveFinalUrl(response.request, url),
      };
    },
  };
}

// ============================================================================
// Page Fetcher
// ============================================================================

export type FetchResult =
  | { ok: true; document: CheerioAPI; finalUrl: string; attempts: number }
  | { ok: false; error: string; finalUrl: string; attempts: number };

/**
 * Anything that can produce a parsed page for a URL
 */
export interface PageSource {
  fetchPage(url: string, maxAttempts?: number): Promise<FetchResult>;
}

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Backoff before retrying after the given (1-based) attempt
 */
export function backoffDelayMs(attempt: number): number {
  return BACKOFF_UNIT_MS * attempt;
}

export interface PageFetcherOptions {
  pacing: PacingPolicy;
  httpClient?: HttpClient;
  /** Ignored when httpClient is supplied */
  timeoutMs?: number;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
  metrics?: Metrics;
}

export class PageFetcher implements PageSource {
  private readonly pacing: PacingPolicy;
  private readonly httpClient: HttpClient;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: Logger;
  private readonly metrics: Metrics;

  constructor(options: PageFetcherOptions) {
    this.pacing = options.pacing;
    this.httpClient = options.httpClient ?? createHttpClient(options.timeoutMs);
    this.sleep = options.sleep ?? sleep;
    this.logger = options.logger ?? createLogger('fetcher');
    this.metrics = options.metrics ?? defaultMetrics;
  }

  /**
   * Fetch and parse a page, retrying up to maxAttempts times
   *
   * @returns the parsed document and post-redirect URL, or the last error
   *          together with the originally requested URL
   */
  async fetchPage(url: string, maxAttempts: number = DEFAULT_MAX_ATTEMPTS): Promise<FetchResult> {
    const attempts = Math.max(1, Math.floor(maxAttempts));
    let lastError = 'No attempt made';

    for (let attempt = 1; attempt <= attempts; attempt++) {
      await this.sleep(this.pacing.delayBeforeRequestMs());

      this.logger.info(`Fetching ${url}`, { attempt, maxAttempts: attempts });

      try {
        const page = await this.httpClient.get(url, {
          ...DEFAULT_FETCH_HEADERS,
          'User-Agent': this.pacing.selectIdentity(),
        });

        if (page.status < 200 || page.status >= 300) {
          throw new Error(`Request failed with status code ${page.status}`);
        }

        return { ok: true, document: cheerio.load(page.body), finalUrl: page.finalUrl, attempts: attempt };
      } catch (error) {
        lastError = errorMessage(error);
        this.metrics.increment('fetcher.attempt_failed');
        this.logger.error('Error fetching the page', { url, attempt, maxAttempts: attempts, error: lastError });

        if (attempt < attempts) {
          await this.sleep(backoffDelayMs(attempt));
        }
      }
    }

    this.metrics.increment('fetcher.exhausted');
    return { ok: false, error: lastError, finalUrl: url, attempts };
  }
}
