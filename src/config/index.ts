/**
 * Configuration Module
 *
 * Environment-driven settings for the task API and the scrape pipeline.
 * Job-level parameters (subreddit, limits, delays) are not read here;
 * they arrive per request through the normalizer.
 */

import { z } from 'zod';

const positiveInt = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((value) => Number(value))
    .pipe(z.number().int().positive());

const envSchema = z.object({
  PORT: positiveInt('8000'),
  HOST: z.string().min(1).default('0.0.0.0'),
  OUTPUT_DIR: z.string().min(1).default('output'),
  CORS_ORIGIN: z.string().min(1).default('*'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  REQUEST_TIMEOUT_MS: positiveInt('10000'),
  MAX_FETCH_ATTEMPTS: positiveInt('3'),
  MAX_COMMENTS_PER_POST: positiveInt('10'),
});

export type ServerConfig = z.infer<typeof envSchema>;

/**
 * Parse and validate environment configuration
 *
 * @throws ZodError when a variable is present but invalid
 */
export const loadServerConfig = (env: NodeJS.ProcessEnv = process.env): ServerConfig => {
  return envSchema.parse(env);
};

/**
 * Pipeline tuning derived from the server configuration
 */
export interface PipelineSettings {
  requestTimeoutMs: number;
  maxFetchAttempts: number;
  maxCommentsPerPost: number;
}

export function toPipelineSettings(config: ServerConfig): PipelineSettings {
  return {
    requestTimeoutMs: config.REQUEST_TIMEOUT_MS,
    maxFetchAttempts: config.MAX_FETCH_ATTEMPTS,
    maxCommentsPerPost: config.MAX_COMMENTS_PER_POST,
  };
}
