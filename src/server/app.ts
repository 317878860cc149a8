/**
 * Express App Configuration (without server startup)
 *
 * Exported for supertest and for main.ts, which owns listen().
 */

import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import type { Logger, StorageAdapter } from '../types/index.js';
import { createLogger } from '../logger/index.js';
import { TaskRegistry, type TaskRunnerDeps } from '../run-manager/index.js';
import { NotFoundError, createErrorHandler } from './errors.js';
import { createTaskRoutes } from './routes.js';

export const API_NAME = 'Subreddit Scraper API';
export const API_VERSION = '1.0.0';

export interface AppDeps {
  storage: StorageAdapter;
  registry?: TaskRegistry;
  /** Pipeline, settings and clock used for background tasks */
  runner?: Omit<TaskRunnerDeps, 'registry' | 'storage'>;
  corsOrigin?: string;
  logger?: Logger;
}

export function createApp(deps: AppDeps): Express {
  const logger = deps.logger ?? createLogger('server');
  const registry = deps.registry ?? new TaskRegistry();

  const app = express();

  app.use(cors({ origin: deps.corsOrigin ?? '*' }));
  app.use(express.json());

  app.get('/', (_req: Request, res: Response) => {
    res.json({
      name: API_NAME,
      version: API_VERSION,
      endpoints: {
        '/scrape': 'Start a new scraping task',
        '/tasks': 'Get all tasks',
        '/tasks/{task_id}': 'Get task status',
        '/download/{task_id}': 'Download task results',
      },
    });
  });

  app.use(
    createTaskRoutes({
      registry,
      storage: deps.storage,
      runner: { logger, ...deps.runner },
      logger,
    })
  );

  app.use((req: Request, _res: Response, next: NextFunction) => {
    next(new NotFoundError(`Route not found: ${req.method} ${req.path}`));
  });

  app.use(createErrorHandler(logger));

  return app;
}
