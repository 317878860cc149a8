import { Router, type Request, type Response } from 'express';
import type { Logger, StorageAdapter } from '../types/index.js';
import { normalizeScrapeRequest } from '../normalizer/index.js';
import {
  discardArtifacts,
  startScrapeTask,
  toStatusView,
  type TaskRecord,
  type TaskRegistry,
  type TaskRunnerDeps,
} from '../run-manager/index.js';
import { asyncHandler, BadRequestError, NotFoundError } from './errors.js';

export interface TaskRouteDeps {
  registry: TaskRegistry;
  storage: StorageAdapter;
  runner: Omit<TaskRunnerDeps, 'registry' | 'storage'>;
  logger: Logger;
}

function requireTask(registry: TaskRegistry, taskId: string | undefined): TaskRecord {
  const task = taskId === undefined ? undefined : registry.get(taskId);
  if (!task) {
    throw new NotFoundError('Task not found');
  }
  return task;
}

/**
 * Creates task API routes with dependency injection.
 */
export function createTaskRoutes(deps: TaskRouteDeps): Router {
  const router = Router();
  const { registry, storage, logger } = deps;

  /**
   * POST /scrape
   *
   * Validates the request and starts a background task.
   */
  router.post(
    '/scrape',
    asyncHandler(async (req: Request, res: Response) => {
      const normalized = normalizeScrapeRequest(req.body);
      if (!normalized.success || !normalized.data) {
        throw new BadRequestError(
          normalized.error?.message ?? 'Invalid scrape request',
          normalized.error?.details
        );
      }

      const { task } = startScrapeTask(normalized.data, { ...deps.runner, registry, storage });

      res.status(202).json({
        task_id: task.task_id,
        status: task.status,
        subreddit: task.subreddit,
        message: 'Scraping task started',
      });
    })
  );

  /**
   * GET /tasks
   */
  router.get(
    '/tasks',
    asyncHandler(async (_req: Request, res: Response) => {
      res.json(registry.list().map((task) => toStatusView(task)));
    })
  );

  /**
   * GET /tasks/:taskId
   *
   * Analytics are attached for completed tasks when include_analytics=true.
   */
  router.get(
    '/tasks/:taskId',
    asyncHandler(async (req: Request, res: Response) => {
      const task = requireTask(registry, req.params.taskId);
      res.json(toStatusView(task, req.query.include_analytics === 'true'));
    })
  );

  /**
   * GET /download/:taskId
   */
  router.get(
    '/download/:taskId',
    asyncHandler(async (req: Request, res: Response) => {
      const task = requireTask(registry, req.params.taskId);

      if (task.status !== 'completed') {
        throw new BadRequestError('Task not completed');
      }
      if (task.output_file === null) {
        throw new NotFoundError('Output file not found');
      }
      if (!(await storage.exists(task.output_file))) {
        throw new NotFoundError('File not found');
      }

      const { content } = await storage.load(task.output_file);
      res.attachment(task.output_file);
      res.type('application/octet-stream');
      res.send(typeof content === 'string' ? Buffer.from(content, 'utf-8') : content);
    })
  );

  /**
   * DELETE /tasks/:taskId
   *
   * Removes the output and analytics files, if any, then the task. A run
   * still in progress discards its files when it ends.
   */
  router.delete(
    '/tasks/:taskId',
    asyncHandler(async (req: Request, res: Response) => {
      const task = requireTask(registry, req.params.taskId);

      await discardArtifacts(storage, [task.output_file, task.analytics_file], logger);

      registry.delete(task.task_id);
      res.json({ message: 'Task deleted successfully' });
    })
  );

  return router;
}
