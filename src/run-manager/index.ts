/**
 * Run Manager Module
 *
 * Responsibilities:
 * - Generate task identifiers
 * - Hold task records in memory (one writer per task)
 * - Enforce the lifecycle pending → running → completed | failed
 * - Run a scrape job in the background and record its outcome
 *
 * Usage:
 * ```typescript
 * const registry = new TaskRegistry();
 * const { task, completion } = startScrapeTask(config, { registry, storage });
 * await completion;
 * registry.get(task.task_id)?.status; // 'completed'
 * ```
 */

import { randomUUID } from 'crypto';
import type {
  AnalyticsSummary,
  ArtifactMetadata,
  Logger,
  Metrics,
  ScrapeJobConfig,
  StorageAdapter,
  TaskId,
} from '../types/index.js';
import type { PipelineSettings } from '../config/index.js';
import { createLogger, errorMessage } from '../logger/index.js';
import { formatFileStamp, runFullScrape, type PipelineDeps, type PipelineResult } from '../pipeline/index.js';

/**
 * Task status tracking
 */
export type TaskStatus = 'pending' | 'running' | 'completed' | 'failed';

const ALLOWED_TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
  pending: ['running', 'failed'],
  running: ['completed', 'failed'],
  completed: [],
  failed: [],
};

export interface TaskRecord {
  task_id: TaskId;
  status: TaskStatus;
  subreddit: string;
  start_time: string;
  completion_time: string | null;
  post_count: number | null;
  output_file: string | null;
  /** Stored analytics summary; internal, not part of the status view */
  analytics_file: string | null;
  error: string | null;
  config: ScrapeJobConfig;
  analytics: AnalyticsSummary | null;
}

/**
 * Public shape of a task; analytics only when requested and completed
 */
export type TaskStatusView = Omit<TaskRecord, 'config' | 'analytics' | 'analytics_file'> & {
  analytics?: AnalyticsSummary;
};

export type TaskUpdate = Partial<
  Pick<TaskRecord, 'completion_time' | 'post_count' | 'output_file' | 'analytics_file' | 'error' | 'analytics'>
>;

export function generateTaskId(): TaskId {
  return randomUUID();
}

export function isTerminal(status: TaskStatus): boolean {
  return status === 'completed' || status === 'failed';
}

// ============================================================================
// Registry
// ============================================================================

export class TaskRegistry {
  private tasks: Map<TaskId, TaskRecord> = new Map();

  constructor(private readonly now: () => Date = () => new Date()) {}

  create(config: ScrapeJobConfig, taskId: TaskId = generateTaskId()): TaskRecord {
    if (this.tasks.has(taskId)) {
      throw new Error(`Task already exists: ${taskId}`);
    }

    const record: TaskRecord = {
      task_id: taskId,
      status: 'pending',
      subreddit: config.subreddit,
      start_time: this.now().toISOString(),
      completion_time: null,
      post_count: null,
      output_file: null,
      analytics_file: null,
      error: null,
      config,
      analytics: null,
    };

    this.tasks.set(taskId, record);
    return record;
  }

  get(taskId: TaskId): TaskRecord | undefined {
    return this.tasks.get(taskId);
  }

  /**
   * All tasks in creation order
   */
  list(): TaskRecord[] {
    return Array.from(this.tasks.values());
  }

  /**
   * Move a task to a new status and merge the given fields
   *
   * @throws Error for unknown tasks and transitions outside the lifecycle
   */
  transition(taskId: TaskId, status: TaskStatus, update: TaskUpdate = {}): TaskRecord {
    const current = this.tasks.get(taskId);
    if (!current) {
      throw new Error(`Task not found: ${taskId}`);
    }
    if (!ALLOWED_TRANSITIONS[current.status].includes(status)) {
      throw new Error(`Invalid task transition ${current.status} → ${status} for ${taskId}`);
    }

    const next: TaskRecord = { ...current, ...update, status };
    if (isTerminal(status) && next.completion_time === null) {
      next.completion_time = this.now().toISOString();
    }

    this.tasks.set(taskId, next);
    return next;
  }

  delete(taskId: TaskId): boolean {
    return this.tasks.delete(taskId);
  }

  size(): number {
    return this.tasks.size;
  }
}

export function toStatusView(record: TaskRecord, includeAnalytics: boolean = false): TaskStatusView {
  const { config: _config, analytics, analytics_file: _analyticsFile, ...view } = record;
  if (includeAnalytics && record.status === 'completed' && analytics) {
    return { ...view, analytics };
  }
  return view;
}

// ============================================================================
// Task Runner
// ============================================================================

export type PipelineRunner = (config: ScrapeJobConfig, deps: PipelineDeps) => Promise<PipelineResult>;

export interface TaskRunnerDeps {
  registry: TaskRegistry;
  storage: StorageAdapter;
  /** Defaults to runFullScrape */
  runPipeline?: PipelineRunner;
  settings?: PipelineSettings;
  logger?: Logger;
  metrics?: Metrics;
  now?: () => Date;
}

/**
 * Remove stored files; failures are logged and do not propagate
 */
export async function discardArtifacts(
  storage: StorageAdapter,
  artifacts: ReadonlyArray<ArtifactMetadata | string | null>,
  logger: Logger
): Promise<void> {
  for (const artifact of artifacts) {
    if (artifact === null) {
      continue;
    }
    const fileName = typeof artifact === 'string' ? artifact : artifact.fileName;
    try {
      await storage.delete(fileName);
    } catch (error) {
      logger.error('Error deleting output file', { fileName, error: errorMessage(error) });
    }
  }
}

/**
 * Execute a registered task to completion
 *
 * Never rejects: any failure is recorded on the task.
 */
export async function runScrapeTask(taskId: TaskId, deps: TaskRunnerDeps): Promise<void> {
  const logger = deps.logger ?? createLogger('run-manager');
  const now = deps.now ?? (() => new Date());
  const runPipeline = deps.runPipeline ?? runFullScrape;

  const task = deps.registry.get(taskId);
  if (!task) {
    logger.error('Cannot run unknown task', { taskId });
    return;
  }

  try {
    deps.registry.transition(taskId, 'running');
    logger.info('Task started', { taskId, subreddit: task.subreddit });

    const { config } = task;
    const result = await runPipeline(config, {
      storage: deps.storage,
      settings: deps.settings,
      baseName: `${config.subreddit}_${config.sort_by}_${taskId}_${formatFileStamp(now())}`,
      logger,
      metrics: deps.metrics,
      now,
    });

    if (!deps.registry.get(taskId)) {
      logger.info('Task deleted while running, discarding its files', { taskId });
      await discardArtifacts(deps.storage, [result.artifact, result.analyticsArtifact], logger);
      return;
    }

    deps.registry.transition(taskId, 'completed', {
      post_count: result.output.posts.length,
      output_file: result.artifact?.fileName ?? null,
      analytics_file: result.analyticsArtifact?.fileName ?? null,
      error: result.persistError ?? null,
      analytics: result.analytics,
    });

    logger.info('Task completed', {
      taskId,
      postCount: result.output.posts.length,
      outputFile: result.artifact?.fileName ?? null,
    });
  } catch (error) {
    const message = errorMessage(error);
    logger.error('Task failed', { taskId, error: message });
    const current = deps.registry.get(taskId);
    if (current && !isTerminal(current.status)) {
      deps.registry.transition(taskId, 'failed', { error: message });
    }
  }
}

/**
 * Register a task and start it in the background
 *
 * @returns the pending record and a promise that settles when the run ends
 */
export function startScrapeTask(
  config: ScrapeJobConfig,
  deps: TaskRunnerDeps
): { task: TaskRecord; completion: Promise<void> } {
  const logger = deps.logger ?? createLogger('run-manager');
  const task = deps.registry.create(config);

  const completion = runScrapeTask(task.task_id, deps).catch((error: unknown) => {
    logger.error('Background task crashed', { taskId: task.task_id, error: errorMessage(error) });
  });

  return { task, completion };
}
