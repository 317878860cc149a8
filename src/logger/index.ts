/**
 * Logger Module
 *
 * Structured console logging shared by every module with I/O.
 * Each entry is one JSON line: level, module, message, metadata, timestamp.
 */

import type { Logger, Metrics } from '../types/index.js';

export type { Logger, Metrics };

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LEVEL_ORDER, value);
}

/**
 * Resolve the active level from LOG_LEVEL, falling back to info
 */
export function resolveLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : 'info';
}

/**
 * Create a console logger bound to a module name
 */
export function createLogger(module: string, level: LogLevel = resolveLogLevel(process.env.LOG_LEVEL)): Logger {
  const threshold = LEVEL_ORDER[level];

  const write = (
    entryLevel: Exclude<LogLevel, 'silent'>,
    sink: (line: string) => void,
    message: string,
    meta?: Record<string, unknown>
  ): void => {
    if (LEVEL_ORDER[entryLevel] < threshold) {
      return;
    }
    sink(JSON.stringify({ level: entryLevel, module, message, ...meta, timestamp: new Date().toISOString() }));
  };

  return {
    debug: (message, meta) => write('debug', console.debug, message, meta),
    info: (message, meta) => write('info', console.log, message, meta),
    warn: (message, meta) => write('warn', console.warn, message, meta),
    error: (message, meta) => write('error', console.error, message, meta),
  };
}

/**
 * Default no-op metrics implementation
 */
export const defaultMetrics: Metrics = {
  increment: () => { /* no-op */ },
  gauge: () => { /* no-op */ },
  timing: () => { /* no-op */ },
};

/**
 * Normalize an unknown thrown value to a message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
