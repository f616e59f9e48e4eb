/**
 * Structured logging utility
 * Provides context-aware logging with run ID tracking via AsyncLocalStorage
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomBytes } from 'node:crypto';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Structured log context that can be passed to any log method
 */
export interface LogContext {
  [key: string]: unknown;
}

/**
 * Run context stored in AsyncLocalStorage for tracking across async calls
 */
interface RunContext {
  runId: string;
  schemaName?: string | undefined;
  source?: string | undefined;
  startTime: number;
}

const runStorage = new AsyncLocalStorage<RunContext>();

/** Explicit threshold; when unset, LOG_LEVEL is consulted on every call */
let configuredLevel: LogLevel | undefined;

/**
 * Generate a short, cryptographically secure run ID
 * Format: run-{8 chars of base64url}
 */
function generateRunId(): string {
  return `run-${randomBytes(6).toString('base64url')}`;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

function activeLevel(): LogLevel {
  if (configuredLevel) return configuredLevel;
  const fromEnv = process.env.LOG_LEVEL;
  return isLogLevel(fromEnv) ? fromEnv : 'info';
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[activeLevel()];
}

/**
 * Format an error object into a loggable structure
 */
function formatError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return {
      errorName: error.name,
      errorMessage: error.message,
      errorStack: error.stack,
    };
  }
  return { errorValue: String(error) };
}

/**
 * Format a log message with timestamp, level, run context, and optional data
 */
function formatMessage(level: LogLevel, message: string, context?: LogContext): string {
  const timestamp = new Date().toISOString();
  const runContext = runStorage.getStore();

  const fullContext: LogContext = {};

  if (runContext) {
    fullContext.runId = runContext.runId;
    if (runContext.schemaName) fullContext.schema = runContext.schemaName;
    if (runContext.source) fullContext.source = runContext.source;
  }

  if (context) {
    Object.assign(fullContext, context);
  }

  const contextStr = Object.keys(fullContext).length > 0
    ? ` ${JSON.stringify(fullContext)}`
    : '';

  return `[${timestamp}] [${level.toUpperCase()}] ${message}${contextStr}`;
}

function getElapsedMs(): number | undefined {
  const runContext = runStorage.getStore();
  return runContext ? Date.now() - runContext.startTime : undefined;
}

/**
 * Logger with support for structured context and run ID tracking
 */
export const logger = {
  debug(message: string, error?: unknown, context?: LogContext): void {
    if (enabled('debug')) {
      const fullContext = error ? { ...context, ...formatError(error) } : context;
      console.debug(formatMessage('debug', message, fullContext));
    }
  },

  info(message: string, context?: LogContext): void {
    if (enabled('info')) {
      console.info(formatMessage('info', message, context));
    }
  },

  warn(message: string, error?: unknown, context?: LogContext): void {
    if (enabled('warn')) {
      const fullContext = error ? { ...context, ...formatError(error) } : context;
      console.warn(formatMessage('warn', message, fullContext));
    }
  },

  error(message: string, error?: unknown, context?: LogContext): void {
    const fullContext = error ? { ...context, ...formatError(error) } : context;
    console.error(formatMessage('error', message, fullContext));
  },

  /**
   * Pin the level threshold. `undefined` goes back to reading LOG_LEVEL.
   */
  setLevel(level: LogLevel | undefined): void {
    configuredLevel = level;
  },

  getLevel(): LogLevel {
    return activeLevel();
  },

  /**
   * Run a function within a run context.
   * All logs within the callback will include the run ID, schema and source.
   *
   * @example
   * ```typescript
   * await logger.withRunContext({ schemaName: 'mission', source: 'mars.yaml' }, async () => {
   *   logger.debug('Validating'); // includes runId, schema, source
   * });
   * ```
   */
  async withRunContext<T>(
    options: {
      runId?: string | undefined;
      schemaName?: string | undefined;
      source?: string | undefined;
    },
    fn: () => Promise<T>
  ): Promise<T> {
    const context: RunContext = {
      runId: options.runId ?? generateRunId(),
      schemaName: options.schemaName,
      source: options.source,
      startTime: Date.now(),
    };

    return runStorage.run(context, fn);
  },

  getRunId(): string | undefined {
    return runStorage.getStore()?.runId;
  },

  getElapsedMs,

  /**
   * Update the current run context (e.g., once the schema name is resolved)
   */
  updateContext(updates: Partial<Omit<RunContext, 'runId' | 'startTime'>>): void {
    const current = runStorage.getStore();
    if (current) {
      if (updates.schemaName !== undefined) current.schemaName = updates.schemaName;
      if (updates.source !== undefined) current.source = updates.source;
    }
  },
};
