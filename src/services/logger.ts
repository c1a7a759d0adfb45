/**
 * Logging Service
 *
 * Module-scoped loggers that fan entries out to pluggable handlers.
 * Nothing is printed until a handler is registered, so library consumers
 * decide where engine logs go.
 *
 * @example
 * ```typescript
 * import { createLogger } from '@/services/logger';
 *
 * const logger = createLogger('TimelineModel');
 * logger.debug('Segment added', { segmentId });
 * ```
 */

// =============================================================================
// Types
// =============================================================================

/** Log severity levels, ordered for comparison */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export interface LogEntry {
  timestamp: number;
  level: LogLevel;
  module: string;
  message: string;
  data?: Record<string, unknown>;
}

export type LogHandler = (entry: LogEntry) => void;

export interface Logger {
  readonly module: string;
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  /** Register the console handler (default true) */
  console?: boolean;
}

// =============================================================================
// Constants
// =============================================================================

/** Entries kept for error reports */
const MAX_LOG_HISTORY = 200;

/** Nested data deeper than this is truncated */
const MAX_NORMALIZATION_DEPTH = 8;

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.SILENT]: 'SILENT',
};

// =============================================================================
// Module State
// =============================================================================

let globalLogLevel: LogLevel = LogLevel.INFO;

const handlers: Set<LogHandler> = new Set();

const logHistory: LogEntry[] = [];

// =============================================================================
// Handler Management
// =============================================================================

export function addLogHandler(handler: LogHandler): void {
  handlers.add(handler);
}

export function removeLogHandler(handler: LogHandler): void {
  handlers.delete(handler);
}

export function clearLogHandlers(): void {
  handlers.clear();
}

// =============================================================================
// Log Level Management
// =============================================================================

export function setGlobalLogLevel(level: LogLevel): void {
  globalLogLevel = level;
}

export function getGlobalLogLevel(): LogLevel {
  return globalLogLevel;
}

/**
 * Parse a level name such as `"warn"` or `"DEBUG"`.
 *
 * @returns The level, or `undefined` when the name is not recognised
 */
export function parseLogLevel(name: string): LogLevel | undefined {
  switch (name.trim().toUpperCase()) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'INFO':
      return LogLevel.INFO;
    case 'WARN':
    case 'WARNING':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    case 'SILENT':
    case 'OFF':
      return LogLevel.SILENT;
    default:
      return undefined;
  }
}

// =============================================================================
// Utilities
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Turn an Error into a plain object. Own enumerable fields of custom error
 * classes (codes, ids) are kept.
 */
export function serializeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    const info: Record<string, unknown> = {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
    for (const [key, value] of Object.entries(error)) {
      if (!(key in info)) {
        info[key] = value;
      }
    }
    return info;
  }

  if (typeof error === 'string') {
    return { message: error };
  }

  return { value: error };
}

function normalizeValue(value: unknown, seen: WeakSet<object>, depth: number): unknown {
  if (value instanceof Error) {
    return serializeError(value);
  }
  if (Array.isArray(value)) {
    return value.map((item) => normalizeValue(item, seen, depth + 1));
  }
  if (isRecord(value)) {
    return normalizeLogData(value, seen, depth + 1);
  }
  return value;
}

function normalizeLogData(
  data: Record<string, unknown>,
  seen: WeakSet<object> = new WeakSet(),
  depth: number = 0,
): Record<string, unknown> {
  if (depth > MAX_NORMALIZATION_DEPTH) {
    return { _truncated: true };
  }
  if (seen.has(data)) {
    return { _circular: true };
  }
  seen.add(data);

  const normalized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    normalized[key] = normalizeValue(value, seen, depth);
  }
  return normalized;
}

// =============================================================================
// Internal Logging
// =============================================================================

function dispatch(entry: LogEntry): void {
  if (entry.level < globalLogLevel) {
    return;
  }

  logHistory.push(entry);
  if (logHistory.length > MAX_LOG_HISTORY) {
    logHistory.shift();
  }

  handlers.forEach((handler) => {
    try {
      handler(entry);
    } catch (handlerError) {
      // Logging through the logger here could recurse into the same handler.
      console.error('[logger] handler failed', serializeError(handlerError));
    }
  });
}

function log(module: string, level: LogLevel, message: string, data?: Record<string, unknown>): void {
  dispatch({
    timestamp: Date.now(),
    level,
    module,
    message,
    data: data ? normalizeLogData(data) : undefined,
  });
}

// =============================================================================
// Log History Access
// =============================================================================

export function getLogHistory(level?: LogLevel): readonly LogEntry[] {
  if (level === undefined) {
    return [...logHistory];
  }
  return logHistory.filter((entry) => entry.level >= level);
}

export function clearLogHistory(): void {
  logHistory.length = 0;
}

/** One line per entry: `[iso] [LEVEL] [Module] message {data}` */
export function formatLogEntry(entry: LogEntry): string {
  const timestamp = new Date(entry.timestamp).toISOString();
  const dataStr = entry.data ? ` ${JSON.stringify(entry.data)}` : '';
  return `[${timestamp}] [${LEVEL_NAMES[entry.level]}] [${entry.module}] ${entry.message}${dataStr}`;
}

export function exportLogHistory(level?: LogLevel): string {
  return getLogHistory(level).map(formatLogEntry).join('\n');
}

// =============================================================================
// Logger Factory
// =============================================================================

export function createLogger(moduleName: string = 'Timeline'): Logger {
  return {
    module: moduleName,
    debug: (message, data) => log(moduleName, LogLevel.DEBUG, message, data),
    info: (message, data) => log(moduleName, LogLevel.INFO, message, data),
    warn: (message, data) => log(moduleName, LogLevel.WARN, message, data),
    error: (message, data) => log(moduleName, LogLevel.ERROR, message, data),
  };
}

// =============================================================================
// Console Handler
// =============================================================================

export const consoleHandler: LogHandler = (entry) => {
  const line = `[${new Date(entry.timestamp).toISOString()}] [${entry.module}] ${entry.message}`;
  const extra = entry.data ?? '';

  switch (entry.level) {
    case LogLevel.DEBUG:
      console.debug(line, extra);
      break;
    case LogLevel.INFO:
      console.info(line, extra);
      break;
    case LogLevel.WARN:
      console.warn(line, extra);
      break;
    case LogLevel.ERROR:
      console.error(line, extra);
      break;
    default:
      break;
  }
};

// =============================================================================
// Initialization
// =============================================================================

/**
 * Set the level and attach the console handler. Call once from the host
 * application; the level usually comes from `loadTimelineConfigFromEnv`.
 */
export function initializeLogger(options: LoggerOptions = {}): void {
  setGlobalLogLevel(options.level ?? LogLevel.WARN);
  if (options.console ?? true) {
    addLogHandler(consoleHandler);
  }
}
