/**
 * utils/logger.ts — Structured logging utility.
 *
 * Output format depends on the environment:
 *   - Development: `[timestamp] [LEVEL] [requestId] message data`
 *   - Everywhere else: one JSON object per line for log ingestion
 *
 * Request correlation uses AsyncLocalStorage: the requestId middleware runs
 * each request inside `runWithRequestId()`, and every entry logged during
 * that request (including awaited store calls) carries the same id.
 *
 * LOG_LEVEL (error | warn | info | debug) filters output; debug is the
 * default in development, info elsewhere.
 */
import { AsyncLocalStorage } from 'async_hooks';

const isDevelopment = process.env.ENV === 'development' || !process.env.ENV;

const LEVELS = { ERROR: 0, WARN: 1, INFO: 2, DEBUG: 3 } as const;
type Level = keyof typeof LEVELS;

function isLevel(value: string | undefined): value is Level {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LEVELS, value);
}

function resolveThreshold(): number {
  const configured = process.env.LOG_LEVEL?.toUpperCase();
  if (isLevel(configured)) {
    return LEVELS[configured];
  }
  return isDevelopment ? LEVELS.DEBUG : LEVELS.INFO;
}

const threshold = resolveThreshold();

interface LogEntry {
  timestamp: string;
  level: Level;
  message: string;
  requestId?: string;
  data?: unknown;
}

// ─── Request ID Tracking ─────────────────────────────────────────
const requestContext = new AsyncLocalStorage<string>();

export function runWithRequestId<T>(requestId: string, fn: () => T): T {
  return requestContext.run(requestId, fn);
}

export function currentRequestId(): string | undefined {
  return requestContext.getStore();
}

function write(level: Level, message: string, data?: unknown): void {
  if (LEVELS[level] > threshold) return;

  const requestId = currentRequestId();
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...(requestId && { requestId }),
    ...(data !== undefined && { data }),
  };

  const output = level === 'ERROR' ? console.error : console.log;

  if (isDevelopment) {
    const prefix = requestId
      ? `[${entry.timestamp}] [${level}] [${requestId}]`
      : `[${entry.timestamp}] [${level}]`;
    output(prefix, message, data ?? '');
  } else {
    output(JSON.stringify(entry));
  }
}

export const logger = {
  error: (message: string, data?: unknown) => write('ERROR', message, data),
  warn: (message: string, data?: unknown) => write('WARN', message, data),
  info: (message: string, data?: unknown) => write('INFO', message, data),
  debug: (message: string, data?: unknown) => write('DEBUG', message, data),
};

export type Logger = typeof logger;
