/**
 * LogService Implementation
 *
 * Structured logging with two modes:
 * - Development: Human-readable output with module prefix
 * - Production: JSON structured output
 *
 * Every call is also offered to the active request context (if any) before
 * level filtering, which is how the Logging panel sees what a request logged.
 *
 * Usage:
 *   const log = createLogService({ level: 'info' });
 *   log.info('Toolbar mounted', { apiPath: '/_debug_toolbar' });
 *
 *   const pipelineLog = log.child('Pipeline');
 *   // Dev:  [Pipeline] ...
 *   // Prod: {"level":"info","ts":"...","module":"Pipeline","msg":"..."}
 */

import type { ILogService, LogLevel } from './log-service.js';
import { captureLogRecord } from '../toolbar/context.js';

export interface LogServiceOptions {
  level?: LogLevel;
  json?: boolean;
}

export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVELS, value);
}

/**
 * Parse a level name, falling back when the value is missing or unknown
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return normalized && isLogLevel(normalized) ? normalized : fallback;
}

function isPlainRecord(data: unknown): data is Record<string, unknown> {
  return typeof data === 'object' && data !== null && !Array.isArray(data) && !(data instanceof Error);
}

export class LogService implements ILogService {
  private readonly levelName: LogLevel;
  private readonly module: string | null;
  private readonly json: boolean;

  constructor(options?: LogServiceOptions & { module?: string }) {
    this.levelName = options?.level ?? 'info';
    this.module = options?.module ?? null;
    this.json = options?.json ?? (process.env.NODE_ENV === 'production');
  }

  debug(message: string, data?: unknown): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: unknown): void {
    this.log('error', message, data);
  }

  child(module: string): ILogService {
    return new LogService({
      level: this.levelName,
      json: this.json,
      module: this.module ? `${this.module}:${module}` : module,
    });
  }

  private log(level: LogLevel, message: string, data: unknown): void {
    captureLogRecord({ level, module: this.module, message, data, timestamp: Date.now() });
    if (LOG_LEVELS[level] >= LOG_LEVELS[this.levelName]) {
      this.write(level, message, data);
    }
  }

  private write(level: LogLevel, message: string, data?: unknown): void {
    const fn = level === 'error'
      ? console.error
      : level === 'warn'
        ? console.warn
        : level === 'debug'
          ? console.debug
          : console.log;

    if (this.json) {
      const record = isPlainRecord(data) ? data : data !== undefined ? { data } : {};
      fn(JSON.stringify({
        level,
        ts: new Date().toISOString(),
        ...(this.module ? { module: this.module } : {}),
        msg: message,
        ...record,
      }));
    } else {
      const prefix = this.module ? `[${this.module}]` : '';
      if (data !== undefined) {
        fn(`${prefix} ${message}`, data);
      } else {
        fn(`${prefix} ${message}`);
      }
    }
  }
}

/**
 * Create a new LogService instance.
 */
export function createLogService(options?: LogServiceOptions): ILogService {
  return new LogService(options);
}
