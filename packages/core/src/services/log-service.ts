/**
 * ILogService - Structured Logging Interface
 *
 * Usage:
 *   const log = getLog('Interceptor');
 *   log.debug('Codec unavailable', { encoding: 'zstd' });
 *
 *   // Scoped logger for a sub-module
 *   const cascadeLog = log.child('Cascade');
 *   // Output: [Interceptor:Cascade] ...
 */

export interface ILogService {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;

  /**
   * Create a child logger scoped to a module.
   * The module name is prepended to all log messages.
   */
  child(module: string): ILogService;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** One log call, as captured for the Logging panel */
export interface LogRecord {
  level: LogLevel;
  module: string | null;
  message: string;
  data?: unknown;
  /** Epoch milliseconds */
  timestamp: number;
}
