/**
 * Logging Utility
 *
 * Provides scoped loggers anywhere in the codebase.
 * Uses the root logger installed with setLogService(), otherwise a cached
 * LogService whose level comes from DEBUG_TOOLBAR_LOG_LEVEL.
 *
 * Usage:
 *   import { getLog } from '@devbar/core';
 *   const log = getLog('Cascade');
 *   log.debug('Codec unavailable', { encoding: 'zstd' });
 */

import type { ILogService } from './log-service.js';
import { LogService, parseLogLevel } from './log-service-impl.js';

const fallbackLoggers = new Map<string, ILogService>();
let rootLogger: ILogService | null = null;

/**
 * Install the root logger every getLog() call derives from.
 * Pass null to go back to the fallback loggers.
 */
export function setLogService(log: ILogService | null): void {
  rootLogger = log;
}

/**
 * Get a scoped logger for a module.
 */
export function getLog(module: string): ILogService {
  if (rootLogger) {
    return rootLogger.child(module);
  }

  let logger = fallbackLoggers.get(module);
  if (!logger) {
    logger = new LogService({ level: parseLogLevel(process.env.DEBUG_TOOLBAR_LOG_LEVEL), module });
    fallbackLoggers.set(module, logger);
  }
  return logger;
}
