/**
 * Services exports
 */

// Logging
export type { ILogService, LogLevel, LogRecord } from './log-service.js';
export {
  LogService,
  createLogService,
  parseLogLevel,
  isLogLevel,
  LOG_LEVELS,
  type LogServiceOptions,
} from './log-service-impl.js';
export { getLog, setLogService } from './get-log.js';
