/**
 * Request Context
 *
 * Per-request state shared by panels while a request is in flight:
 * - Panel statistics
 * - Timing measurements (seconds)
 * - Request/response metadata
 * - Log records written during the request
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';
import type { LogRecord } from '../services/log-service.js';

/** Upper bound on captured log records per request */
export const MAX_LOG_RECORDS_PER_REQUEST = 500;

export type PanelStats = Record<string, unknown>;

export class RequestContext {
  readonly requestId: string;
  readonly panelData: Record<string, PanelStats> = {};
  readonly timingData: Record<string, number> = {};
  readonly metadata: Record<string, unknown> = {};
  readonly logRecords: LogRecord[] = [];
  /** Records dropped once MAX_LOG_RECORDS_PER_REQUEST was reached */
  droppedLogRecords = 0;

  constructor(requestId: string = randomUUID()) {
    this.requestId = requestId;
  }

  storePanelData(panelId: string, key: string, value: unknown): void {
    const existing = this.panelData[panelId];
    if (existing) {
      existing[key] = value;
    } else {
      this.panelData[panelId] = { [key]: value };
    }
  }

  getPanelData(panelId: string): PanelStats {
    return this.panelData[panelId] ?? {};
  }

  recordTiming(name: string, seconds: number): void {
    this.timingData[name] = seconds;
  }

  getTiming(name: string): number | undefined {
    return this.timingData[name];
  }

  addLogRecord(record: LogRecord): void {
    if (this.logRecords.length >= MAX_LOG_RECORDS_PER_REQUEST) {
      this.droppedLogRecords++;
      return;
    }
    this.logRecords.push(record);
  }
}

// =============================================================================
// Async Local Storage
// =============================================================================

const contextStorage = new AsyncLocalStorage<RequestContext>();

/**
 * Run a function with the request context bound
 */
export function runWithRequestContext<T>(context: RequestContext, fn: () => T): T {
  return contextStorage.run(context, fn);
}

/**
 * Get the context of the request currently being handled
 */
export function getRequestContext(): RequestContext | undefined {
  return contextStorage.getStore();
}

/**
 * Append a log record to the active request, if there is one
 */
export function captureLogRecord(record: LogRecord): void {
  contextStorage.getStore()?.addLogRecord(record);
}
