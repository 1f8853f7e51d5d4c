/**
 * Logging panel: what was logged while the request was in flight
 */

import { Panel } from '../panel.js';
import type { PanelStats, RequestContext } from '../context.js';
import type { LogLevel } from '../../services/log-service.js';

export class LoggingPanel extends Panel {
  readonly title = 'Logging';

  generateStats(context: RequestContext): PanelStats {
    const counts: Record<LogLevel, number> = { debug: 0, info: 0, warn: 0, error: 0 };
    for (const record of context.logRecords) {
      counts[record.level]++;
    }

    return {
      records: context.logRecords.map((record) => ({
        level: record.level,
        module: record.module,
        message: record.message,
        timestamp: new Date(record.timestamp).toISOString(),
        ...(record.data !== undefined ? { data: record.data } : {}),
      })),
      countsByLevel: counts,
      dropped: context.droppedLogRecords,
    };
  }

  override getNavSubtitle(context: RequestContext): string {
    const n = context.logRecords.length;
    return `${n} ${n === 1 ? 'message' : 'messages'}`;
  }
}
