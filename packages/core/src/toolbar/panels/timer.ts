/**
 * Timer panel: wall clock and CPU time spent handling the request
 */

import { Panel } from '../panel.js';
import type { PanelStats, RequestContext } from '../context.js';

interface TimerStart {
  wall: number;
  cpu: NodeJS.CpuUsage;
}

export class TimerPanel extends Panel {
  readonly title = 'Time';
  override readonly hasContent = false;

  private readonly starts = new WeakMap<RequestContext, TimerStart>();

  override async processRequest(context: RequestContext): Promise<void> {
    this.starts.set(context, { wall: performance.now(), cpu: process.cpuUsage() });
  }

  override async processResponse(context: RequestContext): Promise<void> {
    const start = this.starts.get(context);
    if (!start) return;
    this.starts.delete(context);

    const cpu = process.cpuUsage(start.cpu);
    context.recordTiming('total', (performance.now() - start.wall) / 1000);
    context.recordTiming('user_cpu', cpu.user / 1e6);
    context.recordTiming('system_cpu', cpu.system / 1e6);
  }

  generateStats(context: RequestContext): PanelStats {
    const toMs = (seconds: number | undefined): number => Math.round((seconds ?? 0) * 1e6) / 1e3;
    const userCpu = toMs(context.getTiming('user_cpu'));
    const systemCpu = toMs(context.getTiming('system_cpu'));
    return {
      totalTimeMs: toMs(context.getTiming('total')),
      userCpuTimeMs: userCpu,
      systemCpuTimeMs: systemCpu,
      totalCpuTimeMs: Math.round((userCpu + systemCpu) * 1e3) / 1e3,
    };
  }

  override getNavSubtitle(context: RequestContext): string {
    return `${((context.getTiming('total') ?? 0) * 1000).toFixed(2)}ms`;
  }

  override generateServerTiming(context: RequestContext): Record<string, number> {
    const total = context.getTiming('total');
    return total === undefined ? {} : { total: total * 1000 };
  }
}
