/**
 * Panel base class
 *
 * A panel collects data for one tab of the toolbar. Hooks run in this order
 * for every request the toolbar handles:
 *   processRequest -> (application) -> processResponse -> generateStats
 * Stats are stored in the request context under the panel's id and end up
 * in the request history.
 */

import type { DebugToolbarConfig } from '../config/toolbar-config.js';
import type { PanelStats, RequestContext } from './context.js';

/**
 * What a panel may read from the toolbar that owns it
 */
export interface PanelHost {
  readonly config: DebugToolbarConfig;
  /** Which content-codings the response pipeline can decode */
  codecAvailability(): Record<string, boolean>;
}

export type PanelClass = new (host: PanelHost) => Panel;

export abstract class Panel {
  /** Defaults to the class name, which is also what excludePanels matches */
  readonly panelId: string = this.constructor.name;
  abstract readonly title: string;
  readonly hasContent: boolean = true;
  enabled = true;

  protected readonly host: PanelHost;

  constructor(host: PanelHost) {
    this.host = host;
  }

  get navTitle(): string {
    return this.title;
  }

  /**
   * Short text shown under the nav title, computed from collected stats
   */
  getNavSubtitle(_context: RequestContext): string {
    return '';
  }

  async processRequest(_context: RequestContext): Promise<void> {}

  async processResponse(_context: RequestContext): Promise<void> {}

  abstract generateStats(context: RequestContext): PanelStats | Promise<PanelStats>;

  /**
   * Durations in milliseconds to expose through Server-Timing
   */
  generateServerTiming(_context: RequestContext): Record<string, number> {
    return {};
  }

  recordStats(context: RequestContext, stats: PanelStats): void {
    for (const [key, value] of Object.entries(stats)) {
      context.storePanelData(this.panelId, key, value);
    }
  }

  getStats(context: RequestContext): PanelStats {
    return context.getPanelData(this.panelId);
  }
}
