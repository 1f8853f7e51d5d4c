/**
 * DebugToolbar
 *
 * Owns the panels, the request history and the codec registry, and drives
 * the panel hooks for each request. Framework bindings call:
 *   processRequest() -> run the app -> processResponse(ctx) -> getToolbarData(ctx)
 */

import {
  getAllPanels,
  resolveToolbarConfig,
  type DebugToolbarConfig,
  type DebugToolbarOptions,
} from '../config/toolbar-config.js';
import { initCodecRegistry, type CodecRegistry } from '../encoding/codec-registry.js';
import type { ILogService } from '../services/log-service.js';
import { getLog } from '../services/get-log.js';
import { getErrorMessage } from '../types/errors.js';
import { RequestContext, type PanelStats } from './context.js';
import type { Panel, PanelHost } from './panel.js';
import { renderToolbar } from './renderer.js';
import { ToolbarStorage } from './storage.js';

export interface ToolbarPanelData {
  panelId: string;
  title: string;
  navTitle: string;
  navSubtitle: string;
  hasContent: boolean;
  stats: PanelStats;
}

export interface ToolbarData {
  requestId: string;
  panels: ToolbarPanelData[];
  /** Seconds */
  timing: Record<string, number>;
}

export interface DebugToolbarDeps {
  registry?: CodecRegistry;
  storage?: ToolbarStorage;
  log?: ILogService;
}

/** Server-Timing metric names are HTTP tokens */
function toMetricName(name: string): string {
  return name.replace(/[^A-Za-z0-9!#$%&'*+.^_`|~-]/g, '_');
}

export class DebugToolbar implements PanelHost {
  readonly config: DebugToolbarConfig;
  readonly storage: ToolbarStorage;
  private readonly panels: Panel[];
  private readonly log: ILogService;
  private registry: CodecRegistry | null;
  private readonly processed = new WeakSet<RequestContext>();

  constructor(options: DebugToolbarOptions = {}, deps: DebugToolbarDeps = {}) {
    this.config = resolveToolbarConfig(options);
    this.log = deps.log ?? getLog('DebugToolbar');
    this.storage = deps.storage ?? new ToolbarStorage(this.config.maxRequestHistory);
    this.registry = deps.registry ?? null;
    this.panels = this.config.enabled ? getAllPanels(this.config).map((PanelType) => new PanelType(this)) : [];
  }

  get enabledPanels(): Panel[] {
    return this.panels.filter((panel) => panel.enabled);
  }

  getPanel(panelId: string): Panel | undefined {
    return this.panels.find((panel) => panel.panelId === panelId);
  }

  /**
   * Codec registry for the response pipeline, detected on first use
   */
  async getCodecRegistry(): Promise<CodecRegistry> {
    if (!this.registry) {
      this.registry = await initCodecRegistry();
    }
    return this.registry;
  }

  codecAvailability(): Record<string, boolean> {
    return this.registry?.availability() ?? {};
  }

  /**
   * Open a context for a new request and run every panel's request hook
   */
  async processRequest(context: RequestContext = new RequestContext()): Promise<RequestContext> {
    for (const panel of this.enabledPanels) {
      try {
        await panel.processRequest(context);
      } catch (error) {
        this.log.warn('Panel request hook failed', { panelId: panel.panelId, error: getErrorMessage(error) });
      }
    }
    return context;
  }

  /**
   * Collect stats and store the request in history. Runs once per context;
   * later calls are no-ops.
   */
  async processResponse(context: RequestContext): Promise<void> {
    if (this.processed.has(context)) return;
    this.processed.add(context);

    for (const panel of this.enabledPanels) {
      try {
        await panel.processResponse(context);
        panel.recordStats(context, await panel.generateStats(context));
      } catch (error) {
        this.log.error('Panel failed while collecting stats', {
          panelId: panel.panelId,
          error: getErrorMessage(error),
        });
      }
    }

    this.storage.storeFromContext(context);
  }

  /**
   * Regenerate stats for a context that was already processed and store
   * them again. Panel hooks are not re-run.
   */
  async refreshStats(context: RequestContext): Promise<void> {
    for (const panel of this.enabledPanels) {
      try {
        panel.recordStats(context, await panel.generateStats(context));
      } catch (error) {
        this.log.error('Panel failed while collecting stats', {
          panelId: panel.panelId,
          error: getErrorMessage(error),
        });
      }
    }
    this.storage.storeFromContext(context);
  }

  /**
   * `name;dur=1.23` entries from every panel, or null when there are none
   */
  getServerTimingHeader(context: RequestContext): string | null {
    if (!this.config.serverTiming) return null;

    const entries: string[] = [];
    for (const panel of this.enabledPanels) {
      let timings: Record<string, number>;
      try {
        timings = panel.generateServerTiming(context);
      } catch (error) {
        this.log.warn('Panel server timing failed', { panelId: panel.panelId, error: getErrorMessage(error) });
        continue;
      }
      for (const [name, ms] of Object.entries(timings)) {
        if (Number.isFinite(ms)) entries.push(`${toMetricName(name)};dur=${ms.toFixed(2)}`);
      }
    }
    return entries.length > 0 ? entries.join(', ') : null;
  }

  getToolbarData(context: RequestContext): ToolbarData {
    return {
      requestId: context.requestId,
      panels: this.enabledPanels.map((panel) => ({
        panelId: panel.panelId,
        title: panel.title,
        navTitle: panel.navTitle,
        navSubtitle: panel.getNavSubtitle(context),
        hasContent: panel.hasContent,
        stats: panel.getStats(context),
      })),
      timing: { ...context.timingData },
    };
  }

  /**
   * Finish the request and render the fragment injected into its page
   */
  async renderFragment(context: RequestContext): Promise<string> {
    await this.processResponse(context);
    return renderToolbar(this.getToolbarData(context), {
      apiPath: this.config.apiPath,
      staticPath: this.config.staticPath,
    });
  }
}

export function createDebugToolbar(options?: DebugToolbarOptions, deps?: DebugToolbarDeps): DebugToolbar {
  return new DebugToolbar(options, deps);
}
