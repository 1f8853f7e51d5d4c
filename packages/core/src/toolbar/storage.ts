/**
 * Toolbar Storage
 *
 * Bounded request history. Map insertion order doubles as recency: storing
 * an existing id moves it to the end, and the oldest entry is evicted once
 * the limit is passed.
 */

import type { PanelStats, RequestContext } from './context.js';

export interface RequestSnapshot {
  panelData: Record<string, PanelStats>;
  timingData: Record<string, number>;
  metadata: Record<string, unknown>;
}

export interface StoredRequest {
  requestId: string;
  data: RequestSnapshot;
}

export class ToolbarStorage {
  readonly maxSize: number;
  private readonly entries = new Map<string, RequestSnapshot>();

  constructor(maxSize = 50) {
    this.maxSize = maxSize;
  }

  get size(): number {
    return this.entries.size;
  }

  store(requestId: string, data: RequestSnapshot): void {
    this.entries.delete(requestId);
    this.entries.set(requestId, data);

    while (this.entries.size > this.maxSize) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  get(requestId: string): RequestSnapshot | undefined {
    return this.entries.get(requestId);
  }

  /**
   * Newest first
   */
  getAll(): StoredRequest[] {
    return [...this.entries].reverse().map(([requestId, data]) => ({ requestId, data }));
  }

  delete(requestId: string): boolean {
    return this.entries.delete(requestId);
  }

  clear(): void {
    this.entries.clear();
  }

  /**
   * Snapshot a context. Top-level maps are copied so later writes to the
   * context do not leak into history.
   */
  storeFromContext(context: RequestContext): void {
    const panelData: Record<string, PanelStats> = {};
    for (const [panelId, stats] of Object.entries(context.panelData)) {
      panelData[panelId] = { ...stats };
    }

    this.store(context.requestId, {
      panelData,
      timingData: { ...context.timingData },
      metadata: { ...context.metadata },
    });
  }
}
