/**
 * Typed reads from RequestContext.metadata, which bindings fill loosely
 */

import type { RequestContext } from '../context.js';

export function metaString(context: RequestContext, key: string): string {
  const value = context.metadata[key];
  return typeof value === 'string' ? value : '';
}

export function metaNumber(context: RequestContext, key: string): number | null {
  const value = context.metadata[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

export function metaRecord(context: RequestContext, key: string): Record<string, string> {
  const value = context.metadata[key];
  if (!value || typeof value !== 'object' || Array.isArray(value)) return {};

  const result: Record<string, string> = {};
  for (const [k, v] of Object.entries(value)) {
    if (typeof v === 'string') result[k] = v;
  }
  return result;
}
