/**
 * Toolbar configuration
 *
 * Plain-object configuration with defaults. Framework bindings validate
 * their user-facing options before handing them to resolveToolbarConfig().
 */

import type { PanelClass } from '../toolbar/panel.js';
import { DEFAULT_PANELS } from '../toolbar/panels/index.js';
import type { PipelineConfig } from '../response/types.js';
import { ValidationError } from '../types/errors.js';
import {
  DEFAULT_API_PATH,
  DEFAULT_INSERT_BEFORE,
  DEFAULT_MAX_BODY_SIZE,
  DEFAULT_MAX_REQUEST_HISTORY,
  DEFAULT_SERVER_TIMING,
  DEFAULT_STATIC_PATH,
} from './defaults.js';

export interface DebugToolbarConfig {
  enabled: boolean;
  /** Marker the fragment is inserted before */
  insertBefore: string;
  /** Size of the request history kept in memory */
  maxRequestHistory: number;
  /** Mount point of the JSON API */
  apiPath: string;
  /** Mount point of toolbar.css / toolbar.js */
  staticPath: string;
  /** Extra request path prefixes that are never intercepted */
  excludePaths: readonly string[];
  maxBodySize: number;
  /** Hosts the toolbar runs for: exact names or `*.suffix`. Empty allows all. */
  allowedHosts: readonly string[];
  panels: readonly PanelClass[];
  extraPanels: readonly PanelClass[];
  /** Class names of panels to leave out */
  excludePanels: readonly string[];
  /** Emit a Server-Timing header built from panel timings */
  serverTiming: boolean;
}

export type DebugToolbarOptions = Partial<DebugToolbarConfig>;

function assertNonNegativeInteger(name: string, value: number, min = 0): void {
  if (!Number.isSafeInteger(value) || value < min) {
    throw new ValidationError(`${name} must be an integer >= ${min}`, {
      errors: [{ path: [name], message: `expected an integer >= ${min}, got ${value}` }],
    });
  }
}

/**
 * Fill in defaults and check numeric limits
 */
export function resolveToolbarConfig(options: DebugToolbarOptions = {}): DebugToolbarConfig {
  const config: DebugToolbarConfig = {
    enabled: options.enabled ?? true,
    insertBefore: options.insertBefore ?? DEFAULT_INSERT_BEFORE,
    maxRequestHistory: options.maxRequestHistory ?? DEFAULT_MAX_REQUEST_HISTORY,
    apiPath: options.apiPath ?? DEFAULT_API_PATH,
    staticPath: options.staticPath ?? DEFAULT_STATIC_PATH,
    excludePaths: options.excludePaths ?? [],
    maxBodySize: options.maxBodySize ?? DEFAULT_MAX_BODY_SIZE,
    allowedHosts: options.allowedHosts ?? [],
    panels: options.panels ?? DEFAULT_PANELS,
    extraPanels: options.extraPanels ?? [],
    excludePanels: options.excludePanels ?? [],
    serverTiming: options.serverTiming ?? DEFAULT_SERVER_TIMING,
  };

  assertNonNegativeInteger('maxRequestHistory', config.maxRequestHistory, 1);
  assertNonNegativeInteger('maxBodySize', config.maxBodySize);
  return config;
}

/**
 * Panels plus extra panels, minus excluded class names
 */
export function getAllPanels(config: DebugToolbarConfig): PanelClass[] {
  const all = [...config.panels, ...config.extraPanels];
  if (config.excludePanels.length === 0) return all;

  const excluded = new Set(config.excludePanels);
  return all.filter((panel) => !excluded.has(panel.name));
}

/**
 * The subset of settings the response pipeline reads.
 * The toolbar's own routes are always excluded.
 */
export function toPipelineConfig(config: DebugToolbarConfig): PipelineConfig {
  const excludePaths = [...new Set([config.apiPath, config.staticPath, ...config.excludePaths])];
  return {
    enabled: config.enabled,
    insertBefore: config.insertBefore,
    excludePaths: excludePaths.filter((path) => path.length > 0),
    maxBodySize: config.maxBodySize,
  };
}

/**
 * Match a Host header (port ignored) against the allow-list
 */
export function isHostAllowed(host: string | undefined, allowedHosts: readonly string[]): boolean {
  if (allowedHosts.length === 0) return true;
  if (!host) return false;

  const name = stripPort(host.trim().toLowerCase());
  return allowedHosts.some((pattern) => {
    const p = pattern.trim().toLowerCase();
    if (p === '*') return true;
    if (p.startsWith('*.')) return name.endsWith(p.slice(1));
    return name === p;
  });
}

function stripPort(host: string): string {
  // [::1]:8080
  if (host.startsWith('[')) {
    const end = host.indexOf(']');
    return end === -1 ? host : host.slice(0, end + 1);
  }
  const colon = host.lastIndexOf(':');
  return colon === -1 ? host : host.slice(0, colon);
}
