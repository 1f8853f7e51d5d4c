/**
 * Debug toolbar options
 *
 * Plain settings are validated with zod. Panels, the show-toolbar callback
 * and a pre-built toolbar are passed through as they are.
 */

import { z } from 'zod';
import type { Context } from 'hono';
import { ValidationError, type DebugToolbar, type DebugToolbarOptions, type PanelClass } from '@devbar/core';

const pathPrefix = z
  .string()
  .min(1)
  .max(200)
  .refine((value) => value.startsWith('/'), { message: 'must start with "/"' });

export const debugToolbarOptionsSchema = z
  .object({
    enabled: z.boolean(),
    insertBefore: z.string().min(1).max(200),
    maxRequestHistory: z.number().int().min(1).max(10_000),
    apiPath: pathPrefix,
    staticPath: pathPrefix,
    excludePaths: z.array(pathPrefix).max(200),
    maxBodySize: z.number().int().min(0),
    allowedHosts: z.array(z.string().min(1).max(253)).max(200),
    excludePanels: z.array(z.string().min(1)).max(100),
    serverTiming: z.boolean(),
  })
  .partial()
  .strict();

export type DebugToolbarSettings = z.infer<typeof debugToolbarOptionsSchema>;

export interface DebugToolbarMiddlewareOptions extends DebugToolbarSettings {
  panels?: readonly PanelClass[];
  extraPanels?: readonly PanelClass[];
  /** Return false to skip the toolbar for a request */
  showToolbar?: (c: Context) => boolean;
  /** Share one toolbar (and its history) between middleware and routes */
  toolbar?: DebugToolbar;
}

function toValidationError(message: string, issues: readonly z.ZodIssue[]): ValidationError {
  const errors = issues.map((issue) => ({ path: issue.path.map(String), message: issue.message }));
  const summary = errors.map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`).join('; ');
  return new ValidationError(`${message}: ${summary}`, { errors });
}

/**
 * Validate user options and return them in the core config shape
 */
export function parseToolbarOptions(options: DebugToolbarMiddlewareOptions = {}): DebugToolbarOptions {
  const { panels, extraPanels, showToolbar: _showToolbar, toolbar: _toolbar, ...settings } = options;
  const parsed = debugToolbarOptionsSchema.safeParse(settings);
  if (!parsed.success) {
    throw toValidationError('Invalid debug toolbar options', parsed.error.issues);
  }

  return {
    ...parsed.data,
    ...(panels ? { panels } : {}),
    ...(extraPanels ? { extraPanels } : {}),
  };
}

// =============================================================================
// Environment
// =============================================================================

const flag = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no', 'on', 'off']))
  .transform((value) => value === 'true' || value === '1' || value === 'yes' || value === 'on');

const list = z.string().transform((value) =>
  value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0)
);

const envSchema = z.object({
  DEBUG_TOOLBAR_ENABLED: flag.optional(),
  DEBUG_TOOLBAR_INSERT_BEFORE: z.string().min(1).optional(),
  DEBUG_TOOLBAR_MAX_BODY_BYTES: z.coerce.number().int().min(0).optional(),
  DEBUG_TOOLBAR_EXCLUDE_PATHS: list.pipe(z.array(pathPrefix)).optional(),
  DEBUG_TOOLBAR_ALLOWED_HOSTS: list.optional(),
});

/**
 * Read toolbar settings from DEBUG_TOOLBAR_* variables. Unset and empty
 * variables are left out so defaults apply.
 */
export function loadToolbarConfigFromEnv(
  env: Record<string, string | undefined> = process.env
): DebugToolbarSettings {
  const present: Record<string, string> = {};
  for (const key of Object.keys(envSchema.shape)) {
    const value = env[key];
    if (value !== undefined && value.trim() !== '') present[key] = value;
  }

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw toValidationError('Invalid debug toolbar environment', parsed.error.issues);
  }

  const e = parsed.data;
  const settings: DebugToolbarSettings = {};
  if (e.DEBUG_TOOLBAR_ENABLED !== undefined) settings.enabled = e.DEBUG_TOOLBAR_ENABLED;
  if (e.DEBUG_TOOLBAR_INSERT_BEFORE !== undefined) settings.insertBefore = e.DEBUG_TOOLBAR_INSERT_BEFORE;
  if (e.DEBUG_TOOLBAR_MAX_BODY_BYTES !== undefined) settings.maxBodySize = e.DEBUG_TOOLBAR_MAX_BODY_BYTES;
  if (e.DEBUG_TOOLBAR_EXCLUDE_PATHS !== undefined) settings.excludePaths = e.DEBUG_TOOLBAR_EXCLUDE_PATHS;
  if (e.DEBUG_TOOLBAR_ALLOWED_HOSTS !== undefined) settings.allowedHosts = e.DEBUG_TOOLBAR_ALLOWED_HOSTS;
  return settings;
}
