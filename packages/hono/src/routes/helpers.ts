/**
 * Route Helpers
 *
 * Shared utilities for the toolbar's Hono route handlers.
 */

import type { Context } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type { ApiResponse } from '../types/index.js';
import { ERROR_CODES, type ErrorCode } from './error-codes.js';

export { ERROR_CODES, type ErrorCode };

/**
 * Parse pagination parameters from query string with defaults.
 *
 * @param defaultLimit - Default limit value (default: 20)
 * @param maxLimit - Maximum allowed limit (default: 100)
 */
export function getPaginationParams(
  c: Context,
  defaultLimit: number = 20,
  maxLimit: number = 100
): { limit: number; offset: number } {
  const limitRaw = parseInt(c.req.query('limit') ?? String(defaultLimit), 10);
  const limit = Math.min(Math.max(1, Number.isNaN(limitRaw) ? defaultLimit : limitRaw), maxLimit);
  const offsetRaw = parseInt(c.req.query('offset') ?? '0', 10);
  const offset = Math.max(0, Number.isNaN(offsetRaw) ? 0 : offsetRaw);

  return { limit, offset };
}

/**
 * Build and return a success API response with standard meta envelope.
 */
export function apiResponse<T>(c: Context, data: T, status?: ContentfulStatusCode) {
  const response: ApiResponse<T> = {
    success: true,
    data,
    meta: {
      requestId: c.get('requestId') ?? 'unknown',
      timestamp: new Date().toISOString(),
    },
  };
  return status ? c.json(response, status) : c.json(response);
}

/**
 * Build and return an error API response with standard meta envelope.
 *
 * @param status - HTTP status code (default 400)
 *
 * @example
 * return apiError(c, { code: ERROR_CODES.NOT_FOUND, message: 'Request not found' }, 404);
 */
export function apiError(
  c: Context,
  error: { code: ErrorCode; message: string },
  status: ContentfulStatusCode = 400
) {
  const response: ApiResponse = {
    success: false,
    error,
    meta: {
      requestId: c.get('requestId') ?? 'unknown',
      timestamp: new Date().toISOString(),
    },
  };
  return c.json(response, status);
}

/**
 * Sanitize a user-provided ID before echoing it in a message.
 * Strips all characters except word chars, dots and hyphens, then truncates to 100 chars.
 */
export function sanitizeId(id: string): string {
  return id.replace(/[^\w.-]/g, '').slice(0, 100);
}

/**
 * Return a standardized 404 not-found error response.
 */
export function notFoundError(c: Context, resourceType: string, id: string) {
  return apiError(c, { code: ERROR_CODES.NOT_FOUND, message: `${resourceType} not found: ${sanitizeId(id)}` }, 404);
}
