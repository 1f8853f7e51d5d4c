/**
 * Error handler for the toolbar routes
 */

import type { Context } from 'hono';
import { HTTPException } from 'hono/http-exception';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { isAppError } from '@devbar/core';
import type { ApiResponse } from '../types/index.js';
import { ERROR_CODES } from '../routes/helpers.js';
import { getLog } from '../services/log.js';

const log = getLog('ToolbarErrorHandler');

function statusToErrorCode(status: number): string {
  switch (status) {
    case 400:
      return ERROR_CODES.BAD_REQUEST;
    case 404:
      return ERROR_CODES.NOT_FOUND;
    case 422:
      return ERROR_CODES.VALIDATION_ERROR;
    default:
      return ERROR_CODES.INTERNAL_ERROR;
  }
}

function isContentfulStatus(status: number): status is ContentfulStatusCode {
  return status >= 200 && status <= 599 && status !== 204 && status !== 205 && status !== 304;
}

function envelope(c: Context, code: string, message: string): ApiResponse {
  return {
    success: false,
    error: { code, message },
    meta: {
      requestId: c.get('requestId') ?? 'unknown',
      timestamp: new Date().toISOString(),
    },
  };
}

export function errorHandler(err: Error, c: Context): Response {
  if (err instanceof HTTPException) {
    return c.json(envelope(c, statusToErrorCode(err.status), err.message), err.status);
  }

  if (isAppError(err)) {
    const status = isContentfulStatus(err.statusCode) ? err.statusCode : 500;
    return c.json(envelope(c, err.code, err.message), status);
  }

  log.error('Unexpected error in toolbar route', { path: c.req.path, error: err.message });
  return c.json(envelope(c, ERROR_CODES.INTERNAL_ERROR, 'An unexpected error occurred'), 500);
}
