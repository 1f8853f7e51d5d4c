/**
 * Shared types for the Hono binding
 */

import type { RequestContext } from '@devbar/core';

/**
 * Standard API response envelope
 */
export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: ApiError;
  meta?: ResponseMeta;
}

export interface ApiError {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

export interface ResponseMeta {
  requestId: string;
  timestamp: string;
}

declare module 'hono' {
  interface ContextVariableMap {
    requestId: string;
    /** Set by debugToolbar() for requests it instruments */
    debugToolbarContext?: RequestContext;
  }
}
