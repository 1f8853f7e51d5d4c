/**
 * Toolbar Routes
 *
 * JSON API over the request history plus the toolbar's own assets.
 * Mounted under the toolbar's apiPath:
 *
 *   GET    /api/requests        - paginated history, newest first
 *   GET    /api/requests/:id    - one stored request (404 via NotFoundError)
 *   DELETE /api/requests        - clear history
 *   GET    /static/:file        - toolbar.css, toolbar.js
 */

import { readFile } from 'node:fs/promises';
import { Hono, type Env } from 'hono';
import { NotFoundError, type DebugToolbar, type StoredRequest } from '@devbar/core';
import { requestId } from '../middleware/request-id.js';
import { errorHandler } from '../middleware/error-handler.js';
import { apiResponse, getPaginationParams, notFoundError, sanitizeId } from './helpers.js';

interface StaticAsset {
  file: string;
  contentType: string;
}

const STATIC_ASSETS = new Map<string, StaticAsset>([
  ['toolbar.css', { file: 'toolbar.css', contentType: 'text/css; charset=utf-8' }],
  ['toolbar.js', { file: 'toolbar.js', contentType: 'text/javascript; charset=utf-8' }],
]);

const assetCache = new Map<string, Promise<string>>();

function loadAsset(file: string): Promise<string> {
  let cached = assetCache.get(file);
  if (!cached) {
    // A failed read is dropped from the cache and retried on the next request
    cached = readFile(new URL(`../static/${file}`, import.meta.url), 'utf8').catch((error: unknown) => {
      assetCache.delete(file);
      throw error;
    });
    assetCache.set(file, cached);
  }
  return cached;
}

export interface RequestSummary {
  requestId: string;
  method: string;
  path: string;
  statusCode: number | null;
  /** Seconds */
  totalTime: number | null;
}

function summarize({ requestId: id, data }: StoredRequest): RequestSummary {
  const { metadata, timingData } = data;
  return {
    requestId: id,
    method: typeof metadata.method === 'string' ? metadata.method : '',
    path: typeof metadata.path === 'string' ? metadata.path : '',
    statusCode: typeof metadata.responseStatus === 'number' ? metadata.responseStatus : null,
    totalTime: timingData.total ?? null,
  };
}

/**
 * Static asset routes, mountable on their own when staticPath is not
 * `${apiPath}/static`
 */
export function createStaticRoutes(): Hono {
  const app = new Hono();

  app.get('/:file', async (c) => {
    const name = c.req.param('file');
    const asset = STATIC_ASSETS.get(name);
    if (!asset) {
      return notFoundError(c, 'Static file', name);
    }
    const body = await loadAsset(asset.file);
    return c.body(body, 200, { 'Content-Type': asset.contentType, 'Cache-Control': 'no-cache' });
  });

  return app;
}

export function createToolbarRoutes(toolbar: DebugToolbar): Hono {
  const app = new Hono();
  app.use('*', requestId);

  app.get('/api/requests', (c) => {
    const { limit, offset } = getPaginationParams(c, 20, 100);
    const all = toolbar.storage.getAll();
    return apiResponse(c, {
      requests: all.slice(offset, offset + limit).map(summarize),
      total: all.length,
      limit,
      offset,
    });
  });

  app.get('/api/requests/:id', (c) => {
    const id = c.req.param('id');
    const data = toolbar.storage.get(id);
    if (!data) {
      throw new NotFoundError('Request', sanitizeId(id));
    }
    return apiResponse(c, { requestId: id, ...data });
  });

  app.delete('/api/requests', (c) => {
    const cleared = toolbar.storage.size;
    toolbar.storage.clear();
    return apiResponse(c, { cleared });
  });

  app.route('/static', createStaticRoutes());

  app.onError(errorHandler);

  return app;
}

/**
 * Mount the toolbar routes on an app at the toolbar's configured paths
 */
export function mountToolbarRoutes<E extends Env>(app: Hono<E>, toolbar: DebugToolbar): void {
  const { apiPath, staticPath } = toolbar.config;
  app.route(apiPath, createToolbarRoutes(toolbar));
  if (staticPath !== `${apiPath}/static`) {
    app.route(staticPath, createStaticRoutes());
  }
}
