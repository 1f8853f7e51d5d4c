/**
 * Debug toolbar middleware
 *
 * Instruments each request with a RequestContext, runs the app inside it,
 * and routes the response through the injection pipeline:
 *
 * - ineligible responses (not HTML, excluded, bodiless, too large) keep
 *   their original body stream; only Server-Timing is appended
 * - eligible responses are replayed through a ResponseInterceptor, which
 *   decodes, injects the toolbar and re-frames them; a client that
 *   disconnects while the body is buffered gets nothing rendered or stored
 *
 * Usage:
 *   const toolbar = new DebugToolbar();
 *   app.use('*', debugToolbar({ toolbar }));
 *   mountToolbarRoutes(app, toolbar);
 */

import type { Context, MiddlewareHandler } from 'hono';
import { createMiddleware } from 'hono/factory';
import { getCookie } from 'hono/cookie';
import {
  DebugToolbar,
  checkEligibility,
  createResponseInterceptor,
  isExcludedPath,
  isHostAllowed,
  runWithRequestContext,
  toPipelineConfig,
  type DebugToolbarConfig,
  type HeaderList,
  type RequestContext,
} from '@devbar/core';
import { parseToolbarOptions, type DebugToolbarMiddlewareOptions } from '../config/schema.js';
import { ResponseEventSink, headersToList, replayResponse } from '../bridge/response-sink.js';
import { getLog } from '../services/log.js';

const log = getLog('DebugToolbarMiddleware');

/**
 * Whether a request gets a toolbar context at all
 */
export function shouldShowToolbar(
  c: Context,
  config: DebugToolbarConfig,
  showToolbar?: (c: Context) => boolean
): boolean {
  if (!config.enabled) return false;
  if (isExcludedPath(c.req.path, [config.apiPath, config.staticPath, ...config.excludePaths])) return false;
  if (!isHostAllowed(c.req.header('host'), config.allowedHosts)) return false;
  return showToolbar ? showToolbar(c) : true;
}

function populateRequestMetadata(c: Context, context: RequestContext): void {
  const url = new URL(c.req.url);
  Object.assign(context.metadata, {
    method: c.req.method,
    path: c.req.path,
    queryString: url.search.slice(1),
    queryParams: c.req.query(),
    headers: c.req.header(),
    cookies: getCookie(c),
    contentType: c.req.header('content-type') ?? '',
    scheme: url.protocol.replace(/:$/, ''),
    host: url.host,
  });
}

function populateResponseMetadata(response: Response, headers: HeaderList, context: RequestContext): void {
  Object.assign(context.metadata, {
    responseStatus: response.status,
    responseHeaders: Object.fromEntries(headers),
    responseContentType: response.headers.get('content-type') ?? '',
  });
}

export function debugToolbar(options: DebugToolbarMiddlewareOptions = {}): MiddlewareHandler {
  const toolbar = options.toolbar ?? new DebugToolbar(parseToolbarOptions(options));
  const { showToolbar } = options;
  const pipeline = toPipelineConfig(toolbar.config);

  return createMiddleware(async (c, next) => {
    if (!shouldShowToolbar(c, toolbar.config, showToolbar)) {
      await next();
      return;
    }

    const registry = await toolbar.getCodecRegistry();
    const context = await toolbar.processRequest();
    c.set('debugToolbarContext', context);
    populateRequestMetadata(c, context);

    await runWithRequestContext(context, async () => {
      await next();

      const response = c.res;
      const headers = headersToList(response.headers);
      populateResponseMetadata(response, headers, context);

      const eligibility = checkEligibility(
        { path: c.req.path, method: c.req.method, status: response.status, headers },
        pipeline
      );
      if (!eligibility.eligible || !response.body) {
        context.metadata.pipeline = eligibility.eligible ? 'no-body' : eligibility.reason;
        await toolbar.processResponse(context);
        const serverTiming = toolbar.getServerTimingHeader(context);
        if (serverTiming) {
          c.header('Server-Timing', serverTiming, { append: true });
        }
        return;
      }

      // Rendering happens mid-replay, so the fragment shows this until the outcome is known.
      context.metadata.pipeline = 'intercepting';

      const sink = new ResponseEventSink();
      const interceptor = createResponseInterceptor({
        send: sink.send,
        request: { path: c.req.path, method: c.req.method },
        config: pipeline,
        registry,
        renderFragment: () => toolbar.renderFragment(context),
        decorateHeaders: (list): HeaderList => {
          const serverTiming = toolbar.getServerTimingHeader(context);
          if (!serverTiming) return list;
          const entry: readonly [string, string] = ['server-timing', serverTiming];
          return [...list, entry];
        },
      });

      const rebuilt = await replayResponse(response, interceptor, sink, { signal: c.req.raw.signal });
      if (!rebuilt) {
        log.debug('Client disconnected while the response was buffered', { path: c.req.path });
        // A render that was already under way may have stored the request.
        toolbar.storage.delete(context.requestId);
        c.res = undefined;
        c.res = new Response(null, { status: response.status });
        return;
      }

      context.metadata.pipeline = interceptor.outcome ?? 'intercepting';
      if (interceptor.outcome === 'rewritten') {
        // Stats were stored while the fragment rendered.
        await toolbar.refreshStats(context);
      } else {
        await toolbar.processResponse(context);
      }
      log.debug('Response passed through the toolbar pipeline', {
        path: c.req.path,
        outcome: interceptor.outcome,
      });

      // Clear first: assigning over an existing response merges its headers back in.
      c.res = undefined;
      c.res = rebuilt;
    });
  });
}
