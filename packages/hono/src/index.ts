/**
 * @devbar/hono
 *
 * Hono middleware and routes for the debug toolbar.
 *
 * @example
 * const toolbar = new DebugToolbar(parseToolbarOptions(loadToolbarConfigFromEnv()));
 * app.use('*', debugToolbar({ toolbar }));
 * mountToolbarRoutes(app, toolbar);
 *
 * @packageDocumentation
 */

import './types/index.js';

export type { ApiResponse, ApiError, ResponseMeta } from './types/index.js';

export { debugToolbar, shouldShowToolbar } from './middleware/debug-toolbar.js';
export { errorHandler } from './middleware/error-handler.js';
export { requestId } from './middleware/request-id.js';

export {
  debugToolbarOptionsSchema,
  parseToolbarOptions,
  loadToolbarConfigFromEnv,
  type DebugToolbarSettings,
  type DebugToolbarMiddlewareOptions,
} from './config/schema.js';

export {
  createToolbarRoutes,
  createStaticRoutes,
  mountToolbarRoutes,
  type RequestSummary,
} from './routes/toolbar-routes.js';

export {
  ResponseEventSink,
  replayResponse,
  headersToList,
  listToHeaders,
  type ResponseEventConsumer,
  type ReplayOptions,
} from './bridge/response-sink.js';
