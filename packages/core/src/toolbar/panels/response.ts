/**
 * Response panel: status, headers and what the pipeline did with the body
 */

import { Panel } from '../panel.js';
import type { PanelStats, RequestContext } from '../context.js';
import { metaNumber, metaRecord, metaString } from './metadata.js';

export class ResponsePanel extends Panel {
  readonly title = 'Response';

  generateStats(context: RequestContext): PanelStats {
    return {
      statusCode: metaNumber(context, 'responseStatus'),
      headers: metaRecord(context, 'responseHeaders'),
      contentType: metaString(context, 'responseContentType'),
      // rewritten | passthrough | intercepting (while rendering), or why the body was never buffered
      pipeline: metaString(context, 'pipeline'),
    };
  }

  override getNavSubtitle(context: RequestContext): string {
    const status = metaNumber(context, 'responseStatus');
    return status === null ? '' : String(status);
  }
}
