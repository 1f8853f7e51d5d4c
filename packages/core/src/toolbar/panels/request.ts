/**
 * Request panel: method, path, query, headers and cookies
 */

import { Panel } from '../panel.js';
import type { PanelStats, RequestContext } from '../context.js';
import { metaRecord, metaString } from './metadata.js';

export class RequestPanel extends Panel {
  readonly title = 'Request';

  generateStats(context: RequestContext): PanelStats {
    return {
      method: metaString(context, 'method'),
      path: metaString(context, 'path'),
      queryString: metaString(context, 'queryString'),
      queryParams: metaRecord(context, 'queryParams'),
      headers: metaRecord(context, 'headers'),
      cookies: metaRecord(context, 'cookies'),
      contentType: metaString(context, 'contentType'),
      scheme: metaString(context, 'scheme'),
      host: metaString(context, 'host'),
    };
  }

  override getNavSubtitle(context: RequestContext): string {
    const method = metaString(context, 'method');
    const path = metaString(context, 'path');
    return [method, path].filter(Boolean).join(' ');
  }
}
