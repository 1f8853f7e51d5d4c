/**
 * Versions panel: runtime versions and which content-codings can be decoded
 */

import { Panel } from '../panel.js';
import type { PanelStats, RequestContext } from '../context.js';

export class VersionsPanel extends Panel {
  readonly title = 'Versions';

  generateStats(_context: RequestContext): PanelStats {
    return {
      node: process.versions.node,
      v8: process.versions.v8,
      platform: process.platform,
      arch: process.arch,
      codecs: this.host.codecAvailability(),
    };
  }

  override getNavSubtitle(_context: RequestContext): string {
    return `Node.js ${process.versions.node}`;
  }
}
