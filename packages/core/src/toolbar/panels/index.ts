import type { PanelClass } from '../panel.js';
import { LoggingPanel } from './logging.js';
import { RequestPanel } from './request.js';
import { ResponsePanel } from './response.js';
import { TimerPanel } from './timer.js';
import { VersionsPanel } from './versions.js';

export { LoggingPanel, RequestPanel, ResponsePanel, TimerPanel, VersionsPanel };
export * from './metadata.js';

export const DEFAULT_PANELS: readonly PanelClass[] = [TimerPanel, RequestPanel, ResponsePanel, LoggingPanel, VersionsPanel];
