/**
 * Toolbar fragment renderer
 *
 * Produces the HTML injected into pages. The fragment only carries the
 * nav bar; panel contents are fetched by toolbar.js from the JSON API.
 */

import type { ToolbarData } from './toolbar.js';

export interface RenderOptions {
  apiPath: string;
  staticPath: string;
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

function trimSlash(path: string): string {
  return path.endsWith('/') ? path.slice(0, -1) : path;
}

function renderPanelButton(panel: ToolbarData['panels'][number]): string {
  const subtitle = panel.navSubtitle
    ? `<span class="panel-subtitle">${escapeHtml(panel.navSubtitle)}</span>`
    : '';
  return (
    `<button class="toolbar-panel-btn" data-panel-id="${escapeHtml(panel.panelId)}">` +
    `<span class="panel-title">${escapeHtml(panel.navTitle)}</span>${subtitle}</button>`
  );
}

export function renderToolbar(data: ToolbarData, options: RenderOptions): string {
  const staticPath = escapeHtml(trimSlash(options.staticPath));
  const apiPath = escapeHtml(trimSlash(options.apiPath));
  const requestId = escapeHtml(data.requestId);
  const totalMs = ((data.timing.total ?? 0) * 1000).toFixed(2);

  return [
    `<link rel="stylesheet" href="${staticPath}/toolbar.css">`,
    `<div id="debug-toolbar" data-request-id="${requestId}" data-api-path="${apiPath}">`,
    '<div class="toolbar-bar">',
    '<span class="toolbar-brand" title="Click to toggle">Debug Toolbar</span>',
    `<span class="toolbar-time">${totalMs}ms</span>`,
    `<div class="toolbar-panels">${data.panels.map(renderPanelButton).join('')}</div>`,
    `<span class="toolbar-request-id" title="${requestId}">${escapeHtml(data.requestId.slice(0, 8))}</span>`,
    '</div>',
    '<div class="toolbar-details"></div>',
    '</div>',
    `<script src="${staticPath}/toolbar.js" defer></script>`,
  ].join('\n');
}
