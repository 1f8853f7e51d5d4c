/**
 * Header helpers and the Header Rewriter
 */

import type { HeaderList } from './types.js';
import type { InjectionResult } from './injection.js';

const HTML_MEDIA_TYPES = new Set(['text/html', 'application/xhtml+xml']);

/** Headers describing the old framing that a rewritten body invalidates */
const FRAMING_HEADERS = ['content-length', 'transfer-encoding'];

export function getHeaderValues(headers: HeaderList, name: string): string[] {
  const target = name.toLowerCase();
  return headers.filter(([key]) => key.toLowerCase() === target).map(([, value]) => value);
}

export function getHeader(headers: HeaderList, name: string): string | undefined {
  return getHeaderValues(headers, name)[0];
}

export function withoutHeaders(headers: HeaderList, names: readonly string[]): HeaderList {
  const drop = new Set(names.map((n) => n.toLowerCase()));
  return headers.filter(([key]) => !drop.has(key.toLowerCase()));
}

/**
 * Declared Content-Length, or null when absent or not a valid length
 */
export function parseContentLength(headers: HeaderList): number | null {
  const raw = getHeader(headers, 'content-length')?.trim();
  if (!raw || !/^\d+$/.test(raw)) return null;
  const value = Number(raw);
  return Number.isSafeInteger(value) ? value : null;
}

/**
 * Lowercased media type without parameters ("text/html; charset=utf-8" -> "text/html")
 */
export function mediaType(contentType: string | undefined): string {
  return (contentType?.split(';')[0] ?? '').trim().toLowerCase();
}

export function isHtmlContentType(contentType: string | undefined): boolean {
  return HTML_MEDIA_TYPES.has(mediaType(contentType));
}

/**
 * Headers for a rewritten body: fresh Content-Length, old framing removed,
 * Content-Encoding removed when the body was decoded. Everything else keeps
 * its position.
 */
export function rewriteHeaders(headers: HeaderList, result: InjectionResult): HeaderList {
  const drop = result.encodingRemoved ? [...FRAMING_HEADERS, 'content-encoding'] : FRAMING_HEADERS;
  return [...withoutHeaders(headers, drop), ['content-length', String(result.contentLength)]];
}
