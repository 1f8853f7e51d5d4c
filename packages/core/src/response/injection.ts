/**
 * Injection Engine
 *
 * Marker-based insertion: no HTML parsing, just the last occurrence of a
 * literal string. The closing body tag is the usual marker, and the last
 * one wins because earlier ones tend to sit inside scripts or comments.
 */

export interface InjectionResult {
  body: Buffer;
  contentLength: number;
  /** Content-Encoding must be dropped because the body is now plain */
  encodingRemoved: boolean;
}

function lastIndexIgnoringCase(haystack: string, needle: string): number {
  const pattern = new RegExp(needle.replace(/[.*+?^${}()|[\]\\]/g, '\\$&'), 'gi');
  let last = -1;
  for (let match = pattern.exec(haystack); match; match = pattern.exec(haystack)) {
    last = match.index;
  }
  return last;
}

/**
 * Splice `fragment` in front of the last `marker`, or append it.
 * An exact match is preferred; a case-insensitive one (</BODY>) is the fallback.
 */
export function injectFragment(html: string, fragment: string, marker: string): string {
  let index = marker ? html.lastIndexOf(marker) : -1;
  if (index === -1 && marker) {
    index = lastIndexIgnoringCase(html, marker);
  }
  if (index === -1) {
    return html + fragment;
  }
  return html.slice(0, index) + fragment + html.slice(index);
}

/**
 * Inject and serialize the new body
 *
 * @param removedEncodings - content-codings the cascade stripped from the body
 */
export function buildInjection(
  text: string,
  fragment: string,
  marker: string,
  removedEncodings: readonly string[]
): InjectionResult {
  const body = Buffer.from(injectFragment(text, fragment, marker), 'utf8');
  return {
    body,
    contentLength: body.byteLength,
    encodingRemoved: removedEncodings.length > 0,
  };
}
