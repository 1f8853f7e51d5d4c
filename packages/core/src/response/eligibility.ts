/**
 * Eligibility Gate
 *
 * Decides from the start event alone whether a response will be buffered
 * and rewritten. Everything else streams through untouched.
 */

import { getHeader, isHtmlContentType, parseContentLength } from './headers.js';
import type { HeaderList, PipelineConfig } from './types.js';

export interface EligibilityInput {
  path: string;
  method?: string;
  status: number;
  headers: HeaderList;
}

export type IneligibleReason = 'disabled' | 'excluded-path' | 'no-body' | 'not-html' | 'too-large';

export type Eligibility =
  | { readonly eligible: true }
  | { readonly eligible: false; readonly reason: IneligibleReason };

const ELIGIBLE: Eligibility = Object.freeze({ eligible: true });

/**
 * Whether a status code can carry a body at all
 */
export function statusAllowsBody(status: number): boolean {
  return !(status < 200 || status === 204 || status === 205 || status === 304);
}

export function isExcludedPath(path: string, excludePaths: readonly string[]): boolean {
  return excludePaths.some((prefix) => prefix.length > 0 && path.startsWith(prefix));
}

export function checkEligibility(input: EligibilityInput, config: PipelineConfig): Eligibility {
  if (!config.enabled) return { eligible: false, reason: 'disabled' };
  if (isExcludedPath(input.path, config.excludePaths)) return { eligible: false, reason: 'excluded-path' };
  if (input.method?.toUpperCase() === 'HEAD' || !statusAllowsBody(input.status)) {
    return { eligible: false, reason: 'no-body' };
  }
  if (!isHtmlContentType(getHeader(input.headers, 'content-type'))) {
    return { eligible: false, reason: 'not-html' };
  }

  const declared = parseContentLength(input.headers);
  if (declared !== null && declared > config.maxBodySize) {
    return { eligible: false, reason: 'too-large' };
  }

  return ELIGIBLE;
}
