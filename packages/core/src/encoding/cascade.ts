/**
 * Decompression Cascade
 *
 * Removes every layer of a Content-Encoding stack, last-applied first, and
 * checks that what is left is UTF-8 text. Any failure abandons the whole
 * stack: a half-decoded body would no longer match its Content-Encoding
 * header, so the original bytes are used instead.
 */

import type { ILogService } from '../services/log-service.js';
import { getLog } from '../services/get-log.js';
import type { CodecRegistry } from './codec-registry.js';
import { decodeOrder, type EncodingStack } from './encoding-stack.js';

export type DecodeFailureReason =
  | 'unknown-encoding'
  | 'codec-unavailable'
  | 'malformed'
  | 'too-large'
  | 'not-text';

export interface DecodeFailure {
  reason: DecodeFailureReason;
  /** Token that stopped the cascade (absent for not-text) */
  encoding?: string;
  message: string;
}

export type DecodeOutcome =
  | {
      readonly kind: 'decoded';
      /** Plain bytes after every layer was removed */
      readonly body: Buffer;
      readonly text: string;
      /** Tokens that were removed, in declaration order */
      readonly encodings: readonly string[];
    }
  | { readonly kind: 'passthrough'; readonly body: Buffer; readonly failure?: DecodeFailure }
  | { readonly kind: 'failed'; readonly failure: DecodeFailure };

export type SettledOutcome = Exclude<DecodeOutcome, { kind: 'failed' }>;

export interface CascadeOptions {
  /** Upper bound on each layer's decoded size */
  maxDecodedSize?: number;
}

const utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/**
 * Decode bytes as strict UTF-8, keeping a leading BOM so re-encoding is lossless
 */
export function decodeUtf8(bytes: Uint8Array): string | null {
  try {
    return utf8.decode(bytes);
  } catch {
    return null;
  }
}

function failed(reason: DecodeFailureReason, message: string, encoding?: string): DecodeOutcome {
  return { kind: 'failed', failure: encoding === undefined ? { reason, message } : { reason, message, encoding } };
}

/**
 * Reverse the encoding stack over the complete body
 */
export function decompressCascade(
  stack: EncodingStack,
  body: Buffer,
  registry: CodecRegistry,
  options: CascadeOptions = {}
): DecodeOutcome {
  const order = decodeOrder(stack);

  // Check the whole stack before touching any bytes.
  for (const token of order) {
    const found = registry.lookup(token);
    if (found.status === 'unknown') {
      return failed('unknown-encoding', `unknown content-coding "${token}"`, token);
    }
    if (found.status === 'unavailable') {
      return failed('codec-unavailable', `no decoder installed for "${token}"`, token);
    }
  }

  let current = body;
  for (const token of order) {
    const result = registry.decode(token, current, { maxOutputLength: options.maxDecodedSize });
    if (!result.ok) {
      const reason = result.error.kind === 'too-large' ? 'too-large' : 'malformed';
      return failed(reason, result.error.message, token);
    }
    current = result.value;
  }

  const text = decodeUtf8(current);
  if (text === null) {
    return failed('not-text', 'decoded body is not valid UTF-8');
  }

  return { kind: 'decoded', body: current, text, encodings: stack.tokens };
}

/**
 * Collapse a failed outcome into a pass-through of the original bytes,
 * logging the reason at the level it deserves.
 */
export function settleOutcome(
  outcome: DecodeOutcome,
  original: Buffer,
  log: ILogService = getLog('Cascade')
): SettledOutcome {
  if (outcome.kind !== 'failed') return outcome;

  const { failure } = outcome;
  const details = { reason: failure.reason, encoding: failure.encoding, message: failure.message };
  switch (failure.reason) {
    case 'codec-unavailable':
    case 'unknown-encoding':
    case 'not-text':
      log.debug('Leaving response body untouched', details);
      break;
    case 'malformed':
    case 'too-large':
      log.warn('Could not decode response body, passing it through', details);
      break;
  }

  return { kind: 'passthrough', body: original, failure };
}
