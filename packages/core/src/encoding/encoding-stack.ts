/**
 * Content-Encoding stack parsing
 *
 * The header lists codings in the order the origin applied them, so the
 * last token has to be removed first when decoding.
 */

export interface EncodingStack {
  /** Normalized tokens in declaration order, `identity` removed */
  readonly tokens: readonly string[];
}

/** Legacy names that RFC 9110 declares equivalent to a registered coding */
const TOKEN_ALIASES: Readonly<Record<string, string>> = {
  'x-gzip': 'gzip',
};

export const EMPTY_ENCODING_STACK: EncodingStack = Object.freeze({ tokens: Object.freeze([]) });

/**
 * Parse a Content-Encoding value.
 * Pass an array when the header appeared on several lines.
 */
export function parseEncodingStack(value: string | readonly string[] | null | undefined): EncodingStack {
  const raw = typeof value === 'string' ? value : value?.join(',');
  if (!raw) return EMPTY_ENCODING_STACK;

  const tokens: string[] = [];
  for (const part of raw.split(',')) {
    const token = part.trim().toLowerCase();
    if (!token || token === 'identity') continue;
    tokens.push(TOKEN_ALIASES[token] ?? token);
  }

  return tokens.length === 0 ? EMPTY_ENCODING_STACK : Object.freeze({ tokens: Object.freeze(tokens) });
}

/**
 * Tokens in the order they must be decoded (right to left)
 */
export function decodeOrder(stack: EncodingStack): string[] {
  return [...stack.tokens].reverse();
}

export function isEmptyStack(stack: EncodingStack): boolean {
  return stack.tokens.length === 0;
}
