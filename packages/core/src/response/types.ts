/**
 * Response event types
 *
 * A response travels as one start event followed by body events, the last
 * of which has moreBody=false. The interceptor consumes and emits the same
 * shapes, so it can sit between any producer and transport that speak them.
 */

/** Header name/value pairs in the order declared; duplicates are kept */
export type HeaderList = ReadonlyArray<readonly [name: string, value: string]>;

export interface ResponseStartEvent {
  type: 'http.response.start';
  status: number;
  headers: HeaderList;
}

export interface ResponseBodyEvent {
  type: 'http.response.body';
  body: Uint8Array;
  moreBody: boolean;
}

export type ResponseEvent = ResponseStartEvent | ResponseBodyEvent;

export type SendEvent = (event: ResponseEvent) => Promise<void>;

/**
 * The settings the pipeline reads
 */
export interface PipelineConfig {
  /** false turns the interceptor into a plain forwarder */
  enabled: boolean;
  /** Fragment is inserted before the last occurrence of this string */
  insertBefore: string;
  /** Request path prefixes that are never intercepted */
  excludePaths: readonly string[];
  /** Largest body (encoded or decoded) that will be buffered */
  maxBodySize: number;
}

export function startEvent(status: number, headers: HeaderList): ResponseStartEvent {
  return { type: 'http.response.start', status, headers };
}

export function bodyEvent(body: Uint8Array, moreBody = false): ResponseBodyEvent {
  return { type: 'http.response.body', body, moreBody };
}
