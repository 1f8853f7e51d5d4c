/**
 * Response bridge
 *
 * Replays a Web Response as response events through an interceptor and
 * rebuilds what comes out as a new streaming Response.
 *
 * Upstream chunks are read eagerly until the interceptor emits its start
 * event (an eligible response is buffered in full before that). After the
 * start, reading is driven by the consumer: each pull on the new body reads
 * at most one upstream chunk, so a slow client slows the upstream down.
 */

import {
  bodyEvent,
  getErrorMessage,
  type HeaderList,
  type ILogService,
  type ResponseEvent,
  type ResponseStartEvent,
  type SendEvent,
} from '@devbar/core';
import { getLog } from '../services/log.js';

const log = getLog('ResponseBridge');

/**
 * Whatever sits between the upstream and the sink: the interceptor
 */
export interface ResponseEventConsumer {
  readonly send: SendEvent;
  cancel(): void;
}

const EMPTY = new Uint8Array(0);

/** Statuses a Response may not carry a body with */
const NULL_BODY_STATUSES = new Set([204, 205, 304]);

export function headersToList(headers: Headers): HeaderList {
  return [...headers];
}

export function listToHeaders(list: HeaderList): Headers {
  const headers = new Headers();
  for (const [name, value] of list) {
    headers.append(name, value);
  }
  return headers;
}

/**
 * Collects the events emitted downstream of the interceptor
 */
export class ResponseEventSink {
  private start: ResponseStartEvent | null = null;
  private readonly pending: Uint8Array[] = [];
  private ended = false;
  private readonly log: ILogService;

  constructor(log: ILogService = getLog('ResponseEventSink')) {
    this.log = log;
  }

  readonly send: SendEvent = async (event: ResponseEvent) => {
    if (event.type === 'http.response.start') {
      if (this.start) {
        this.log.warn('Ignoring a second response start', { status: event.status });
        return;
      }
      this.start = event;
      return;
    }

    if (!this.start || this.ended) {
      this.log.warn('Ignoring a response body outside the response', { bytes: event.body.byteLength });
      return;
    }
    if (event.body.byteLength > 0) this.pending.push(event.body);
    if (!event.moreBody) this.ended = true;
  };

  get head(): ResponseStartEvent | null {
    return this.start;
  }

  get isEnded(): boolean {
    return this.ended;
  }

  /** Next body chunk waiting to be written, if any */
  shift(): Uint8Array | undefined {
    return this.pending.shift();
  }
}

export interface ReplayOptions {
  /** Client disconnect signal, watched until the start event is known */
  signal?: AbortSignal;
}

/**
 * Feed `upstream` through `consumer` (whose send writes into `sink`) and
 * return the rebuilt Response once its start event is known.
 *
 * Resolves to null when `signal` aborts first: the consumer and the
 * upstream body are cancelled and nothing is sent.
 *
 * Errors reading the upstream body before the start propagate to the
 * caller; later ones error the returned body stream.
 */
export async function replayResponse(
  upstream: Response,
  consumer: ResponseEventConsumer,
  sink: ResponseEventSink,
  options: ReplayOptions = {}
): Promise<Response | null> {
  const { signal } = options;
  const reader = upstream.body?.getReader() ?? null;
  let upstreamDone = false;

  const cancelUpstream = async (reason: unknown): Promise<void> => {
    await reader?.cancel(reason).catch((cancelError: unknown) => {
      log.debug('Could not cancel upstream body', { error: getErrorMessage(cancelError) });
    });
  };

  // One upstream read forwarded as one body event.
  const pump = async (): Promise<void> => {
    if (upstreamDone) return;
    const result = reader ? await reader.read() : { done: true as const, value: undefined };
    if (result.done) {
      upstreamDone = true;
      await consumer.send(bodyEvent(EMPTY, false));
    } else {
      await consumer.send(bodyEvent(result.value, true));
    }
  };

  const drain = async (until: () => boolean): Promise<void> => {
    try {
      while (!until()) {
        await pump();
      }
    } catch (error) {
      consumer.cancel();
      await cancelUpstream(error);
      throw error;
    }
  };

  // Cancelling the reader settles a pending read as done, which ends the drain.
  const aborts: Array<Promise<void>> = [];
  const onAbort = (): void => {
    consumer.cancel();
    aborts.push(cancelUpstream(signal?.reason));
  };

  if (signal?.aborted) {
    onAbort();
  } else {
    signal?.addEventListener('abort', onAbort, { once: true });
  }

  try {
    await consumer.send({ type: 'http.response.start', status: upstream.status, headers: headersToList(upstream.headers) });
    await drain(() => aborts.length > 0 || sink.head !== null || upstreamDone);
  } finally {
    signal?.removeEventListener('abort', onAbort);
  }

  if (aborts.length > 0) {
    await Promise.all(aborts);
    return null;
  }

  const head = sink.head;
  if (!head) {
    throw new Error('Response pipeline finished without a response start');
  }

  if (NULL_BODY_STATUSES.has(head.status)) {
    await drain(() => upstreamDone);
    return new Response(null, { status: head.status, headers: listToHeaders(head.headers) });
  }

  const body = new ReadableStream<Uint8Array>(
    {
      async pull(controller) {
        for (;;) {
          const chunk = sink.shift();
          if (chunk) {
            controller.enqueue(chunk);
            return;
          }
          if (sink.isEnded || upstreamDone) {
            controller.close();
            return;
          }
          try {
            await pump();
          } catch (error) {
            consumer.cancel();
            log.warn('Upstream body failed mid-response', { error: getErrorMessage(error) });
            throw error;
          }
        }
      },
      async cancel(reason) {
        consumer.cancel();
        await reader?.cancel(reason);
      },
    },
    { highWaterMark: 0 }
  );

  return new Response(body, { status: head.status, headers: listToHeaders(head.headers) });
}
