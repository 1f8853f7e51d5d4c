/**
 * Response Interceptor
 *
 * Sits between an application that emits response events and the transport
 * that writes them. Eligible (HTML) responses are buffered to completion,
 * decoded, handed to the renderer for a fragment, injected and re-emitted
 * as one start event plus one final body event. Everything else is
 * forwarded event by event.
 *
 * Eligible path:   capturing -> rewriting -> done
 * Ineligible path: streaming -> done
 *
 * Internal failures never reach the transport: the captured response is
 * re-emitted unmodified instead. Errors thrown by the downstream `send`
 * are not caught, since a dead connection cannot be recovered here.
 */

import type { CodecRegistry } from '../encoding/codec-registry.js';
import { decompressCascade, settleOutcome } from '../encoding/cascade.js';
import { parseEncodingStack } from '../encoding/encoding-stack.js';
import type { ILogService } from '../services/log-service.js';
import { getLog } from '../services/get-log.js';
import { getErrorMessage } from '../types/errors.js';
import { checkEligibility, type Eligibility } from './eligibility.js';
import { getHeaderValues, rewriteHeaders } from './headers.js';
import { buildInjection } from './injection.js';
import { ResponseState } from './response-state.js';
import {
  bodyEvent,
  startEvent,
  type HeaderList,
  type PipelineConfig,
  type ResponseBodyEvent,
  type ResponseEvent,
  type ResponseStartEvent,
  type SendEvent,
} from './types.js';

export type InterceptorMode = 'pending' | 'capturing' | 'rewriting' | 'streaming' | 'done' | 'cancelled';

export type InterceptOutcome = 'rewritten' | 'passthrough' | 'streamed' | 'cancelled';

/** What the renderer gets once the body is complete and readable */
export interface FinalizedBody {
  status: number;
  headers: HeaderList;
  text: string;
  /** Content-codings that were removed to get `text` */
  encodings: readonly string[];
}

export interface ResponseInterceptorOptions {
  /** Downstream transport */
  send: SendEvent;
  request: { path: string; method?: string };
  config: PipelineConfig;
  registry: CodecRegistry;
  /** Produces the HTML fragment to inject */
  renderFragment: (body: FinalizedBody) => string | Promise<string>;
  /** Applied to streamed and rewritten responses, never to fallbacks */
  decorateHeaders?: (headers: HeaderList) => HeaderList | Promise<HeaderList>;
  log?: ILogService;
}

interface Emission {
  start: ResponseStartEvent;
  body: ResponseBodyEvent;
  outcome: InterceptOutcome;
}

interface CapturedResponse {
  status: number;
  headers: HeaderList;
  body: Buffer;
}

function unmodified(captured: CapturedResponse): Emission {
  return {
    start: startEvent(captured.status, captured.headers),
    body: bodyEvent(captured.body, false),
    outcome: 'passthrough',
  };
}

export class ResponseInterceptor {
  private readonly options: ResponseInterceptorOptions;
  private readonly log: ILogService;
  private readonly state = new ResponseState();
  private _mode: InterceptorMode = 'pending';
  private _outcome: InterceptOutcome | undefined;
  private _eligibility: Eligibility | undefined;

  /** Upstream-facing send: hand every response event to this */
  readonly send: SendEvent = (event) => this.handle(event);

  constructor(options: ResponseInterceptorOptions) {
    this.options = options;
    this.log = options.log ?? getLog('Interceptor');
  }

  get mode(): InterceptorMode {
    return this._mode;
  }

  /** Set once the response has been fully emitted, or cancelled */
  get outcome(): InterceptOutcome | undefined {
    return this._outcome;
  }

  get eligibility(): Eligibility | undefined {
    return this._eligibility;
  }

  /**
   * Client went away: drop buffers and never write again
   */
  cancel(): void {
    if (this._mode === 'cancelled') return;
    if (this._mode !== 'done') {
      this._outcome = 'cancelled';
    }
    this._mode = 'cancelled';
    this.state.release();
  }

  private async handle(event: ResponseEvent): Promise<void> {
    if (this._mode === 'cancelled') return;
    if (event.type === 'http.response.start') {
      await this.onStart(event);
    } else {
      await this.onBody(event);
    }
  }

  // ===========================================================================
  // Event handlers
  // ===========================================================================

  private async onStart(event: ResponseStartEvent): Promise<void> {
    if (this._mode === 'capturing') {
      this.log.warn('Second response start while buffering, sending captured response unmodified', {
        path: this.options.request.path,
        status: event.status,
      });
      await this.fallBackToStreaming();
      return;
    }
    if (this._mode !== 'pending') {
      this.log.warn('Dropping response start received after the response began', {
        path: this.options.request.path,
        mode: this._mode,
      });
      return;
    }

    const eligibility = this.decide(event);
    this._eligibility = eligibility;

    if (!eligibility.eligible) {
      this._mode = 'streaming';
      const headers = await this.decorate(event.headers);
      await this.emit(startEvent(event.status, headers));
      return;
    }

    this.state.start(event.status, event.headers);
    this._mode = 'capturing';
  }

  private async onBody(event: ResponseBodyEvent): Promise<void> {
    switch (this._mode) {
      case 'streaming':
        if (!event.moreBody) {
          this._mode = 'done';
          this._outcome ??= 'streamed';
        }
        await this.emit(event);
        return;

      case 'capturing':
        break;

      default:
        this.log.warn('Dropping out-of-order response body', {
          path: this.options.request.path,
          mode: this._mode,
          bytes: event.body.byteLength,
        });
        return;
    }

    this.state.append(event.body, event.moreBody);

    if (this.state.byteLength > this.options.config.maxBodySize) {
      this.log.warn('Response body exceeds the buffering limit, streaming it unmodified', {
        path: this.options.request.path,
        limit: this.options.config.maxBodySize,
        buffered: this.state.byteLength,
      });
      await this.fallBackToStreaming();
      return;
    }

    if (this.state.complete) {
      await this.finalize();
    }
  }

  // ===========================================================================
  // Decisions
  // ===========================================================================

  private decide(event: ResponseStartEvent): Eligibility {
    try {
      return checkEligibility(
        {
          path: this.options.request.path,
          method: this.options.request.method,
          status: event.status,
          headers: event.headers,
        },
        this.options.config
      );
    } catch (error) {
      this.log.error('Eligibility check failed, streaming response unmodified', { error: getErrorMessage(error) });
      return { eligible: false, reason: 'not-html' };
    }
  }

  private async decorate(headers: HeaderList): Promise<HeaderList> {
    if (!this.options.decorateHeaders) return headers;
    try {
      return await this.options.decorateHeaders(headers);
    } catch (error) {
      this.log.error('Header decoration failed, keeping original headers', { error: getErrorMessage(error) });
      return headers;
    }
  }

  // ===========================================================================
  // Emission
  // ===========================================================================

  /**
   * Flush whatever was captured, unmodified, and forward the rest as it comes
   */
  private async fallBackToStreaming(): Promise<void> {
    const complete = this.state.complete;
    const captured: CapturedResponse = {
      status: this.state.status,
      headers: this.state.headers,
      body: this.state.body(),
    };
    this.state.release();

    this._mode = complete ? 'done' : 'streaming';
    this._outcome = 'passthrough';
    await this.emit(startEvent(captured.status, captured.headers));
    await this.emit(bodyEvent(captured.body, !complete));
  }

  private async finalize(): Promise<void> {
    const captured: CapturedResponse = {
      status: this.state.status,
      headers: this.state.headers,
      body: this.state.body(),
    };
    this.state.release();
    this._mode = 'rewriting';

    let emission: Emission;
    try {
      emission = await this.rewrite(captured);
    } catch (error) {
      this.log.error('Toolbar injection failed, sending original response', {
        path: this.options.request.path,
        error: getErrorMessage(error),
      });
      emission = unmodified(captured);
    }

    // Cancelled while the fragment was rendering.
    if (this.isCancelled()) return;

    this._mode = 'done';
    this._outcome = emission.outcome;
    await this.emit(emission.start);
    await this.emit(emission.body);
  }

  private async rewrite(captured: CapturedResponse): Promise<Emission> {
    const { config, registry } = this.options;
    const stack = parseEncodingStack(getHeaderValues(captured.headers, 'content-encoding'));
    const outcome = settleOutcome(
      decompressCascade(stack, captured.body, registry, { maxDecodedSize: config.maxBodySize }),
      captured.body,
      this.log
    );
    if (outcome.kind === 'passthrough') {
      return unmodified(captured);
    }

    const fragment = await this.options.renderFragment({
      status: captured.status,
      headers: captured.headers,
      text: outcome.text,
      encodings: outcome.encodings,
    });
    const injection = buildInjection(outcome.text, fragment, config.insertBefore, outcome.encodings);
    const headers = await this.decorate(rewriteHeaders(captured.headers, injection));

    return {
      start: startEvent(captured.status, headers),
      body: bodyEvent(injection.body, false),
      outcome: 'rewritten',
    };
  }

  private isCancelled(): boolean {
    return this._mode === 'cancelled';
  }

  private async emit(event: ResponseEvent): Promise<void> {
    if (this.isCancelled()) return;
    await this.options.send(event);
  }
}

export function createResponseInterceptor(options: ResponseInterceptorOptions): ResponseInterceptor {
  return new ResponseInterceptor(options);
}
