import { describe, it, expect, vi } from 'vitest';
import zlib from 'node:zlib';
import { createResponseInterceptor, type FinalizedBody, type ResponseInterceptorOptions } from './interceptor.js';
import { bodyEvent, startEvent, type HeaderList } from './types.js';
import { getHeader, parseContentLength } from './headers.js';
import {
  TEST_PIPELINE_CONFIG,
  createEventCollector,
  createMockLog,
  createTestRegistry,
  responseEvents,
  sendAll,
} from '../test-helpers.js';

const page = '<html><body>Hi</body></html>';
const fragment = '<div>X</div>';
const injected = '<html><body>Hi<div>X</div></body></html>';
const htmlHeaders: HeaderList = [['content-type', 'text/html; charset=utf-8']];

function setup(overrides: Partial<ResponseInterceptorOptions> = {}) {
  const collector = createEventCollector();
  const log = createMockLog();
  const renderFragment = vi.fn((_body: FinalizedBody): string | Promise<string> => fragment);
  const interceptor = createResponseInterceptor({
    send: collector.send,
    request: { path: '/', method: 'GET' },
    config: TEST_PIPELINE_CONFIG,
    registry: createTestRegistry(),
    renderFragment,
    log,
    ...overrides,
  });
  return { interceptor, collector, log, renderFragment };
}

describe('ResponseInterceptor', () => {
  describe('rewriting', () => {
    it('injects the fragment before the closing body tag', async () => {
      const { interceptor, collector } = setup();
      await sendAll(
        interceptor.send,
        responseEvents(200, [...htmlHeaders, ['content-length', '28']], ['<html><body>', 'Hi</body></html>'])
      );

      expect(collector.events).toHaveLength(2);
      expect(collector.starts()[0]).toEqual(
        startEvent(200, [
          ['content-type', 'text/html; charset=utf-8'],
          ['content-length', '40'],
        ])
      );
      expect(collector.bodies()[0]?.moreBody).toBe(false);
      expect(collector.body().toString('utf8')).toBe(injected);
      expect(interceptor.outcome).toBe('rewritten');
      expect(interceptor.mode).toBe('done');
    });

    it('hands the renderer the decoded body', async () => {
      const { interceptor, renderFragment } = setup();
      await sendAll(interceptor.send, responseEvents(201, htmlHeaders, [page]));

      expect(renderFragment).toHaveBeenCalledTimes(1);
      expect(renderFragment).toHaveBeenCalledWith({
        status: 201,
        headers: htmlHeaders,
        text: page,
        encodings: [],
      });
    });

    it('decodes gzip and drops Content-Encoding', async () => {
      const { interceptor, collector } = setup();
      const compressed = zlib.gzipSync(page);
      await sendAll(
        interceptor.send,
        responseEvents(
          200,
          [
            ['content-type', 'text/html'],
            ['content-encoding', 'gzip'],
            ['content-length', String(compressed.byteLength)],
            ['vary', 'Accept-Encoding'],
          ],
          [compressed]
        )
      );

      expect(collector.starts()[0]?.headers).toEqual([
        ['content-type', 'text/html'],
        ['vary', 'Accept-Encoding'],
        ['content-length', '40'],
      ]);
      expect(collector.body().toString('utf8')).toBe(injected);
    });

    it('decodes a stacked encoding sent in chunks without a declared length', async () => {
      const { interceptor, collector } = setup();
      const compressed = zlib.brotliCompressSync(zlib.gzipSync(page));
      const half = Math.floor(compressed.byteLength / 2);
      await sendAll(
        interceptor.send,
        responseEvents(
          200,
          [
            ['content-type', 'text/html'],
            ['content-encoding', 'gzip, br'],
            ['transfer-encoding', 'chunked'],
          ],
          [compressed.subarray(0, half), compressed.subarray(half)]
        )
      );

      const headers = collector.starts()[0]?.headers ?? [];
      expect(getHeader(headers, 'content-encoding')).toBeUndefined();
      expect(getHeader(headers, 'transfer-encoding')).toBeUndefined();
      expect(parseContentLength(headers)).toBe(collector.body().byteLength);
      expect(collector.body().toString('utf8')).toBe(injected);
    });

    it('appends the fragment when the marker is missing', async () => {
      const { interceptor, collector } = setup();
      await sendAll(interceptor.send, responseEvents(200, htmlHeaders, ['<p>partial']));
      expect(collector.body().toString('utf8')).toBe('<p>partial<div>X</div>');
    });

    it('counts multi-byte characters in Content-Length', async () => {
      const { interceptor, collector } = setup({ renderFragment: () => '<b>ü</b>' });
      await sendAll(interceptor.send, responseEvents(200, htmlHeaders, ['<body>é</body>']));

      expect(collector.body().toString('utf8')).toBe('<body>é<b>ü</b></body>');
      expect(parseContentLength(collector.starts()[0]?.headers ?? [])).toBe(24);
    });

    it('decorates the rewritten headers', async () => {
      const { interceptor, collector } = setup({
        decorateHeaders: (headers) => [...headers, ['server-timing', 'total;dur=1']],
      });
      await sendAll(interceptor.send, responseEvents(200, htmlHeaders, [page]));

      expect(collector.starts()[0]?.headers).toEqual([
        ['content-type', 'text/html; charset=utf-8'],
        ['content-length', '40'],
        ['server-timing', 'total;dur=1'],
      ]);
    });
  });

  describe('failure containment', () => {
    it('passes a zstd body through byte for byte when no decoder is installed', async () => {
      const { interceptor, collector, log, renderFragment } = setup();
      const body = Buffer.from([0x28, 0xb5, 0x2f, 0xfd, 0x01, 0x02, 0x03]);
      const headers: HeaderList = [
        ['content-type', 'text/html'],
        ['content-encoding', 'zstd'],
        ['content-length', '7'],
      ];
      await sendAll(interceptor.send, responseEvents(200, headers, [body]));

      expect(collector.starts()[0]).toEqual(startEvent(200, headers));
      expect(collector.body().equals(body)).toBe(true);
      expect(renderFragment).not.toHaveBeenCalled();
      expect(log.debug).toHaveBeenCalledWith('Leaving response body untouched', {
        reason: 'codec-unavailable',
        encoding: 'zstd',
        message: 'no decoder installed for "zstd"',
      });
      expect(interceptor.outcome).toBe('passthrough');
    });

    it('passes a corrupted gzip body through', async () => {
      const { interceptor, collector, log } = setup();
      const body = Buffer.from('definitely not gzip');
      const headers: HeaderList = [
        ['content-type', 'text/html'],
        ['content-encoding', 'gzip'],
      ];
      await sendAll(interceptor.send, responseEvents(200, headers, [body]));

      expect(collector.starts()[0]?.headers).toEqual(headers);
      expect(collector.body().equals(body)).toBe(true);
      expect(log.warn).toHaveBeenCalledWith(
        'Could not decode response body, passing it through',
        expect.objectContaining({ reason: 'malformed', encoding: 'gzip' })
      );
    });

    it('passes a body through when decoding would outgrow the limit', async () => {
      const { interceptor, collector, log } = setup({ config: { ...TEST_PIPELINE_CONFIG, maxBodySize: 100 } });
      const body = zlib.gzipSync('a'.repeat(1000));
      await sendAll(
        interceptor.send,
        responseEvents(200, [['content-type', 'text/html'], ['content-encoding', 'gzip']], [body])
      );

      expect(collector.body().equals(body)).toBe(true);
      expect(log.warn).toHaveBeenCalledWith(
        'Could not decode response body, passing it through',
        expect.objectContaining({ reason: 'too-large', encoding: 'gzip' })
      );
    });

    it('passes a body that is not UTF-8 through', async () => {
      const { interceptor, collector, renderFragment } = setup();
      const body = Buffer.from([0xff, 0xfe, 0x3c]);
      await sendAll(interceptor.send, responseEvents(200, htmlHeaders, [body]));

      expect(collector.body().equals(body)).toBe(true);
      expect(renderFragment).not.toHaveBeenCalled();
      expect(interceptor.outcome).toBe('passthrough');
    });

    it('sends the original response when rendering throws', async () => {
      const { interceptor, collector, log } = setup({
        renderFragment: () => {
          throw new Error('boom');
        },
      });
      await sendAll(interceptor.send, responseEvents(200, [...htmlHeaders, ['content-length', '28']], [page]));

      expect(collector.starts()[0]?.headers).toEqual([...htmlHeaders, ['content-length', '28']]);
      expect(collector.body().toString('utf8')).toBe(page);
      expect(log.error).toHaveBeenCalledWith('Toolbar injection failed, sending original response', {
        path: '/',
        error: 'boom',
      });
      expect(interceptor.outcome).toBe('passthrough');
    });

    it('does not decorate a fallback response', async () => {
      const decorateHeaders = vi.fn((headers: HeaderList) => [...headers, ['x-extra', '1'] as const]);
      const { interceptor, collector } = setup({
        decorateHeaders,
        renderFragment: () => Promise.reject(new Error('render failed')),
      });
      await sendAll(interceptor.send, responseEvents(200, htmlHeaders, [page]));

      expect(collector.starts()[0]?.headers).toEqual(htmlHeaders);
      expect(decorateHeaders).not.toHaveBeenCalled();
    });

    it('propagates transport errors', async () => {
      const send = vi.fn(async () => {
        throw new Error('socket closed');
      });
      const { interceptor } = setup({ send });
      await expect(interceptor.send(startEvent(200, [['content-type', 'application/json']]))).rejects.toThrow(
        'socket closed'
      );
    });
  });

  describe('pass-through', () => {
    it('forwards non-HTML responses event by event', async () => {
      const { interceptor, collector, renderFragment } = setup();
      const events = responseEvents(200, [['content-type', 'application/json']], ['{"a":', '1}']);
      await sendAll(interceptor.send, events);

      expect(collector.events).toEqual(events);
      expect(renderFragment).not.toHaveBeenCalled();
      expect(interceptor.outcome).toBe('streamed');
      expect(interceptor.eligibility).toEqual({ eligible: false, reason: 'not-html' });
    });

    it('forwards excluded paths untouched', async () => {
      const { interceptor, collector } = setup({ request: { path: '/_debug_toolbar/api/requests' } });
      const events = responseEvents(200, htmlHeaders, [page]);
      await sendAll(interceptor.send, events);

      expect(collector.events).toEqual(events);
      expect(interceptor.eligibility).toEqual({ eligible: false, reason: 'excluded-path' });
    });

    it('forwards everything when disabled', async () => {
      const { interceptor, collector } = setup({ config: { ...TEST_PIPELINE_CONFIG, enabled: false } });
      const events = responseEvents(200, htmlHeaders, [page]);
      await sendAll(interceptor.send, events);
      expect(collector.events).toEqual(events);
    });

    it('decorates streamed response headers', async () => {
      const { interceptor, collector } = setup({
        decorateHeaders: (headers) => [...headers, ['server-timing', 'total;dur=2']],
      });
      await sendAll(interceptor.send, responseEvents(200, [['content-type', 'text/css']], ['a{}']));

      expect(collector.starts()[0]?.headers).toEqual([
        ['content-type', 'text/css'],
        ['server-timing', 'total;dur=2'],
      ]);
      expect(collector.body().toString()).toBe('a{}');
    });

    it('streams a response whose declared length is over the limit', async () => {
      const { interceptor, collector } = setup({ config: { ...TEST_PIPELINE_CONFIG, maxBodySize: 10 } });
      const events = responseEvents(200, [...htmlHeaders, ['content-length', '28']], [page]);
      await sendAll(interceptor.send, events);

      expect(collector.events).toEqual(events);
      expect(interceptor.eligibility).toEqual({ eligible: false, reason: 'too-large' });
    });

    it('switches to streaming once the buffer outgrows the limit', async () => {
      const { interceptor, collector, log } = setup({ config: { ...TEST_PIPELINE_CONFIG, maxBodySize: 10 } });
      await sendAll(interceptor.send, responseEvents(200, htmlHeaders, ['aaaaaaa', 'bbbbbbb', 'c']));

      expect(collector.events).toEqual([
        startEvent(200, htmlHeaders),
        bodyEvent(Buffer.from('aaaaaaabbbbbbb'), true),
        bodyEvent(Buffer.from('c'), false),
      ]);
      expect(interceptor.outcome).toBe('passthrough');
      expect(log.warn).toHaveBeenCalledWith('Response body exceeds the buffering limit, streaming it unmodified', {
        path: '/',
        limit: 10,
        buffered: 14,
      });
    });
  });

  describe('protocol violations', () => {
    it('flushes the capture unmodified on a second start', async () => {
      const { interceptor, collector, log } = setup();
      await interceptor.send(startEvent(200, htmlHeaders));
      await interceptor.send(bodyEvent(Buffer.from('ab'), true));
      await interceptor.send(startEvent(500, []));
      await interceptor.send(bodyEvent(Buffer.from('c'), false));

      expect(collector.events).toEqual([
        startEvent(200, htmlHeaders),
        bodyEvent(Buffer.from('ab'), true),
        bodyEvent(Buffer.from('c'), false),
      ]);
      expect(log.warn).toHaveBeenCalledWith(
        'Second response start while buffering, sending captured response unmodified',
        { path: '/', status: 500 }
      );
      expect(interceptor.outcome).toBe('passthrough');
    });

    it('drops a body that arrives before the start', async () => {
      const { interceptor, collector, log } = setup();
      await interceptor.send(bodyEvent(Buffer.from('early'), false));

      expect(collector.events).toEqual([]);
      expect(log.warn).toHaveBeenCalledWith('Dropping out-of-order response body', {
        path: '/',
        mode: 'pending',
        bytes: 5,
      });
    });

    it('drops events after the response finished', async () => {
      const { interceptor, collector, log } = setup();
      await sendAll(interceptor.send, responseEvents(200, htmlHeaders, [page]));
      await interceptor.send(bodyEvent(Buffer.from('late'), false));
      await interceptor.send(startEvent(200, htmlHeaders));

      expect(collector.events).toHaveLength(2);
      expect(log.warn).toHaveBeenCalledWith('Dropping response start received after the response began', {
        path: '/',
        mode: 'done',
      });
    });
  });

  describe('cancellation', () => {
    it('sends nothing once cancelled while buffering', async () => {
      const { interceptor, collector, renderFragment } = setup();
      await interceptor.send(startEvent(200, htmlHeaders));
      await interceptor.send(bodyEvent(Buffer.from('<body>'), true));
      interceptor.cancel();
      await interceptor.send(bodyEvent(Buffer.from('</body>'), false));

      expect(collector.events).toEqual([]);
      expect(renderFragment).not.toHaveBeenCalled();
      expect(interceptor.mode).toBe('cancelled');
      expect(interceptor.outcome).toBe('cancelled');
    });

    it('discards the rewrite when cancelled while rendering', async () => {
      let resolveFragment: (value: string) => void = () => {};
      const { interceptor, collector } = setup({
        renderFragment: () =>
          new Promise<string>((resolve) => {
            resolveFragment = resolve;
          }),
      });
      await interceptor.send(startEvent(200, htmlHeaders));
      const pending = interceptor.send(bodyEvent(Buffer.from(page), false));
      interceptor.cancel();
      resolveFragment(fragment);
      await pending;

      expect(collector.events).toEqual([]);
      expect(interceptor.outcome).toBe('cancelled');
    });

    it('keeps the outcome of a finished response', async () => {
      const { interceptor } = setup();
      await sendAll(interceptor.send, responseEvents(200, htmlHeaders, [page]));
      interceptor.cancel();
      expect(interceptor.outcome).toBe('rewritten');
    });
  });
});
