import { describe, it, expect } from 'vitest';
import { ResponseState } from './response-state.js';
import { ProtocolError } from '../types/errors.js';

describe('ResponseState', () => {
  it('walks idle -> headers-received -> buffering -> complete', () => {
    const state = new ResponseState();
    expect(state.phase).toBe('idle');
    expect(state.started).toBe(false);

    state.start(200, [['content-type', 'text/html']]);
    expect(state.phase).toBe('headers-received');
    expect(state.started).toBe(true);

    state.append(Buffer.from('<p>'), true);
    expect(state.phase).toBe('buffering');

    state.append(Buffer.from('hi</p>'), false);
    expect(state.phase).toBe('complete');
    expect(state.complete).toBe(true);
    expect(state.body().toString()).toBe('<p>hi</p>');
    expect(state.byteLength).toBe(9);
    expect(state.status).toBe(200);
  });

  it('rejects a second start', () => {
    const state = new ResponseState();
    state.start(200, []);
    expect(() => state.start(500, [])).toThrow(ProtocolError);
    expect(state.status).toBe(200);
  });

  it('rejects a body before start', () => {
    const state = new ResponseState();
    expect(() => state.append(Buffer.from('x'), false)).toThrow('body received before response start');
  });

  it('rejects chunks after completion', () => {
    const state = new ResponseState();
    state.start(200, []);
    state.append(Buffer.from('done'), false);
    expect(() => state.append(Buffer.from('more'), false)).toThrow(ProtocolError);
    expect(state.body().toString()).toBe('done');
  });

  it('does not store empty chunks', () => {
    const state = new ResponseState();
    state.start(200, []);
    state.append(new Uint8Array(0), true);
    state.append(Buffer.from('a'), true);
    state.append(new Uint8Array(0), false);
    expect(state.chunkCount).toBe(1);
  });

  it('releases buffers but keeps the head', () => {
    const state = new ResponseState();
    state.start(404, [['x-a', '1']]);
    state.append(Buffer.from('abc'), true);
    state.release();
    expect(state.phase).toBe('released');
    expect(state.byteLength).toBe(0);
    expect(state.body().byteLength).toBe(0);
    expect(state.headers).toEqual([['x-a', '1']]);
    expect(() => state.append(Buffer.from('late'), false)).toThrow('body received after the response was released');
  });
});
