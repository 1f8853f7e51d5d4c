/**
 * Response Capture State Machine
 *
 * Owns one in-flight response while it is being buffered:
 *   idle -> headers-received -> buffering -> complete
 * `released` is entered from any phase once the buffers are dropped.
 */

import { ProtocolError } from '../types/errors.js';
import type { HeaderList } from './types.js';

export type CapturePhase = 'idle' | 'headers-received' | 'buffering' | 'complete' | 'released';

export class ResponseState {
  private _phase: CapturePhase = 'idle';
  private _status = 0;
  private _headers: HeaderList = [];
  private chunks: Uint8Array[] = [];
  private _byteLength = 0;

  get phase(): CapturePhase {
    return this._phase;
  }

  get status(): number {
    return this._status;
  }

  get headers(): HeaderList {
    return this._headers;
  }

  get started(): boolean {
    return this._phase !== 'idle';
  }

  /** No further chunks will be accepted */
  get complete(): boolean {
    return this._phase === 'complete';
  }

  get byteLength(): number {
    return this._byteLength;
  }

  get chunkCount(): number {
    return this.chunks.length;
  }

  /**
   * Record status and headers. A second call is a protocol violation.
   */
  start(status: number, headers: HeaderList): void {
    if (this._phase !== 'idle') {
      throw new ProtocolError('start', `response already started (phase: ${this._phase})`);
    }
    this._status = status;
    this._headers = headers;
    this._phase = 'headers-received';
  }

  /**
   * Append a body chunk; `moreBody=false` completes the response.
   */
  append(chunk: Uint8Array, moreBody: boolean): void {
    if (this._phase === 'idle') {
      throw new ProtocolError('body', 'body received before response start');
    }
    if (this._phase === 'complete' || this._phase === 'released') {
      throw new ProtocolError('body', `body received after the response was ${this._phase}`);
    }

    if (chunk.byteLength > 0) {
      this.chunks.push(chunk);
      this._byteLength += chunk.byteLength;
    }
    this._phase = moreBody ? 'buffering' : 'complete';
  }

  /**
   * All captured bytes as one buffer
   */
  body(): Buffer {
    return Buffer.concat(this.chunks, this._byteLength);
  }

  /**
   * Drop buffered chunks. Status and headers stay readable.
   */
  release(): void {
    this.chunks = [];
    this._byteLength = 0;
    this._phase = 'released';
  }
}
