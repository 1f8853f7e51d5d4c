/**
 * Shared test helpers for @devbar/core
 *
 * IMPORTANT: Because vi.mock() is hoisted to the top of each test file,
 * createMockLog() is used INSIDE vi.mock factories, not as a replacement
 * for vi.mock calls themselves. GET_LOG_MOCK can be handed to vi.mock as is.
 */

import { vi } from 'vitest';
import type { ILogService } from './services/log-service.js';
import { brotliCodec, createCodecRegistry, deflateCodec, gzipCodec, zstdCodec } from './encoding/codec-registry.js';
import type { CodecRegistry } from './encoding/codec-registry.js';
import {
  bodyEvent,
  startEvent,
  type HeaderList,
  type PipelineConfig,
  type ResponseBodyEvent,
  type ResponseEvent,
  type ResponseStartEvent,
} from './response/types.js';

// ---------------------------------------------------------------------------
// 1. Mock logger
// ---------------------------------------------------------------------------

/**
 * Create a mock ILogService.
 *
 * Every method is a fresh vi.fn(), including `child()` which returns
 * a new mock log (allowing nested child assertions).
 */
export function createMockLog(): ILogService {
  const log: ILogService = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    child: vi.fn(() => createMockLog()),
  };
  return log;
}

/**
 * Usage:
 *   vi.mock('../services/get-log.js', () => GET_LOG_MOCK);
 */
export const GET_LOG_MOCK = {
  getLog: () => createMockLog(),
} as const;

// ---------------------------------------------------------------------------
// 2. Pipeline fixtures
// ---------------------------------------------------------------------------

export const TEST_PIPELINE_CONFIG: PipelineConfig = {
  enabled: true,
  insertBefore: '</body>',
  excludePaths: ['/_debug_toolbar'],
  maxBodySize: 1024 * 1024,
};

/**
 * gzip, deflate and br from zlib; zstd known but not installed
 */
export function createTestRegistry(): CodecRegistry {
  return createCodecRegistry([gzipCodec, deflateCodec, brotliCodec(), zstdCodec(null)]);
}

/**
 * A downstream transport that records what it was sent.
 */
export function createEventCollector() {
  const events: ResponseEvent[] = [];
  const send = vi.fn(async (event: ResponseEvent) => {
    events.push(event);
  });

  return {
    events,
    send,
    starts(): ResponseStartEvent[] {
      return events.filter((e): e is ResponseStartEvent => e.type === 'http.response.start');
    },
    bodies(): ResponseBodyEvent[] {
      return events.filter((e): e is ResponseBodyEvent => e.type === 'http.response.body');
    },
    /** All body bytes sent, concatenated */
    body(): Buffer {
      return Buffer.concat(this.bodies().map((e) => e.body));
    },
  };
}

/**
 * Build the event sequence for a response whose body arrives in `chunks`
 */
export function responseEvents(status: number, headers: HeaderList, chunks: Array<string | Uint8Array>): ResponseEvent[] {
  const parts = chunks.length > 0 ? chunks : [''];
  return [
    startEvent(status, headers),
    ...parts.map((chunk, i) =>
      bodyEvent(typeof chunk === 'string' ? Buffer.from(chunk) : chunk, i < parts.length - 1)
    ),
  ];
}

export async function sendAll(send: (event: ResponseEvent) => Promise<void>, events: readonly ResponseEvent[]): Promise<void> {
  for (const event of events) {
    await send(event);
  }
}
