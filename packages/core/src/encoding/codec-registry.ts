/**
 * Codec Registry
 *
 * Maps content-coding tokens to decoders. gzip and deflate are always
 * present; br and zstd depend on what the runtime (or an optional package)
 * provides and are detected once at startup. A token the registry has never
 * heard of is "unknown"; a token it knows but cannot decode here is
 * "unavailable". Callers treat the two differently.
 */

import zlib from 'node:zlib';
import { DecodeError, getErrorMessage } from '../types/errors.js';
import { err, fromThrowable, type Result } from '../types/result.js';
import { getLog } from '../services/get-log.js';

const log = getLog('CodecRegistry');

export interface DecodeOptions {
  /** Abort once the decoded output would exceed this many bytes */
  maxOutputLength?: number;
}

export interface Codec {
  readonly name: string;
  /** Optional codecs may be missing from a given install */
  readonly optional: boolean;
  readonly available: boolean;
  /** Throws on malformed input */
  decode(data: Uint8Array, options?: DecodeOptions): Buffer;
  encode?(data: Uint8Array): Buffer;
}

export type CodecLookup =
  | { readonly status: 'available'; readonly codec: Codec }
  | { readonly status: 'unavailable'; readonly name: string }
  | { readonly status: 'unknown'; readonly name: string };

type ZstdDecompress = (data: Uint8Array) => Uint8Array;

function zlibOptions(options?: DecodeOptions): { maxOutputLength?: number } {
  return options?.maxOutputLength !== undefined ? { maxOutputLength: options.maxOutputLength } : {};
}

function assertWithinLimit(output: Uint8Array, options?: DecodeOptions): void {
  if (options?.maxOutputLength !== undefined && output.byteLength > options.maxOutputLength) {
    throw new RangeError(`decoded output exceeds ${options.maxOutputLength} bytes`);
  }
}

function isOutputLimitError(error: unknown): boolean {
  if (error instanceof RangeError) return true;
  return error instanceof Error && 'code' in error && error.code === 'ERR_BUFFER_TOO_LARGE';
}

// =============================================================================
// Built-in codecs
// =============================================================================

export const gzipCodec: Codec = {
  name: 'gzip',
  optional: false,
  available: true,
  decode: (data, options) => zlib.gunzipSync(data, zlibOptions(options)),
  encode: (data) => zlib.gzipSync(data),
};

export const deflateCodec: Codec = {
  name: 'deflate',
  optional: false,
  available: true,
  decode(data, options) {
    // HTTP "deflate" is meant to be zlib-wrapped, but some servers send raw deflate.
    try {
      return zlib.inflateSync(data, zlibOptions(options));
    } catch (error) {
      if (isOutputLimitError(error)) throw error;
      return zlib.inflateRawSync(data, zlibOptions(options));
    }
  },
  encode: (data) => zlib.deflateSync(data),
};

export function brotliCodec(): Codec {
  const available = typeof zlib.brotliDecompressSync === 'function';
  return {
    name: 'br',
    optional: true,
    available,
    decode: (data, options) => zlib.brotliDecompressSync(data, zlibOptions(options)),
    encode: (data) => zlib.brotliCompressSync(data),
  };
}

export function zstdCodec(decompress: ZstdDecompress | null): Codec {
  return {
    name: 'zstd',
    optional: true,
    available: decompress !== null,
    decode(data, options) {
      if (!decompress) throw new Error('zstd support is not installed');
      const output = decompress(data);
      assertWithinLimit(output, options);
      return Buffer.from(output.buffer, output.byteOffset, output.byteLength);
    },
  };
}

// =============================================================================
// Registry
// =============================================================================

export class CodecRegistry {
  private readonly codecs: ReadonlyMap<string, Codec>;

  constructor(codecs: readonly Codec[]) {
    this.codecs = new Map(codecs.map((codec) => [codec.name, codec]));
  }

  lookup(token: string): CodecLookup {
    const name = token.toLowerCase();
    const codec = this.codecs.get(name);
    if (!codec) return { status: 'unknown', name };
    if (!codec.available) return { status: 'unavailable', name };
    return { status: 'available', codec };
  }

  isKnown(token: string): boolean {
    return this.codecs.has(token.toLowerCase());
  }

  isAvailable(token: string): boolean {
    return this.lookup(token).status === 'available';
  }

  /**
   * Decode one layer. Unknown and unavailable tokens are reported as
   * errors too; use lookup() first when the distinction matters.
   */
  decode(token: string, data: Uint8Array, options?: DecodeOptions): Result<Buffer, DecodeError> {
    const found = this.lookup(token);
    if (found.status !== 'available') {
      return err(new DecodeError(token, `codec is ${found.status}`));
    }

    const { codec } = found;
    return fromThrowable(
      () => codec.decode(data, options),
      (error) =>
        new DecodeError(codec.name, getErrorMessage(error), {
          kind: isOutputLimitError(error) ? 'too-large' : 'malformed',
          cause: error,
        })
    );
  }

  /**
   * Compress with a codec that supports it (used by tests and tooling)
   */
  encode(token: string, data: Uint8Array): Buffer | undefined {
    const found = this.lookup(token);
    return found.status === 'available' ? found.codec.encode?.(data) : undefined;
  }

  names(): string[] {
    return [...this.codecs.keys()];
  }

  /** Snapshot of which known codings can be decoded here */
  availability(): Record<string, boolean> {
    const result: Record<string, boolean> = {};
    for (const [name, codec] of this.codecs) {
      result[name] = codec.available;
    }
    return result;
  }
}

export function createCodecRegistry(codecs: readonly Codec[]): CodecRegistry {
  return new CodecRegistry(codecs);
}

// =============================================================================
// Startup probing
// =============================================================================

export interface DetectOptions {
  /** Loader for the optional zstd package; injectable for tests */
  loadZstd?: () => Promise<{ decompress: ZstdDecompress }>;
}

/**
 * Detect optional codec libraries and build the codec list
 */
export async function detectCodecs(options: DetectOptions = {}): Promise<Codec[]> {
  const loadZstd = options.loadZstd ?? (() => import('fzstd'));

  let decompress: ZstdDecompress | null = null;
  try {
    const mod = await loadZstd();
    decompress = (data) => mod.decompress(data);
  } catch (error) {
    log.debug('zstd decoder not installed, zstd responses will pass through', {
      error: error instanceof Error ? error.message : String(error),
    });
  }

  return [gzipCodec, deflateCodec, brotliCodec(), zstdCodec(decompress)];
}

let registryPromise: Promise<CodecRegistry> | null = null;

/**
 * Process-wide registry. Detects once; later calls share the same promise.
 */
export function initCodecRegistry(): Promise<CodecRegistry> {
  if (!registryPromise) {
    registryPromise = detectCodecs().then(createCodecRegistry);
  }
  return registryPromise;
}
