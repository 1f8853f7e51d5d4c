/**
 * Structured error classes for the toolbar
 * All errors are serializable and include metadata
 */

/**
 * Base application error with structured metadata
 */
export abstract class AppError extends Error {
  abstract readonly code: string;
  abstract readonly statusCode: number;
  readonly timestamp: Date = new Date();
  override readonly cause?: unknown;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message);
    this.name = this.constructor.name;
    this.cause = options?.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

/**
 * Compressed body could not be reversed for one content-coding.
 * `too-large` means the output outgrew the allowed size, not that the input was bad.
 */
export class DecodeError extends AppError {
  readonly code = 'DECODE_ERROR' as const;
  readonly statusCode = 500;
  readonly encoding: string;
  readonly kind: 'malformed' | 'too-large';

  constructor(
    encoding: string,
    message: string,
    options?: { kind?: 'malformed' | 'too-large'; cause?: unknown }
  ) {
    super(`Cannot decode ${encoding} body: ${message}`, options);
    this.encoding = encoding;
    this.kind = options?.kind ?? 'malformed';
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      encoding: this.encoding,
      kind: this.kind,
    };
  }
}

/**
 * Response events arrived in an order the streaming contract forbids
 * (second start, body before start, body after the final chunk)
 */
export class ProtocolError extends AppError {
  readonly code = 'PROTOCOL_ERROR' as const;
  readonly statusCode = 500;
  readonly event: 'start' | 'body';

  constructor(event: 'start' | 'body', message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.event = event;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      event: this.event,
    };
  }
}

/**
 * Validation error - invalid configuration or input
 */
export class ValidationError extends AppError {
  readonly code = 'VALIDATION_ERROR' as const;
  readonly statusCode = 400;
  readonly errors?: ReadonlyArray<{ path: string[]; message: string }>;

  constructor(
    message: string,
    options?: {
      errors?: ReadonlyArray<{ path: string[]; message: string }>;
      cause?: unknown;
    }
  ) {
    super(message, options);
    this.errors = options?.errors;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      errors: this.errors,
    };
  }
}

/**
 * Not found error - resource doesn't exist
 */
export class NotFoundError extends AppError {
  readonly code = 'NOT_FOUND' as const;
  readonly statusCode = 404;
  readonly resource: string;
  readonly id: string;

  constructor(resource: string, id: string, options?: { cause?: unknown }) {
    super(`${resource} not found: ${id}`, options);
    this.resource = resource;
    this.id = id;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      resource: this.resource,
      id: this.id,
    };
  }
}

/**
 * Check if an error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Extract error message from an unknown catch value.
 * With a fallback, returns the fallback for non-Error values.
 */
export function getErrorMessage(error: unknown, fallback?: string): string {
  return error instanceof Error ? error.message : (fallback ?? String(error));
}
