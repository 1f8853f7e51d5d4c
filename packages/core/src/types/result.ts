/**
 * Result type for explicit error handling
 * Decoders and parsers return a Result instead of throwing, so fallback
 * paths are ordinary branches.
 */

export type Result<T, E = Error> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

/**
 * Create a successful result
 */
export function ok<T>(value: T): { readonly ok: true; readonly value: T } {
  return { ok: true, value };
}

/**
 * Create a failed result
 */
export function err<E>(error: E): { readonly ok: false; readonly error: E } {
  return { ok: false, error };
}

/**
 * Run a function that might throw and capture the outcome.
 * The mapper turns whatever was thrown into the error type.
 */
export function fromThrowable<T, E>(fn: () => T, errorMapper: (error: unknown) => E): Result<T, E> {
  try {
    return ok(fn());
  } catch (error) {
    return err(errorMapper(error));
  }
}
