/**
 * Result type used across all domains
 * Fallible operations return a Result instead of throwing
 */

export type Result<T, E = Error> =
  | { ok: true; data: T }
  | { ok: false; error: E };

export const success = <T>(data: T): Result<T, never> => ({
  ok: true,
  data,
});

export const failure = <E>(error: E): Result<never, E> => ({
  ok: false,
  error,
});

/**
 * Message of an unknown thrown value
 */
export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
