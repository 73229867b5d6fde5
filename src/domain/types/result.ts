/**
 * Result Pattern
 * Discriminated union returned by cluster-facing calls instead of throwing
 */

export type Result<T> = { ok: true; value: T } | { ok: false; error: string };

export const Success = <T>(value: T): Result<T> => ({ ok: true, value });

export const Failure = <T>(error: string): Result<T> => ({ ok: false, error });

export const isOk = <T>(result: Result<T>): result is { ok: true; value: T } => result.ok;

export const isFail = <T>(result: Result<T>): result is { ok: false; error: string } => !result.ok;

/**
 * Render an unknown thrown value as a message for a Failure
 */
export const describeError = (error: unknown): string =>
  typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string'
    ? error.message
    : String(error);
