import type { ServiceError } from './errors.js';

/**
 * Outcome of every store- and generation-facing call. Failures carry a typed
 * error so callers can tell "no data" apart from "the call failed".
 */
export type Result<T, E = ServiceError> =
  | { success: true; data: T }
  | { success: false; error: E };

export function ok<T>(data: T): Result<T, never> {
  return { success: true, data };
}

export function fail<E>(error: E): Result<never, E> {
  return { success: false, error };
}
