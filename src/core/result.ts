import { BackendInvocationError } from './errors.js';

/**
 * Explicit success/error variant returned across backend boundaries
 */
export type BackendResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: BackendInvocationError };

export function ok<T>(value: T): BackendResult<T> {
  return { ok: true, value };
}

export function fail<T = never>(error: BackendInvocationError): BackendResult<T> {
  return { ok: false, error };
}
