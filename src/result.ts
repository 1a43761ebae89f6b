export type ErrorKind =
  | "insufficient_frames"
  | "incomparable_input"
  | "load_failed"
  | "service_error"
  | "timeout"
  | "unavailable";

export interface ServiceError {
  kind: ErrorKind;
  message: string;
}

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: ServiceError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T = never>(kind: ErrorKind, message: string): Result<T> {
  return { ok: false, error: { kind, message } };
}

/**
 * Wraps a caught value as a failed result. Errors that already carry a kind
 * (see TimeoutError) keep it.
 */
export function failFromError<T = never>(error: unknown, kind: ErrorKind = "service_error"): Result<T> {
  if (error instanceof TimeoutError) {
    return fail("timeout", error.message);
  }
  return fail(kind, error instanceof Error ? error.message : String(error));
}

export class TimeoutError extends Error {
  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs} ms`);
    this.name = "TimeoutError";
  }
}
