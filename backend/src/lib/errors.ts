import type { ErrorKind, OperationResult } from '@medrun/shared';

/**
 * Error raised by engines and services; the kind drives both the
 * discriminated result returned to callers and the HTTP status code.
 */
export class BackendError extends Error {
  constructor(
    public readonly kind: ErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'BackendError';
  }
}

export function isBackendError(error: unknown, kind?: ErrorKind): error is BackendError {
  return error instanceof BackendError && (kind === undefined || error.kind === kind);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Normalize anything thrown into a BackendError, keeping the original as cause
 */
export function toBackendError(error: unknown, fallback: ErrorKind = 'Internal'): BackendError {
  if (error instanceof BackendError) {
    return error;
  }
  return new BackendError(fallback, errorMessage(error) || 'Unknown error', { cause: error });
}

export function ok<T>(data: T): OperationResult<T> {
  return { success: true, data };
}

export function fail<T>(kind: ErrorKind, message: string): OperationResult<T> {
  return { success: false, error: { kind, message } };
}

/**
 * Run an operation and fold any thrown error into a failed result
 */
export async function toResult<T>(fn: () => Promise<T> | T): Promise<OperationResult<T>> {
  try {
    return ok(await fn());
  } catch (error) {
    const backendError = toBackendError(error);
    return fail(backendError.kind, backendError.message);
  }
}
