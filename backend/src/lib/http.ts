import { HTTPException } from 'hono/http-exception';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type { ErrorKind, OperationResult } from '@medrun/shared';

const STATUS_BY_KIND: Record<ErrorKind, ContentfulStatusCode> = {
  EngineUnavailable: 503,
  ImageNotFound: 404,
  InvalidMount: 400,
  ImageInUse: 409,
  PullError: 502,
  CatalogUnreachable: 503,
  NotFound: 404,
  AlreadyTerminal: 409,
  InvalidRequest: 400,
  Internal: 500,
};

export function statusCodeFor(kind: ErrorKind): ContentfulStatusCode {
  return STATUS_BY_KIND[kind];
}

/**
 * HTTP error that carries the backend error kind into the response body
 */
export class OperationHTTPException extends HTTPException {
  constructor(
    public readonly kind: ErrorKind,
    message: string
  ) {
    super(statusCodeFor(kind), { message });
  }
}

/**
 * Return the data of a successful result or throw it as an HTTP error
 */
export function unwrap<T>(result: OperationResult<T>): T {
  if (!result.success) {
    throw new OperationHTTPException(result.error.kind, result.error.message);
  }
  return result.data;
}

/**
 * Engine executables named by an HTTP client would run on this host, so
 * they are refused unless the server was started with overrides enabled
 */
export function assertExecutableOverrideAllowed(allowed: boolean, field: string, present: boolean): void {
  if (present && !allowed) {
    throw new OperationHTTPException(
      'InvalidRequest',
      `${field} is not accepted over HTTP; start the server with ALLOW_EXECUTABLE_OVERRIDES=true to allow it`
    );
  }
}
