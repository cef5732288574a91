export type ErrorKind =
  | 'EngineUnavailable'
  | 'ImageNotFound'
  | 'InvalidMount'
  | 'ImageInUse'
  | 'PullError'
  | 'CatalogUnreachable'
  | 'NotFound'
  | 'AlreadyTerminal'
  | 'InvalidRequest'
  | 'Internal';

export interface ErrorBody {
  error: {
    message: string;
    statusCode: number;
    kind?: ErrorKind;
  };
}

/**
 * Discriminated result returned by every public backend operation
 */
export type OperationResult<T> =
  | { success: true; data: T }
  | { success: false; error: { kind: ErrorKind; message: string } };
