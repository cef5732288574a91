import logger from './logger';

export interface RetryOptions {
  /** Maximum number of retry attempts (default: 2) */
  maxRetries?: number;
  /** Initial delay in milliseconds (default: 500) */
  initialDelayMs?: number;
  /** Maximum delay in milliseconds (default: 5000) */
  maxDelayMs?: number;
  /** Exponential backoff factor (default: 2) */
  backoffFactor?: number;
  /** Function to determine if error is retryable (default: transient HTTP/network errors) */
  isRetryable?: (error: unknown) => boolean;
  /** Operation name for logging */
  operationName?: string;
}

const DEFAULT_OPTIONS: Required<Omit<RetryOptions, 'isRetryable' | 'operationName'>> = {
  maxRetries: 2,
  initialDelayMs: 500,
  maxDelayMs: 5000,
  backoffFactor: 2,
};

const NETWORK_ERROR_CODES = ['ECONNRESET', 'ETIMEDOUT', 'ECONNREFUSED', 'ENOTFOUND', 'EAI_AGAIN', 'UND_ERR_SOCKET'];

interface ErrorShape {
  statusCode?: number;
  code?: string;
  name?: string;
  message?: string;
  cause?: unknown;
}

function asErrorShape(value: unknown): ErrorShape | null {
  return value !== null && typeof value === 'object' ? (value as ErrorShape) : null;
}

/**
 * Default function to determine if an HTTP fetch error is transient.
 * Only used for the remote catalog; container engine calls are never retried.
 */
export function isTransientHttpError(error: unknown): boolean {
  const err = asErrorShape(error);
  if (!err) {
    return false;
  }

  // Retry on server errors (5xx) and rate limiting (429)
  if (err.statusCode && (err.statusCode >= 500 || err.statusCode === 429)) {
    return true;
  }

  // Timeouts from AbortSignal.timeout()
  if (err.name === 'TimeoutError') {
    return true;
  }

  // undici reports socket failures as TypeError('fetch failed') with the errno on cause
  const cause = asErrorShape(err.cause);
  const code = err.code || cause?.code;
  if (code && NETWORK_ERROR_CODES.includes(code)) {
    return true;
  }

  const retryableMessages = ['fetch failed', 'socket hang up', 'network error'];
  if (err.message && retryableMessages.some((msg) => err.message?.includes(msg))) {
    return true;
  }

  return false;
}

/**
 * Sleep for a given number of milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Execute an async function with retry logic and exponential backoff
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxRetries = DEFAULT_OPTIONS.maxRetries,
    initialDelayMs = DEFAULT_OPTIONS.initialDelayMs,
    maxDelayMs = DEFAULT_OPTIONS.maxDelayMs,
    backoffFactor = DEFAULT_OPTIONS.backoffFactor,
    isRetryable = isTransientHttpError,
    operationName = 'operation',
  } = options;

  let lastError: unknown;
  let delay = initialDelayMs;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      // Don't retry if this is the last attempt or error is not retryable
      if (attempt === maxRetries || !isRetryable(error)) {
        throw error;
      }

      logger.warn(
        {
          operationName,
          attempt: attempt + 1,
          maxRetries,
          delayMs: delay,
          statusCode: asErrorShape(error)?.statusCode,
          errorMessage: error instanceof Error ? error.message : String(error),
        },
        `Retrying ${operationName} after transient error (attempt ${attempt + 1}/${maxRetries})`
      );

      await sleep(delay);

      // Exponential backoff with jitter
      const jitter = Math.random() * 0.3 + 0.85; // 0.85 to 1.15
      delay = Math.min(delay * backoffFactor * jitter, maxDelayMs);
    }
  }

  throw lastError;
}
