/**
 * Shared API Client for MedRun
 *
 * Thin typed client the presentation layer uses to reach the orchestrator.
 *
 * Usage:
 * ```typescript
 * const client = createApiClient({ baseUrl: 'http://localhost:3001' });
 *
 * const { id } = await client.jobs.submit({
 *   image: 'mhubai/lungmask:latest',
 *   inputPath: '/data/ct-series',
 *   outputPath: '/data/out',
 *   gpus: [],
 *   args: [],
 * });
 * ```
 */

import type { ErrorKind } from '../types';

/**
 * Configuration for the API client
 */
export interface ApiClientConfig {
  /**
   * Base URL for API requests (e.g., 'http://localhost:3001' or '')
   * Empty string means same-origin requests
   */
  baseUrl: string;

  /**
   * Optional custom fetch implementation (for testing or special environments)
   */
  fetchImpl?: typeof fetch;
}

/**
 * API Error with status code and backend error kind
 */
export class ApiError extends Error {
  constructor(
    public statusCode: number,
    message: string,
    public kind?: ErrorKind
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

interface ErrorPayload {
  error?: { message?: string; kind?: ErrorKind };
  message?: string;
}

function isErrorPayload(value: unknown): value is ErrorPayload {
  return typeof value === 'object' && value !== null;
}

/**
 * Creates a request function configured with the given options
 */
export function createRequestFn(config: ApiClientConfig) {
  const fetchFn = config.fetchImpl || fetch;

  return async function request<T>(
    endpoint: string,
    options?: RequestInit
  ): Promise<T> {
    const url = `${config.baseUrl}/api${endpoint}`;

    const headers = new Headers(options?.headers);
    if (!headers.has('Content-Type')) {
      headers.set('Content-Type', 'application/json');
    }

    const response = await fetchFn(url, {
      ...options,
      headers,
    });

    if (!response.ok) {
      let errorMessage: string;
      let kind: ErrorKind | undefined;
      try {
        const error: unknown = await response.json();
        if (isErrorPayload(error)) {
          kind = error.error?.kind;
          errorMessage =
            error.error?.message ||
            error.message ||
            `Request failed with status ${response.status}`;
        } else {
          errorMessage = `Request failed with status ${response.status}`;
        }
      } catch {
        // Response body is empty or not valid JSON
        errorMessage = `Request failed with status ${response.status}: ${response.statusText || 'No response body'}`;
      }

      throw new ApiError(response.status, errorMessage, kind);
    }

    return response.json() as Promise<T>;
  };
}

/**
 * Type for the request function
 */
export type RequestFn = ReturnType<typeof createRequestFn>;
