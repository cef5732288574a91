/**
 * Shared API Client for MedRun
 *
 * This module provides a configurable API client for any presentation layer
 * (desktop GUI, web UI, scripts) talking to the orchestrator over HTTP.
 */

// Re-export client utilities
export { ApiError, createRequestFn } from './client';
export type { ApiClientConfig, RequestFn } from './client';

// Import API creators
import { createRequestFn, type ApiClientConfig } from './client';
import { createModelsApi, type ModelsApi } from './models';
import { createJobsApi, type JobsApi } from './jobs';
import { createGpusApi, type GpusApi } from './gpus';
import { createHealthApi, type HealthApi } from './health';
import { createSettingsApi, type SettingsApi } from './settings';

// Re-export API types
export type { ModelsApi } from './models';
export type { JobsApi } from './jobs';
export type { GpusApi } from './gpus';
export type { HealthApi, HealthCheckResponse } from './health';
export type { SettingsApi, UpdateSettingsResponse } from './settings';

/**
 * Complete API client with all endpoints
 */
export interface ApiClient {
  models: ModelsApi;
  jobs: JobsApi;
  gpus: GpusApi;
  health: HealthApi;
  settings: SettingsApi;
}

/**
 * Create a fully configured API client
 *
 * @example
 * ```typescript
 * const client = createApiClient({ baseUrl: '' });
 * const { models } = await client.models.list('lung');
 * const { id } = await client.jobs.submit(runRequest);
 * ```
 */
export function createApiClient(config: ApiClientConfig): ApiClient {
  const request = createRequestFn(config);

  return {
    models: createModelsApi(request),
    jobs: createJobsApi(request, config.baseUrl),
    gpus: createGpusApi(request),
    health: createHealthApi(request),
    settings: createSettingsApi(request),
  };
}
