/**
 * Models API
 */

import type { RequestFn } from './client';
import type {
  CatalogRefreshResponse,
  ModelDescriptor,
  ModelListResponse,
  ModelStatus,
  PullResult,
  RemoveImageResponse,
} from '../types';

export interface ModelsApi {
  /** List catalog models, optionally filtered by a search query */
  list: (query?: string) => Promise<ModelListResponse>;

  /** Get a specific model by ID */
  get: (id: string) => Promise<ModelDescriptor>;

  /** Local image status for a model */
  getStatus: (id: string) => Promise<ModelStatus>;

  /** Force a catalog refresh */
  refresh: () => Promise<CatalogRefreshResponse>;

  /** Pull (or update) the model image */
  pull: (id: string) => Promise<PullResult>;

  /** Remove the local model image */
  removeImage: (id: string) => Promise<RemoveImageResponse>;
}

export function createModelsApi(request: RequestFn): ModelsApi {
  return {
    list: (query?: string) =>
      request<ModelListResponse>(query ? `/models?q=${encodeURIComponent(query)}` : '/models'),

    get: (id: string) => request<ModelDescriptor>(`/models/${encodeURIComponent(id)}`),

    getStatus: (id: string) => request<ModelStatus>(`/models/${encodeURIComponent(id)}/status`),

    refresh: () => request<CatalogRefreshResponse>('/models/refresh', { method: 'POST' }),

    pull: (id: string) =>
      request<PullResult>(`/models/${encodeURIComponent(id)}/pull`, { method: 'POST' }),

    removeImage: (id: string) =>
      request<RemoveImageResponse>(`/models/${encodeURIComponent(id)}/image`, {
        method: 'DELETE',
      }),
  };
}
