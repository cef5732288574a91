/**
 * GPU API
 */

import type { RequestFn } from './client';
import type { GpuDevice } from '../types';

export interface GpusApi {
  /** List GPUs visible to the engine; refresh bypasses the inventory cache */
  list: (options?: { refresh?: boolean }) => Promise<{ gpus: GpuDevice[] }>;
}

export function createGpusApi(request: RequestFn): GpusApi {
  return {
    list: (options?: { refresh?: boolean }) =>
      request<{ gpus: GpuDevice[] }>(options?.refresh ? '/gpus?refresh=true' : '/gpus'),
  };
}
