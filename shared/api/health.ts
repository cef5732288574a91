/**
 * Health API
 */

import type { RequestFn } from './client';
import type { EngineInfo } from '../types';

export interface HealthCheckResponse {
  status: string;
  timestamp: string;
}

export interface HealthApi {
  /** Check API health */
  check: () => Promise<HealthCheckResponse>;

  /** Version and availability of the active container engine */
  engine: () => Promise<EngineInfo>;
}

export function createHealthApi(request: RequestFn): HealthApi {
  return {
    check: () => request<HealthCheckResponse>('/health'),

    engine: () => request<EngineInfo>('/health/engine'),
  };
}
